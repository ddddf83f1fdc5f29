import type { NormalizedFeatures, RiskTier } from './contracts.js';

export const ML_NOTE_PROBABILITY = 0.7;

export const RECOMMENDATIONS = {
  criticalAttendance: 'Critical attendance issue - mandatory attendance counseling',
  monitorAttendance: 'Monitor attendance closely',
  remediation: 'Academic remediation program required',
  academicSupport: 'Academic support recommended',
  studySkills: 'Study skills workshop - very low study time detected',
  tutoring: 'Immediate tutoring for failing grades',
  parentalEngagement: 'Parental engagement initiative',
  counselorMeeting: 'URGENT: Schedule intervention meeting with counselor',
  contactGuardians: 'Contact parents/guardians immediately',
  regularMonitoring: 'Regular monitoring and check-ins',
  continueTrajectory: 'Continue current trajectory',
} as const;

export function mlConfidenceNote(probability: number) {
  return `ML model predicts ${(probability * 100).toFixed(1)}% failure probability - close monitoring advised`;
}

export function synthesize(
  features: NormalizedFeatures,
  finalTier: RiskTier,
  probability: number | null = null
): string[] {
  const recommendations: string[] = [];

  if (features.absences > 15) {
    recommendations.push(RECOMMENDATIONS.criticalAttendance);
  } else if (features.absences > 5) {
    recommendations.push(RECOMMENDATIONS.monitorAttendance);
  }

  if (features.failures > 1) {
    recommendations.push(RECOMMENDATIONS.remediation);
  } else if (features.failures === 1) {
    recommendations.push(RECOMMENDATIONS.academicSupport);
  }

  if (features.studytime === 1) {
    recommendations.push(RECOMMENDATIONS.studySkills);
  }

  if (features.G2 < 10) {
    recommendations.push(RECOMMENDATIONS.tutoring);
  }

  if (features.famsup === 'no') {
    recommendations.push(RECOMMENDATIONS.parentalEngagement);
  }

  if (finalTier === 'High') {
    recommendations.push(RECOMMENDATIONS.counselorMeeting, RECOMMENDATIONS.contactGuardians);
  } else if (finalTier === 'Moderate') {
    recommendations.push(RECOMMENDATIONS.regularMonitoring);
  } else if (recommendations.length === 0) {
    recommendations.push(RECOMMENDATIONS.continueTrajectory);
  }

  if (probability !== null && probability > ML_NOTE_PROBABILITY) {
    recommendations.push(mlConfidenceNote(probability));
  }

  return recommendations;
}
