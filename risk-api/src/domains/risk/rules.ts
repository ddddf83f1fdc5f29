import type { NormalizedFeatures, RiskBreakdown, RiskComponent, RiskTier, RuleScore } from './contracts.js';

export type RuleSeverity = 'CRITICAL' | 'HIGH' | 'MODERATE';

export type RiskRule = {
  id: string;
  component: RiskComponent;
  condition: string;
  points: number;
  severity: RuleSeverity;
  applies: (features: NormalizedFeatures) => boolean;
};

type ComponentSpec = {
  name: string;
  max: number;
  /** `band` scores the first matching rule, `additive` sums every match. */
  mode: 'band' | 'additive';
};

export const RISK_COMPONENTS: Record<RiskComponent, ComponentSpec> = {
  APS: { name: 'Academic Performance Score', max: 4, mode: 'band' },
  ARS: { name: 'Attendance Risk Score', max: 3, mode: 'band' },
  FSR: { name: 'Family Support Risk', max: 3, mode: 'additive' },
  LRS: { name: 'Lifestyle Risk Score', max: 5, mode: 'additive' },
};

const COMPONENT_ORDER: RiskComponent[] = ['APS', 'ARS', 'FSR', 'LRS'];

export const HIGH_RISK_SCORE = 8;
export const MODERATE_RISK_SCORE = 4;
export const MAX_RISK_SCORE = COMPONENT_ORDER.reduce((sum, component) => sum + RISK_COMPONENTS[component].max, 0);

// Evaluated in this order; band components stop at the first match.
export const RISK_RULES: readonly RiskRule[] = [
  {
    id: 'aps.failing_grade',
    component: 'APS',
    condition: 'G2 < 10',
    points: 4,
    severity: 'CRITICAL',
    applies: (f) => f.G2 < 10,
  },
  {
    id: 'aps.borderline_grade',
    component: 'APS',
    condition: '10 <= G2 <= 11',
    points: 2,
    severity: 'MODERATE',
    applies: (f) => f.G2 >= 10 && f.G2 <= 11,
  },
  {
    // Strictly greater: 15 absences stays in the 1-point band.
    id: 'ars.chronic_absence',
    component: 'ARS',
    condition: 'absences > 15',
    points: 3,
    severity: 'HIGH',
    applies: (f) => f.absences > 15,
  },
  {
    id: 'ars.frequent_absence',
    component: 'ARS',
    condition: '5 <= absences <= 15',
    points: 1,
    severity: 'MODERATE',
    applies: (f) => f.absences >= 5 && f.absences <= 15,
  },
  {
    id: 'fsr.no_family_support',
    component: 'FSR',
    condition: "famsup = 'no'",
    points: 2,
    severity: 'HIGH',
    applies: (f) => f.famsup === 'no',
  },
  {
    id: 'fsr.low_parent_education',
    component: 'FSR',
    condition: '(Medu + Fedu) / 2 <= 2',
    points: 1,
    severity: 'MODERATE',
    applies: (f) => (f.Medu + f.Fedu) / 2 <= 2,
  },
  {
    id: 'lrs.alcohol_use',
    component: 'LRS',
    condition: '(Dalc + Walc) / 2 >= 4',
    points: 2,
    severity: 'HIGH',
    applies: (f) => (f.Dalc + f.Walc) / 2 >= 4,
  },
  {
    id: 'lrs.going_out',
    component: 'LRS',
    condition: 'goout >= 4',
    points: 1,
    severity: 'MODERATE',
    applies: (f) => f.goout >= 4,
  },
  {
    id: 'lrs.minimal_study_time',
    component: 'LRS',
    condition: 'studytime = 1',
    points: 2,
    severity: 'HIGH',
    applies: (f) => f.studytime === 1,
  },
];

function matchingRules(component: RiskComponent, features: NormalizedFeatures) {
  const rules = RISK_RULES.filter((rule) => rule.component === component && rule.applies(features));
  return RISK_COMPONENTS[component].mode === 'band' ? rules.slice(0, 1) : rules;
}

export function scoreComponent(component: RiskComponent, features: NormalizedFeatures) {
  return matchingRules(component, features).reduce((sum, rule) => sum + rule.points, 0);
}

export const academicPerformanceScore = (features: NormalizedFeatures) => scoreComponent('APS', features);
export const attendanceRiskScore = (features: NormalizedFeatures) => scoreComponent('ARS', features);
export const familySupportRisk = (features: NormalizedFeatures) => scoreComponent('FSR', features);
export const lifestyleRiskScore = (features: NormalizedFeatures) => scoreComponent('LRS', features);

export function totalRiskScore(breakdown: RiskBreakdown) {
  return breakdown.APS + breakdown.ARS + breakdown.FSR + breakdown.LRS;
}

export function classify(score: number): RiskTier {
  if (score >= HIGH_RISK_SCORE) return 'High';
  if (score >= MODERATE_RISK_SCORE) return 'Moderate';
  return 'Low';
}

export function scoreRules(features: NormalizedFeatures): RuleScore {
  const breakdown: RiskBreakdown = { APS: 0, ARS: 0, FSR: 0, LRS: 0 };
  const triggeredRules: string[] = [];

  for (const component of COMPONENT_ORDER) {
    const rules = matchingRules(component, features);
    breakdown[component] = rules.reduce((sum, rule) => sum + rule.points, 0);
    triggeredRules.push(...rules.map((rule) => rule.id));
  }

  const total = totalRiskScore(breakdown);
  return { breakdown, total, tier: classify(total), triggeredRules };
}

export function describeRules() {
  return COMPONENT_ORDER.map((component) => ({
    component,
    name: RISK_COMPONENTS[component].name,
    maxPoints: RISK_COMPONENTS[component].max,
    mode: RISK_COMPONENTS[component].mode,
    rules: RISK_RULES
      .filter((rule) => rule.component === component)
      .map(({ id, condition, points, severity }) => ({ id, condition, points, severity })),
  }));
}
