import { describe, expect, it } from 'vitest';
import { extract } from '../src/domains/risk/features.js';
import {
  MAX_RISK_SCORE,
  academicPerformanceScore,
  attendanceRiskScore,
  classify,
  describeRules,
  familySupportRisk,
  lifestyleRiskScore,
  scoreRules,
} from '../src/domains/risk/rules.js';
import { highRiskStudent, lowRiskStudent } from './helpers/factories.js';

const features = (overrides: Record<string, string | number> = {}) => extract(lowRiskStudent(overrides));

describe('rule scorer', () => {
  it('scores academic performance in bands', () => {
    expect(academicPerformanceScore(features({ G2: 0 }))).toBe(4);
    expect(academicPerformanceScore(features({ G2: 9 }))).toBe(4);
    expect(academicPerformanceScore(features({ G2: 10 }))).toBe(2);
    expect(academicPerformanceScore(features({ G2: 11 }))).toBe(2);
    expect(academicPerformanceScore(features({ G2: 12 }))).toBe(0);
    expect(academicPerformanceScore(features({ G2: 20 }))).toBe(0);
  });

  it('keeps 15 absences in the frequent band and moves 16 to chronic', () => {
    expect(attendanceRiskScore(features({ absences: 4 }))).toBe(0);
    expect(attendanceRiskScore(features({ absences: 5 }))).toBe(1);
    expect(attendanceRiskScore(features({ absences: 15 }))).toBe(1);
    expect(attendanceRiskScore(features({ absences: 16 }))).toBe(3);
  });

  it('adds family support risks together', () => {
    expect(familySupportRisk(features({ famsup: 'no', Medu: 1, Fedu: 1 }))).toBe(3);
    expect(familySupportRisk(features({ Medu: 3, Fedu: 1 }))).toBe(1);
    expect(familySupportRisk(features({ Medu: 3, Fedu: 2 }))).toBe(0);
    expect(familySupportRisk(features({ famsup: 'no' }))).toBe(2);
  });

  it('adds lifestyle risks together', () => {
    expect(lifestyleRiskScore(features({ Dalc: 5, Walc: 3 }))).toBe(2);
    expect(lifestyleRiskScore(features({ Dalc: 4, Walc: 3 }))).toBe(0);
    expect(lifestyleRiskScore(features({ goout: 4 }))).toBe(1);
    expect(lifestyleRiskScore(features({ Dalc: 5, Walc: 3, goout: 4, studytime: 1 }))).toBe(5);
  });

  it('classifies totals at the tier thresholds', () => {
    expect(classify(0)).toBe('Low');
    expect(classify(3)).toBe('Low');
    expect(classify(4)).toBe('Moderate');
    expect(classify(7)).toBe('Moderate');
    expect(classify(8)).toBe('High');
    expect(classify(MAX_RISK_SCORE)).toBe('High');
  });

  it('gives the maximum score to a student who triggers every rule', () => {
    const score = scoreRules(extract(highRiskStudent()));

    expect(score.breakdown).toEqual({ APS: 4, ARS: 3, FSR: 3, LRS: 5 });
    expect(score.total).toBe(15);
    expect(score.total).toBe(MAX_RISK_SCORE);
    expect(score.tier).toBe('High');
    expect(score.triggeredRules).toEqual([
      'aps.failing_grade',
      'ars.chronic_absence',
      'fsr.no_family_support',
      'fsr.low_parent_education',
      'lrs.alcohol_use',
      'lrs.going_out',
      'lrs.minimal_study_time',
    ]);
  });

  it('gives zero to a student who triggers nothing', () => {
    const score = scoreRules(features());

    expect(score.breakdown).toEqual({ APS: 0, ARS: 0, FSR: 0, LRS: 0 });
    expect(score.total).toBe(0);
    expect(score.tier).toBe('Low');
    expect(score.triggeredRules).toEqual([]);
  });

  it('never lowers a score when grades drop or absences rise', () => {
    let previous = -1;
    for (let g2 = 20; g2 >= 0; g2--) {
      const total = scoreRules(features({ G2: g2 })).total;
      expect(total).toBeGreaterThanOrEqual(previous);
      previous = total;
    }

    previous = -1;
    for (let absences = 0; absences <= 40; absences++) {
      const total = scoreRules(features({ absences })).total;
      expect(total).toBeGreaterThanOrEqual(previous);
      previous = total;
    }
  });

  it('describes every component with its rules', () => {
    const components = describeRules();

    expect(components.map((c) => c.component)).toEqual(['APS', 'ARS', 'FSR', 'LRS']);
    expect(components.map((c) => c.maxPoints)).toEqual([4, 3, 3, 5]);
    expect(components[0].rules[0]).toEqual({
      id: 'aps.failing_grade',
      condition: 'G2 < 10',
      points: 4,
      severity: 'CRITICAL',
    });
    expect(components[3].rules).toHaveLength(3);
  });
});
