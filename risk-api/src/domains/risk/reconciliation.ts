import { RISK_TIERS, type RiskTier } from './contracts.js';
import { HIGH_RISK_SCORE, MODERATE_RISK_SCORE } from './rules.js';

export const HIGH_PROBABILITY = 0.65;
export const MODERATE_PROBABILITY = 0.4;

// An unavailable classifier reports 0, which leaves the rule tier.
export function reconcile(totalRuleScore: number, probability: number): RiskTier {
  if (probability > HIGH_PROBABILITY || totalRuleScore >= HIGH_RISK_SCORE) return 'High';
  if (probability > MODERATE_PROBABILITY || totalRuleScore >= MODERATE_RISK_SCORE) return 'Moderate';
  return 'Low';
}

export function tierRank(tier: RiskTier) {
  return RISK_TIERS.indexOf(tier);
}

export function tierLabel(tier: RiskTier) {
  return `${tier} Risk`;
}
