export { sizeOrder, checkBrackets } from './risk';
export { PortfolioLedger } from './ledger';
export { runDecisionStep, lookbackFor } from './decision';
export { loadRiskProfiles, getRiskProfile, parseRiskPolicy, isRiskProfileName } from './risk-profiles';
export { RISK_PROFILE_NAMES } from './types';
export type { DecisionResult } from './decision';
export type {
  RiskPolicy,
  RiskProfile,
  RiskProfileName,
  Order,
  Position,
  Trade,
  ExitReason,
  EquityPoint,
  RejectionReason,
  SizingResult,
  ApplyResult,
  PortfolioState,
  PortfolioSnapshot,
} from './types';
