import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../utils/errors';
import { RISK_PROFILE_NAMES, type RiskPolicy, type RiskProfile, type RiskProfileName } from './types';

export const riskPolicySchema = z
  .object({
    maxPositionFraction: z.number().gt(0).max(1),
    minConfidence: z.number().min(0).max(1),
    confidenceScale: z.number().positive(),
    stopMode: z.enum(['percent', 'atr']),
    stopLossPct: z.number().positive().lt(100),
    takeProfitPct: z.number().positive(),
    atrPeriod: z.number().int().positive(),
    atrStopMultiplier: z.number().positive(),
    atrTakeProfitMultiplier: z.number().positive(),
    minTradeNotional: z.number().min(0),
    feePct: z.number().min(0).lt(100),
    closeOnReversal: z.boolean(),
  })
  .strict();

const profileSchema = z.object({
  startingBalance: z.number().positive(),
  policy: riskPolicySchema,
});

const profilesFileSchema = z.record(z.string(), profileSchema);

export function isRiskProfileName(value: string): value is RiskProfileName {
  return RISK_PROFILE_NAMES.some(n => n === value);
}

let _profiles: Map<RiskProfileName, RiskProfile> | null = null;

/**
 * Load and validate the named risk profiles. Every name in RISK_PROFILE_NAMES
 * must be present. Cached after the first successful load unless a path is given.
 */
export function loadRiskProfiles(profilesPath?: string): Map<RiskProfileName, RiskProfile> {
  if (_profiles && !profilesPath) return _profiles;

  const p = profilesPath || path.resolve(__dirname, '../../config/risk-profiles.json');
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read risk profiles at ${p}: ${errorMessage(err)}`);
  }

  const parsed = profilesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Malformed risk profiles in ${p}: ${parsed.error.issues.map(formatIssue).join('; ')}`);
  }

  const profiles = new Map<RiskProfileName, RiskProfile>();
  for (const name of RISK_PROFILE_NAMES) {
    const entry = parsed.data[name];
    if (!entry) throw new ConfigError(`Risk profile "${name}" missing from ${p}`);
    profiles.set(name, { name, startingBalance: entry.startingBalance, policy: entry.policy });
  }

  if (!profilesPath) _profiles = profiles;
  return profiles;
}

export function getRiskProfile(name: string, profilesPath?: string): RiskProfile {
  if (!isRiskProfileName(name)) {
    throw new ConfigError(`Unknown risk profile "${name}" (expected ${RISK_PROFILE_NAMES.join(', ')})`);
  }
  const profile = loadRiskProfiles(profilesPath).get(name);
  if (!profile) throw new ConfigError(`Risk profile "${name}" not loaded`);
  return profile;
}

/** Validate a hand-built policy, e.g. one assembled in code or tests. */
export function parseRiskPolicy(input: unknown): RiskPolicy {
  const parsed = riskPolicySchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Malformed risk policy: ${parsed.error.issues.map(formatIssue).join('; ')}`);
  }
  return parsed.data;
}

function formatIssue(issue: z.ZodIssue): string {
  return `${issue.path.join('.') || '(root)'}: ${issue.message}`;
}
