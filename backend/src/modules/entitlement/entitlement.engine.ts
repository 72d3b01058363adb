import { AlreadyGrantedError } from '../../common/errors/storefront.errors';
import { addDaysUtc, DAY_MS } from '../../common/utils/date.utils';

export type EntitlementUser = {
  id: string;
  trialUsed: boolean;
  referrerId: string | null;
  expiresAt: Date | null;
};

export type TrialPolicy = {
  trialDays: number;
  referredTrialDays: number;
};

export const DEFAULT_TRIAL_POLICY: TrialPolicy = Object.freeze({ trialDays: 3, referredTrialDays: 7 });

/**
 * `trial` for a granted trial, `sub` for a demo purchase, `paid` for a gateway purchase.
 */
export type ProvisioningKind = 'trial' | 'sub' | 'paid';

export type TrialGrant = {
  days: number;
  startsAt: Date;
  expiresAt: Date;
  configUrl: string;
};

export type Extension = {
  startsAt: Date;
  expiresAt: Date;
  configUrl: string;
};

export type EntitlementStatus = { kind: 'none' } | { kind: 'expired' } | { kind: 'active'; daysLeft: number };

/**
 * Demo placeholder for the connection string a real provisioning backend would issue.
 * Deterministic per identity and kind; it grants nothing and is not a secret.
 */
export function buildProvisioningToken(userId: string, kind: ProvisioningKind): string {
  return `vless://${kind}-${userId}@demo.server:443`;
}

export function computeTrialEligibility(user: Pick<EntitlementUser, 'trialUsed'>): boolean {
  return !user.trialUsed;
}

export function assertTrialEligible(user: Pick<EntitlementUser, 'id' | 'trialUsed'>): void {
  if (!computeTrialEligibility(user)) throw new AlreadyGrantedError(user.id);
}

export function trialDaysFor(user: Pick<EntitlementUser, 'referrerId'>, policy: TrialPolicy = DEFAULT_TRIAL_POLICY): number {
  return user.referrerId ? policy.referredTrialDays : policy.trialDays;
}

/** Does not look at `trialUsed`; callers check eligibility inside the same critical section. */
export function grantTrial(
  user: Pick<EntitlementUser, 'id' | 'referrerId'>,
  now: Date,
  policy: TrialPolicy = DEFAULT_TRIAL_POLICY,
): TrialGrant {
  const days = trialDaysFor(user, policy);
  return {
    days,
    startsAt: now,
    expiresAt: addDaysUtc(now, days),
    configUrl: buildProvisioningToken(user.id, 'trial'),
  };
}

/** Time still left is kept: extensions start from the current expiry unless it already lapsed. */
export function extensionBase(expiresAt: Date | null, now: Date): Date {
  return expiresAt && expiresAt.getTime() >= now.getTime() ? expiresAt : now;
}

export function extendEntitlement(
  user: Pick<EntitlementUser, 'id' | 'expiresAt'>,
  durationDays: number,
  now: Date,
  kind: Exclude<ProvisioningKind, 'trial'>,
): Extension {
  return {
    startsAt: now,
    expiresAt: addDaysUtc(extensionBase(user.expiresAt, now), durationDays),
    configUrl: buildProvisioningToken(user.id, kind),
  };
}

export function statusOf(expiresAt: Date | null, now: Date): EntitlementStatus {
  if (!expiresAt) return { kind: 'none' };
  const diffMs = expiresAt.getTime() - now.getTime();
  if (diffMs < 0) return { kind: 'expired' };
  return { kind: 'active', daysLeft: Math.floor(diffMs / DAY_MS) };
}
