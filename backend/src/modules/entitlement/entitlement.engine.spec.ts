import { AlreadyGrantedError } from '../../common/errors/storefront.errors';
import {
  assertTrialEligible,
  buildProvisioningToken,
  computeTrialEligibility,
  extendEntitlement,
  extensionBase,
  grantTrial,
  statusOf,
} from './entitlement.engine';

const DAY = 24 * 60 * 60 * 1000;
const NOW = new Date('2026-05-10T08:30:00.000Z');
const plusDays = (days: number) => new Date(NOW.getTime() + days * DAY);

describe('entitlement engine', () => {
  describe('trial eligibility', () => {
    it('allows a trial only while the flag is unset', () => {
      expect(computeTrialEligibility({ trialUsed: false })).toBe(true);
      expect(computeTrialEligibility({ trialUsed: true })).toBe(false);
    });

    it('throws AlreadyGrantedError for a used trial', () => {
      expect(() => assertTrialEligible({ id: '42', trialUsed: true })).toThrow(AlreadyGrantedError);
      expect(() => assertTrialEligible({ id: '42', trialUsed: false })).not.toThrow();
    });
  });

  describe('grantTrial', () => {
    it('gives 3 days without a referrer', () => {
      const grant = grantTrial({ id: '42', referrerId: null }, NOW);

      expect(grant).toEqual({
        days: 3,
        startsAt: NOW,
        expiresAt: plusDays(3),
        configUrl: 'vless://trial-42@demo.server:443',
      });
    });

    it('gives 7 days with a referrer', () => {
      const grant = grantTrial({ id: '42', referrerId: '7' }, NOW);

      expect(grant.days).toBe(7);
      expect(grant.expiresAt).toEqual(plusDays(7));
    });

    it('follows a configured policy', () => {
      const policy = { trialDays: 1, referredTrialDays: 14 };

      expect(grantTrial({ id: '1', referrerId: null }, NOW, policy).days).toBe(1);
      expect(grantTrial({ id: '1', referrerId: '2' }, NOW, policy).days).toBe(14);
    });
  });

  describe('extendEntitlement', () => {
    it('stacks onto time still left', () => {
      const ext = extendEntitlement({ id: '42', expiresAt: plusDays(10) }, 30, NOW, 'sub');

      expect(ext.expiresAt).toEqual(plusDays(40));
      expect(ext.startsAt).toEqual(NOW);
      expect(ext.configUrl).toBe('vless://sub-42@demo.server:443');
    });

    it('restarts from now after a lapse', () => {
      const ext = extendEntitlement({ id: '42', expiresAt: plusDays(-5) }, 60, NOW, 'paid');

      expect(ext.expiresAt).toEqual(plusDays(60));
      expect(ext.configUrl).toBe('vless://paid-42@demo.server:443');
    });

    it('starts from now for a user who never had an entitlement', () => {
      expect(extendEntitlement({ id: '42', expiresAt: null }, 30, NOW, 'sub').expiresAt).toEqual(plusDays(30));
    });

    it('treats an expiry equal to now as still running', () => {
      expect(extensionBase(NOW, NOW)).toBe(NOW);
      expect(extensionBase(new Date(NOW.getTime() - 1), NOW)).toBe(NOW);
    });
  });

  describe('statusOf', () => {
    it('reports none without an expiry', () => {
      expect(statusOf(null, NOW)).toEqual({ kind: 'none' });
    });

    it('reports expired once the expiry has passed', () => {
      expect(statusOf(new Date(NOW.getTime() - 1), NOW)).toEqual({ kind: 'expired' });
    });

    it('floors the days left', () => {
      expect(statusOf(NOW, NOW)).toEqual({ kind: 'active', daysLeft: 0 });
      expect(statusOf(new Date(NOW.getTime() + 2.5 * DAY), NOW)).toEqual({ kind: 'active', daysLeft: 2 });
      expect(statusOf(plusDays(10), NOW)).toEqual({ kind: 'active', daysLeft: 10 });
    });
  });

  it('builds deterministic provisioning tokens', () => {
    expect(buildProvisioningToken('9', 'trial')).toBe(buildProvisioningToken('9', 'trial'));
    expect(buildProvisioningToken('9', 'paid')).toBe('vless://paid-9@demo.server:443');
  });
});
