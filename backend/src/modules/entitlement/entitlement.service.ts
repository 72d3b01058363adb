import { Inject, Injectable, Logger } from '@nestjs/common';
import { appConfig, type AppConfig } from '../../config/app.config';
import { PaymentIntegrityError } from '../../common/errors/storefront.errors';
import { fmtDateUtc } from '../../common/utils/date.utils';
import type { Subscription, VpnUser } from '../ledger/entities';
import { LEDGER_STORE, type LedgerStore } from '../ledger/ledger.types';
import { assertTrialEligible, extendEntitlement, grantTrial, type TrialGrant, type TrialPolicy } from './entitlement.engine';

export const TRIAL_PLAN_NAME = 'Trial';
export const GATEWAY_METHOD = 'telegram_stars';

export type Purchase = {
  planName: string;
  devices: number;
  periodDays: number;
  price: number;
  currency: string;
  /** `card` / `crypto` for demo checkouts, `telegram_stars` for the gateway. */
  method: string;
};

export type GatewayReceipt = {
  externalRef: string;
  amount: number;
  currency: string;
};

export type TrialOutcome = {
  user: VpnUser;
  grant: TrialGrant;
};

export type ExtensionOutcome = {
  user: VpnUser;
  subscription: Subscription;
  /** True when the receipt was already recorded and nothing changed. */
  duplicate: boolean;
};

@Injectable()
export class EntitlementService {
  private readonly logger = new Logger(EntitlementService.name);
  private readonly policy: TrialPolicy;

  constructor(
    @Inject(LEDGER_STORE) private readonly ledger: LedgerStore,
    @Inject(appConfig.KEY) config: AppConfig,
  ) {
    this.policy = { trialDays: config.trialDays, referredTrialDays: config.referredTrialDays };
  }

  /** Throws AlreadyGrantedError when the trial flag is set; the check and the grant share one critical section. */
  async grantTrial(userId: string, now: Date = new Date()): Promise<TrialOutcome> {
    return this.ledger.withUser(userId, async (tx) => {
      assertTrialEligible(tx.user);
      const grant = grantTrial(tx.user, now, this.policy);
      await tx.appendSubscription({
        userId,
        planName: TRIAL_PLAN_NAME,
        devices: 1,
        periodDays: grant.days,
        price: 0,
        currency: 'USD',
        paymentMethod: 'trial',
        startsAt: grant.startsAt,
        endsAt: grant.expiresAt,
        configUrl: grant.configUrl,
      });
      const user = await tx.update({ trialUsed: true, expiresAt: grant.expiresAt });
      this.logger.log(`Trial granted: user=${userId} days=${grant.days} until=${fmtDateUtc(grant.expiresAt)}`);
      return { user, grant };
    });
  }

  /**
   * Stacks `purchase.periodDays` onto the current entitlement. With a receipt the Subscription and a
   * completed Payment are stored together, and a receipt seen before is answered from the ledger.
   */
  async extend(userId: string, purchase: Purchase, receipt?: GatewayReceipt, now: Date = new Date()): Promise<ExtensionOutcome> {
    return this.ledger.withUser(userId, async (tx) => {
      if (receipt) {
        const seen = await tx.findPaymentByExternalRef(receipt.externalRef);
        if (seen && seen.userId !== userId) {
          throw new PaymentIntegrityError(`Payment ${receipt.externalRef} is already recorded for another user`);
        }
        if (seen) {
          this.logger.warn(`Duplicate payment ignored: user=${userId} ref=${receipt.externalRef}`);
          const paidFor = seen.subscriptionId == null ? null : await tx.findSubscription(seen.subscriptionId);
          if (!paidFor) {
            throw new PaymentIntegrityError(`Payment ${receipt.externalRef} is recorded without its subscription`);
          }
          return { user: tx.user, subscription: paidFor, duplicate: true };
        }
      }

      const extension = extendEntitlement(tx.user, purchase.periodDays, now, receipt ? 'paid' : 'sub');
      const record = {
        userId,
        planName: purchase.planName,
        devices: purchase.devices,
        periodDays: purchase.periodDays,
        price: purchase.price,
        currency: purchase.currency,
        paymentMethod: purchase.method,
        startsAt: extension.startsAt,
        endsAt: extension.expiresAt,
        configUrl: extension.configUrl,
      };

      const subscription = receipt
        ? (
            await tx.appendSubscriptionAndPayment(record, {
              userId,
              amount: receipt.amount,
              currency: receipt.currency,
              method: purchase.method,
              externalRef: receipt.externalRef,
              status: 'completed',
            })
          ).subscription
        : await tx.appendSubscription(record);

      const user = await tx.update({
        expiresAt: extension.expiresAt,
        totalPaid: tx.user.totalPaid + purchase.price,
      });
      this.logger.log(
        `Entitlement extended: user=${userId} plan=${purchase.planName} days=${purchase.periodDays} method=${purchase.method} until=${fmtDateUtc(extension.expiresAt)}`,
      );
      return { user, subscription, duplicate: false };
    });
  }
}
