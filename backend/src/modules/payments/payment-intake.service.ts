import { Inject, Injectable, Logger } from '@nestjs/common';
import { appConfig, type AppConfig } from '../../config/app.config';
import { getErrorMessage, getErrorStack, InvalidSelectionError, PaymentIntegrityError } from '../../common/errors/storefront.errors';
import {
  CATALOG_CURRENCY,
  gatewayAmount,
  GATEWAY_CURRENCY,
  resolveSelection,
  type Selection,
} from '../catalog/catalog';
import { EntitlementService, GATEWAY_METHOD, type Purchase } from '../entitlement/entitlement.service';
import type { DemoPaymentMethod } from '../bot/navigation/action-token';
import { ScreenRenderer, type InvoiceRequest, type Screen } from '../bot/navigation/screens';
import type { BotLang } from '../bot/i18n/bot-lang';
import { buildTelegramStarsInvoicePayload, verifyTelegramStarsInvoicePayload } from './telegram-stars/telegram-stars.payload';

export type GatewayCompletion = {
  userId: string;
  lang: BotLang;
  /** `invoice_payload` echoed back by Telegram. */
  payload: string;
  currency: string;
  /** `telegram_payment_charge_id`. */
  externalRef: string;
};

export type PreCheckoutAnswer = { ok: true };

function purchaseOf(selection: Selection, method: string): Purchase {
  return {
    planName: selection.plan.name,
    devices: selection.plan.devices,
    periodDays: selection.days,
    price: selection.price,
    currency: CATALOG_CURRENCY,
    method,
  };
}

@Injectable()
export class PaymentIntakeService {
  private readonly logger = new Logger(PaymentIntakeService.name);

  constructor(
    private readonly entitlement: EntitlementService,
    private readonly screens: ScreenRenderer,
    @Inject(appConfig.KEY) private readonly config: AppConfig,
  ) {}

  private payloadSecret(): string {
    const secret = this.config.paymentsPayloadSecret ?? this.config.botToken;
    if (!secret) throw new PaymentIntegrityError('No secret configured for invoice payloads');
    return secret;
  }

  /** Card and crypto are demo methods: the entitlement is extended at once and no Payment row is written. */
  async payDemo(args: {
    userId: string;
    lang: BotLang;
    method: DemoPaymentMethod;
    planIndex: number;
    days: number;
    now?: Date;
  }): Promise<Screen> {
    const selection = resolveSelection(args.planIndex, args.days);
    const { user, subscription } = await this.entitlement.extend(
      args.userId,
      purchaseOf(selection, args.method),
      undefined,
      args.now,
    );
    return this.screens.paymentResult(args.lang, {
      plan: selection.plan,
      days: selection.days,
      price: selection.price,
      expiresAt: user.expiresAt ?? subscription.endsAt,
      configUrl: subscription.configUrl,
      demo: true,
    });
  }

  buildInvoice(args: { userId: string; lang: BotLang; planIndex: number; days: number; now?: Date }): InvoiceRequest {
    const selection = resolveSelection(args.planIndex, args.days);
    const payload = buildTelegramStarsInvoicePayload({
      planIndex: selection.planIndex,
      days: selection.days,
      issuedAt: (args.now ?? new Date()).getTime(),
      userId: args.userId,
      secret: this.payloadSecret(),
    });
    return this.screens.invoice(args.lang, selection, {
      payload,
      currency: GATEWAY_CURRENCY,
      amount: gatewayAmount(selection.price),
    });
  }

  /** Stars charges are settled by Telegram; the order is checked on completion. */
  acknowledgePreCheckout(): PreCheckoutAnswer {
    return { ok: true };
  }

  /**
   * Records a completed Stars charge. The Subscription and its Payment are committed together;
   * a charge id seen before re-renders the stored result without extending again.
   */
  async completeGatewayPayment(completion: GatewayCompletion, now: Date = new Date()): Promise<Screen> {
    try {
      const data = verifyTelegramStarsInvoicePayload({
        payload: completion.payload,
        userId: completion.userId,
        secret: this.payloadSecret(),
      });
      if (!data) throw new PaymentIntegrityError(`Invoice payload failed verification: ${completion.payload}`);

      const selection = resolveSelection(data.planIndex, data.days);
      const { subscription, duplicate } = await this.entitlement.extend(
        completion.userId,
        purchaseOf(selection, GATEWAY_METHOD),
        { externalRef: completion.externalRef, amount: gatewayAmount(selection.price), currency: completion.currency },
        now,
      );
      if (duplicate) this.logger.warn(`Stars charge ${completion.externalRef} was delivered again`);

      return this.screens.paymentResult(completion.lang, {
        plan: selection.plan,
        days: selection.days,
        price: selection.price,
        expiresAt: subscription.endsAt,
        configUrl: subscription.configUrl,
        demo: false,
      });
    } catch (error: unknown) {
      this.logger.error(
        `Stars payment not recorded: user=${completion.userId} charge=${completion.externalRef}: ${getErrorMessage(error)}`,
        getErrorStack(error),
      );
      // Charged but not recorded: show payment-failed rather than the generic error.
      if (error instanceof PaymentIntegrityError || error instanceof InvalidSelectionError) {
        return this.screens.paymentFailed(completion.lang);
      }
      throw error;
    }
  }
}
