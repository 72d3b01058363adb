import type { Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import { getErrorMessage, getErrorStack } from '../../../common/errors/storefront.errors';
import { replyHtml } from '../telegram-reply.utils';
import type {
  TelegramMessageCtx,
  TelegramPreCheckoutCtx,
  TelegramSuccessfulPayment,
} from '../telegram-runtime.types';
import { langOf, type TelegramRegistrarDeps } from './telegram-registrar.deps';

export async function handlePreCheckout(deps: TelegramRegistrarDeps, ctx: TelegramPreCheckoutCtx): Promise<void> {
  const answer = deps.intake.acknowledgePreCheckout();
  await ctx.answerPreCheckoutQuery(answer.ok);
}

/** Telegram confirmed the charge: record it and show the receipt. */
export async function handleSuccessfulPayment(
  deps: TelegramRegistrarDeps,
  ctx: TelegramMessageCtx,
  payment: TelegramSuccessfulPayment,
): Promise<void> {
  if (!ctx.from) return;
  const userId = String(ctx.from.id);
  const lang = await langOf(deps, ctx.from);
  try {
    const screen = await deps.intake.completeGatewayPayment({
      userId,
      lang,
      payload: payment.invoice_payload,
      currency: payment.currency,
      externalRef: payment.telegram_payment_charge_id,
    });
    await replyHtml(ctx, screen.text, screen.actions);
  } catch (error: unknown) {
    deps.logger.error(
      `successful_payment ${payment.telegram_payment_charge_id} failed for ${userId}: ${getErrorMessage(error)}`,
      getErrorStack(error),
    );
    const screen = deps.screens.error(lang);
    await replyHtml(ctx, screen.text, screen.actions);
  }
}

export function registerTelegramStarsPayments(bot: Telegraf, deps: TelegramRegistrarDeps) {
  bot.on('pre_checkout_query', (ctx) => handlePreCheckout(deps, ctx));
  bot.on(message('successful_payment'), (ctx) => handleSuccessfulPayment(deps, ctx, ctx.message.successful_payment));
}
