import type { Logger } from '@nestjs/common';
import { getErrorMessage } from '../../common/errors/storefront.errors';
import type { TelegramCallbackCtx } from './telegram-runtime.types';

/** Answers the callback query; an expired query only gets logged. */
export async function answerCbQuerySafe(
  ctx: Pick<TelegramCallbackCtx, 'answerCbQuery'>,
  logger: Logger,
  text?: string,
  showAlert = false,
): Promise<void> {
  try {
    if (text == null) await ctx.answerCbQuery();
    else await ctx.answerCbQuery(text, showAlert ? { show_alert: true } : undefined);
  } catch (error: unknown) {
    logger.debug(`answerCbQuery failed: ${getErrorMessage(error)}`);
  }
}
