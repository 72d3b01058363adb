import type { Telegraf } from 'telegraf';
import { callbackQuery } from 'telegraf/filters';
import {
  getErrorMessage,
  getErrorStack,
  InvalidSelectionError,
  isNavigationInputError,
} from '../../../common/errors/storefront.errors';
import { answerCbQuerySafe } from '../telegram-callback.utils';
import { editOrReplyHtml, replyHtml } from '../telegram-reply.utils';
import type { TelegramCallbackCtx } from '../telegram-runtime.types';
import { langOf, turnOf, type TelegramRegistrarDeps } from './telegram-registrar.deps';

/**
 * One button press. Screens replace the message behind the button; an invoice is sent as a new
 * message. Input errors keep the current screen and only answer the callback with a notice.
 */
export async function handleAction(
  deps: TelegramRegistrarDeps,
  ctx: TelegramCallbackCtx,
  input: { data: string; botUsername: string },
): Promise<void> {
  if (!ctx.from) return;
  const turn = turnOf(deps, ctx.from, input.botUsername);

  try {
    const transition = await deps.navigation.handle(turn, input.data);
    if (input.data.startsWith('lang:')) deps.pending.delete(turn.userId);

    if (transition.kind === 'invoice') {
      await answerCbQuerySafe(ctx, deps.logger, transition.notice);
      await ctx.replyWithInvoice({
        title: transition.title,
        description: transition.description,
        payload: transition.payload,
        provider_token: transition.providerToken,
        currency: transition.currency,
        prices: transition.prices,
      });
      return;
    }

    await answerCbQuerySafe(ctx, deps.logger);
    await editOrReplyHtml(ctx, transition.text, transition.actions);
  } catch (error: unknown) {
    const lang = await langOf(deps, ctx.from);
    if (isNavigationInputError(error)) {
      deps.logger.warn(`Rejected action from ${turn.userId}: ${getErrorMessage(error)}`);
      const notice = deps.localizer.t(lang, error instanceof InvalidSelectionError ? 'selection_invalid' : 'action_unavailable');
      await answerCbQuerySafe(ctx, deps.logger, notice, true);
      return;
    }
    deps.logger.error(`Action "${input.data}" failed for ${turn.userId}: ${getErrorMessage(error)}`, getErrorStack(error));
    await answerCbQuerySafe(ctx, deps.logger);
    const screen = deps.screens.error(lang);
    await replyHtml(ctx, screen.text, screen.actions);
  }
}

export function registerNavigation(bot: Telegraf, deps: TelegramRegistrarDeps) {
  bot.on(callbackQuery('data'), (ctx) =>
    handleAction(deps, ctx, { data: ctx.callbackQuery.data, botUsername: ctx.botInfo.username }),
  );
}
