import type { Telegraf } from 'telegraf';
import { getErrorMessage, getErrorStack } from '../../../common/errors/storefront.errors';
import { replyHtml } from '../telegram-reply.utils';
import type { TelegramMessageCtx } from '../telegram-runtime.types';
import { langOf, turnOf, type TelegramRegistrarDeps } from './telegram-registrar.deps';

/** `/start [ref<id>]`: language picker for new identities, main menu for known ones. */
export async function handleStart(
  deps: TelegramRegistrarDeps,
  ctx: TelegramMessageCtx,
  input: { payload: string; botUsername: string },
): Promise<void> {
  if (!ctx.from) return;
  const turn = turnOf(deps, ctx.from, input.botUsername);
  try {
    const { screen, pending } = await deps.navigation.start(turn, input.payload);
    if (pending) deps.pending.set(turn.userId, pending);
    await replyHtml(ctx, screen.text, screen.actions);
  } catch (error: unknown) {
    deps.logger.error(`/start failed for ${turn.userId}: ${getErrorMessage(error)}`, getErrorStack(error));
    const screen = deps.screens.error(await langOf(deps, ctx.from));
    await replyHtml(ctx, screen.text, screen.actions);
  }
}

export function registerOnboarding(bot: Telegraf, deps: TelegramRegistrarDeps) {
  bot.start((ctx) => handleStart(deps, ctx, { payload: ctx.payload, botUsername: ctx.botInfo.username }));
}
