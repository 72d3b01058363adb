import type { Logger } from '@nestjs/common';
import type { Telegraf } from 'telegraf';
import { getErrorMessage, getErrorStack } from '../../../common/errors/storefront.errors';
import type { TelegramBotApi } from '../telegram-runtime.types';

export const BOT_COMMANDS = [{ command: 'start', description: '🏠 Main menu' }];

export function registerBotCatch(args: { bot: Telegraf; logger: Logger }) {
  args.bot.catch((err: unknown, ctx) => {
    args.logger.error(`Unhandled error in update ${ctx.update.update_id}: ${getErrorMessage(err)}`, getErrorStack(err));
  });
}

export async function registerBotCommandsMenu(args: { telegram: TelegramBotApi; logger: Logger }) {
  try {
    await args.telegram.setMyCommands(BOT_COMMANDS);
    args.logger.log('Bot commands registered');
  } catch (error: unknown) {
    // The bot works without the command menu.
    args.logger.warn(`Failed to register bot commands: ${getErrorMessage(error)}`);
  }
}

/** getUpdates conflicts with a webhook left over from an earlier deployment. */
export async function deleteWebhookBeforePolling(args: { telegram: TelegramBotApi; logger: Logger }) {
  try {
    await args.telegram.deleteWebhook({ drop_pending_updates: false });
  } catch (error: unknown) {
    args.logger.warn(`Failed to delete webhook: ${getErrorMessage(error)}`);
  }
}

export async function registerWebhook(args: { telegram: TelegramBotApi; url: string; logger: Logger }) {
  await args.telegram.setWebhook(args.url);
  args.logger.log(`Webhook registered at ${new URL(args.url).origin}`);
}

/** Starts long polling. `launch()` settles only when polling stops, so it is not awaited. */
export function launchPolling(args: { bot: Telegraf; logger: Logger; onStopped: () => void }) {
  args.bot
    .launch({ dropPendingUpdates: false }, () => args.logger.log('Telegram bot started (long polling)'))
    .then(args.onStopped, (error: unknown) => {
      args.onStopped();
      args.logger.error(`Long polling stopped: ${getErrorMessage(error)}`, getErrorStack(error));
    });
}
