import type { ActionButton } from './navigation/screens';
import { isMessageNotModifiedError } from './telegram-error.utils';
import { inlineKeyboard } from './telegram-markup.utils';
import type { TelegramCallbackCtx, TelegramHtmlExtra, TelegramMessageCtx } from './telegram-runtime.types';

export function htmlExtra(actions?: ActionButton[][]): TelegramHtmlExtra {
  const extra: TelegramHtmlExtra = { parse_mode: 'HTML', link_preview_options: { is_disabled: true } };
  if (actions && actions.length > 0) extra.reply_markup = inlineKeyboard(actions);
  return extra;
}

export function replyHtml(ctx: TelegramMessageCtx, html: string, actions?: ActionButton[][]) {
  return ctx.reply(html, htmlExtra(actions));
}

export function editHtml(ctx: TelegramCallbackCtx, html: string, actions?: ActionButton[][]) {
  return ctx.editMessageText(html, htmlExtra(actions));
}

/** Edits the message behind the button; sends a new one when Telegram refuses the edit. */
export async function editOrReplyHtml(ctx: TelegramCallbackCtx, html: string, actions?: ActionButton[][]) {
  try {
    return await editHtml(ctx, html, actions);
  } catch (error: unknown) {
    if (isMessageNotModifiedError(error)) return undefined;
    return await replyHtml(ctx, html, actions);
  }
}
