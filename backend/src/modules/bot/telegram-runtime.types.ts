import type { InlineKeyboardMarkup, User } from 'telegraf/types';

export type TelegramFrom = User;

/** Extra options of every storefront message: HTML, no link previews, optional inline keyboard. */
export type TelegramHtmlExtra = {
  parse_mode: 'HTML';
  link_preview_options?: { is_disabled?: boolean };
  reply_markup?: InlineKeyboardMarkup;
};

export type TelegramInvoice = {
  title: string;
  description: string;
  payload: string;
  provider_token: string;
  currency: string;
  prices: ReadonlyArray<{ label: string; amount: number }>;
};

export type TelegramSuccessfulPayment = {
  currency: string;
  invoice_payload: string;
  telegram_payment_charge_id: string;
};

/** The part of a Telegraf context the storefront handlers use. */
export interface TelegramMessageCtx {
  readonly from?: TelegramFrom;
  reply(text: string, extra?: TelegramHtmlExtra): Promise<unknown>;
}

export interface TelegramCallbackCtx extends TelegramMessageCtx {
  answerCbQuery(text?: string, extra?: { show_alert?: boolean }): Promise<unknown>;
  editMessageText(text: string, extra?: TelegramHtmlExtra): Promise<unknown>;
  replyWithInvoice(invoice: TelegramInvoice): Promise<unknown>;
}

export interface TelegramPreCheckoutCtx {
  answerPreCheckoutQuery(ok: boolean, errorMessage?: string): Promise<unknown>;
}

export interface TelegramBotApi {
  setMyCommands(commands: Array<{ command: string; description: string }>): Promise<unknown>;
  deleteWebhook(extra?: { drop_pending_updates?: boolean }): Promise<unknown>;
  setWebhook(url: string, extra?: { drop_pending_updates?: boolean }): Promise<unknown>;
}
