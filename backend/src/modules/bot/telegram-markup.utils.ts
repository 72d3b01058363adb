import { Markup } from 'telegraf';
import type { InlineKeyboardMarkup } from 'telegraf/types';
import type { ActionButton } from './navigation/screens';

export function inlineKeyboard(actions: ActionButton[][]): InlineKeyboardMarkup {
  return Markup.inlineKeyboard(actions.map((row) => row.map((b) => Markup.button.callback(b.text, b.action)))).reply_markup;
}
