import { Injectable } from '@nestjs/common';
import ar from './locales/ar.json';
import en from './locales/en.json';
import hi from './locales/hi.json';
import ru from './locales/ru.json';
import { BOT_LANGS, type BotLang } from './bot-lang';

/** Every key of the English table; the other locales may cover a subset. */
export type MessageKey = keyof typeof en;

export type MessageParams = Record<string, string | number>;

type LocaleTable = Partial<Record<MessageKey, string>>;

const TABLES: Record<BotLang, LocaleTable> = { en, ru, hi, ar };

export function format(template: string, params: MessageParams = {}): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(params, name) ? String(params[name]) : match,
  );
}

/** Requested language, then English, then the raw key. */
export function t(lang: BotLang, key: MessageKey, params?: MessageParams): string {
  const template = TABLES[lang][key] ?? TABLES.en[key] ?? key;
  return format(template, params);
}

@Injectable()
export class Localizer {
  readonly languages: readonly BotLang[] = BOT_LANGS;

  t(lang: BotLang, key: MessageKey, params?: MessageParams): string {
    return t(lang, key, params);
  }

  /** Button label for the language keyboard, e.g. `🇬🇧 English`. */
  languageLabel(lang: BotLang): string {
    return `${t(lang, 'lang_flag')} ${t(lang, 'lang_name')}`;
  }
}
