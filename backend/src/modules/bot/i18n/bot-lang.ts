export const BOT_LANGS = ['en', 'ru', 'hi', 'ar'] as const;

export type BotLang = (typeof BOT_LANGS)[number];

export const DEFAULT_BOT_LANG: BotLang = 'en';

export function isBotLang(value: unknown): value is BotLang {
  return BOT_LANGS.some((lang) => lang === value);
}

/** Stored language of a user row; anything unknown falls back to English. */
export function toBotLang(value: string | null | undefined): BotLang {
  return isBotLang(value) ? value : DEFAULT_BOT_LANG;
}

export function botLangFromTelegram(languageCode: string | undefined | null): BotLang {
  const code = String(languageCode ?? '').toLowerCase();
  // Telegram sends IETF tags: 'ru', 'en-US', 'hi', 'ar', ...
  if (code.startsWith('ru') || code.startsWith('be') || code.startsWith('kk') || code.startsWith('uk')) return 'ru';
  if (code.startsWith('hi')) return 'hi';
  if (code.startsWith('ar')) return 'ar';
  return DEFAULT_BOT_LANG;
}
