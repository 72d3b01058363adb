import { InvalidSelectionError, UnroutableActionError } from '../../../common/errors/storefront.errors';
import { isBotLang, type BotLang } from '../i18n/bot-lang';

export const PAYMENT_METHODS = ['stars', 'card', 'crypto'] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

/** `stars` goes through the Telegram Stars invoice; the others complete at once. */
export type DemoPaymentMethod = Exclude<PaymentMethod, 'stars'>;

const SIMPLE_VERBS = [
  'menu',
  'change_lang',
  'trial',
  'plans',
  'account',
  'referrals',
  'promo',
  'about',
  'help',
  'support',
  'admin',
] as const;

export type SimpleVerb = (typeof SIMPLE_VERBS)[number];

export type InfoTopic = Extract<SimpleVerb, 'about' | 'help' | 'support' | 'promo'>;

export type ActionToken =
  | { verb: SimpleVerb }
  | { verb: 'lang'; lang: BotLang }
  | { verb: 'plan'; planIndex: number }
  | { verb: 'dur'; planIndex: number; days: number }
  | { verb: 'pay'; method: PaymentMethod; planIndex: number; days: number };

function isSimpleVerb(verb: string): verb is SimpleVerb {
  return SIMPLE_VERBS.some((v) => v === verb);
}

function isPaymentMethod(value: string): value is PaymentMethod {
  return PAYMENT_METHODS.some((m) => m === value);
}

export function isInfoTopic(verb: SimpleVerb): verb is InfoTopic {
  return verb === 'about' || verb === 'help' || verb === 'support' || verb === 'promo';
}

function toIndex(raw: string, token: string): number {
  if (!/^\d{1,6}$/.test(raw)) throw new UnroutableActionError(token, `"${raw}" is not a number`);
  return Number(raw);
}

function expectArity(parts: string[], arity: number, token: string): void {
  if (parts.length !== arity + 1) throw new UnroutableActionError(token, `expected ${arity} argument(s)`);
}

/**
 * Parses Telegram callback data (`verb[:arg]*`). A malformed token throws UnroutableActionError;
 * a well-formed token naming a language or payment method that is not offered throws InvalidSelectionError.
 * Plan and duration ranges are checked against the catalog by the caller.
 */
export function parseActionToken(token: string): ActionToken {
  const parts = token.split(':');
  const verb = parts[0] ?? '';

  if (isSimpleVerb(verb)) {
    expectArity(parts, 0, token);
    return { verb };
  }

  switch (verb) {
    case 'lang': {
      expectArity(parts, 1, token);
      const lang = parts[1];
      if (!isBotLang(lang)) throw new InvalidSelectionError(`Language "${lang}" is not offered`);
      return { verb, lang };
    }
    case 'plan':
      expectArity(parts, 1, token);
      return { verb, planIndex: toIndex(parts[1], token) };
    case 'dur':
      expectArity(parts, 2, token);
      return { verb, planIndex: toIndex(parts[1], token), days: toIndex(parts[2], token) };
    case 'pay': {
      expectArity(parts, 3, token);
      const method = parts[1];
      if (!isPaymentMethod(method)) throw new InvalidSelectionError(`Payment method "${method}" is not offered`);
      return { verb, method, planIndex: toIndex(parts[2], token), days: toIndex(parts[3], token) };
    }
    default:
      throw new UnroutableActionError(token);
  }
}

export function encodeActionToken(action: ActionToken): string {
  switch (action.verb) {
    case 'lang':
      return `lang:${action.lang}`;
    case 'plan':
      return `plan:${action.planIndex}`;
    case 'dur':
      return `dur:${action.planIndex}:${action.days}`;
    case 'pay':
      return `pay:${action.method}:${action.planIndex}:${action.days}`;
    default:
      return action.verb;
  }
}
