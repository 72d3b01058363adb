import type { BotLang } from '../i18n/bot-lang';
import { t, type MessageKey, type MessageParams } from '../i18n/localizer';
import type { ActionButton } from '../navigation/screens';

/**
 * Before the trial is used the menu leads with the trial offer; afterwards with account tools.
 * Operators always get the Admin row.
 */
export function buildMainMenuActions(args: {
  lang: BotLang;
  trialUsed: boolean;
  trialDays: number;
  isAdmin: boolean;
}): ActionButton[][] {
  const { lang } = args;
  const btn = (key: MessageKey, action: string, params?: MessageParams): ActionButton => ({
    text: t(lang, key, params),
    action,
  });

  const rows: ActionButton[][] = args.trialUsed
    ? [
        [btn('btn_buy', 'plans')],
        [btn('btn_account', 'account')],
        [btn('btn_referral', 'referrals'), btn('btn_promo', 'promo')],
        [btn('btn_help', 'help'), btn('btn_support', 'support')],
        [btn('btn_language', 'change_lang')],
      ]
    : [
        [btn('btn_trial', 'trial', { days: args.trialDays })],
        [btn('btn_buy', 'plans')],
        [btn('btn_about', 'about'), btn('btn_support', 'support')],
        [btn('btn_language', 'change_lang')],
      ];

  if (args.isAdmin) rows.push([btn('btn_admin', 'admin')]);
  return rows;
}
