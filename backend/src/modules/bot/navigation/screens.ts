import { Inject, Injectable } from '@nestjs/common';
import { appConfig, isAdmin, type AppConfig } from '../../../config/app.config';
import { fmtDateTimeUtc, fmtDateUtc } from '../../../common/utils/date.utils';
import { DURATIONS, monthlyEquivalent, PLANS, type CatalogPlan, type Selection } from '../../catalog/catalog';
import { statusOf, trialDaysFor, type TrialGrant } from '../../entitlement/entitlement.engine';
import type { LedgerStats } from '../../ledger/ledger.types';
import { buildMainMenuActions } from '../keyboards/main-menu.keyboard';
import type { BotLang } from '../i18n/bot-lang';
import { Localizer, type MessageKey, type MessageParams } from '../i18n/localizer';
import { escHtml, fmtAmount } from '../telegram-ui.utils';
import { encodeActionToken, type InfoTopic } from './action-token';

export type ScreenId =
  | 'LanguagePick'
  | 'MainMenu'
  | 'PlanList'
  | 'DurationList'
  | 'PaymentMethodList'
  | 'TrialResult'
  | 'PaymentResult'
  | 'AccountView'
  | 'ReferralView'
  | 'InfoView'
  | 'AdminView'
  | 'BlockedNotice'
  | 'ErrorNotice';

export type ActionButton = {
  text: string;
  /** Callback data, an encoded action token. */
  action: string;
};

export type Screen = {
  kind: 'screen';
  id: ScreenId;
  /** Telegram HTML. */
  text: string;
  actions: ActionButton[][];
};

export type InvoiceRequest = {
  kind: 'invoice';
  id: 'PendingInvoice';
  /** Short callback answer shown while the invoice opens. */
  notice: string;
  title: string;
  description: string;
  payload: string;
  providerToken: string;
  currency: string;
  /** Label and amount in the smallest units of `currency`. */
  prices: Array<{ label: string; amount: number }>;
};

export type Transition = Screen | InvoiceRequest;

/** The user fields screens read; satisfied by the ledger row. */
export type ScreenUser = {
  id: string;
  name: string;
  referrerId: string | null;
  trialUsed: boolean;
  expiresAt: Date | null;
  totalPaid: number;
  createdAt: Date;
};

export type PaymentReceiptView = {
  plan: CatalogPlan;
  days: number;
  price: number;
  expiresAt: Date;
  configUrl: string;
  /** Demo checkouts also offer the referral program. */
  demo: boolean;
};

const INFO_KEYS: Record<InfoTopic, MessageKey> = {
  about: 'about_text',
  help: 'help_text',
  support: 'support_text',
  promo: 'promo_text',
};

function plural(devices: number): string {
  return devices > 1 ? 's' : '';
}

/** Renders every screen of the storefront for one language. No I/O. */
@Injectable()
export class ScreenRenderer {
  constructor(
    private readonly localizer: Localizer,
    @Inject(appConfig.KEY) private readonly config: AppConfig,
  ) {}

  private t(lang: BotLang, key: MessageKey, params?: MessageParams): string {
    return this.localizer.t(lang, key, params);
  }

  private screen(id: ScreenId, text: string, actions: ActionButton[][] = []): Screen {
    return { kind: 'screen', id, text, actions };
  }

  private button(lang: BotLang, key: MessageKey, action: string, params?: MessageParams): ActionButton {
    return { text: this.t(lang, key, params), action };
  }

  private backToMenu(lang: BotLang): ActionButton[] {
    return [this.button(lang, 'btn_back', 'menu')];
  }

  private trialPolicy() {
    return { trialDays: this.config.trialDays, referredTrialDays: this.config.referredTrialDays };
  }

  statusLine(lang: BotLang, expiresAt: Date | null, now: Date): string {
    const status = statusOf(expiresAt, now);
    switch (status.kind) {
      case 'none':
        return this.t(lang, 'status_no_sub');
      case 'expired':
        return this.t(lang, 'status_expired');
      case 'active':
        return this.t(lang, 'status_active', { days: status.daysLeft });
    }
  }

  /** `welcome` for the first visit, `change` when an existing user switches language. */
  languagePick(mode: 'welcome' | 'change', lang: BotLang): Screen {
    const text = mode === 'welcome' ? this.t('en', 'language_prompt') : this.t(lang, 'select_language');
    const actions = this.localizer.languages.map((code) => [
      { text: this.localizer.languageLabel(code), action: encodeActionToken({ verb: 'lang', lang: code }) },
    ]);
    return this.screen('LanguagePick', text, actions);
  }

  mainMenu(args: { user: ScreenUser; lang: BotLang; displayName: string; firstVisit: boolean; now: Date }): Screen {
    const { user, lang } = args;
    const name = escHtml(args.displayName);
    const policy = this.trialPolicy();

    const text = args.firstVisit
      ? this.t(lang, 'welcome', { name }) +
        (user.referrerId
          ? this.t(lang, 'welcome_referred', { referred_days: policy.referredTrialDays, days: policy.trialDays })
          : this.t(lang, 'welcome_trial', { days: policy.trialDays })) +
        this.t(lang, 'choose_option')
      : this.t(lang, 'welcome_back', { name, status: this.statusLine(lang, user.expiresAt, args.now) });

    const actions = buildMainMenuActions({
      lang,
      trialUsed: user.trialUsed,
      trialDays: trialDaysFor(user, policy),
      isAdmin: isAdmin(this.config, user.id),
    });
    return this.screen('MainMenu', text, actions);
  }

  planList(lang: BotLang): Screen {
    let text = this.t(lang, 'plans_title');
    const actions: ActionButton[][] = [];
    PLANS.forEach((plan, planIndex) => {
      text += this.t(lang, 'plan_item', {
        name: plan.name,
        devices: plan.devices,
        plural: plural(plan.devices),
        price: fmtAmount(plan.prices[30]),
      });
      actions.push([
        this.button(lang, 'plan_button', encodeActionToken({ verb: 'plan', planIndex }), {
          name: plan.name,
          devices: plan.devices,
          plural: plural(plan.devices),
        }),
      ]);
    });
    text += this.t(lang, 'plans_features');
    actions.push(this.backToMenu(lang));
    return this.screen('PlanList', text, actions);
  }

  private durationLabel(lang: BotLang, days: number): string {
    return days >= 365 ? this.t(lang, 'duration_year') : this.t(lang, 'duration_days', { days });
  }

  durationList(lang: BotLang, planIndex: number, plan: CatalogPlan): Screen {
    let text = this.t(lang, 'duration_title', { plan_name: plan.name, devices: plan.devices });
    const actions: ActionButton[][] = [];
    for (const days of DURATIONS) {
      const price = plan.prices[days];
      const label = this.durationLabel(lang, days);
      text += this.t(lang, 'duration_item', { label, price: fmtAmount(price), monthly: monthlyEquivalent(price, days) });
      actions.push([
        this.button(lang, 'duration_button', encodeActionToken({ verb: 'dur', planIndex, days }), {
          label,
          price: fmtAmount(price),
        }),
      ]);
    }
    actions.push([this.button(lang, 'btn_back', 'plans')]);
    return this.screen('DurationList', text, actions);
  }

  paymentMethodList(lang: BotLang, selection: Selection): Screen {
    const { plan, planIndex, days } = selection;
    const text = this.t(lang, 'payment_title', {
      plan: `${plan.name} (${plan.devices} devices)`,
      duration: days,
      price: fmtAmount(selection.price),
    });
    const pay = (method: 'stars' | 'card' | 'crypto') => encodeActionToken({ verb: 'pay', method, planIndex, days });
    return this.screen('PaymentMethodList', text, [
      [this.button(lang, 'btn_pay_stars', pay('stars'))],
      [this.button(lang, 'btn_pay_card', pay('card'))],
      [this.button(lang, 'btn_pay_crypto', pay('crypto'))],
      [this.button(lang, 'btn_back', encodeActionToken({ verb: 'plan', planIndex }))],
    ]);
  }

  trialResult(lang: BotLang, grant: TrialGrant | null): Screen {
    const text = grant
      ? this.t(lang, 'trial_activated', {
          days: grant.days,
          expires: fmtDateTimeUtc(grant.expiresAt),
          config: escHtml(grant.configUrl),
        })
      : this.t(lang, 'trial_used');
    return this.screen('TrialResult', text, [[this.button(lang, 'btn_buy', 'plans')], this.backToMenu(lang)]);
  }

  paymentResult(lang: BotLang, receipt: PaymentReceiptView): Screen {
    const text = this.t(lang, 'payment_success', {
      plan: receipt.plan.name,
      duration: receipt.days,
      price: fmtAmount(receipt.price),
      expires: fmtDateUtc(receipt.expiresAt),
      config: escHtml(receipt.configUrl),
    });
    const actions: ActionButton[][] = [
      [this.button(lang, 'btn_account', 'account')],
      [this.button(lang, 'btn_buy', 'plans')],
    ];
    if (receipt.demo) actions.push([this.button(lang, 'btn_referral', 'referrals')]);
    actions.push(this.backToMenu(lang));
    return this.screen('PaymentResult', text, actions);
  }

  paymentFailed(lang: BotLang): Screen {
    return this.screen(
      'PaymentResult',
      this.t(lang, 'payment_failed', { support: escHtml(this.config.supportUsername) }),
      [this.backToMenu(lang)],
    );
  }

  account(lang: BotLang, args: { user: ScreenUser; referrals: number; now: Date }): Screen {
    const { user } = args;
    const text = this.t(lang, 'account_title', {
      user_id: user.id,
      name: escHtml(user.name),
      date: fmtDateUtc(user.createdAt),
      status: this.statusLine(lang, user.expiresAt, args.now),
      spent: fmtAmount(user.totalPaid),
      refs: args.referrals,
    });
    return this.screen('AccountView', text, [[this.button(lang, 'btn_buy', 'plans')], this.backToMenu(lang)]);
  }

  referral(lang: BotLang, args: { userId: string; botUsername: string; referrals: number }): Screen {
    const link = `https://t.me/${args.botUsername}?start=ref${args.userId}`;
    const text = this.t(lang, 'referral_text', {
      link: escHtml(link),
      referred_days: this.config.referredTrialDays,
      days: this.config.trialDays,
      refs: args.referrals,
    });
    return this.screen('ReferralView', text, [this.backToMenu(lang)]);
  }

  info(lang: BotLang, topic: InfoTopic): Screen {
    return this.screen('InfoView', this.t(lang, INFO_KEYS[topic], { support: escHtml(this.config.supportUsername) }), [
      this.backToMenu(lang),
    ]);
  }

  admin(lang: BotLang, stats: LedgerStats, logTail: readonly string[]): Screen {
    const text = this.t(lang, 'admin_title', {
      users: stats.users,
      subscriptions: stats.subscriptions,
      revenue: stats.revenue.toFixed(2),
      log: escHtml(logTail.join('\n') || '-'),
    });
    return this.screen('AdminView', text, [this.backToMenu(lang)]);
  }

  blocked(lang: BotLang): Screen {
    return this.screen('BlockedNotice', this.t(lang, 'blocked_text', { support: escHtml(this.config.supportUsername) }));
  }

  error(lang: BotLang): Screen {
    return this.screen('ErrorNotice', this.t(lang, 'error_generic'), [this.backToMenu(lang)]);
  }

  invoice(
    lang: BotLang,
    selection: Selection,
    args: { payload: string; currency: string; amount: number },
  ): InvoiceRequest {
    const title = this.t(lang, 'invoice_title', { plan: selection.plan.name, duration: selection.days });
    return {
      kind: 'invoice',
      id: 'PendingInvoice',
      notice: this.t(lang, 'payment_opening'),
      title,
      description: this.t(lang, 'invoice_description', { duration: selection.days, devices: selection.plan.devices }),
      payload: args.payload,
      providerToken: this.config.paymentProviderToken,
      currency: args.currency,
      prices: [{ label: title, amount: args.amount }],
    };
  }
}
