import { Inject, Injectable, Logger } from '@nestjs/common';
import { appConfig, isAdmin, type AppConfig } from '../../../config/app.config';
import { LogBuffer } from '../../../common/log-buffer';
import { AlreadyGrantedError, UnroutableActionError } from '../../../common/errors/storefront.errors';
import { getPlan, resolveSelection } from '../../catalog/catalog';
import { EntitlementService } from '../../entitlement/entitlement.service';
import type { VpnUser } from '../../ledger/entities';
import { LEDGER_STORE, type LedgerStore } from '../../ledger/ledger.types';
import { PaymentIntakeService } from '../../payments/payment-intake.service';
import { botLangFromTelegram, toBotLang, type BotLang } from '../i18n/bot-lang';
import { isInfoTopic, parseActionToken, type ActionToken } from './action-token';
import { ScreenRenderer, type Screen, type Transition } from './screens';

/** Referral captured by `/start ref<id>`, held until the identity is created. */
export type PendingRegistration = { referrerId: string };

/** One inbound interaction of one identity. */
export type Turn = {
  userId: string;
  displayName: string;
  username?: string | null;
  /** Telegram client language; only used before a language is chosen. */
  languageHint?: string | null;
  /** Needed for referral links. */
  botUsername: string;
  pending?: PendingRegistration | null;
};

export type StartResult = {
  screen: Screen;
  /** Set for a new identity that arrived through a referral link. */
  pending: PendingRegistration | null;
};

const ADMIN_LOG_LINES = 15;

export function parseReferral(startPayload: string | null | undefined, userId: string): PendingRegistration | null {
  const m = /^ref(\d+)$/.exec(String(startPayload ?? '').trim());
  if (!m || m[1] === userId) return null;
  return { referrerId: m[1] };
}

@Injectable()
export class NavigationService {
  private readonly logger = new Logger(NavigationService.name);

  constructor(
    @Inject(LEDGER_STORE) private readonly ledger: LedgerStore,
    private readonly entitlement: EntitlementService,
    private readonly intake: PaymentIntakeService,
    private readonly screens: ScreenRenderer,
    @Inject(appConfig.KEY) private readonly config: AppConfig,
  ) {}

  /** `/start`: LanguagePick for a new identity, MainMenu for a known one. */
  async start(turn: Turn, startPayload?: string | null, now: Date = new Date()): Promise<StartResult> {
    const user = await this.ledger.getUser(turn.userId);
    if (!user) {
      return {
        screen: this.screens.languagePick('welcome', botLangFromTelegram(turn.languageHint)),
        pending: parseReferral(startPayload, turn.userId),
      };
    }
    const lang = toBotLang(user.lang);
    if (user.blocked) return { screen: this.screens.blocked(lang), pending: null };
    return { screen: this.menu(user, lang, turn, false, now), pending: null };
  }

  /**
   * Routes one action token. Malformed tokens and selections outside the catalog throw
   * UnroutableActionError / InvalidSelectionError and leave the current screen as it is.
   */
  async handle(turn: Turn, token: string, now: Date = new Date()): Promise<Transition> {
    const action = parseActionToken(token);
    const user = await this.ledger.getUser(turn.userId);

    if (!user) {
      if (action.verb === 'lang') return this.register(turn, action.lang, now);
      return this.screens.languagePick('welcome', botLangFromTelegram(turn.languageHint));
    }

    const lang = toBotLang(user.lang);
    if (user.blocked) return this.screens.blocked(lang);
    return this.route(user, lang, turn, action, token, now);
  }

  private menu(user: VpnUser, lang: BotLang, turn: Turn, firstVisit: boolean, now: Date): Screen {
    return this.screens.mainMenu({ user, lang, displayName: turn.displayName, firstVisit, now });
  }

  private async register(turn: Turn, lang: BotLang, now: Date): Promise<Screen> {
    const referrerId = turn.pending?.referrerId ?? null;
    const user = await this.ledger.createUser({
      id: turn.userId,
      name: turn.displayName,
      username: turn.username ?? null,
      lang,
      referrerId,
    });
    this.logger.log(`New user ${user.id} lang=${lang}${referrerId ? ` referrer=${referrerId}` : ''}`);
    return this.menu(user, lang, turn, true, now);
  }

  private async route(
    user: VpnUser,
    lang: BotLang,
    turn: Turn,
    action: ActionToken,
    token: string,
    now: Date,
  ): Promise<Transition> {
    switch (action.verb) {
      case 'lang': {
        const nextLang = action.lang;
        const updated = await this.ledger.updateUser(user.id, () => ({ lang: nextLang }));
        return this.menu(updated, nextLang, turn, false, now);
      }
      case 'menu':
        return this.menu(user, lang, turn, false, now);
      case 'change_lang':
        return this.screens.languagePick('change', lang);
      case 'trial':
        return this.trial(user, lang, now);
      case 'plans':
        return this.screens.planList(lang);
      case 'plan':
        return this.screens.durationList(lang, action.planIndex, getPlan(action.planIndex));
      case 'dur':
        return this.screens.paymentMethodList(lang, resolveSelection(action.planIndex, action.days));
      case 'pay':
        if (action.method === 'stars') {
          return this.intake.buildInvoice({ userId: user.id, lang, planIndex: action.planIndex, days: action.days, now });
        }
        return this.intake.payDemo({
          userId: user.id,
          lang,
          method: action.method,
          planIndex: action.planIndex,
          days: action.days,
          now,
        });
      case 'account':
        return this.screens.account(lang, { user, referrals: await this.ledger.countReferrals(user.id), now });
      case 'referrals':
        return this.screens.referral(lang, {
          userId: user.id,
          botUsername: turn.botUsername,
          referrals: await this.ledger.countReferrals(user.id),
        });
      case 'admin':
        if (!isAdmin(this.config, user.id)) throw new UnroutableActionError(token, 'not available');
        return this.screens.admin(lang, await this.ledger.stats(), LogBuffer.tail(ADMIN_LOG_LINES));
      default:
        if (isInfoTopic(action.verb)) return this.screens.info(lang, action.verb);
        throw new UnroutableActionError(token);
    }
  }

  private async trial(user: VpnUser, lang: BotLang, now: Date): Promise<Screen> {
    try {
      const { grant } = await this.entitlement.grantTrial(user.id, now);
      return this.screens.trialResult(lang, grant);
    } catch (error: unknown) {
      if (error instanceof AlreadyGrantedError) return this.screens.trialResult(lang, null);
      throw error;
    }
  }
}
