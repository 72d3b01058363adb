import type { Logger } from '@nestjs/common';
import type { LedgerStore } from '../../ledger/ledger.types';
import type { PaymentIntakeService } from '../../payments/payment-intake.service';
import { botLangFromTelegram, toBotLang, type BotLang } from '../i18n/bot-lang';
import type { Localizer } from '../i18n/localizer';
import type { NavigationService, Turn } from '../navigation/navigation.service';
import type { ScreenRenderer } from '../navigation/screens';
import type { PendingRegistrations } from '../pending-registrations';
import { displayNameOf } from '../telegram-ui.utils';
import type { TelegramFrom } from '../telegram-runtime.types';
import { getErrorMessage } from '../../../common/errors/storefront.errors';

export type TelegramRegistrarDeps = {
  logger: Logger;
  ledger: Pick<LedgerStore, 'getUser'>;
  navigation: Pick<NavigationService, 'start' | 'handle'>;
  intake: Pick<PaymentIntakeService, 'acknowledgePreCheckout' | 'completeGatewayPayment'>;
  screens: Pick<ScreenRenderer, 'error'>;
  localizer: Pick<Localizer, 't'>;
  pending: PendingRegistrations;
};

export function turnOf(deps: TelegramRegistrarDeps, from: TelegramFrom, botUsername: string): Turn {
  const userId = String(from.id);
  return {
    userId,
    displayName: displayNameOf(from),
    username: from.username ?? null,
    languageHint: from.language_code ?? null,
    botUsername,
    pending: deps.pending.get(userId),
  };
}

/** Stored language of the identity, or the Telegram client language before registration. */
export async function langOf(deps: TelegramRegistrarDeps, from: TelegramFrom | undefined): Promise<BotLang> {
  const hint = botLangFromTelegram(from?.language_code);
  if (!from) return hint;
  try {
    const user = await deps.ledger.getUser(String(from.id));
    return user ? toBotLang(user.lang) : hint;
  } catch (error: unknown) {
    deps.logger.warn(`Language lookup failed for ${from.id}: ${getErrorMessage(error)}`);
    return hint;
  }
}
