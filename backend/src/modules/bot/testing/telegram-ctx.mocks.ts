import { Logger } from '@nestjs/common';
import type { User } from 'telegraf/types';
import type { StorefrontTestbed } from '../../../testing/storefront-testing-module';
import { PaymentIntakeService } from '../../payments/payment-intake.service';
import { Localizer } from '../i18n/localizer';
import { NavigationService } from '../navigation/navigation.service';
import { ScreenRenderer } from '../navigation/screens';
import { PendingRegistrations } from '../pending-registrations';
import type { TelegramRegistrarDeps } from '../registrars/telegram-registrar.deps';

export const ANN: User = { id: 100, is_bot: false, first_name: 'Ann', username: 'ann', language_code: 'en' };

export function messageCtx(from: User = ANN) {
  return { from, reply: jest.fn().mockResolvedValue(undefined) };
}

export function callbackCtx(from: User = ANN) {
  return {
    ...messageCtx(from),
    answerCbQuery: jest.fn().mockResolvedValue(true),
    editMessageText: jest.fn().mockResolvedValue(true),
    replyWithInvoice: jest.fn().mockResolvedValue(undefined),
  };
}

export function registrarDeps(testbed: StorefrontTestbed, overrides: Partial<TelegramRegistrarDeps> = {}): TelegramRegistrarDeps {
  return {
    logger: new Logger('TelegramTest'),
    ledger: testbed.ledger,
    navigation: testbed.module.get(NavigationService),
    intake: testbed.module.get(PaymentIntakeService),
    screens: testbed.module.get(ScreenRenderer),
    localizer: testbed.module.get(Localizer),
    pending: new PendingRegistrations(),
    ...overrides,
  };
}
