import { Logger } from '@nestjs/common';
import { createStorefrontTestbed, type StorefrontTestbed } from '../../../testing/storefront-testing-module';
import { buildTelegramStarsInvoicePayload } from '../../payments/telegram-stars/telegram-stars.payload';
import { t } from '../i18n/localizer';
import { messageCtx, registrarDeps } from '../testing/telegram-ctx.mocks';
import { handlePreCheckout, handleSuccessfulPayment } from './stars-payments.registrar';
import type { TelegramRegistrarDeps } from './telegram-registrar.deps';

describe('stars payments registrar', () => {
  let testbed: StorefrontTestbed;
  let deps: TelegramRegistrarDeps;

  beforeAll(() => Logger.overrideLogger(false));

  beforeEach(async () => {
    testbed = await createStorefrontTestbed();
    deps = registrarDeps(testbed);
    await testbed.ledger.createUser({ id: '100', name: 'Ann', lang: 'en' });
  });

  afterEach(async () => {
    await testbed.close();
  });

  it('approves pre-checkout queries', async () => {
    const ctx = { answerPreCheckoutQuery: jest.fn().mockResolvedValue(true) };

    await handlePreCheckout(deps, ctx);

    expect(ctx.answerPreCheckoutQuery).toHaveBeenCalledWith(true);
  });

  it('records the charge and replies with the receipt', async () => {
    const ctx = messageCtx();
    const payload = buildTelegramStarsInvoicePayload({
      planIndex: 0,
      days: 30,
      issuedAt: Date.now(),
      userId: '100',
      secret: 'test-secret',
    });

    await handleSuccessfulPayment(deps, ctx, {
      currency: 'XTR',
      invoice_payload: payload,
      telegram_payment_charge_id: 'charge-1',
    });

    expect(ctx.reply.mock.calls[0][0]).toContain('<code>vless://paid-100@demo.server:443</code>');
    await expect(testbed.ledger.listPayments('100')).resolves.toEqual([
      expect.objectContaining({ externalRef: 'charge-1', amount: 500, currency: 'XTR' }),
    ]);
  });

  it('replies with the generic error when recording fails unexpectedly', async () => {
    deps = registrarDeps(testbed, {
      intake: {
        acknowledgePreCheckout: jest.fn(),
        completeGatewayPayment: jest.fn().mockRejectedValue(new Error('db down')),
      },
    });
    const ctx = messageCtx();

    await handleSuccessfulPayment(deps, ctx, {
      currency: 'XTR',
      invoice_payload: 'plan:0:30:1:0000000000000000',
      telegram_payment_charge_id: 'charge-2',
    });

    expect(ctx.reply.mock.calls[0][0]).toBe(t('en', 'error_generic'));
  });
});
