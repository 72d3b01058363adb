import { Test, TestingModule } from '@nestjs/testing';
import { getDataSourceToken } from '@nestjs/typeorm';
import type { DataSource } from 'typeorm';
import { appConfig, loadAppConfig } from '../config/app.config';
import { EntitlementService } from '../modules/entitlement/entitlement.service';
import { Localizer } from '../modules/bot/i18n/localizer';
import { NavigationService } from '../modules/bot/navigation/navigation.service';
import { ScreenRenderer } from '../modules/bot/navigation/screens';
import { LedgerService } from '../modules/ledger/ledger.service';
import { LEDGER_STORE } from '../modules/ledger/ledger.types';
import { createTestDataSource } from '../modules/ledger/testing/create-test-data-source';
import { PaymentIntakeService } from '../modules/payments/payment-intake.service';

export const TEST_ENV = {
  BOT_TOKEN: 'test-token',
  ADMIN_IDS: '900',
  PAYMENTS_PAYLOAD_SECRET: 'test-secret',
  SUPPORT_USERNAME: '@TestSupport',
};

export type StorefrontTestbed = {
  module: TestingModule;
  dataSource: DataSource;
  ledger: LedgerService;
  close: () => Promise<void>;
};

/** The storefront services over a fresh in-memory ledger, without the Telegram transport. */
export async function createStorefrontTestbed(env: Record<string, string> = TEST_ENV): Promise<StorefrontTestbed> {
  const dataSource = await createTestDataSource();
  const module = await Test.createTestingModule({
    providers: [
      LedgerService,
      { provide: LEDGER_STORE, useExisting: LedgerService },
      { provide: getDataSourceToken(), useValue: dataSource },
      { provide: appConfig.KEY, useValue: loadAppConfig(env) },
      EntitlementService,
      Localizer,
      ScreenRenderer,
      PaymentIntakeService,
      NavigationService,
    ],
  }).compile();

  return {
    module,
    dataSource,
    ledger: module.get(LedgerService),
    close: async () => {
      await module.close();
      await dataSource.destroy();
    },
  };
}
