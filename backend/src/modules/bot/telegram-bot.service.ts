import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { Telegraf } from 'telegraf';
import { appConfig, type AppConfig } from '../../config/app.config';
import { getErrorMessage, getErrorStack } from '../../common/errors/storefront.errors';
import { LEDGER_STORE, type LedgerStore } from '../ledger/ledger.types';
import { PaymentIntakeService } from '../payments/payment-intake.service';
import { Localizer } from './i18n/localizer';
import { NavigationService } from './navigation/navigation.service';
import { ScreenRenderer } from './navigation/screens';
import { PendingRegistrations } from './pending-registrations';
import {
  deleteWebhookBeforePolling,
  launchPolling,
  registerBotCatch,
  registerBotCommandsMenu,
  registerWebhook,
} from './registrars/bot-bootstrap.registrar';
import { registerNavigation } from './registrars/navigation.registrar';
import { registerOnboarding } from './registrars/onboarding.registrar';
import { registerTelegramStarsPayments } from './registrars/stars-payments.registrar';
import type { TelegramRegistrarDeps } from './registrars/telegram-registrar.deps';

/** The token in the path keeps the endpoint unguessable. */
export function webhookPathFor(botToken: string): string {
  return `/webhook/${botToken}`;
}

/**
 * Owns the Telegraf instance. Long polling by default; with WEBHOOK_URL set, updates arrive
 * through the HTTP server on `/webhook/<token>` instead.
 */
@Injectable()
export class TelegramBotService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(TelegramBotService.name);
  private readonly bot: Telegraf | null;
  private readonly pending = new PendingRegistrations();
  private isPolling = false;

  constructor(
    private readonly navigation: NavigationService,
    private readonly intake: PaymentIntakeService,
    private readonly screens: ScreenRenderer,
    private readonly localizer: Localizer,
    @Inject(LEDGER_STORE) private readonly ledger: LedgerStore,
    @Inject(appConfig.KEY) private readonly config: AppConfig,
  ) {
    this.bot = config.botToken ? new Telegraf(config.botToken) : null;
  }

  /** Express handler for webhook mode; null when polling or when no token is configured. */
  webhookMiddleware(): ReturnType<Telegraf['webhookCallback']> | null {
    if (!this.bot || !this.config.webhookUrl) return null;
    return this.bot.webhookCallback(webhookPathFor(this.bot.telegram.token));
  }

  onModuleInit() {
    if (!this.bot) {
      this.logger.warn('BOT_TOKEN is not set. Telegram bot will not start.');
      return;
    }
    // Startup of the HTTP server does not wait for Telegram.
    this.startBot(this.bot).catch((error: unknown) => {
      this.logger.error(`Failed to start bot: ${getErrorMessage(error)}`, getErrorStack(error));
    });
  }

  onModuleDestroy() {
    if (this.bot && this.isPolling) {
      this.bot.stop('shutdown');
      this.isPolling = false;
    }
  }

  private registrarDeps(): TelegramRegistrarDeps {
    return {
      logger: this.logger,
      ledger: this.ledger,
      navigation: this.navigation,
      intake: this.intake,
      screens: this.screens,
      localizer: this.localizer,
      pending: this.pending,
    };
  }

  private async startBot(bot: Telegraf) {
    const deps = this.registrarDeps();
    registerBotCatch({ bot, logger: this.logger });
    registerOnboarding(bot, deps);
    registerNavigation(bot, deps);
    registerTelegramStarsPayments(bot, deps);
    await registerBotCommandsMenu({ telegram: bot.telegram, logger: this.logger });

    const webhookUrl = this.config.webhookUrl;
    if (webhookUrl) {
      await registerWebhook({ telegram: bot.telegram, url: new URL(webhookPathFor(bot.telegram.token), webhookUrl).toString(), logger: this.logger });
      return;
    }
    await deleteWebhookBeforePolling({ telegram: bot.telegram, logger: this.logger });
    this.isPolling = true;
    launchPolling({
      bot,
      logger: this.logger,
      onStopped: () => {
        this.isPolling = false;
      },
    });
  }
}
