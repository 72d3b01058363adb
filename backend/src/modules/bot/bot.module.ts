import { Module } from '@nestjs/common';
import { EntitlementModule } from '../entitlement/entitlement.module';
import { LedgerModule } from '../ledger/ledger.module';
import { PaymentsModule } from '../payments/payments.module';
import { BotUiModule } from './bot-ui.module';
import { NavigationService } from './navigation/navigation.service';
import { TelegramBotService } from './telegram-bot.service';

@Module({
  imports: [LedgerModule, EntitlementModule, PaymentsModule, BotUiModule],
  providers: [NavigationService, TelegramBotService],
  exports: [TelegramBotService],
})
export class BotModule {}
