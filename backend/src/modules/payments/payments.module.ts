import { Module } from '@nestjs/common';
import { BotUiModule } from '../bot/bot-ui.module';
import { EntitlementModule } from '../entitlement/entitlement.module';
import { PaymentIntakeService } from './payment-intake.service';

@Module({
  imports: [EntitlementModule, BotUiModule],
  providers: [PaymentIntakeService],
  exports: [PaymentIntakeService],
})
export class PaymentsModule {}
