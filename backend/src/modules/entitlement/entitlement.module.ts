import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { EntitlementService } from './entitlement.service';

@Module({
  imports: [LedgerModule],
  providers: [EntitlementService],
  exports: [EntitlementService],
})
export class EntitlementModule {}
