import { Module } from '@nestjs/common';
import { LedgerService } from './ledger.service';
import { LEDGER_STORE } from './ledger.types';

@Module({
  providers: [LedgerService, { provide: LEDGER_STORE, useExisting: LedgerService }],
  exports: [LedgerService, LEDGER_STORE],
})
export class LedgerModule {}
