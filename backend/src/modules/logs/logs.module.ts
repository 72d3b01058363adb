import { Module } from '@nestjs/common';
import { AdminOnlyGuard } from '../../common/guards/admin-only.guard';
import { LogsController } from './logs.controller';
import { LogsService } from './logs.service';

@Module({
  controllers: [LogsController],
  providers: [LogsService, AdminOnlyGuard],
})
export class LogsModule {}
