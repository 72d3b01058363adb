import { Controller, Delete, Get, Query, UseGuards } from '@nestjs/common';
import { AdminOnlyGuard } from '../../common/guards/admin-only.guard';
import { LogsQueryDto } from './dto/logs-query.dto';
import { LogsService } from './logs.service';

@Controller('logs')
@UseGuards(AdminOnlyGuard)
export class LogsController {
  constructor(private readonly logs: LogsService) {}

  @Get()
  getLogs(@Query() query: LogsQueryDto): { lines: string[] } {
    return { lines: this.logs.getLines(query.tail) };
  }

  @Delete()
  clearLogs(): { ok: boolean } {
    this.logs.clear();
    return { ok: true };
  }
}
