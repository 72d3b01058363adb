import { Injectable } from '@nestjs/common';
import { LogBuffer } from '../../common/log-buffer';

@Injectable()
export class LogsService {
  getLines(tail?: number): string[] {
    return tail == null ? LogBuffer.getLines() : LogBuffer.tail(tail);
  }

  clear(): void {
    LogBuffer.clear();
  }
}
