import { ConsoleLogger } from '@nestjs/common';
import { LogBuffer } from './log-buffer';

export function parseLevels(raw: string | undefined, fallback: string): string[] {
  return (raw ?? fallback)
    .toLowerCase()
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Console output is filtered by LOG_LEVEL_CONSOLE (default log,warn,error);
 * the admin buffer by LOG_LEVEL_BUFFER (default log,warn,error, no debug/verbose).
 */
export class BufferLogger extends ConsoleLogger {
  private readonly consoleLevels: string[];
  private readonly bufferLevels: string[];

  constructor(env: Record<string, string | undefined> = process.env) {
    super();
    this.consoleLevels = parseLevels(env.LOG_LEVEL_CONSOLE, 'log,warn,error');
    this.bufferLevels = parseLevels(env.LOG_LEVEL_BUFFER, 'log,warn,error');
  }

  override log(message: string, context?: string): void {
    if (this.consoleLevels.includes('log')) super.log(message, context);
    if (this.bufferLevels.includes('log')) LogBuffer.append('LOG', message, context);
  }

  override error(message: string, trace?: string, context?: string): void {
    if (this.consoleLevels.includes('error')) super.error(message, trace, context);
    if (this.bufferLevels.includes('error')) LogBuffer.append('ERROR', trace ? `${message} ${trace}` : message, context);
  }

  override warn(message: string, context?: string): void {
    if (this.consoleLevels.includes('warn')) super.warn(message, context);
    if (this.bufferLevels.includes('warn')) LogBuffer.append('WARN', message, context);
  }

  override debug(message: string, context?: string): void {
    if (this.consoleLevels.includes('debug')) super.debug(message, context);
    if (this.bufferLevels.includes('debug')) LogBuffer.append('DEBUG', message, context);
  }

  override verbose(message: string, context?: string): void {
    if (this.consoleLevels.includes('verbose')) super.verbose(message, context);
    if (this.bufferLevels.includes('verbose')) LogBuffer.append('VERBOSE', message, context);
  }
}
