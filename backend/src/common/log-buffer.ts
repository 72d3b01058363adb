/**
 * In-memory ring of recent log lines, shown to operators in the admin panel.
 * Filled by BufferLogger, which is installed before DI is up.
 */
const MAX_LINES = 5000;

const lines: string[] = [];

function formatTs(): string {
  return new Date().toISOString();
}

export const LogBuffer = {
  append(level: string, message: string, context?: string): void {
    const ctx = context ? ` [${context}]` : '';
    lines.push(`${formatTs()} ${level}${ctx} ${message}`);
    if (lines.length > MAX_LINES) lines.shift();
  },

  getLines(): string[] {
    return [...lines];
  },

  /** Last `count` lines, oldest first. */
  tail(count: number): string[] {
    if (count <= 0) return [];
    return lines.slice(-count);
  },

  clear(): void {
    lines.length = 0;
  },
};
