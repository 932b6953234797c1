/* Minimal console logger that prefixes every line with a bracketed scope.
 * Usage:
 *   const log = new ScopedLogger('[RECIPIENTS]', process.env.LOG_SILENT !== '1');
 *   log.info('Updated recipient list: 3 recipients');   // "[RECIPIENTS] Updated recipient list: 3 recipients"
 *   log.child('[SMTP]').error('login failed', err);     // "[RECIPIENTS][SMTP] login failed <err>"
 */
export interface ILogger {
  info(line: string, ...details: unknown[]): void;
  warn(line: string, ...details: unknown[]): void;
  error(line: string, ...details: unknown[]): void;
  child(scope: string): ILogger;
}

type Level = 'info' | 'warn' | 'error';

export class ScopedLogger implements ILogger {
  private readonly enabled: boolean;
  private readonly scope: string;

  constructor(scope = '', enabled = true) {
    this.enabled = !!enabled;
    this.scope = scope ? String(scope).trim() : '';
  }

  private print(level: Level, line: string, details: unknown[]): void {
    if (!this.enabled) return;
    const text = this.scope ? `${this.scope} ${line}` : line;
    switch (level) {
      case 'error':
        console.error(text, ...details);
        break;
      case 'warn':
        console.warn(text, ...details);
        break;
      default:
        console.log(text, ...details);
    }
  }

  info(line: string, ...details: unknown[]): void {
    this.print('info', line, details);
  }

  warn(line: string, ...details: unknown[]): void {
    this.print('warn', line, details);
  }

  error(line: string, ...details: unknown[]): void {
    this.print('error', line, details);
  }

  /** Nested scope, e.g. "[APP]" + "[SMTP]" → "[APP][SMTP]". Inherits enabled flag. */
  child(scope: string): ScopedLogger {
    return new ScopedLogger(`${this.scope}${scope.trim()}`, this.enabled);
  }
}

export default ScopedLogger;
