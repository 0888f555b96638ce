export const DEFAULT_LOG_FORMAT = '[%(messageCode)s] %(message)s - %(file)s';

export type LogLevel = 'info' | 'warning' | 'error';

export interface LogEntry {
  level: LogLevel;
  messageCode: string;
  message: string;
  file: string;
}

export function formatLogEntry(template: string, entry: LogEntry): string {
  return template.replace(/%\((\w+)\)s/g, (placeholder, key: string) => {
    switch (key) {
      case 'level':
        return entry.level;
      case 'messageCode':
        return entry.messageCode;
      case 'message':
        return entry.message;
      case 'file':
        return entry.file;
      default:
        return placeholder;
    }
  });
}

export class LogBuffer {
  private entries: LogEntry[] = [];

  constructor(private format: string = DEFAULT_LOG_FORMAT) {}

  setFormat(format: string): void {
    this.format = format;
  }

  get size(): number {
    return this.entries.length;
  }

  log(level: LogLevel, messageCode: string, message: string, file = ''): void {
    this.entries.push({ level, messageCode, message, file });
  }

  info(messageCode: string, message: string, file?: string): void {
    this.log('info', messageCode, message, file);
  }

  warning(messageCode: string, message: string, file?: string): void {
    this.log('warning', messageCode, message, file);
  }

  error(messageCode: string, message: string, file?: string): void {
    this.log('error', messageCode, message, file);
  }

  render(from = 0): string {
    return this.entries
      .slice(from)
      .map((e) => formatLogEntry(this.format, e))
      .join('\n');
  }

  clear(): void {
    this.entries = [];
  }
}
