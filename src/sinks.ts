import { createConsoleFormatter } from './format';
import type { ColorMode, ConsoleFormatter } from './format';
import type { LogRecord, LogSink } from './types';

/**
 * Console sink; picks the console method by level
 */
export class ConsoleSink implements LogSink {
  private format: ConsoleFormatter;

  constructor(color: ColorMode | ConsoleFormatter = 'auto') {
    this.format = typeof color === 'function' ? color : createConsoleFormatter(color);
  }

  write(record: LogRecord): void {
    const output = this.format(record);

    switch (record.levelName) {
      case 'warn':
        console.warn(output);
        break;
      case 'error':
      case 'fatal':
        console.error(output);
        break;
      default:
        console.info(output);
    }
  }
}

/**
 * Stream sink for Node.js writable streams, one line per record
 */
export class StreamSink implements LogSink {
  private stream: NodeJS.WritableStream;
  private format: ConsoleFormatter;

  constructor(stream: NodeJS.WritableStream, format: ConsoleFormatter = createConsoleFormatter('off')) {
    this.stream = stream;
    this.format = format;
  }

  write(record: LogRecord): void {
    this.stream.write(this.format(record) + '\n');
  }
}

/**
 * Memory sink for testing or buffering logs
 */
export class MemorySink implements LogSink {
  public records: LogRecord[] = [];

  write(record: LogRecord): void {
    this.records.push(record);
  }

  clear(): void {
    this.records = [];
  }

  /** Messages only, in emission order */
  messages(): string[] {
    return this.records.map((r) => r.message);
  }
}

/**
 * No-op sink that discards all logs
 */
export class NoOpSink implements LogSink {
  write(_record: LogRecord): void {
    // Intentionally empty
  }
}
