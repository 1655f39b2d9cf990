/**
 * Structured logging utility.
 *
 * Writes one JSON object per line, keeping stdout free for rendered output.
 *
 * @packageDocumentation
 */

/**
 * Severity of a log entry. `debug` entries are dropped unless debug mode is on.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * One serialized log line.
 *
 * @example
 * ```json
 * {"timestamp":"2024-01-15T10:30:00.000Z","level":"debug","component":"pipeline","event":"name_invalid","data":{"rawName":"Foo___Bar"}}
 * ```
 */
export interface LogEntry {
  /** ISO 8601 creation time. */
  readonly timestamp: string;
  readonly level: LogLevel;
  /** Component that wrote the entry, such as `cli` or `pipeline`. */
  readonly component: string;
  /** Short snake_case event name. */
  readonly event: string;
  readonly data?: Record<string, unknown>;
}

/**
 * Destination for serialized log lines (each line ends with a newline).
 */
export type LogSink = (line: string) => void;

export interface LoggerOptions {
  readonly component: string;
  /** @defaultValue false */
  readonly debugMode?: boolean;
  /** @defaultValue writes to process.stderr */
  readonly sink?: LogSink;
}

function writeToStderr(line: string): void {
  process.stderr.write(line);
}

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'cli', debugMode: true });
 * logger.debug('unit_started', { source: 'widget_test.cpp' });
 * logger.child('pipeline').debug('name_invalid', { rawName: 'Foo___Bar' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? writeToStderr;
  }

  /**
   * Whether debug entries are emitted.
   */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Returns a logger for another component with the same debug mode and sink.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, sink: this.sink });
  }

  /** Logs a debug entry; a no-op unless debug mode is enabled. */
  debug(event: string, data?: Record<string, unknown>): void {
    if (this.debugMode) {
      this.log('debug', event, data);
    }
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    this.sink(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes an entry, replacing `data` with a placeholder when it cannot be
 * turned into JSON (circular references, BigInt values).
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const { data: _unserializable, ...rest } = entry;
    return JSON.stringify({
      ...rest,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}
