import type { Disposable, OutputChannel } from '../core/types';

export interface ILogger extends Disposable {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string | Error, error?: Error): void;
  debug(message: string, ...args: unknown[]): void;
  isDebugEnabled(): boolean;
}

export function formatLog(level: string, message: string, args: unknown[]): string {
  const timestamp = new Date().toISOString();
  let rest = '';
  if (args.length) {
    rest = ' ' + args.map(a => (typeof a === 'string' ? a : JSON.stringify(a))).join(' ');
  }
  return `[${timestamp}] [${level}] ${message}${rest}`;
}

export class LoggerService implements ILogger {
  private readonly getDebug: () => boolean;

  constructor(private readonly outputChannel: OutputChannel, getDebug?: () => boolean) {
    this.getDebug = getDebug ?? (() => false);
  }

  isDebugEnabled(): boolean {
    return this.getDebug();
  }

  info(message: string, ...args: unknown[]) {
    this.outputChannel.appendLine(formatLog('INFO', message, args));
  }

  warn(message: string, ...args: unknown[]) {
    this.outputChannel.appendLine(formatLog('WARN', message, args));
  }

  error(message: string | Error, error?: Error) {
    let text: string;
    if (message instanceof Error) {
      text = message.message;
      error = message;
    } else {
      text = message;
    }
    const details = error && error.stack ? `\n${error.stack}` : '';
    this.outputChannel.appendLine(formatLog('ERROR', `${text}${details}`, []));
  }

  debug(message: string, ...args: unknown[]) {
    if (!this.isDebugEnabled()) return;
    this.outputChannel.appendLine(formatLog('DEBUG', message, args));
  }

  dispose() {
    this.outputChannel.dispose();
  }
}

export default LoggerService;

/**
 * Output channel over a writable stream. Disposing does not close the stream,
 * so process stdio can be wrapped safely.
 */
export function createStreamOutputChannel(stream: NodeJS.WritableStream): OutputChannel {
  let disposed = false;
  return {
    appendLine(value: string) {
      if (!disposed) stream.write(`${value}\n`);
    },
    dispose() {
      disposed = true;
    },
  };
}

/**
 * Factory used by the CLI host to create a LoggerService writing to stderr.
 */
export function createLogger(getDebug?: () => boolean, stream: NodeJS.WritableStream = process.stderr): LoggerService {
  return new LoggerService(createStreamOutputChannel(stream), getDebug);
}

/**
 * Logger that drops everything. Used where a caller supplies none.
 */
export const nullLogger: ILogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
  isDebugEnabled: () => false,
  dispose: () => undefined,
};
