/** Anything with `appendLine`, such as a `vscode.OutputChannel` */
export interface LineSink {
  appendLine(value: string): void;
}

export type LogLevel = 'info' | 'warn' | 'error';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.stack ?? err.message : String(err);
}

export function createLogger(sink: LineSink, now: () => Date = () => new Date()): Logger {
  const write = (level: LogLevel, message: string) => {
    sink.appendLine(`[${now().toISOString()}] [${level}] ${message}`);
  };
  return {
    info: message => write('info', message),
    warn: message => write('warn', message),
    error: (message, err) => write('error', err === undefined ? message : `${message}: ${describeError(err)}`),
  };
}
