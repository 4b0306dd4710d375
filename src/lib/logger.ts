import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggingOptions {
  debug: boolean;
  logFile?: string;
}

const lineFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf(({ timestamp, level, label, message }) =>
    `${timestamp} [${level.toUpperCase()}] [${label}] ${message}`
  ),
);

function createRoot(options: LoggingOptions): winston.Logger {
  const transports: winston.transport[] = [];

  if (options.logFile) {
    // Truncated on open, one log per run.
    transports.push(new winston.transports.File({
      filename: options.logFile,
      options: { flags: 'w' },
    }));
  } else if (options.debug) {
    transports.push(new winston.transports.Console({ stderrLevels: LEVELS, forceConsole: true }));
  }

  return winston.createLogger({
    level: options.debug ? 'debug' : 'info',
    format: lineFormat,
    transports,
    silent: transports.length === 0,
  });
}

// Silent until configureLogging() is called with --debug or --log-file.
let root = createRoot({ debug: false });

export function configureLogging(options: LoggingOptions): void {
  root.close();
  root = createRoot(options);
}

// Waits until every transport has written out what it was given. Logging
// is silent afterwards.
export async function flushLogging(): Promise<void> {
  const current = root;
  const finished = current.transports.map(transport =>
    new Promise<void>(resolve => {
      transport.once('finish', () => resolve());
    })
  );
  root = createRoot({ debug: false });
  current.end();
  await Promise.all(finished);
}

export function resetLogging(): void {
  configureLogging({ debug: false });
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

// Loggers look up the current root on every call, so module-level loggers
// pick up configureLogging() made later.
export function createLogger(name: string): Logger {
  const write = (level: LogLevel, message: string): void => {
    root.log({ level, message, label: name });
  };

  return {
    debug: message => write('debug', message),
    info: message => write('info', message),
    warn: message => write('warn', message),
    error: (message, err) => {
      write('error', message);
      if (err instanceof Error && err.stack) {
        write('error', err.stack);
      }
    },
  };
}
