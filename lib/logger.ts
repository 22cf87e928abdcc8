import pino, { Logger, LoggerOptions } from 'pino';

// Shared pino logger. LOG_LEVEL overrides the default; LOG_FORMAT=pretty switches
// to human-readable output through pino-pretty. stdout is reserved for the
// reporter's listing, so logs always go to stderr.

const STDERR_FD = 2;

function defaultLevel(env: NodeJS.ProcessEnv): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  return env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const options: LoggerOptions = {
    name: 'subsweep',
    level: defaultLevel(env),
  };

  if (env.LOG_FORMAT === 'pretty') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'HH:MM:ss.l', ignore: 'pid,hostname', destination: STDERR_FD },
    };
    return pino(options);
  }
  return pino(options, pino.destination(STDERR_FD));
}

export const logger = createLogger();

export default logger;
