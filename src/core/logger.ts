import { pino, type Logger } from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

const LOG_DIR = join(homedir(), '.surgebench', 'logs');

function ensureLogDir(): void {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }
}

export function createLogger(name: string = 'surgebench', verbose: boolean = false): Logger {
  if (verbose) {
    return pino({
      name,
      level: 'debug',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'HH:MM:ss.l' },
      },
    });
  }

  ensureLogDir();

  return pino({
    name,
    level: 'info',
    transport: {
      target: 'pino/file',
      options: { destination: join(LOG_DIR, 'surgebench.log'), mkdir: true },
    },
  });
}

let _logger: Logger | null = null;

export function getLogger(): Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: Logger): void {
  _logger = logger;
}

/**
 * Child logger bound to a component name.
 */
export function componentLogger(component: string): Logger {
  return getLogger().child({ component });
}

export function getLogDir(): string {
  return LOG_DIR;
}
