import pino from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';

const LOG_FILE = 'cargo-ci.log';

function ensureLogDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Default logs go to stderr at `warn` so cargo's own output stays readable.
 * Setting `CARGO_CI_LOG_DIR` adds a debug-level file log in that directory;
 * when it cannot be created, stderr is used instead.
 */
export function createLogger(
  name: string = 'cargo-ci',
  verbose: boolean = false,
  env: NodeJS.ProcessEnv = process.env,
): pino.Logger {
  if (verbose) {
    return pino({
      name,
      level: 'debug',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  const dir = env.CARGO_CI_LOG_DIR;
  if (dir) {
    try {
      ensureLogDir(dir);
      return pino({ name, level: 'debug' }, pino.destination({ dest: join(dir, LOG_FILE), sync: true }));
    } catch (err) {
      const logger = stderrLogger(name);
      logger.warn({ dir, error: err instanceof Error ? err.message : String(err) }, 'Log directory unusable, logging to stderr');
      return logger;
    }
  }

  return stderrLogger(name);
}

function stderrLogger(name: string): pino.Logger {
  return pino({ name, level: 'warn' }, pino.destination({ dest: 2, sync: true }));
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}
