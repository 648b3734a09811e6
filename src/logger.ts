import pc from 'picocolors';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const PREFIX = '[pmc-lint]';

let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

function write(level: LogLevel, message: string): void {
  const tag =
    level === 'error' ? pc.red(PREFIX) :
    level === 'warn' ? pc.yellow(PREFIX) :
    pc.dim(PREFIX);
  process.stderr.write(`${tag} ${message}\n`);
}

// stderr keeps stdout clean for --format json
export const logger = {
  debug(message: string): void {
    if (verbose) write('debug', pc.dim(message));
  },

  info(message: string): void {
    write('info', message);
  },

  warn(message: string): void {
    write('warn', message);
  },

  error(message: string): void {
    write('error', message);
  },
};
