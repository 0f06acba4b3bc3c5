import chalk from "chalk";

export interface Logger {
  debug: (...args: unknown[]) => void;
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
}

// Standard output carries the records, so every diagnostic line goes to stderr.
function writeLine(tag: string, args: unknown[]): void {
  process.stderr.write(`${tag} ${args.map(a => String(a)).join(' ')}\n`);
}

export function debug(debugMode: boolean, ...args: unknown[]): void {
  if (debugMode) {
    writeLine(chalk.dim("debug"), args);
  }
}

export function error(...args: unknown[]): void {
  writeLine(chalk.red("error"), args);
}

export function warn(...args: unknown[]): void {
  writeLine(chalk.yellow("warn "), args);
}

export function info(...args: unknown[]): void {
  writeLine(chalk.cyan("info "), args);
}

export function createLogger(debugMode: boolean | string = false): Logger {
  const isDebugEnabled = typeof debugMode === 'string' ? debugMode === 'true' : Boolean(debugMode);

  return {
    debug: (...args: unknown[]) => debug(isDebugEnabled, ...args),
    log: (...args: unknown[]) => debug(isDebugEnabled, ...args),
    error,
    warn,
    info,
  };
}

export default { debug, error, warn, info, createLogger };
