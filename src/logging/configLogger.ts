import chalk from "chalk";

export interface Logger {
  debug: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
}

function format(args: unknown[]): string {
  return args
    .map((arg) => (arg instanceof Error ? arg.stack ?? arg.message : String(arg)))
    .join(" ") + "\n";
}

export function debug(debugMode: boolean, ...args: unknown[]): void {
  if (debugMode) {
    process.stdout.write(chalk.dim(format(args)));
  }
}

export function info(...args: unknown[]): void {
  process.stdout.write(format(args));
}

export function warn(...args: unknown[]): void {
  process.stderr.write(`${chalk.bold.yellow("Warning")} ${format(args)}`);
}

export function error(...args: unknown[]): void {
  process.stderr.write(`${chalk.bold.red("Error")} ${format(args)}`);
}

export function createLogger(debugMode = false): Logger {
  return {
    debug: (...args: unknown[]) => debug(debugMode, ...args),
    error,
    warn,
    info,
  };
}
