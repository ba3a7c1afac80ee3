import chalk from "chalk";

let debugEnabled = false;

/** Call once at startup to enable/disable debug logging. */
export function initLogger(debug: boolean) {
  debugEnabled = debug;
}

export interface Logger {
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  dim(msg: string): void;
  detail(label: string, value: string): void;
  /** Timestamped; printed only after `initLogger(true)`. */
  debug(msg: string): void;
}

/** A logger whose lines carry `[scope]` after the tag. */
export function createLogger(scope?: string): Logger {
  const prefix = () => {
    const tag = chalk.bold.magenta("ASK");
    return scope ? `${tag} ${chalk.dim(`[${scope}]`)}` : tag;
  };

  return {
    info: (msg) => console.log(`  ${prefix()} ${msg}`),
    success: (msg) => console.log(`  ${prefix()} ${chalk.green("✓")} ${msg}`),
    warn: (msg) => console.log(`  ${prefix()} ${chalk.yellow("⚠")} ${msg}`),
    error: (msg) => console.error(`  ${prefix()} ${chalk.red("✗")} ${msg}`),
    dim: (msg) => console.log(`  ${prefix()} ${chalk.dim(msg)}`),
    detail: (label, value) => console.log(`  ${prefix()}   ${chalk.dim(label)} ${value}`),
    debug: (msg) => {
      if (!debugEnabled) return;
      const time = new Date().toISOString().slice(11, 23);
      console.log(`  ${prefix()} ${chalk.dim(time)} ${chalk.dim(msg)}`);
    },
  };
}

export const log = createLogger();

/**
 * Short form of a broker id for log lines: the prefix and the first block of
 * the uuid (`req_3f2a9c1e`). Ids without a prefix are returned unchanged.
 */
export function shortId(id: string): string {
  const match = /^([a-z]+_)([0-9a-f]{8})-[0-9a-f-]+$/i.exec(id);
  return match ? `${match[1]}${match[2]}` : id;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function printBanner(title = "Ask Broker") {
  console.log();
  console.log(`  ${chalk.bold.magenta(title)}`);
  console.log();
}

/**
 * Print a formatted fatal error with hints for the failures we know about.
 */
export function printStartupError(err: unknown) {
  const message = errorMessage(err);

  console.log();
  console.log(`  ${chalk.red.bold("Startup failed")}`);
  console.log();

  if (message.includes("ANTHROPIC_API_KEY")) {
    console.log(`  ${chalk.dim("The ordering agent needs a model API key.")}`);
    console.log(`  Set ${chalk.cyan("ANTHROPIC_API_KEY")} and restart.`);
  } else if (message.includes("EADDRINUSE")) {
    console.log(`  ${chalk.red(message)}`);
    console.log();
    console.log(`  ${chalk.dim("Another process holds the port. Set")} ${chalk.cyan("PORT")} ${chalk.dim("to a free one.")}`);
  } else {
    console.log(`  ${chalk.red(message)}`);
    if (err instanceof Error && err.stack) {
      console.log();
      const stackLines = err.stack.split("\n").slice(1, 5);
      for (const line of stackLines) {
        console.log(`  ${chalk.dim(line.trim())}`);
      }
    }
  }

  console.log();
}
