/**
 * Error Handler - Consistent error reporting for CLI commands
 */

import chalk from "chalk";

import { ConfigResolutionError } from "../config.js";
import { RelayError } from "../relay/errors.js";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;
  readonly suggestion?: string;

  constructor(message: string, options: { code: string; details?: Record<string, unknown>; suggestion?: string } = { code: "CLI_ERROR" }) {
    super(message);
    this.name = "CliError";
    this.code = options.code;
    this.details = options.details;
    this.suggestion = options.suggestion;
  }
}

export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, { code: "CONFIG_ERROR", suggestion });
    this.name = "ConfigError";
  }
}

const ERROR_MESSAGES: Record<string, { title: string; help: string }> = {
  CONFIG_ERROR: {
    title: "Configuration Error",
    help: "Check relay.config.json and the RELAY_* environment variables.",
  },
  RELAY_ERROR: {
    title: "Relay Error",
    help: "Run with logging.level set to debug for more detail.",
  },
  CLI_ERROR: {
    title: "CLI Error",
    help: "Run 'topic-relay --help' for usage information.",
  },
};

/**
 * Lift library errors into their CLI counterparts
 */
export function toCliError(err: unknown): unknown {
  if (err instanceof ConfigResolutionError) {
    return new ConfigError(err.message);
  }
  if (err instanceof RelayError) {
    return new CliError(err.message, { code: "RELAY_ERROR", details: { code: err.code, ...err.details } });
  }
  return err;
}

/**
 * Format an error for display
 */
export function formatError(input: unknown, verbose = false): string {
  const err = toCliError(input);
  const lines: string[] = [];

  if (err instanceof CliError) {
    const meta = ERROR_MESSAGES[err.code] ?? ERROR_MESSAGES.CLI_ERROR;
    lines.push(chalk.red.bold(`${meta.title}: `) + err.message);

    if (err.suggestion) {
      lines.push(chalk.yellow("Suggestion: ") + err.suggestion);
    } else {
      lines.push(chalk.dim(`Hint: ${meta.help}`));
    }

    if (verbose && err.details) {
      lines.push(chalk.dim("\nDetails:"));
      lines.push(chalk.dim(JSON.stringify(err.details, null, 2)));
    }
  } else if (err instanceof Error) {
    lines.push(chalk.red.bold("Error: ") + err.message);

    if (verbose && err.stack) {
      lines.push(chalk.dim("\nStack trace:"));
      lines.push(chalk.dim(err.stack));
    }
  } else {
    lines.push(chalk.red.bold("Error: ") + String(err));
  }

  return lines.join("\n");
}

/**
 * Run a command body, reporting any failure and setting a non-zero exit code
 */
export async function handleError(fn: () => Promise<unknown>, verbose = false): Promise<void> {
  try {
    await fn();
  } catch (err) {
    console.error(formatError(err, verbose));
    process.exitCode = 1;
  }
}
