/**
 * Error Handler - Consistent error reporting for CLI commands
 */

import chalk from "chalk";
import { ZodError } from "zod";

import { isOrchestrationError, type OrchestrationErrorKind } from "../agent/errors.js";

export class CliError extends Error {
  readonly code: string;
  readonly suggestion?: string;

  constructor(message: string, options: { code: string; suggestion?: string; cause?: unknown } = { code: "CLI_ERROR" }) {
    super(message, { cause: options.cause });
    this.name = "CliError";
    this.code = options.code;
    this.suggestion = options.suggestion;
  }
}

export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string, cause?: unknown) {
    super(message, { code: "CONFIG_ERROR", suggestion, cause });
    this.name = "ConfigError";
  }
}

export class ValidationError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, { code: "VALIDATION_ERROR", suggestion });
    this.name = "ValidationError";
  }
}

const ERROR_MESSAGES: Record<string, { title: string; help: string }> = {
  CONFIG_ERROR: {
    title: "Configuration Error",
    help: "Check your switchyard.config.json file for issues.",
  },
  VALIDATION_ERROR: {
    title: "Validation Error",
    help: "Check the command arguments and try again.",
  },
  CLI_ERROR: {
    title: "CLI Error",
    help: "Run 'switchyard --help' for usage information.",
  },
};

const ORCHESTRATION_HELP: Partial<Record<OrchestrationErrorKind, string>> = {
  AllProvidersExhausted: "Check provider credentials and quotas, then try /reload.",
  ContextOverflow: "Unpin messages or /clear the session to free context.",
  BudgetExceeded: "Raise the ceiling with /budget <usd> or start a new session.",
  NotFound: "Use /history or /session list to see what exists.",
};

export function formatError(err: unknown, verbose = false): string {
  const lines: string[] = [];

  if (err instanceof CliError) {
    const meta = ERROR_MESSAGES[err.code] ?? { title: "CLI Error", help: "" };
    lines.push(chalk.red.bold(`${meta.title}: `) + err.message);
    if (err.suggestion) {
      lines.push(chalk.yellow("Suggestion: ") + err.suggestion);
    } else if (meta.help) {
      lines.push(chalk.dim(`Hint: ${meta.help}`));
    }
  } else if (isOrchestrationError(err)) {
    lines.push(chalk.red.bold(`${err.kind}: `) + err.message);
    const help = ORCHESTRATION_HELP[err.kind];
    if (help) lines.push(chalk.dim(`Hint: ${help}`));
  } else if (err instanceof ZodError) {
    lines.push(chalk.red.bold("Configuration Error: ") + "invalid settings");
    for (const issue of err.issues) {
      lines.push(chalk.dim(`  ${issue.path.join(".") || "(root)"}: ${issue.message}`));
    }
  } else if (err instanceof Error) {
    lines.push(chalk.red.bold("Error: ") + err.message);
  } else {
    lines.push(chalk.red.bold("Error: ") + String(err));
  }

  if (verbose && err instanceof Error && err.stack) {
    lines.push(chalk.dim("\nStack trace:"));
    lines.push(chalk.dim(err.stack));
  }

  return lines.join("\n");
}

/**
 * Run a command body, reporting failures and setting the exit code
 */
export async function handleError(fn: () => Promise<unknown>, verbose = false): Promise<void> {
  try {
    await fn();
  } catch (err) {
    console.error(formatError(err, verbose));
    process.exitCode = 1;
  }
}
