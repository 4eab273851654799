import chalk from 'chalk';
import { PlanGraphError, ErrorCode } from '../errors.js';

/** Errors caused by the input the user handed us: exit code 3 */
const INPUT_ERROR_CODES: readonly ErrorCode[] = [
  ErrorCode.SCHEMA_VIOLATION,
  ErrorCode.MALFORMED_DOCUMENT,
  ErrorCode.IO_FAILURE,
  ErrorCode.CONFIG_NOT_FOUND,
  ErrorCode.CONFIG_INVALID,
];

/**
 * Wrap a CLI command handler with centralized error handling.
 * Catches all errors and prints user-friendly output.
 */
export function withErrorHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof PlanGraphError) {
        console.error(chalk.red(`✗ ${err.message}`));
        if (err.hint) {
          console.error(chalk.dim(`  ${err.hint}`));
        }
        if (INPUT_ERROR_CODES.includes(err.code)) {
          process.exit(3);
        }
        process.exit(1);
      } else if (err instanceof Error) {
        console.error(chalk.red(`✗ ${err.message}`));
      } else {
        console.error(chalk.red('✗ An unexpected error occurred'));
      }
      process.exit(1);
    }
  };
}
