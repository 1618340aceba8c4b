import { isOperationalError, wrapError } from '../errors/index.js';

/**
 * Print a command failure to stderr and set the matching exit code.
 * Errors that are not operational are bugs, so their stack is printed too.
 */
export function reportFailure(err: unknown): void {
  const error = wrapError(err);
  process.stderr.write(`Error: ${error.message}\n`);
  if (!isOperationalError(error) && error.stack) {
    process.stderr.write(`${error.stack}\n`);
  }
  process.exitCode = error.exitCode;
}
