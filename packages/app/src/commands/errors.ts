/**
 * Command errors
 */

import { BarwatchError, errorMessage } from '@barwatch/contracts';

export enum CommandErrorCode {
  /** Unknown flag or unparsable value */
  INVALID_ARGS = 'INVALID_ARGS',
  UNKNOWN_COMMAND = 'UNKNOWN_COMMAND',
  /** Anything the command did not anticipate */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class CommandError extends BarwatchError {
  constructor(code: CommandErrorCode, message: string, data?: Record<string, unknown>, options?: ErrorOptions) {
    super(code, message, data, options);
  }

  format(verbose: boolean = false): string {
    const lines = [`Error: ${this.message}`, `Code: ${this.code}`];

    if (verbose && this.data !== undefined && Object.keys(this.data).length > 0) {
      lines.push('Context:');
      for (const [key, value] of Object.entries(this.data)) {
        lines.push(`  ${key}: ${JSON.stringify(value)}`);
      }
    }

    return lines.join('\n');
  }
}

export function isCommandError(error: unknown): error is CommandError {
  return error instanceof CommandError;
}

/**
 * Wrap anything thrown inside a command
 */
export function toCommandError(error: unknown): CommandError {
  if (isCommandError(error)) {
    return error;
  }
  return new CommandError(CommandErrorCode.INTERNAL_ERROR, errorMessage(error), undefined, { cause: error });
}
