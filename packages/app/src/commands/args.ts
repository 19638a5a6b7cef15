/**
 * Flag parsing for one-shot commands
 */

import { CommandError, CommandErrorCode } from './errors.js';

export interface FlagSpec {
  /** Flags that take a value: `--name value` or `--name=value` */
  values?: readonly string[];
  /** Flags that take none */
  switches?: readonly string[];
}

export interface NumberFlagOptions {
  min?: number;
  integer?: boolean;
}

export class ParsedFlags {
  constructor(
    private readonly values: ReadonlyMap<string, string | true>,
    readonly positionals: readonly string[]
  ) {}

  has(name: string): boolean {
    return this.values.has(name);
  }

  string(name: string): string | undefined {
    const value = this.values.get(name);
    return typeof value === 'string' ? value : undefined;
  }

  number(name: string, options: NumberFlagOptions = {}): number | undefined {
    const raw = this.string(name);
    if (raw === undefined) {
      return undefined;
    }

    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
      throw new CommandError(CommandErrorCode.INVALID_ARGS, `--${name} expects a number, got '${raw}'`, { flag: name });
    }
    if (options.integer && !Number.isInteger(value)) {
      throw new CommandError(CommandErrorCode.INVALID_ARGS, `--${name} expects an integer, got '${raw}'`, { flag: name });
    }
    if (options.min !== undefined && value < options.min) {
      throw new CommandError(CommandErrorCode.INVALID_ARGS, `--${name} must be at least ${options.min}`, { flag: name });
    }
    return value;
  }
}

export function parseFlags(args: readonly string[], spec: FlagSpec): ParsedFlags {
  const valueFlags = new Set(spec.values ?? []);
  const switchFlags = new Set(spec.switches ?? []);
  const values = new Map<string, string | true>();
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

    if (switchFlags.has(name)) {
      if (eq !== -1) {
        throw new CommandError(CommandErrorCode.INVALID_ARGS, `--${name} takes no value`, { flag: name });
      }
      values.set(name, true);
    } else if (valueFlags.has(name)) {
      const value = eq === -1 ? args[++i] : arg.slice(eq + 1);
      if (value === undefined) {
        throw new CommandError(CommandErrorCode.INVALID_ARGS, `--${name} needs a value`, { flag: name });
      }
      values.set(name, value);
    } else {
      throw new CommandError(CommandErrorCode.INVALID_ARGS, `Unknown flag --${name}`, { flag: name });
    }
  }

  return new ParsedFlags(values, positionals);
}
