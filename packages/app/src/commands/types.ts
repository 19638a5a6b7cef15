/**
 * Command types and interfaces
 */

export type OutputFormat = 'json' | 'text';

/**
 * Base command interface
 */
export interface Command {
  name: string;
  description: string;
  usage: string;
  aliases?: string[];
  execute(args: string[], options: CommandOptions): Promise<CommandResult>;
}

export interface CommandOptions {
  verbose?: boolean;
  format?: OutputFormat;
}

export interface CommandResult {
  success: boolean;
  output: string;
  error?: Error;
  duration?: number;
  metadata?: Record<string, unknown>;
}
