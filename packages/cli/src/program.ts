import { Command } from 'commander';
import { version } from '../package.json';
import { AppError, ConfigError, UsageError } from '@evalkit/shared';
import {
  registerChatCommand,
  registerCompareCommand,
  registerJudgeCommand,
  registerValidateCommand,
} from './commands';
import type { GlobalOptions } from './runtime';

export const name = '@evalkit/cli';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('evalkit')
    .description('Validate LLM responses and score them with an LLM judge')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerValidateCommand(program);
  registerJudgeCommand(program);
  registerCompareCommand(program);
  registerChatCommand(program);

  return program;
}

/** Configuration and usage mistakes exit with 2, everything else with 1. */
export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigError || error instanceof UsageError ? 2 : 1;
}

export function reportError(error: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    if (error instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: error.code,
            message: error.message,
            details: error.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: error instanceof Error ? error.message : String(error),
          },
        }),
      );
    }
    return;
  }

  console.error(`❌ Error: ${(error instanceof Error && error.message) || String(error)}`);
  if (error instanceof AppError && error.details) {
    console.error(
      `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
    );
  }
  if (opts.verbose && error instanceof Error && error.stack) {
    console.error(`\nStack Trace:\n${error.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
  } catch (e) {
    reportError(e, program.opts<GlobalOptions>());
    process.exit(exitCodeFor(e));
  }
}
