import { Command } from 'commander';
import { UsageError } from '@evalkit/shared';
import { createJudge, createRuntime, readTextArgument } from '../runtime';

interface CompareOptions {
  prompt?: string;
  response1?: string;
  response2?: string;
  criteria?: string;
}

export function registerCompareCommand(program: Command) {
  program
    .command('compare')
    .option('--prompt <text>', 'The prompt both responses answer (@file to read it)')
    .option('--response1 <text>', 'First response (@file to read it)')
    .option('--response2 <text>', 'Second response (@file to read it)')
    .option('--criteria <text>', 'What makes one response better than the other')
    .description('Ask the judge model which of two responses is better')
    .action(async (options: CompareOptions) => {
      const { prompt, response1, response2 } = options;
      if (!prompt || !response1 || !response2) {
        throw new UsageError('compare needs --prompt, --response1 and --response2');
      }

      const runtime = createRuntime(program);
      const verdict = await createJudge(runtime).compare({
        prompt: readTextArgument(prompt),
        response1: readTextArgument(response1),
        response2: readTextArgument(response2),
        criteria: options.criteria,
      });

      runtime.renderer.renderComparison(verdict);
      if (verdict.error) {
        process.exitCode = 1;
      }
    });
}
