import { Command } from 'commander';
import { UsageError } from '@evalkit/shared';
import { chatAndJudge } from '@evalkit/core';
import {
  createJudge,
  createRuntime,
  parseJudgeType,
  parseNumberOption,
  readTextArgument,
} from '../runtime';

interface ChatOptions {
  prompt?: string;
  type?: string;
  criteria?: string;
  passingScore?: string;
}

export function registerChatCommand(program: Command) {
  program
    .command('chat')
    .option('--prompt <text>', 'Prompt for the target model (@file to read it)')
    .option('--type <type>', 'Judge type for the answer')
    .option('--criteria <text>', 'Evaluation criteria (required for --type custom)')
    .option('--passing-score <n>', 'Minimum score to pass')
    .description('Ask the target model a prompt, then judge its answer')
    .action(async (options: ChatOptions) => {
      if (!options.prompt) {
        throw new UsageError('Missing required option --prompt <text>');
      }
      const judgeType = parseJudgeType(options.type);
      const passingScore = parseNumberOption('--passing-score', options.passingScore);

      const runtime = createRuntime(program, { judge: { passingScore } });
      const result = await chatAndJudge({
        prompt: readTextArgument(options.prompt),
        target: runtime.registry.getAdapter(runtime.config.target.provider),
        judge: createJudge(runtime),
        judgeType,
        criteria: options.criteria,
        passingScore: runtime.config.judge.passingScore,
        temperature: runtime.config.target.temperature,
        maxTokens: runtime.config.target.maxTokens,
        logger: runtime.logger,
        runId: runtime.runId,
      });

      runtime.renderer.renderChat(result);
      if (result.error || !result.verdict?.passed) {
        process.exitCode = 1;
      }
    });
}
