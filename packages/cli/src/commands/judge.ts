import { Command } from 'commander';
import { UsageError } from '@evalkit/shared';
import { ValidatorChain, evaluateResponse, loadRuleSet } from '@evalkit/core';
import {
  createJudge,
  createRuntime,
  parseJudgeType,
  parseNumberOption,
  readTextArgument,
} from '../runtime';

interface JudgeOptions {
  prompt?: string;
  response?: string[];
  type?: string;
  criteria?: string;
  passingScore?: string;
  concurrency?: string;
  rules?: string;
}

export function registerJudgeCommand(program: Command) {
  program
    .command('judge')
    .option('--prompt <text>', 'The prompt the response answers (@file to read it)')
    .option('--response <text...>', 'Response(s) to judge (@file to read one)')
    .option('--type <type>', 'Judge type: quality, correctness, appropriateness, comprehensiveness, custom')
    .option('--criteria <text>', 'Evaluation criteria (required for --type custom)')
    .option('--passing-score <n>', 'Minimum score to pass')
    .option('--concurrency <n>', 'Judgments in flight at once when judging several responses')
    .option('--rules <path>', 'Validate the response against this rule set before judging it')
    .description('Ask the judge model to score one or more responses')
    .action(async (options: JudgeOptions) => {
      if (!options.prompt) {
        throw new UsageError('Missing required option --prompt <text>');
      }
      if (!options.response || options.response.length === 0) {
        throw new UsageError('Missing required option --response <text...>');
      }

      const prompt = readTextArgument(options.prompt);
      const responses = options.response.map(readTextArgument);
      const judgeType = parseJudgeType(options.type);
      const passingScoreFlag = parseNumberOption('--passing-score', options.passingScore);

      const runtime = createRuntime(program, { judge: { passingScore: passingScoreFlag } });
      const judge = createJudge(runtime);
      const settings = {
        judgeType,
        criteria: options.criteria,
        passingScore: runtime.config.judge.passingScore,
      };

      if (responses.length === 1) {
        const evaluation = await evaluateResponse({
          prompt,
          response: responses[0],
          chain: options.rules ? new ValidatorChain(loadRuleSet(options.rules)) : undefined,
          judge,
          judgeOptions: settings,
          logger: runtime.logger,
          runId: runtime.runId,
        });
        if (evaluation.validation) {
          runtime.renderer.renderEvaluation(evaluation);
        } else if (evaluation.verdict) {
          runtime.renderer.renderVerdict(evaluation.verdict);
        }
        if (!evaluation.passed) {
          process.exitCode = 1;
        }
        return;
      }

      if (options.rules) {
        throw new UsageError('--rules takes a single --response');
      }
      const verdicts = await judge.judgeMultiple({
        prompt,
        responses,
        ...settings,
        concurrency: parseNumberOption('--concurrency', options.concurrency),
      });
      runtime.renderer.renderVerdicts(verdicts);
      if (verdicts.some((v) => !v.passed)) {
        process.exitCode = 1;
      }
    });
}
