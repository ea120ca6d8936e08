import fs from 'fs';
import { Command } from 'commander';
import { EVENT_SCHEMA_VERSION, UsageError } from '@evalkit/shared';
import { ValidatorChain, loadRuleSet } from '@evalkit/core';
import { createRuntime, readStdin } from '../runtime';

interface ValidateOptions {
  rules?: string;
}

export function registerValidateCommand(program: Command) {
  program
    .command('validate')
    .argument('[file]', 'File holding the response text (default: stdin)')
    .option('--rules <path>', 'YAML or JSON rule set to validate against')
    .description('Validate a response against a rule set')
    .action(async (file: string | undefined, options: ValidateOptions) => {
      if (!options.rules) {
        throw new UsageError('Missing required option --rules <path>');
      }

      const runtime = createRuntime(program);
      const chain = new ValidatorChain(loadRuleSet(options.rules));
      const text = await readInput(file);

      const report = chain.validate(text);
      await runtime.logger.log({
        type: 'ValidationCompleted',
        schemaVersion: EVENT_SCHEMA_VERSION,
        timestamp: new Date().toISOString(),
        runId: runtime.runId,
        payload: {
          isValid: report.isValid,
          ruleCount: chain.rules.length,
          errorCount: report.errors.length,
        },
      });

      runtime.renderer.renderValidation(report);
      if (!report.isValid) {
        process.exitCode = 1;
      }
    });
}

async function readInput(file: string | undefined): Promise<string> {
  if (file) {
    if (!fs.existsSync(file)) {
      throw new UsageError(`File not found: ${file}`);
    }
    return fs.readFileSync(file, 'utf8');
  }
  if (process.stdin.isTTY) {
    throw new UsageError('No input: pass a file or pipe the response on stdin');
  }
  return readStdin();
}
