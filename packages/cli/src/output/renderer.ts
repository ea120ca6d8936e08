import pc from 'picocolors';
import type {
  ChatAndJudgeResult,
  ComparisonVerdict,
  EvaluationResult,
  JudgeVerdict,
  ValidationReport,
} from '@evalkit/core';
import { printTable } from './index';

const FEEDBACK_PREVIEW_CHARS = 60;

function preview(text: string): string {
  return text.length > FEEDBACK_PREVIEW_CHARS ? `${text.slice(0, FEEDBACK_PREVIEW_CHARS - 3)}...` : text;
}

function describeAuxiliary(value: unknown): string {
  if (Array.isArray(value)) {
    return value.length > 0 ? value.map((item) => String(item)).join('; ') : '(none)';
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderValidation(report: ValidationReport): void {
    if (this.isJson) {
      this.renderJson(report);
      return;
    }

    const failing = report.results.filter((r) => !r.valid).length;
    if (report.isValid) {
      console.log(pc.green(`✅ Validation passed (${report.results.length} rules)`));
    } else {
      console.log(pc.red(`❌ Validation failed (${failing} of ${report.results.length} rules)`));
    }
    for (const result of report.results) {
      if (result.valid) {
        console.log(`  ${pc.green('✓')} ${result.rule}`);
      } else {
        console.log(`  ${pc.red('✗')} ${result.rule}: ${result.error ?? ''}`);
      }
    }
  }

  renderVerdict(verdict: JudgeVerdict): void {
    if (this.isJson) {
      this.renderJson(verdict);
      return;
    }

    const status = verdict.passed ? pc.green('✅ PASSED') : pc.red('❌ FAILED');
    console.log(`\n${status} ${pc.bold(`Score: ${verdict.score}`)} (${verdict.judgeType})`);

    if (verdict.error) {
      console.log(`  ${pc.bold('Error:')} ${verdict.error}`);
      return;
    }
    if (verdict.feedback) {
      console.log(`  ${pc.bold('Feedback:')} ${verdict.feedback}`);
    }
    for (const [field, value] of Object.entries(verdict.auxiliary)) {
      console.log(`  ${pc.bold(`${field}:`)} ${describeAuxiliary(value)}`);
    }
    if (verdict.parseStage === 'fallback') {
      console.log(pc.yellow('  Judgment was extracted from surrounding text.'));
    } else if (verdict.parseStage === 'failed') {
      console.log(pc.yellow('  Judge output could not be parsed.'));
    }
  }

  renderVerdicts(verdicts: JudgeVerdict[]): void {
    if (this.isJson) {
      this.renderJson(verdicts);
      return;
    }

    printTable(
      verdicts.map((verdict, index) => ({
        '#': index + 1,
        Score: verdict.score,
        Result: verdict.passed ? 'PASS' : 'FAIL',
        Feedback: preview(verdict.error ? `Error: ${verdict.error}` : verdict.feedback),
      })),
      { head: ['#', 'Score', 'Result', 'Feedback'] },
    );
    const passed = verdicts.filter((v) => v.passed).length;
    console.log(pc.bold(`${passed} of ${verdicts.length} responses passed.`));
  }

  renderEvaluation(result: EvaluationResult): void {
    if (this.isJson) {
      this.renderJson(result);
      return;
    }

    if (result.validation) {
      this.renderValidation(result.validation);
    }
    if (result.skippedJudgment) {
      console.log(pc.gray('Judgment skipped: the response failed validation.'));
    }
    if (result.verdict) {
      this.renderVerdict(result.verdict);
    }
  }

  renderComparison(verdict: ComparisonVerdict): void {
    if (this.isJson) {
      this.renderJson(verdict);
      return;
    }

    if (verdict.winner === 'undetermined') {
      console.log(`\n${pc.yellow('⚖️  Winner: undetermined')}`);
    } else {
      console.log(`\n${pc.green(`🏆 Winner: Response ${verdict.winner}`)}`);
    }
    if (verdict.error) {
      console.log(`  ${pc.bold('Error:')} ${verdict.error}`);
      return;
    }

    console.log(`  Response 1: ${verdict.response1Score}`);
    console.log(`  Response 2: ${verdict.response2Score}`);
    if (verdict.explanation) {
      console.log(`  ${pc.bold('Why:')} ${verdict.explanation}`);
    }
  }

  renderChat(result: ChatAndJudgeResult): void {
    if (this.isJson) {
      this.renderJson(result);
      return;
    }

    if (result.error) {
      this.error(result.error);
      return;
    }
    console.log(pc.bold('Response:'));
    console.log(result.response ?? '');
    if (result.verdict) {
      this.renderVerdict(result.verdict);
    }
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }

  error(message: string | Error): void {
    const msg = message instanceof Error ? message.message : message;
    if (this.isJson) {
      console.error(JSON.stringify({ error: msg }));
    } else {
      console.error(pc.red(msg));
    }
  }

  private renderJson(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }
}
