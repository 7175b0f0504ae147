import type { FileOutcome, RunReport } from '../merge/merge-engine.js';
import type { EcosystemDefinition } from '../ecosystems.js';
import type { DownstreamCommandError } from '../../utils/errors.js';

export type StepStatus = 'ok' | 'warning' | 'failed' | 'skipped';

export interface StepRecord {
  label: string;
  status: StepStatus;
}

/**
 * Prints `[n/total] label` headers and remembers how each step ended.
 */
export class StepTracker {
  private current = 0;
  readonly records: StepRecord[] = [];

  constructor(private readonly total: number) {}

  start(label: string): void {
    this.current++;
    console.log(`\n[${this.current}/${this.total}] ${label}`);
    this.records.push({ label, status: 'ok' });
  }

  skip(label: string, reason: string): void {
    this.current++;
    console.log(`\n[${this.current}/${this.total}] ${label}`);
    console.log(`   ⏭️  Skipped (${reason})`);
    this.records.push({ label, status: 'skipped' });
  }

  finish(status: StepStatus): void {
    const last = this.records[this.records.length - 1];
    if (last) last.status = status;
  }
}

const ACTION_LABELS: Record<FileOutcome['action'], string> = {
  created: 'Created',
  overwritten: 'Updated',
  merged: 'Merged',
  unchanged: 'Unchanged',
  declined: 'Skipped',
  'pending-confirmation': 'Would ask',
  failed: 'Failed'
};

export function formatOutcomeLine(outcome: FileOutcome): string {
  const marker = outcome.status === 'failed' ? '❌' : outcome.status === 'skipped' ? '⏭️ ' : '✓';
  const note = outcome.error ?? outcome.detail;
  return `${marker} ${ACTION_LABELS[outcome.action]} ${outcome.path}${note ? ` (${note})` : ''}`;
}

/**
 * Lines of the end-of-run summary, one entry per printed line.
 */
export function formatRunSummary(
  report: RunReport,
  warnings: DownstreamCommandError[],
  steps: StepRecord[]
): string[] {
  const heading = report.dryRun ? 'Dry run summary' : 'Setup summary';
  const lines = [`\n✓ ${heading}:`, `✓ Succeeded: ${report.succeeded.length} file(s)`];
  for (const path of report.succeeded) {
    lines.push(`   ├── ${path}`);
  }

  if (report.skipped.length > 0) {
    lines.push(`⏭️  Skipped: ${report.skipped.length} file(s)`);
    for (const path of report.skipped) {
      lines.push(`   ├── ${path}`);
    }
  }

  if (report.failed.length > 0) {
    lines.push(`❌ Failed: ${report.failed.length} file(s)`);
    for (const item of report.outcomes.filter(outcome => outcome.status === 'failed')) {
      lines.push(`   ├── ${item.path}: ${item.error ?? 'unknown error'}`);
    }
  }

  const skippedSteps = steps.filter(step => step.status === 'skipped');
  if (skippedSteps.length > 0) {
    lines.push(`ℹ️  Steps not run: ${skippedSteps.map(step => step.label).join(', ')}`);
  }

  if (warnings.length > 0) {
    lines.push(`\n⚠️  Warnings:`);
    for (const warning of warnings) {
      lines.push(`   • ${warning.message}`);
      for (const hint of warning.remediation) {
        lines.push(`     💡 ${hint}`);
      }
    }
  }

  return lines;
}

export function displayRunSummary(
  report: RunReport,
  warnings: DownstreamCommandError[],
  steps: StepRecord[]
): void {
  for (const line of formatRunSummary(report, warnings, steps)) {
    console.log(line);
  }
}

export function displayNextSteps(definition: EcosystemDefinition): void {
  console.log(`\n📝 Next steps for your ${definition.name} project:`);
  console.log('   1. Verify the setup:      npm run validate');
  console.log('   2. Run quality checks:    npm run quality:check');
  console.log('   3. Protect branches main, develop, uat and prod in your Git host settings');
  console.log('   4. Start a feature:       git checkout -b feature/<name>');
}
