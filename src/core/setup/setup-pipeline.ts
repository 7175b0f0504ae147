/**
 * Setup Pipeline
 * fetch → detect → merge → git init → install → hooks → repository setup
 * → cleanup. Fetch and detection failures throw before the project is
 * touched; everything after the merge only adds warnings.
 */

import { logger } from '../../utils/logger.js';
import type { DownstreamCommandError } from '../../utils/errors.js';
import type { CommandRunner } from '../../utils/process.js';
import { loadBundle } from '../bundle/bundle-loader.js';
import { detectProject } from '../detect/project-detector.js';
import { ECOSYSTEM_DEFINITIONS, getEcosystemDefinition, type Ecosystem, type EcosystemDefinition } from '../ecosystems.js';
import type { BundleFetcher } from '../fetch/bundle-fetcher.js';
import { hasFailures, reconcile, type ConfirmPrompt, type RunReport } from '../merge/merge-engine.js';
import { ensureGitRepository, installDependencies, registerHooks, type StepLog } from './downstream-steps.js';
import { runRepositorySetup, type SetupPrompter } from './repository-setup.js';
import {
  StepTracker,
  displayNextSteps,
  displayRunSummary,
  formatOutcomeLine,
  type StepRecord,
  type StepStatus
} from './setup-reporting.js';

export interface SetupRequest {
  ecosystem: Ecosystem;
  repoUrl: string;
  branch: string;
  targetRoot: string;
  dryRun?: boolean;
  // Answer every overwrite confirmation with yes
  assumeYes?: boolean;
  skipInstall?: boolean;
  remoteSetup?: boolean;
}

export interface SetupDependencies {
  fetcher: BundleFetcher;
  runner: CommandRunner;
  prompter: SetupPrompter;
  definitions?: readonly EcosystemDefinition[];
}

export interface SetupResult {
  exitCode: number;
  report: RunReport;
  warnings: DownstreamCommandError[];
  steps: StepRecord[];
}

const stepLog: StepLog = {
  info: (message: string) => console.log(`   ${message}`)
};

const TOTAL_STEPS = 8;

function statusFor(failures: DownstreamCommandError[]): StepStatus {
  return failures.length > 0 ? 'warning' : 'ok';
}

export async function runSetupPipeline(
  request: SetupRequest,
  deps: SetupDependencies
): Promise<SetupResult> {
  const definitions = deps.definitions ?? ECOSYSTEM_DEFINITIONS;
  const definition = getEcosystemDefinition(request.ecosystem, definitions);
  const runDownstream = !request.dryRun && !request.skipInstall;
  const runRemoteSetup = !request.dryRun && request.remoteSetup !== false;
  const steps = new StepTracker(TOTAL_STEPS);
  const skipReason = request.dryRun ? 'dry run' : '--skip-install';
  const warnings: DownstreamCommandError[] = [];

  console.log(`🚀 lintflow setup - ${definition.name}${request.dryRun ? ' (dry run)' : ''}`);

  steps.start('Fetching template bundle...');
  const fetched = await deps.fetcher.fetch({
    repoUrl: request.repoUrl,
    branch: request.branch,
    bundleDir: definition.bundleDir
  });
  stepLog.info(`✓ Template bundle ready (${request.repoUrl}#${request.branch})`);

  let report: RunReport;
  try {
    steps.start('Detecting project...');
    const project = await detectProject(request.targetRoot, definition.id, definitions);
    stepLog.info(`✓ ${definition.name} project${project.name ? ` '${project.name}'` : ''} at ${project.root}`);

    steps.start('Merging template files...');
    const bundle = await loadBundle(fetched.bundleRoot, definition);
    const confirm: ConfirmPrompt = request.assumeYes
      ? async () => true
      : async (question: string) => await deps.prompter.confirm(question, false);
    report = await reconcile(bundle, project.root, {
      confirm,
      dryRun: request.dryRun,
      onOutcome: outcome => stepLog.info(formatOutcomeLine(outcome))
    });
    steps.finish(hasFailures(report) ? 'warning' : 'ok');

    if (runDownstream) {
      steps.start('Initializing Git repository...');
      const gitFailures = await ensureGitRepository(project.root, deps.runner, stepLog);
      warnings.push(...gitFailures);
      steps.finish(statusFor(gitFailures));

      steps.start('Installing dependencies...');
      const installFailures = await installDependencies(project.root, definition, deps.runner, stepLog);
      warnings.push(...installFailures);
      steps.finish(statusFor(installFailures));

      steps.start('Registering Git hooks...');
      const hookFailures = await registerHooks(project.root, deps.runner, stepLog);
      warnings.push(...hookFailures);
      steps.finish(statusFor(hookFailures));
    } else {
      steps.skip('Initializing Git repository...', skipReason);
      steps.skip('Installing dependencies...', skipReason);
      steps.skip('Registering Git hooks...', skipReason);
    }

    if (runRemoteSetup) {
      steps.start('Setting up Git remote and branches (optional)...');
      const remoteFailures = await runRepositorySetup(project.root, deps.runner, deps.prompter, stepLog);
      warnings.push(...remoteFailures);
      steps.finish(statusFor(remoteFailures));
    } else {
      steps.skip('Setting up Git remote and branches (optional)...', request.dryRun ? 'dry run' : '--no-remote-setup');
    }
  } finally {
    steps.start('Cleaning up...');
    try {
      await fetched.cleanup();
      stepLog.info('✓ Removed staged template files');
    } catch (error) {
      // The run's own error, if any, is the one to report
      logger.debug('Failed to remove staged template files', { error });
      steps.finish('warning');
    }
  }

  for (const warning of warnings) {
    logger.debug('Downstream step reported a problem', { command: warning.command, exitCode: warning.exitCode });
  }

  displayRunSummary(report, warnings, steps.records);
  if (!report.dryRun) {
    displayNextSteps(definition);
  }

  return {
    exitCode: hasFailures(report) ? 1 : 0,
    report,
    warnings,
    steps: steps.records
  };
}
