import { Command } from 'commander';

import type { CommandResult, SetupOptions } from '../types/index.js';
import { resolveSetupConfig } from '../core/config.js';
import { resolveProjectRoot } from '../core/detect/project-detector.js';
import { getAllEcosystems, getEcosystemDefinition, resolveEcosystem, type Ecosystem } from '../core/ecosystems.js';
import { createBundleFetcher } from '../core/fetch/bundle-fetcher.js';
import { runSetupPipeline, type SetupResult } from '../core/setup/setup-pipeline.js';
import type { SetupPrompter } from '../core/setup/repository-setup.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { SpawnCommandRunner } from '../utils/process.js';
import { promptConfirmation, promptEcosystemSelection, promptText } from '../utils/prompts.js';

const interactivePrompter: SetupPrompter = {
  confirm: promptConfirmation,
  text: promptText
};

async function chooseEcosystem(language: string | undefined): Promise<Ecosystem> {
  if (language) {
    return resolveEcosystem(language);
  }
  const choices = getAllEcosystems().map(id => ({ id, name: getEcosystemDefinition(id).name }));
  return await promptEcosystemSelection(choices);
}

async function setupCommand(
  language: string | undefined,
  options: SetupOptions
): Promise<CommandResult<SetupResult>> {
  const config = await resolveSetupConfig({
    repo: options.repo,
    branch: options.branch,
    language
  });
  const targetRoot = await resolveProjectRoot(options.cwd);
  const ecosystem = await chooseEcosystem(config.language);
  logger.debug('Starting setup', { ecosystem, targetRoot, repoUrl: config.repoUrl, branch: config.branch });

  const runner = new SpawnCommandRunner();
  const fetcher = await createBundleFetcher(config.repoUrl, runner);

  const result = await runSetupPipeline(
    {
      ecosystem,
      repoUrl: config.repoUrl,
      branch: config.branch,
      targetRoot,
      dryRun: options.dryRun,
      assumeYes: options.yes,
      skipInstall: options.skipInstall,
      remoteSetup: options.remoteSetup
    },
    { fetcher, runner, prompter: interactivePrompter }
  );

  return {
    success: result.exitCode === 0,
    data: result,
    warnings: result.warnings.map(warning => warning.message)
  };
}

export function setupSetupCommand(program: Command): void {
  program
    .command('setup')
    .description('Apply the code quality template bundle to the project in the current directory')
    .argument('[language]', 'project ecosystem (flutter, reactnative); prompted for when omitted')
    .option('--repo <url>', 'template repository URL or local template directory')
    .option('--branch <name>', 'template repository branch')
    .option('--cwd <path>', 'project directory (default: current directory)')
    .option('-y, --yes', 'overwrite existing files without asking')
    .option('--dry-run', 'show what would change without writing anything')
    .option('--skip-install', 'skip git init, dependency installation and hook registration')
    .option('--no-remote-setup', 'skip the remote and branch setup questions')
    .action(withErrorHandling(async (language: string | undefined, options: SetupOptions) => {
      const result = await setupCommand(language, options);
      if (!result.success) {
        process.exitCode = 1;
      }
    }));
}
