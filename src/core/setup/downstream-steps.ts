/**
 * Downstream tool invocations run after the merge: repository
 * initialisation, dependency installation and Git hook registration.
 * Failures come back as DownstreamCommandError values; none of them throw.
 */

import { join } from 'path';
import { DIR_PATTERNS } from '../../constants/index.js';
import { DownstreamCommandError } from '../../utils/errors.js';
import { exists } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { formatCommand, type CommandRunner } from '../../utils/process.js';
import type { EcosystemDefinition, InstallCommandDef } from '../ecosystems.js';

export interface StepLog {
  info(message: string): void;
}

const consoleStepLog: StepLog = {
  info: (message: string) => console.log(`   ${message}`)
};

async function runOrReport(
  runner: CommandRunner,
  root: string,
  command: string,
  args: string[],
  label: string
): Promise<DownstreamCommandError | undefined> {
  const outcome = await runner.run({ command, args, cwd: root });
  const rendered = formatCommand(command, args);

  if (outcome.missing) {
    return new DownstreamCommandError(`${label}: '${command}' not found`, rendered, null, [
      `Install ${command} and run '${rendered}' manually`
    ]);
  }
  if (outcome.exitCode !== 0) {
    return new DownstreamCommandError(`${label}: '${rendered}' exited with code ${outcome.exitCode}`, rendered, outcome.exitCode, [
      `Re-run '${rendered}' to see the full error`
    ]);
  }
  return undefined;
}

/**
 * `git init` when the project is not a repository yet; hooks need one.
 */
export async function ensureGitRepository(
  root: string,
  runner: CommandRunner,
  log: StepLog = consoleStepLog
): Promise<DownstreamCommandError[]> {
  if (await exists(join(root, DIR_PATTERNS.GIT))) {
    log.info('ℹ️  Git repository already exists');
    return [];
  }

  const failure = await runOrReport(runner, root, 'git', ['init'], 'Git initialisation');
  if (failure) return [failure];
  log.info('✓ Git repository initialized');
  return [];
}

async function resolveInstallCommand(
  root: string,
  def: InstallCommandDef,
  runner: CommandRunner
): Promise<{ command: string; args: string[] } | undefined> {
  if (def.wrapper
    && await runner.isAvailable(def.wrapper.command)
    && await exists(join(root, def.wrapper.whenFile))) {
    return { command: def.wrapper.command, args: [def.command, ...def.args] };
  }
  if (await runner.isAvailable(def.command)) {
    return { command: def.command, args: def.args };
  }
  return undefined;
}

export async function installDependencies(
  root: string,
  definition: EcosystemDefinition,
  runner: CommandRunner,
  log: StepLog = consoleStepLog
): Promise<DownstreamCommandError[]> {
  const failures: DownstreamCommandError[] = [];

  for (const def of definition.install) {
    const resolved = await resolveInstallCommand(root, def, runner);
    const rendered = formatCommand(def.command, def.args);

    if (!resolved) {
      failures.push(new DownstreamCommandError(`${def.label}: '${def.command}' not found, skipped`, rendered, null, [
        `Run '${rendered}' manually after installing ${def.command}`
      ]));
      continue;
    }

    const failure = await runOrReport(runner, root, resolved.command, resolved.args, def.label);
    if (failure) {
      failures.push(failure);
      continue;
    }
    const via = resolved.command === def.command ? '' : ` (via ${resolved.command})`;
    log.info(`✓ ${def.label} installed${via}`);
  }

  return failures;
}

async function readHooksPath(root: string, runner: CommandRunner): Promise<string> {
  const outcome = await runner.run({
    command: 'git',
    args: ['config', 'core.hooksPath'],
    cwd: root,
    capture: true
  });
  return outcome.exitCode === 0 ? outcome.stdout.trim() : '';
}

async function setHooksPath(root: string, runner: CommandRunner): Promise<DownstreamCommandError | undefined> {
  return await runOrReport(runner, root, 'git', ['config', 'core.hooksPath', DIR_PATTERNS.HUSKY], 'Hook registration');
}

/**
 * Register the husky hooks with Git: `npx husky install`, falling back to
 * setting core.hooksPath directly, then verify the hooks path.
 */
export async function registerHooks(
  root: string,
  runner: CommandRunner,
  log: StepLog = consoleStepLog
): Promise<DownstreamCommandError[]> {
  const husky = await runner.run({ command: 'npx', args: ['husky', 'install'], cwd: root });

  if (husky.missing || husky.exitCode !== 0) {
    logger.debug('husky install failed, setting core.hooksPath directly', { exitCode: husky.exitCode });
    log.info('⚠️  Husky install failed, configuring the Git hooks path directly');
    const failure = await setHooksPath(root, runner);
    if (failure) return [failure];
  }

  if (!(await readHooksPath(root, runner)).includes(DIR_PATTERNS.HUSKY)) {
    const failure = await setHooksPath(root, runner);
    if (failure) return [failure];
  }

  log.info(`✓ Git hooks path: ${DIR_PATTERNS.HUSKY}`);
  return [];
}
