/**
 * Optional interactive tail of a setup run: remote origin, initial commit,
 * the standard branch set and pushing it.
 */

import {
  ENV_VARS,
  GIT_BRANCHES,
  GIT_REMOTE,
  INITIAL_COMMIT_MESSAGE
} from '../../constants/index.js';
import { DownstreamCommandError } from '../../utils/errors.js';
import { formatCommand, type CommandRunner } from '../../utils/process.js';
import type { StepLog } from './downstream-steps.js';

export interface SetupPrompter {
  confirm(message: string, initial?: boolean): Promise<boolean>;
  text(message: string): Promise<string>;
}

class GitSession {
  readonly failures: DownstreamCommandError[] = [];

  constructor(
    private readonly root: string,
    private readonly runner: CommandRunner
  ) {}

  async succeeds(args: string[]): Promise<boolean> {
    const outcome = await this.runner.run({ command: 'git', args, cwd: this.root, capture: true });
    return outcome.exitCode === 0;
  }

  async output(args: string[]): Promise<string | undefined> {
    const outcome = await this.runner.run({ command: 'git', args, cwd: this.root, capture: true });
    return outcome.exitCode === 0 ? outcome.stdout.trim() : undefined;
  }

  async run(args: string[], env?: Record<string, string>): Promise<boolean> {
    const outcome = await this.runner.run({ command: 'git', args, cwd: this.root, env });
    if (outcome.exitCode === 0) return true;
    const rendered = formatCommand('git', args);
    this.failures.push(new DownstreamCommandError(`'${rendered}' exited with code ${outcome.exitCode}`, rendered, outcome.exitCode));
    return false;
  }

  async branchExists(branch: string): Promise<boolean> {
    return await this.succeeds(['rev-parse', '--verify', '--quiet', branch]);
  }
}

async function configureRemote(git: GitSession, prompter: SetupPrompter, log: StepLog): Promise<void> {
  const url = await prompter.text('GitHub repository URL (press Enter to skip):');
  if (!url) return;

  const current = await git.output(['remote', 'get-url', GIT_REMOTE]);
  if (current === undefined) {
    if (await git.run(['remote', 'add', GIT_REMOTE, url])) {
      log.info(`✓ Added remote ${GIT_REMOTE}`);
    }
    return;
  }

  log.info(`ℹ️  Remote '${GIT_REMOTE}' already exists: ${current}`);
  if (await prompter.confirm('Update it?', false)) {
    if (await git.run(['remote', 'set-url', GIT_REMOTE, url])) {
      log.info(`✓ Updated remote ${GIT_REMOTE}`);
    }
  }
}

async function checkoutMain(git: GitSession): Promise<void> {
  if (await git.branchExists(GIT_BRANCHES.MAIN)) {
    await git.run(['checkout', GIT_BRANCHES.MAIN]);
  } else if (await git.branchExists(GIT_BRANCHES.LEGACY_MAIN)) {
    await git.run(['checkout', GIT_BRANCHES.LEGACY_MAIN]);
    await git.run(['branch', '-m', GIT_BRANCHES.LEGACY_MAIN, GIT_BRANCHES.MAIN]);
  } else {
    await git.run(['checkout', '-b', GIT_BRANCHES.MAIN]);
  }
}

async function createBranches(git: GitSession, log: StepLog): Promise<void> {
  await git.run(['add', '.']);
  // A rerun has nothing to commit; that is not a failure
  if (await git.succeeds(['commit', '-m', INITIAL_COMMIT_MESSAGE])) {
    log.info('✓ Initial commit created');
  } else {
    log.info('⚠️  Commit failed (nothing to commit or already committed)');
  }

  await checkoutMain(git);

  for (const branch of GIT_BRANCHES.STANDARD) {
    if (await git.branchExists(branch)) {
      log.info(`ℹ️  Branch '${branch}' already exists`);
      continue;
    }
    if (await git.run(['checkout', '-b', branch, GIT_BRANCHES.MAIN])) {
      log.info(`✓ Created branch: ${branch}`);
    }
  }

  if (await git.run(['checkout', GIT_BRANCHES.WORKING])) {
    log.info(`✓ Switched to ${GIT_BRANCHES.WORKING}`);
  }
}

async function pushBranches(git: GitSession, log: StepLog): Promise<void> {
  for (const branch of [GIT_BRANCHES.MAIN, ...GIT_BRANCHES.STANDARD]) {
    if (!(await git.branchExists(branch))) continue;
    const pushed = await git.run(
      ['push', '-u', GIT_REMOTE, branch],
      { [ENV_VARS.ALLOW_PROTECTED_BRANCHES]: 'true' }
    );
    if (pushed) log.info(`✓ Pushed ${branch}`);
  }
}

/**
 * Walk the user through remote and branch setup. Every git failure is
 * collected and returned; nothing here aborts the run.
 */
export async function runRepositorySetup(
  root: string,
  runner: CommandRunner,
  prompter: SetupPrompter,
  log: StepLog
): Promise<DownstreamCommandError[]> {
  const git = new GitSession(root, runner);

  await configureRemote(git, prompter, log);

  if (!(await prompter.confirm('Create initial commit and standard branches?', false))) {
    log.info('⏭️  Skipped branch setup');
    return git.failures;
  }

  await createBranches(git, log);

  const hasRemote = (await git.output(['remote', 'get-url', GIT_REMOTE])) !== undefined;
  if (hasRemote && await prompter.confirm('Push all branches to the remote?', false)) {
    await pushBranches(git, log);
  }

  return git.failures;
}
