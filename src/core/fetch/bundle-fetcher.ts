/**
 * Bundle Fetcher
 * Retrieves the template repository and exposes `<localDir>/<bundleDir>/`.
 * Remote sources are shallow-cloned into a staging directory that the
 * caller removes through `cleanup()`.
 */

import { mkdtemp } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { STAGING_DIR_PREFIX } from '../../constants/index.js';
import { FetchError } from '../../utils/errors.js';
import { isDirectory, listDirectories, remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import type { CommandRunner } from '../../utils/process.js';

export interface FetchRequest {
  repoUrl: string;
  branch: string;
  bundleDir: string;
}

export interface FetchedBundle {
  // <localDir>/<bundleDir>
  bundleRoot: string;
  cleanup(): Promise<void>;
}

export interface BundleFetcher {
  fetch(request: FetchRequest): Promise<FetchedBundle>;
}

const REMOTE_URL_PATTERNS: RegExp[] = [
  /^https?:\/\/[^\s/]+\/\S+$/,
  /^ssh:\/\/\S+$/,
  /^git:\/\/\S+$/,
  /^file:\/\/\S+$/,
  /^[\w.-]+@[\w.-]+:\S+$/
];

export const EXPECTED_URL_FORMATS = [
  'https://github.com/<owner>/<repo>.git',
  'git@github.com:<owner>/<repo>.git',
  'a local directory containing the template folders'
];

export function isRemoteRepoUrl(url: string): boolean {
  return REMOTE_URL_PATTERNS.some(pattern => pattern.test(url.trim()));
}

async function missingBundleError(localDir: string, request: FetchRequest): Promise<FetchError> {
  const available = (await listDirectories(localDir)).filter(name => !name.startsWith('.'));
  return new FetchError(
    `Template folder '${request.bundleDir}' not found in ${request.repoUrl} (branch ${request.branch})`,
    [
      `Available folders: ${available.length > 0 ? available.join(', ') : '(none found)'}`,
      `Check that '${request.bundleDir}' is committed and pushed on branch '${request.branch}'`
    ]
  );
}

/**
 * Uses a local template checkout in place. Nothing is staged, so cleanup
 * never touches it.
 */
export class LocalDirectoryBundleFetcher implements BundleFetcher {
  async fetch(request: FetchRequest): Promise<FetchedBundle> {
    const localDir = resolve(request.repoUrl);
    const bundleRoot = join(localDir, request.bundleDir);
    if (!(await isDirectory(bundleRoot))) {
      throw await missingBundleError(localDir, request);
    }
    return { bundleRoot, cleanup: async () => undefined };
  }
}

export class GitBundleFetcher implements BundleFetcher {
  constructor(private readonly runner: CommandRunner) {}

  async fetch(request: FetchRequest): Promise<FetchedBundle> {
    if (!(await this.runner.isAvailable('git'))) {
      throw new FetchError('Git not found', ['Install Git and re-run the setup']);
    }

    const stagingDir = await mkdtemp(join(tmpdir(), STAGING_DIR_PREFIX));
    const cleanup = async (): Promise<void> => {
      await remove(stagingDir);
      logger.debug(`Removed staging directory ${stagingDir}`);
    };

    try {
      const checkoutDir = join(stagingDir, 'repo');
      const clone = await this.runner.run({
        command: 'git',
        args: ['clone', '--depth', '1', '--branch', request.branch, request.repoUrl, checkoutDir],
        cwd: stagingDir,
        capture: true
      });

      if (clone.exitCode !== 0) {
        const reason = clone.stderr.trim().split('\n').pop() ?? '';
        throw new FetchError(`Failed to clone ${request.repoUrl} (branch ${request.branch})${reason ? `: ${reason}` : ''}`, [
          `Expected a repository URL such as ${EXPECTED_URL_FORMATS[0]} or ${EXPECTED_URL_FORMATS[1]}`,
          `Check that branch '${request.branch}' exists and that you have access to the repository`
        ]);
      }

      const bundleRoot = join(checkoutDir, request.bundleDir);
      if (!(await isDirectory(bundleRoot))) {
        throw await missingBundleError(checkoutDir, request);
      }

      return { bundleRoot, cleanup };
    } catch (error) {
      await cleanup();
      throw error;
    }
  }
}

/**
 * Pick the fetcher for a repository reference: an existing local directory
 * is used in place, anything else must look like a Git URL.
 */
export async function createBundleFetcher(repoUrl: string, runner: CommandRunner): Promise<BundleFetcher> {
  if (await isDirectory(repoUrl)) {
    logger.debug(`Using local template directory ${repoUrl}`);
    return new LocalDirectoryBundleFetcher();
  }

  if (!isRemoteRepoUrl(repoUrl)) {
    throw new FetchError(`Invalid repository URL: ${repoUrl}`, [
      'Expected one of:',
      ...EXPECTED_URL_FORMATS.map(format => `  • ${format}`)
    ]);
  }

  return new GitBundleFetcher(runner);
}
