import assert from 'node:assert/strict';
import { mkdirSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';

import {
  GitBundleFetcher,
  LocalDirectoryBundleFetcher,
  createBundleFetcher,
  isRemoteRepoUrl
} from '../src/core/fetch/bundle-fetcher.js';
import { FetchError } from '../src/utils/errors.js';
import { exists } from '../src/utils/fs.js';
import { RecordingRunner, makeTempDir, removeTempDir } from './support/fakes.js';

const repoUrl = 'https://github.com/example-org/quality-templates.git';

async function runUrlValidationTest(): Promise<void> {
  assert.equal(isRemoteRepoUrl(repoUrl), true);
  assert.equal(isRemoteRepoUrl('git@github.com:example-org/quality-templates.git'), true);
  assert.equal(isRemoteRepoUrl('ssh://git@example.test/templates.git'), true);
  assert.equal(isRemoteRepoUrl('file:///srv/templates.git'), true);
  assert.equal(isRemoteRepoUrl('templates'), false);
  assert.equal(isRemoteRepoUrl('https://'), false);

  const runner = new RecordingRunner();
  assert.ok(await createBundleFetcher(repoUrl, runner) instanceof GitBundleFetcher);
  await assert.rejects(
    createBundleFetcher('not a repository', runner),
    (error: unknown) => error instanceof FetchError && error.message === 'Invalid repository URL: not a repository'
  );
}

async function runLocalDirectoryTest(): Promise<void> {
  const templates = await makeTempDir('templates');

  try {
    await mkdir(join(templates, 'linter-workflow-flutter'));
    await mkdir(join(templates, 'linter-workflow-reactnative'));
    await mkdir(join(templates, '.git'));

    const fetcher = await createBundleFetcher(templates, new RecordingRunner());
    assert.ok(fetcher instanceof LocalDirectoryBundleFetcher);

    const fetched = await fetcher.fetch({ repoUrl: templates, branch: 'main', bundleDir: 'linter-workflow-flutter' });
    assert.equal(fetched.bundleRoot, join(resolve(templates), 'linter-workflow-flutter'));
    await fetched.cleanup();
    assert.equal(await exists(fetched.bundleRoot), true, 'a local template directory is never removed');

    await assert.rejects(
      fetcher.fetch({ repoUrl: templates, branch: 'main', bundleDir: 'linter-workflow-kotlin' }),
      (error: unknown) => {
        assert.ok(error instanceof FetchError);
        assert.equal(error.message, `Template folder 'linter-workflow-kotlin' not found in ${templates} (branch main)`);
        assert.equal(error.remediation[0], 'Available folders: linter-workflow-flutter, linter-workflow-reactnative');
        return true;
      }
    );
  } finally {
    await removeTempDir(templates);
  }
}

async function runGitCloneTest(): Promise<void> {
  const runner = new RecordingRunner(['git'], spec => {
    const checkoutDir = spec.args[spec.args.length - 1];
    mkdirSync(join(checkoutDir, 'linter-workflow-flutter'), { recursive: true });
    return { exitCode: 0 };
  });

  const fetched = await new GitBundleFetcher(runner).fetch({
    repoUrl,
    branch: 'release',
    bundleDir: 'linter-workflow-flutter'
  });

  const clone = runner.calls[0];
  const checkoutDir = dirname(fetched.bundleRoot);
  assert.deepEqual(clone.args, ['clone', '--depth', '1', '--branch', 'release', repoUrl, checkoutDir]);
  assert.equal(clone.capture, true);
  assert.equal(await exists(fetched.bundleRoot), true);

  await fetched.cleanup();
  assert.equal(await exists(clone.cwd), false, 'cleanup removes the staging directory');
}

async function runGitFailureTest(): Promise<void> {
  await assert.rejects(
    new GitBundleFetcher(new RecordingRunner([])).fetch({ repoUrl, branch: 'main', bundleDir: 'x' }),
    (error: unknown) => error instanceof FetchError && error.message === 'Git not found'
  );

  const failing = new RecordingRunner(['git'], () => ({
    exitCode: 128,
    stderr: "Cloning into 'repo'...\nfatal: Remote branch nope not found in upstream origin\n"
  }));
  await assert.rejects(
    new GitBundleFetcher(failing).fetch({ repoUrl, branch: 'nope', bundleDir: 'linter-workflow-flutter' }),
    (error: unknown) =>
      error instanceof FetchError
      && error.message === `Failed to clone ${repoUrl} (branch nope): fatal: Remote branch nope not found in upstream origin`
  );
  assert.equal(await exists(failing.calls[0].cwd), false, 'a failed clone leaves no staging directory');

  const emptyClone = new RecordingRunner(['git'], spec => {
    mkdirSync(join(spec.args[spec.args.length - 1], 'linter-workflow-reactnative'), { recursive: true });
    return { exitCode: 0 };
  });
  await assert.rejects(
    new GitBundleFetcher(emptyClone).fetch({ repoUrl, branch: 'main', bundleDir: 'linter-workflow-flutter' }),
    (error: unknown) =>
      error instanceof FetchError
      && error.remediation[0] === 'Available folders: linter-workflow-reactnative'
  );
  assert.equal(await exists(emptyClone.calls[0].cwd), false);
}

await runUrlValidationTest();
await runLocalDirectoryTest();
await runGitCloneTest();
await runGitFailureTest();

console.log('bundle-fetcher tests passed');
