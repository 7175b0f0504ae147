import assert from 'node:assert/strict';
import { mkdir, readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';

import {
  LocalDirectoryBundleFetcher,
  type BundleFetcher,
  type FetchRequest,
  type FetchedBundle
} from '../src/core/fetch/bundle-fetcher.js';
import { runSetupPipeline, type SetupRequest } from '../src/core/setup/setup-pipeline.js';
import { NotAProjectError } from '../src/utils/errors.js';
import { RecordingRunner, StubPrompter, makeTempDir, removeTempDir, writeTree } from './support/fakes.js';

class TrackingFetcher implements BundleFetcher {
  cleanups = 0;
  private readonly inner = new LocalDirectoryBundleFetcher();

  async fetch(request: FetchRequest): Promise<FetchedBundle> {
    const fetched = await this.inner.fetch(request);
    return {
      bundleRoot: fetched.bundleRoot,
      cleanup: async () => {
        this.cleanups++;
        await fetched.cleanup();
      }
    };
  }
}

class StuckCleanupFetcher implements BundleFetcher {
  private readonly inner = new LocalDirectoryBundleFetcher();

  async fetch(request: FetchRequest): Promise<FetchedBundle> {
    const fetched = await this.inner.fetch(request);
    return {
      bundleRoot: fetched.bundleRoot,
      cleanup: async () => {
        await fetched.cleanup();
        throw new Error('EBUSY: staging directory is in use');
      }
    };
  }
}

const bundleFiles: Record<string, string> = {
  'linter-workflow-flutter/package.json': '{\n  "name": "quality-tooling"\n}\n',
  'linter-workflow-flutter/commitlint.config.js': "module.exports = { extends: ['@commitlint/config-conventional'] };\n",
  'linter-workflow-flutter/.gitignore': 'build/\nnode_modules/\n',
  'linter-workflow-flutter/.husky/pre-commit': '#!/bin/sh\nnpm run quality:check\n',
  'linter-workflow-flutter/docs/engineering/guide.md': '# Engineering guide\n'
};

const pubspec = 'name: demo_app\n\nflutter:\n  uses-material-design: true\n';

interface Workspace {
  templates: string;
  project: string;
  request: SetupRequest;
}

async function withWorkspace(projectFiles: Record<string, string>, body: (ws: Workspace) => Promise<void>): Promise<void> {
  const templates = await makeTempDir('pipeline-templates');
  const project = await makeTempDir('pipeline-project');

  try {
    await writeTree(templates, bundleFiles);
    await writeTree(project, projectFiles);
    await body({
      templates,
      project,
      request: {
        ecosystem: 'flutter',
        repoUrl: templates,
        branch: 'main',
        targetRoot: project,
        remoteSetup: false
      }
    });
  } finally {
    await removeTempDir(templates);
    await removeTempDir(project);
  }
}

async function runFullSetupTest(): Promise<void> {
  await withWorkspace({ 'pubspec.yaml': pubspec, 'package.json': '{ "name": "demo" }\n' }, async ({ project, request }) => {
    const fetcher = new TrackingFetcher();
    const runner = new RecordingRunner(['git', 'flutter', 'npm', 'npx'], spec =>
      spec.args.join(' ') === 'config core.hooksPath' ? { stdout: '.husky\n' } : undefined
    );
    const prompter = new StubPrompter([false]);

    const result = await runSetupPipeline(request, { fetcher, runner, prompter });

    assert.equal(result.exitCode, 0);
    assert.deepEqual(prompter.asked, ['package.json already exists. Overwrite?']);
    assert.deepEqual(result.report.skipped, ['package.json']);
    assert.deepEqual(result.warnings, []);
    assert.equal(fetcher.cleanups, 1);

    assert.equal(await readFile(join(project, 'package.json'), 'utf8'), '{ "name": "demo" }\n');
    assert.equal(
      await readFile(join(project, 'pubspec.yaml'), 'utf8'),
      'name: demo_app\n\ndev_dependencies:\n  very_good_analysis: ^10.0.0\nflutter:\n  uses-material-design: true\n'
    );
    assert.equal(await readFile(join(project, 'docs/engineering/guide.md'), 'utf8'), '# Engineering guide\n');

    assert.deepEqual(runner.commandLines(), [
      'git init',
      'flutter pub get',
      'npm install',
      'npx husky install',
      'git config core.hooksPath'
    ]);
    assert.deepEqual(result.steps.map(step => `${step.label} ${step.status}`), [
      'Fetching template bundle... ok',
      'Detecting project... ok',
      'Merging template files... ok',
      'Initializing Git repository... ok',
      'Installing dependencies... ok',
      'Registering Git hooks... ok',
      'Setting up Git remote and branches (optional)... skipped',
      'Cleaning up... ok'
    ]);
  });
}

async function runDryRunTest(): Promise<void> {
  const projectFiles = { 'pubspec.yaml': pubspec, 'package.json': '{ "name": "demo" }\n' };
  await withWorkspace(projectFiles, async ({ project, request }) => {
    const runner = new RecordingRunner();
    const result = await runSetupPipeline(
      { ...request, dryRun: true, remoteSetup: true },
      { fetcher: new TrackingFetcher(), runner, prompter: new StubPrompter() }
    );

    assert.equal(result.exitCode, 0);
    assert.equal(result.report.dryRun, true);
    assert.deepEqual(result.report.skipped, ['package.json']);
    assert.deepEqual(runner.calls, [], 'a dry run starts no tools');
    assert.deepEqual((await readdir(project)).sort(), ['package.json', 'pubspec.yaml']);
    assert.equal(await readFile(join(project, 'pubspec.yaml'), 'utf8'), pubspec);
  });
}

async function runNotAProjectTest(): Promise<void> {
  await withWorkspace({ 'README.md': '# Not a Flutter app\n' }, async ({ project, request }) => {
    const fetcher = new TrackingFetcher();
    const runner = new RecordingRunner();

    await assert.rejects(
      runSetupPipeline(request, { fetcher, runner, prompter: new StubPrompter() }),
      NotAProjectError
    );
    assert.equal(fetcher.cleanups, 1, 'the staged bundle is cleaned up after a fatal error');
    assert.deepEqual(runner.calls, []);
    assert.deepEqual(await readdir(project), ['README.md']);
  });
}

async function runCleanupFailureTest(): Promise<void> {
  await withWorkspace({ 'README.md': '# Not a Flutter app\n' }, async ({ request }) => {
    await assert.rejects(
      runSetupPipeline(request, { fetcher: new StuckCleanupFetcher(), runner: new RecordingRunner(), prompter: new StubPrompter() }),
      NotAProjectError,
      'a failed cleanup does not replace the detection error'
    );
  });

  await withWorkspace({ 'pubspec.yaml': pubspec }, async ({ request }) => {
    const result = await runSetupPipeline(
      { ...request, skipInstall: true },
      { fetcher: new StuckCleanupFetcher(), runner: new RecordingRunner(), prompter: new StubPrompter() }
    );

    assert.equal(result.exitCode, 0);
    assert.equal(result.steps[7].label, 'Cleaning up...');
    assert.equal(result.steps[7].status, 'warning');
  });
}

async function runPartialFailureTest(): Promise<void> {
  await withWorkspace({ 'pubspec.yaml': pubspec }, async ({ project, request }) => {
    // A directory where the bundle wants a file makes that one write fail
    await mkdir(join(project, 'commitlint.config.js'));
    const runner = new RecordingRunner(['git', 'npx']);

    const result = await runSetupPipeline(request, {
      fetcher: new TrackingFetcher(),
      runner,
      prompter: new StubPrompter()
    });

    assert.equal(result.exitCode, 1);
    assert.deepEqual(result.report.failed, ['commitlint.config.js']);
    assert.equal(result.report.succeeded.length, 5);
    assert.deepEqual(result.warnings.map(warning => warning.message), [
      "Flutter dependencies: 'flutter' not found, skipped",
      "npm dependencies: 'npm' not found, skipped"
    ]);
    assert.equal(result.steps[2].status, 'warning');
    assert.equal(result.steps[4].status, 'warning');
    assert.equal(
      await readFile(join(project, '.gitignore'), 'utf8'),
      'build/\nnode_modules/\n',
      'files after the failed one are still applied'
    );
  });
}

await runFullSetupTest();
await runDryRunTest();
await runNotAProjectTest();
await runCleanupFailureTest();
await runPartialFailureTest();

console.log('setup-pipeline tests passed');
