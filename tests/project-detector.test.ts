import assert from 'node:assert/strict';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';

import { detectProject, resolveProjectRoot } from '../src/core/detect/project-detector.js';
import { NotAProjectError, ValidationError } from '../src/utils/errors.js';
import { makeTempDir, removeTempDir, writeTree } from './support/fakes.js';

async function withProject(files: Record<string, string>, body: (root: string) => Promise<void>): Promise<void> {
  const root = await makeTempDir('detect');
  try {
    await writeTree(root, files);
    await body(root);
  } finally {
    await removeTempDir(root);
  }
}

async function runDetectionTest(): Promise<void> {
  await withProject({ 'pubspec.yaml': 'name: demo_app\nversion: 1.0.0+1\n' }, async root => {
    const project = await detectProject(root);
    assert.equal(project.root, root);
    assert.equal(project.ecosystem, 'flutter');
    assert.equal(project.definition.bundleDir, 'linter-workflow-flutter');
    assert.equal(project.name, 'demo_app');
  });

  await withProject({ 'package.json': '{ "name": "rn-demo" }', 'app.json': '{}' }, async root => {
    const project = await detectProject(root);
    assert.equal(project.ecosystem, 'reactnative');
    assert.equal(project.name, 'rn-demo');
  });

  await withProject({
    'pubspec.yaml': 'name: [unterminated\n',
    'package.json': '{}',
    'app.json': '{}'
  }, async root => {
    const project = await detectProject(root);
    assert.equal(project.ecosystem, 'flutter', 'declaration order decides when several ecosystems match');
    assert.equal(project.name, undefined, 'an unreadable name does not fail detection');
  });
}

async function runNotAProjectTest(): Promise<void> {
  await withProject({}, async root => {
    await assert.rejects(
      detectProject(root),
      (error: unknown) =>
        error instanceof NotAProjectError
        && error.message === `${root} is not a recognized project`
        && error.missingMarkers.join(',') === 'pubspec.yaml'
    );
    assert.deepEqual(await readdir(root), [], 'detection never writes');
  });

  await withProject({ 'package.json': '{}' }, async root => {
    await assert.rejects(
      detectProject(root, 'flutter'),
      (error: unknown) => {
        assert.ok(error instanceof NotAProjectError);
        assert.equal(error.message, `${root} is not a Flutter project (missing pubspec.yaml)`);
        assert.deepEqual(error.remediation, ['Flutter: run from the project root containing pubspec.yaml']);
        return true;
      }
    );
    assert.deepEqual(await readdir(root), ['package.json']);
  });
}

async function runProjectRootTest(): Promise<void> {
  await withProject({ 'pubspec.yaml': 'name: demo_app\n' }, async root => {
    assert.equal(await resolveProjectRoot(root), root);

    const missing = join(root, 'no-such-dir');
    await assert.rejects(
      resolveProjectRoot(missing),
      (error: unknown) => {
        assert.ok(error instanceof ValidationError);
        assert.equal(error.message, `Not a directory: ${missing}`);
        assert.deepEqual(error.remediation, ['Pass --cwd the path of an existing project directory']);
        return true;
      }
    );

    const manifest = join(root, 'pubspec.yaml');
    await assert.rejects(resolveProjectRoot(manifest), ValidationError, 'a file is not a project directory');
  });
}

await runDetectionTest();
await runNotAProjectTest();
await runProjectRootTest();

console.log('project-detector tests passed');
