import assert from 'node:assert/strict';

import { loadBundle } from '../src/core/bundle/bundle-loader.js';
import { getEcosystemDefinition } from '../src/core/ecosystems.js';
import { makeTempDir, removeTempDir, writeTree } from './support/fakes.js';

async function runManifestOrderTest(): Promise<void> {
  const bundleDir = await makeTempDir('bundle');

  try {
    await writeTree(bundleDir, {
      'package.json': '{ "name": "quality" }\n',
      '.gitignore': 'node_modules/\n',
      '.husky/pre-commit': '#!/bin/sh\n',
      'docs/engineering/b.md': '# B\n',
      'docs/engineering/a/guide.md': '# Guide\n',
      'docs/engineering/.DS_Store': 'junk',
      'unlisted.txt': 'not in the manifest\n'
    });

    const bundle = await loadBundle(bundleDir, getEcosystemDefinition('flutter'));

    assert.equal(bundle.ecosystem, 'flutter');
    assert.equal(bundle.sensitiveFile, 'package.json');
    assert.deepEqual(
      bundle.entries.map(entry => `${entry.fileClass}:${entry.relativePath}`),
      [
        'root:package.json',
        'ignore:.gitignore',
        'hook:.husky/pre-commit',
        'doc:docs/engineering/a/guide.md',
        'doc:docs/engineering/b.md',
        'manifest-dependency:pubspec.yaml'
      ]
    );

    const hook = bundle.entries[2];
    assert.equal(hook.kind, 'file');
    if (hook.kind === 'file') {
      assert.equal(hook.content, '#!/bin/sh\n');
    }
    assert.equal(Object.isFrozen(bundle.entries), true);
  } finally {
    await removeTempDir(bundleDir);
  }
}

async function runEmptyBundleTest(): Promise<void> {
  const bundleDir = await makeTempDir('bundle-empty');

  try {
    const bundle = await loadBundle(bundleDir, getEcosystemDefinition('reactnative'));
    assert.deepEqual(bundle.entries, [], 'react native declares no manifest patch, so nothing remains');
  } finally {
    await removeTempDir(bundleDir);
  }
}

await runManifestOrderTest();
await runEmptyBundleTest();

console.log('bundle-loader tests passed');
