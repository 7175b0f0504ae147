import assert from 'node:assert/strict';

import {
  ECOSYSTEM_DEFINITIONS,
  getAllEcosystems,
  getEcosystemDefinition,
  parseEcosystemDefinitions,
  resolveEcosystem
} from '../src/core/ecosystems.js';
import { ConfigError, UnknownEcosystemError } from '../src/utils/errors.js';
import { parseJsonc } from '../src/utils/jsonc.js';

async function runBundledDefinitionsTest(): Promise<void> {
  assert.deepEqual(getAllEcosystems(), ['flutter', 'reactnative']);

  const flutter = getEcosystemDefinition('flutter');
  assert.equal(flutter.bundleDir, 'linter-workflow-flutter');
  assert.deepEqual(flutter.markers, ['pubspec.yaml']);
  assert.equal(flutter.sensitiveFile, 'package.json');
  assert.deepEqual(
    flutter.files.find(entry => entry.path === 'docs/engineering'),
    { path: 'docs/engineering', fileClass: 'doc', directory: true }
  );
  assert.deepEqual(
    flutter.files.find(entry => entry.fileClass === 'manifest-dependency'),
    {
      path: 'pubspec.yaml',
      fileClass: 'manifest-dependency',
      dependency: {
        section: 'dev_dependencies:',
        key: 'very_good_analysis',
        version: '^10.0.0',
        anchors: ['flutter:']
      }
    }
  );
  assert.deepEqual(flutter.install[0].wrapper, { command: 'fvm', whenFile: '.fvmrc' });

  assert.equal(Object.isFrozen(ECOSYSTEM_DEFINITIONS), true);
}

async function runResolveTest(): Promise<void> {
  assert.equal(resolveEcosystem('flutter'), 'flutter');
  assert.equal(resolveEcosystem(' Dart '), 'flutter');
  assert.equal(resolveEcosystem('RN'), 'reactnative');
  assert.equal(resolveEcosystem('react-native'), 'reactnative');

  assert.throws(
    () => resolveEcosystem('kotlin'),
    (error: unknown) =>
      error instanceof UnknownEcosystemError
      && error.message === 'Unknown language: kotlin'
      && error.remediation[0] === 'Supported languages: flutter, reactnative'
  );
}

async function runValidationTest(): Promise<void> {
  const valid = parseEcosystemDefinitions(parseJsonc(`{
    // trailing commas and comments are accepted
    "go": {
      "name": "Go",
      "bundleDir": "go-bundle",
      "markers": ["go.mod"],
      "files": [{ "path": "scripts/", "class": "hook" }],
    },
  }`, 'inline'));
  assert.deepEqual(valid, [{
    id: 'go',
    name: 'Go',
    bundleDir: 'go-bundle',
    aliases: [],
    markers: ['go.mod'],
    nameFrom: undefined,
    sensitiveFile: undefined,
    files: [{ path: 'scripts', fileClass: 'hook', directory: true }],
    install: []
  }]);

  const base = { name: 'Go', bundleDir: 'go-bundle', markers: ['go.mod'] };
  assert.throws(
    () => parseEcosystemDefinitions({ go: { ...base, files: [{ path: 'a', class: 'binary' }] } }),
    (error: unknown) => error instanceof ConfigError && error.message.includes("unknown file class 'binary'")
  );
  assert.throws(
    () => parseEcosystemDefinitions({
      go: {
        ...base,
        files: [{
          path: 'go.mod',
          class: 'manifest-dependency',
          dependency: { section: 'require (', key: 'x', version: 'banana' }
        }]
      }
    }),
    (error: unknown) => error instanceof ConfigError && error.message.includes('is not a valid version range')
  );
  assert.throws(
    () => parseEcosystemDefinitions({ go: { ...base, markers: [], files: [] } }),
    ConfigError
  );
  assert.throws(() => parseJsonc('{ "a": ', 'broken.jsonc'), ConfigError);
}

await runBundledDefinitionsTest();
await runResolveTest();
await runValidationTest();

console.log('ecosystems tests passed');
