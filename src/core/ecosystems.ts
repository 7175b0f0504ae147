/**
 * Ecosystem Management Module
 * Ecosystem definitions (markers, bundle folder, file manifest, install
 * commands) loaded from bundles.jsonc, plus lookup helpers.
 */

import * as semver from 'semver';
import { FILE_CLASSES, FILE_PATTERNS, type FileClass } from '../constants/index.js';
import { ConfigError, UnknownEcosystemError } from '../utils/errors.js';
import { readJsoncFileSync } from '../utils/jsonc.js';

export type Ecosystem = string;

export interface DependencyPatchDef {
  section: string;
  key: string;
  version: string;
  anchors: string[];
}

export type CopyFileClass = Exclude<FileClass, typeof FILE_CLASSES.MANIFEST_DEPENDENCY>;

export type ManifestEntry =
  | { path: string; fileClass: CopyFileClass; directory: boolean }
  | { path: string; fileClass: typeof FILE_CLASSES.MANIFEST_DEPENDENCY; dependency: DependencyPatchDef };

export interface InstallCommandDef {
  label: string;
  command: string;
  args: string[];
  // Run through `wrapper.command` when it is installed and `wrapper.whenFile` exists in the project
  wrapper?: { command: string; whenFile: string };
}

export interface EcosystemDefinition {
  id: Ecosystem;
  name: string;
  bundleDir: string;
  aliases: string[];
  markers: string[];
  nameFrom?: string;
  sensitiveFile?: string;
  files: ManifestEntry[];
  install: InstallCommandDef[];
}

type RawObject = Record<string, unknown>;

function isRawObject(value: unknown): value is RawObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function requireString(obj: RawObject, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`${where}: '${key}' must be a non-empty string`);
  }
  return value;
}

function optionalString(obj: RawObject, key: string, where: string): string | undefined {
  if (obj[key] === undefined) return undefined;
  return requireString(obj, key, where);
}

function stringArray(obj: RawObject, key: string, where: string, required: boolean): string[] {
  const value = obj[key];
  if (value === undefined && !required) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`${where}: '${key}' must be an array of strings`);
  }
  return value;
}

function isFileClass(value: unknown): value is FileClass {
  return Object.values(FILE_CLASSES).some(fileClass => fileClass === value);
}

function parseDependency(raw: unknown, where: string): DependencyPatchDef {
  if (!isRawObject(raw)) {
    throw new ConfigError(`${where}: manifest-dependency entries need a 'dependency' object`);
  }
  const version = requireString(raw, 'version', where);
  if (semver.validRange(version) === null) {
    throw new ConfigError(`${where}: '${version}' is not a valid version range`);
  }
  return {
    section: requireString(raw, 'section', where),
    key: requireString(raw, 'key', where),
    version,
    anchors: stringArray(raw, 'anchors', where, false)
  };
}

function parseManifestEntry(raw: unknown, where: string): ManifestEntry {
  if (!isRawObject(raw)) {
    throw new ConfigError(`${where}: file entries must be objects`);
  }
  const path = requireString(raw, 'path', where);
  const fileClass = raw.class;
  if (!isFileClass(fileClass)) {
    throw new ConfigError(`${where}: unknown file class '${String(fileClass)}' for ${path}`);
  }

  if (fileClass === FILE_CLASSES.MANIFEST_DEPENDENCY) {
    return { path, fileClass, dependency: parseDependency(raw.dependency, `${where} (${path})`) };
  }

  const directory = path.endsWith('/');
  return {
    path: directory ? path.slice(0, -1) : path,
    fileClass,
    directory
  };
}

function parseInstallCommand(raw: unknown, where: string): InstallCommandDef {
  if (!isRawObject(raw)) {
    throw new ConfigError(`${where}: install entries must be objects`);
  }
  const def: InstallCommandDef = {
    label: requireString(raw, 'label', where),
    command: requireString(raw, 'command', where),
    args: stringArray(raw, 'args', where, false)
  };
  if (raw.wrapper !== undefined) {
    if (!isRawObject(raw.wrapper)) {
      throw new ConfigError(`${where}: 'wrapper' must be an object`);
    }
    def.wrapper = {
      command: requireString(raw.wrapper, 'command', `${where} wrapper`),
      whenFile: requireString(raw.wrapper, 'whenFile', `${where} wrapper`)
    };
  }
  return def;
}

/**
 * Validate the raw bundles.jsonc structure into ecosystem definitions,
 * preserving declaration order (which is the detection priority).
 */
export function parseEcosystemDefinitions(raw: unknown): EcosystemDefinition[] {
  if (!isRawObject(raw)) {
    throw new ConfigError(`${FILE_PATTERNS.BUNDLES_JSONC} must contain an object of ecosystems`);
  }

  return Object.entries(raw).map(([id, cfg]) => {
    const where = `${FILE_PATTERNS.BUNDLES_JSONC} [${id}]`;
    if (!isRawObject(cfg)) {
      throw new ConfigError(`${where}: definition must be an object`);
    }
    const files = cfg.files;
    const install = cfg.install;
    if (!Array.isArray(files)) {
      throw new ConfigError(`${where}: 'files' must be an array`);
    }
    if (install !== undefined && !Array.isArray(install)) {
      throw new ConfigError(`${where}: 'install' must be an array`);
    }
    const markers = stringArray(cfg, 'markers', where, true);
    if (markers.length === 0) {
      throw new ConfigError(`${where}: at least one marker file is required`);
    }

    return {
      id,
      name: requireString(cfg, 'name', where),
      bundleDir: requireString(cfg, 'bundleDir', where),
      aliases: stringArray(cfg, 'aliases', where, false).map(alias => alias.toLowerCase()),
      markers,
      nameFrom: optionalString(cfg, 'nameFrom', where),
      sensitiveFile: optionalString(cfg, 'sensitiveFile', where),
      files: files.map(entry => parseManifestEntry(entry, where)),
      install: (install ?? []).map(entry => parseInstallCommand(entry, where))
    };
  });
}

// Ecosystem definitions in detection priority order
export const ECOSYSTEM_DEFINITIONS: readonly EcosystemDefinition[] = Object.freeze(
  parseEcosystemDefinitions(readJsoncFileSync(FILE_PATTERNS.BUNDLES_JSONC))
);

export function getAllEcosystems(
  definitions: readonly EcosystemDefinition[] = ECOSYSTEM_DEFINITIONS
): Ecosystem[] {
  return definitions.map(def => def.id);
}

/**
 * Map a user-supplied language name (id or alias, any case) to an ecosystem.
 * Unknown names are an error; they are never used as a folder name.
 */
export function resolveEcosystem(
  input: string,
  definitions: readonly EcosystemDefinition[] = ECOSYSTEM_DEFINITIONS
): Ecosystem {
  const normalized = input.trim().toLowerCase();
  const match = definitions.find(def => def.id === normalized || def.aliases.includes(normalized));
  if (!match) {
    throw new UnknownEcosystemError(input, getAllEcosystems(definitions));
  }
  return match.id;
}

export function getEcosystemDefinition(
  ecosystem: Ecosystem,
  definitions: readonly EcosystemDefinition[] = ECOSYSTEM_DEFINITIONS
): EcosystemDefinition {
  const def = definitions.find(candidate => candidate.id === ecosystem);
  if (!def) {
    throw new UnknownEcosystemError(ecosystem, getAllEcosystems(definitions));
  }
  return def;
}
