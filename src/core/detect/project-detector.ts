import { extname, join, resolve } from 'path';
import * as yaml from 'js-yaml';
import { FILE_PATTERNS } from '../../constants/index.js';
import { NotAProjectError, ValidationError } from '../../utils/errors.js';
import { isDirectory, isFile, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import {
  ECOSYSTEM_DEFINITIONS,
  getEcosystemDefinition,
  type Ecosystem,
  type EcosystemDefinition
} from '../ecosystems.js';

export interface DetectedProject {
  root: string;
  ecosystem: Ecosystem;
  definition: EcosystemDefinition;
  name?: string;
}

/**
 * Resolve a `--cwd` value (default: the process directory) to an absolute
 * path that must name an existing directory.
 */
export async function resolveProjectRoot(cwd: string | undefined): Promise<string> {
  const root = resolve(cwd ?? process.cwd());
  if (!(await isDirectory(root))) {
    throw new ValidationError(`Not a directory: ${root}`, ['Pass --cwd the path of an existing project directory']);
  }
  return root;
}

export async function findMissingMarkers(root: string, definition: EcosystemDefinition): Promise<string[]> {
  const missing: string[] = [];
  for (const marker of definition.markers) {
    if (!(await isFile(join(root, marker)))) {
      missing.push(marker);
    }
  }
  return missing;
}

function extractName(parsed: unknown): string | undefined {
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) return undefined;
  const name: unknown = Reflect.get(parsed, 'name');
  return typeof name === 'string' && name.trim() !== '' ? name : undefined;
}

/**
 * Read the project's display name from its manifest. Read only; any
 * problem just means the banner shows no name.
 */
async function readProjectName(root: string, definition: EcosystemDefinition): Promise<string | undefined> {
  if (!definition.nameFrom) return undefined;
  const manifestPath = join(root, definition.nameFrom);
  const extension = extname(manifestPath);

  try {
    const content = await readTextFile(manifestPath);
    if (FILE_PATTERNS.YAML_FILES.some(ext => ext === extension)) {
      return extractName(yaml.load(content));
    }
    if (extension === FILE_PATTERNS.JSON_FILE) {
      return extractName(JSON.parse(content));
    }
  } catch (error) {
    logger.debug(`Could not read project name from ${manifestPath}`, { error });
  }
  return undefined;
}

function notAProject(root: string, candidates: readonly EcosystemDefinition[], missing: string[]): NotAProjectError {
  const remediation = candidates.map(def =>
    `${def.name}: run from the project root containing ${def.markers.join(' and ')}`
  );
  const message = candidates.length === 1
    ? `${root} is not a ${candidates[0].name} project (missing ${missing.join(', ')})`
    : `${root} is not a recognized project`;
  return new NotAProjectError(message, missing, remediation);
}

/**
 * Identify the project root and ecosystem from marker files in `cwd`.
 * With `expected`, only that ecosystem's markers are checked. Never writes.
 */
export async function detectProject(
  cwd: string,
  expected?: Ecosystem,
  definitions: readonly EcosystemDefinition[] = ECOSYSTEM_DEFINITIONS
): Promise<DetectedProject> {
  const root = resolve(cwd);
  const candidates = expected ? [getEcosystemDefinition(expected, definitions)] : definitions;
  let missingForReport: string[] = [];

  for (const definition of candidates) {
    const missing = await findMissingMarkers(root, definition);
    if (missing.length === 0) {
      logger.debug(`Detected ${definition.id} project at ${root}`);
      return {
        root,
        ecosystem: definition.id,
        definition,
        name: await readProjectName(root, definition)
      };
    }
    if (missingForReport.length === 0) missingForReport = missing;
  }

  throw notAProject(root, candidates, missingForReport);
}
