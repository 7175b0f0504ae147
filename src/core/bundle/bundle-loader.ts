/**
 * Bundle Loader
 * Turns a fetched bundle directory plus the ecosystem's file manifest into
 * the ordered, immutable list of entries the merge engine walks.
 */

import { join } from 'path';
import { FILE_CLASSES } from '../../constants/index.js';
import { isDirectory, isFile, readTextFile, walkFiles } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import type {
  CopyFileClass,
  DependencyPatchDef,
  Ecosystem,
  EcosystemDefinition
} from '../ecosystems.js';

export type BundleEntry =
  | {
      kind: 'file';
      relativePath: string;
      fileClass: CopyFileClass;
      content: string;
    }
  | {
      kind: 'dependency';
      relativePath: string;
      fileClass: typeof FILE_CLASSES.MANIFEST_DEPENDENCY;
      dependency: DependencyPatchDef;
    };

export interface Bundle {
  ecosystem: Ecosystem;
  sourceDir: string;
  sensitiveFile?: string;
  entries: readonly BundleEntry[];
}

/**
 * Load bundle entries in manifest order. Manifest files missing from the
 * bundle are left out; directory entries expand to their files, sorted.
 */
export async function loadBundle(sourceDir: string, definition: EcosystemDefinition): Promise<Bundle> {
  const entries: BundleEntry[] = [];

  for (const item of definition.files) {
    if (item.fileClass === FILE_CLASSES.MANIFEST_DEPENDENCY) {
      entries.push({
        kind: 'dependency',
        relativePath: item.path,
        fileClass: item.fileClass,
        dependency: item.dependency
      });
      continue;
    }

    const sourcePath = join(sourceDir, item.path);

    if (item.directory) {
      if (!(await isDirectory(sourcePath))) {
        logger.debug(`Bundle directory not present, skipping: ${item.path}/`);
        continue;
      }
      for (const file of await walkFiles(sourcePath)) {
        const relativePath = `${item.path}/${file}`;
        entries.push({
          kind: 'file',
          relativePath,
          fileClass: item.fileClass,
          content: await readTextFile(join(sourceDir, relativePath))
        });
      }
      continue;
    }

    if (!(await isFile(sourcePath))) {
      logger.debug(`Bundle file not present, skipping: ${item.path}`);
      continue;
    }

    entries.push({
      kind: 'file',
      relativePath: item.path,
      fileClass: item.fileClass,
      content: await readTextFile(sourcePath)
    });
  }

  return {
    ecosystem: definition.id,
    sourceDir,
    sensitiveFile: definition.sensitiveFile,
    entries: Object.freeze(entries)
  };
}
