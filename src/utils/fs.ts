import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import { isJunk } from 'junk';
import { EXECUTABLE_MODE } from '../constants/index.js';

/**
 * Filesystem helpers shared by the merge engine, detector and fetcher.
 * All paths are absolute or relative to the process cwd.
 */

export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

export async function isFile(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isFile();
  } catch {
    return false;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function ensureDir(path: string): Promise<void> {
  await fs.mkdir(path, { recursive: true });
}

export async function readTextFile(path: string): Promise<string> {
  return await fs.readFile(path, 'utf8');
}

/**
 * Write a text file in a single call, creating parent directories.
 */
export async function writeTextFile(path: string, content: string): Promise<void> {
  await ensureDir(dirname(path));
  await fs.writeFile(path, content, 'utf8');
}

export async function readJsonFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

export async function makeExecutable(path: string): Promise<void> {
  await fs.chmod(path, EXECUTABLE_MODE);
}

export async function remove(path: string): Promise<void> {
  await fs.rm(path, { recursive: true, force: true });
}

export async function listDirectories(path: string): Promise<string[]> {
  const entries = await fs.readdir(path, { withFileTypes: true });
  return entries
    .filter(entry => entry.isDirectory())
    .map(entry => entry.name)
    .sort((a, b) => a.localeCompare(b));
}

/**
 * Recursively list files below `root` as forward-slash relative paths,
 * sorted, with OS junk files (.DS_Store, Thumbs.db, ...) left out.
 */
export async function walkFiles(root: string, prefix: string = ''): Promise<string[]> {
  const entries = await fs.readdir(join(root, prefix), { withFileTypes: true });
  const sorted = [...entries].sort((a, b) => a.name.localeCompare(b.name));
  const files: string[] = [];

  for (const entry of sorted) {
    if (isJunk(entry.name)) continue;
    const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...await walkFiles(root, relativePath));
    } else if (entry.isFile()) {
      files.push(relativePath);
    }
  }

  return files;
}
