/**
 * Merge Engine
 * Reconciles every bundle entry against the target project, one file at a
 * time in manifest order. Each decision is recomputed from what is on disk,
 * so running again over its own output changes nothing.
 */

import { join } from 'path';
import { FILE_CLASSES, OUTCOME_STATUS, type FileClass, type OutcomeStatus } from '../../constants/index.js';
import { ManifestPatchError, UserCancellationError, describeError } from '../../utils/errors.js';
import { exists, makeExecutable, readTextFile, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import type { Bundle, BundleEntry } from '../bundle/bundle-loader.js';
import { injectDependency, patchDependencyContent, type PatchResult } from './dependency-manifest-patcher.js';
import { applyIgnoreMerge, mergeIgnoreContent } from './ignore-file-patcher.js';

export type ConfirmPrompt = (question: string) => Promise<boolean>;

export interface ReconcileOptions {
  confirm: ConfirmPrompt;
  // Compute and report decisions without writing or prompting
  dryRun?: boolean;
  onOutcome?: (outcome: FileOutcome) => void;
}

export type ReconciliationDecision =
  | { kind: 'copy'; targetExisted: boolean }
  | { kind: 'skip'; reason: 'declined' | 'identical' | 'needs-confirmation' }
  | { kind: 'prompted-overwrite'; accepted: boolean }
  | { kind: 'merge' };

export type FileAction =
  | 'created'
  | 'overwritten'
  | 'merged'
  | 'unchanged'
  | 'declined'
  | 'pending-confirmation'
  | 'failed';

export interface FileOutcome {
  path: string;
  fileClass: FileClass;
  action: FileAction;
  status: OutcomeStatus;
  decision?: ReconciliationDecision;
  detail?: string;
  error?: string;
}

export interface RunReport {
  dryRun: boolean;
  outcomes: FileOutcome[];
  succeeded: string[];
  skipped: string[];
  failed: string[];
}

interface EngineContext {
  targetRoot: string;
  sensitiveFile?: string;
  options: ReconcileOptions;
}

const STATUS_BY_ACTION: Record<FileAction, OutcomeStatus> = {
  created: OUTCOME_STATUS.SUCCEEDED,
  overwritten: OUTCOME_STATUS.SUCCEEDED,
  merged: OUTCOME_STATUS.SUCCEEDED,
  unchanged: OUTCOME_STATUS.SUCCEEDED,
  declined: OUTCOME_STATUS.SKIPPED,
  'pending-confirmation': OUTCOME_STATUS.SKIPPED,
  failed: OUTCOME_STATUS.FAILED
};

function outcome(
  entry: BundleEntry,
  action: FileAction,
  decision: ReconciliationDecision | undefined,
  detail?: string
): FileOutcome {
  return {
    path: entry.relativePath,
    fileClass: entry.fileClass,
    action,
    status: STATUS_BY_ACTION[action],
    ...(decision && { decision }),
    ...(detail !== undefined ? { detail } : {})
  };
}

function isSensitive(entry: BundleEntry, ctx: EngineContext): boolean {
  return entry.fileClass === FILE_CLASSES.ROOT && entry.relativePath === ctx.sensitiveFile;
}

/**
 * Decide what to do with a copyable entry. Only the sensitive root file
 * ever prompts; every other class overwrites or creates.
 */
async function decideCopy(
  entry: Extract<BundleEntry, { kind: 'file' }>,
  targetPath: string,
  ctx: EngineContext
): Promise<ReconciliationDecision> {
  const targetExisted = await exists(targetPath);
  if (!targetExisted) {
    return { kind: 'copy', targetExisted };
  }

  if (entry.fileClass === FILE_CLASSES.IGNORE) {
    return { kind: 'merge' };
  }

  if (!isSensitive(entry, ctx)) {
    return { kind: 'copy', targetExisted };
  }

  if ((await readTextFile(targetPath)) === entry.content) {
    return { kind: 'skip', reason: 'identical' };
  }

  if (ctx.options.dryRun) {
    return { kind: 'skip', reason: 'needs-confirmation' };
  }

  const accepted = await ctx.options.confirm(`${entry.relativePath} already exists. Overwrite?`);
  return { kind: 'prompted-overwrite', accepted };
}

async function writeEntry(
  entry: Extract<BundleEntry, { kind: 'file' }>,
  targetPath: string,
  ctx: EngineContext
): Promise<void> {
  if (ctx.options.dryRun) return;
  await writeTextFile(targetPath, entry.content);
  if (entry.fileClass === FILE_CLASSES.HOOK) {
    await makeExecutable(targetPath);
  }
}

async function reconcileFile(
  entry: Extract<BundleEntry, { kind: 'file' }>,
  ctx: EngineContext
): Promise<FileOutcome> {
  const targetPath = join(ctx.targetRoot, entry.relativePath);
  const decision = await decideCopy(entry, targetPath, ctx);
  logger.debug(`Decision for ${entry.relativePath}`, decision);

  switch (decision.kind) {
    case 'copy':
      await writeEntry(entry, targetPath, ctx);
      return outcome(entry, decision.targetExisted ? 'overwritten' : 'created', decision);

    case 'prompted-overwrite':
      if (!decision.accepted) {
        return outcome(entry, 'declined', decision, 'kept existing file');
      }
      await writeEntry(entry, targetPath, ctx);
      return outcome(entry, 'overwritten', decision);

    case 'skip':
      if (decision.reason === 'identical') {
        return outcome(entry, 'unchanged', decision, 'already up to date');
      }
      if (decision.reason === 'needs-confirmation') {
        return outcome(entry, 'pending-confirmation', decision, 'would ask before overwriting');
      }
      return outcome(entry, 'declined', decision, 'kept existing file');

    case 'merge': {
      const merged = ctx.options.dryRun
        ? mergeIgnoreContent(await readTextFile(targetPath), entry.content)
        : await applyIgnoreMerge(targetPath, entry.content);
      if (merged.appended.length === 0) {
        return outcome(entry, 'unchanged', decision, 'no new entries');
      }
      return outcome(entry, 'merged', decision, `${merged.appended.length} new entr${merged.appended.length === 1 ? 'y' : 'ies'}`);
    }
  }
}

async function reconcileDependency(
  entry: Extract<BundleEntry, { kind: 'dependency' }>,
  ctx: EngineContext
): Promise<FileOutcome> {
  const targetPath = join(ctx.targetRoot, entry.relativePath);
  const { section, key, version, anchors } = entry.dependency;
  const decision: ReconciliationDecision = { kind: 'merge' };

  let result: PatchResult;
  if (ctx.options.dryRun) {
    if (!(await exists(targetPath))) {
      throw new ManifestPatchError(`Manifest not found: ${targetPath}`, targetPath);
    }
    result = patchDependencyContent(await readTextFile(targetPath), { section, key, value: version, anchors }).result;
  } else {
    result = await injectDependency(targetPath, section, key, version, anchors);
  }

  if (result.status === 'already-present') {
    return outcome(entry, 'unchanged', decision, `${key} already present`);
  }
  const where = result.sectionCreated ? `new ${section} section` : section;
  return outcome(entry, 'merged', decision, `added ${key} to ${where}`);
}

function buildRunReport(outcomes: FileOutcome[], dryRun: boolean): RunReport {
  const pathsWith = (status: OutcomeStatus): string[] =>
    outcomes.filter(item => item.status === status).map(item => item.path);

  return {
    dryRun,
    outcomes,
    succeeded: pathsWith(OUTCOME_STATUS.SUCCEEDED),
    skipped: pathsWith(OUTCOME_STATUS.SKIPPED),
    failed: pathsWith(OUTCOME_STATUS.FAILED)
  };
}

/**
 * Apply `bundle` to the project at `targetRoot`. Per-file failures are
 * recorded in the report and never stop the remaining files.
 */
export async function reconcile(
  bundle: Bundle,
  targetRoot: string,
  options: ReconcileOptions
): Promise<RunReport> {
  const ctx: EngineContext = { targetRoot, sensitiveFile: bundle.sensitiveFile, options };
  const outcomes: FileOutcome[] = [];

  for (const entry of bundle.entries) {
    let result: FileOutcome;
    try {
      result = entry.kind === 'dependency'
        ? await reconcileDependency(entry, ctx)
        : await reconcileFile(entry, ctx);
    } catch (error) {
      if (error instanceof UserCancellationError) throw error;
      logger.debug(`Failed to reconcile ${entry.relativePath}`, { error });
      result = {
        ...outcome(entry, 'failed', undefined),
        error: describeError(error)
      };
    }

    outcomes.push(result);
    options.onOutcome?.(result);
  }

  return buildRunReport(outcomes, options.dryRun === true);
}

export function hasFailures(report: RunReport): boolean {
  return report.failed.length > 0;
}
