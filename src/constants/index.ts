/**
 * Shared constants for the lintflow CLI
 * Single source of truth for directory names, file names, environment
 * variables and defaults used throughout the application.
 */

export const DIR_PATTERNS = {
  LINTFLOW: '.lintflow',
  GIT: '.git',
  HUSKY: '.husky'
} as const;

export const FILE_PATTERNS = {
  BUNDLES_JSONC: 'bundles.jsonc',
  CONFIG_JSON: 'config.json',
  YAML_FILES: ['.yaml', '.yml'],
  JSON_FILE: '.json'
} as const;

/**
 * Reconciliation classes a bundle file can belong to.
 */
export const FILE_CLASSES = {
  ROOT: 'root',
  IGNORE: 'ignore',
  MANIFEST_DEPENDENCY: 'manifest-dependency',
  HOOK: 'hook',
  WORKFLOW: 'workflow',
  DOC: 'doc'
} as const;

export const ENV_VARS = {
  REPO_URL: 'LINTFLOW_REPO_URL',
  BRANCH: 'LINTFLOW_BRANCH',
  LANGUAGE: 'LINTFLOW_LANGUAGE',
  LOG_LEVEL: 'LINTFLOW_LOG_LEVEL',
  ALLOW_PROTECTED_BRANCHES: 'ALLOW_PROTECTED_BRANCHES'
} as const;

export const DEFAULTS = {
  BRANCH: 'main',
  // Placeholder template source; point LINTFLOW_REPO_URL or --repo at your own.
  REPO_URL: 'https://github.com/lintflow/lintflow-templates.git',
  INDENT: '  '
} as const;

export const IGNORE_MERGE_MARKER = '# Added by lintflow setup';

export const EXECUTABLE_MODE = 0o755;

export const STAGING_DIR_PREFIX = 'lintflow-';

export const GIT_BRANCHES = {
  MAIN: 'main',
  LEGACY_MAIN: 'master',
  STANDARD: ['develop', 'uat', 'prod'],
  WORKING: 'develop'
} as const;

export const GIT_REMOTE = 'origin';

export const INITIAL_COMMIT_MESSAGE = [
  'chore: set up code quality standards',
  '',
  '- Add Husky hooks for commit message validation and quality checks',
  '- Add GitHub Actions workflows for CI/CD',
  '- Add code quality scripts and configuration',
  '- Add engineering documentation',
  '- Configure version pinning'
].join('\n');

export const OUTCOME_STATUS = {
  SUCCEEDED: 'succeeded',
  SKIPPED: 'skipped',
  FAILED: 'failed'
} as const;

export type FileClass = typeof FILE_CLASSES[keyof typeof FILE_CLASSES];
export type OutcomeStatus = typeof OUTCOME_STATUS[keyof typeof OUTCOME_STATUS];
