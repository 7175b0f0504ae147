import { Command } from 'commander';
import { resolve } from 'path';

import type { EnvOptions } from '../types/index.js';
import { formatDartDefines, toBuildArgs, writeBuildArgsJson } from '../core/env/env-build-args.js';
import { withErrorHandling } from '../utils/errors.js';

/**
 * Print `--dart-define` arguments for an env file, one per line, or write
 * them as JSON for `--dart-define-from-file`.
 */
export function setupEnvCommand(program: Command): void {
  program
    .command('env')
    .description('Convert a KEY=VALUE env file into Flutter build arguments')
    .argument('<env-file>', 'env file to read, e.g. .dev.env')
    .option('--json <out>', 'write the values to a JSON file instead of printing arguments')
    .action(withErrorHandling(async (envFile: string, options: EnvOptions) => {
      const args = await toBuildArgs(resolve(envFile));

      if (options.json) {
        const outPath = resolve(options.json);
        await writeBuildArgsJson(args, outPath);
        console.log(`✓ Wrote ${args.size} value(s) to ${outPath}`);
        return;
      }

      for (const define of formatDartDefines(args)) {
        console.log(define);
      }
    }));
}
