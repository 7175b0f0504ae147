import { Command } from 'commander';

import type { BaseCommandOptions, CommandResult } from '../types/index.js';
import { detectProject, resolveProjectRoot, type DetectedProject } from '../core/detect/project-detector.js';
import { withErrorHandling } from '../utils/errors.js';

async function detectCommand(options: BaseCommandOptions): Promise<CommandResult<DetectedProject>> {
  const project = await detectProject(await resolveProjectRoot(options.cwd));

  console.log(`✓ ${project.definition.name} project detected`);
  console.log(`   Root: ${project.root}`);
  if (project.name) {
    console.log(`   Name: ${project.name}`);
  }
  console.log(`   Template folder: ${project.definition.bundleDir}`);

  return { success: true, data: project };
}

export function setupDetectCommand(program: Command): void {
  program
    .command('detect')
    .description('Show which ecosystem the project in the current directory belongs to')
    .option('--cwd <path>', 'project directory (default: current directory)')
    .action(withErrorHandling(async (options: BaseCommandOptions) => {
      await detectCommand(options);
    }));
}
