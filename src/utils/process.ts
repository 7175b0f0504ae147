import { spawn } from 'child_process';
import { constants as fsConstants, promises as fs } from 'fs';
import { delimiter, join } from 'path';
import { logger } from './logger.js';

export interface CommandSpec {
  command: string;
  args: string[];
  cwd: string;
  env?: Record<string, string>;
  // Capture output instead of streaming it to the terminal
  capture?: boolean;
}

export interface CommandOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
  // The executable could not be started at all (ENOENT)
  missing: boolean;
}

/**
 * Boundary for every external tool lintflow drives (git, npm, flutter, ...).
 * Commands run to completion; there is no timeout.
 */
export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandOutcome>;
  isAvailable(command: string): Promise<boolean>;
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(' ');
}

export class SpawnCommandRunner implements CommandRunner {
  async run(spec: CommandSpec): Promise<CommandOutcome> {
    logger.debug(`Running: ${formatCommand(spec.command, spec.args)}`, { cwd: spec.cwd });

    return await new Promise<CommandOutcome>((resolve, reject) => {
      const child = spawn(spec.command, spec.args, {
        cwd: spec.cwd,
        env: { ...process.env, ...(spec.env ?? {}) },
        stdio: spec.capture ? ['ignore', 'pipe', 'pipe'] : 'inherit',
        shell: process.platform === 'win32'
      });

      let stdout = '';
      let stderr = '';
      child.stdout?.on('data', (chunk: Buffer) => { stdout += chunk.toString(); });
      child.stderr?.on('data', (chunk: Buffer) => { stderr += chunk.toString(); });

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'ENOENT') {
          resolve({ exitCode: 127, stdout, stderr, missing: true });
          return;
        }
        reject(error);
      });

      child.on('close', (code) => {
        resolve({ exitCode: code ?? 1, stdout, stderr, missing: false });
      });
    });
  }

  async isAvailable(command: string): Promise<boolean> {
    const searchPath = process.env.PATH ?? '';
    const extensions = process.platform === 'win32'
      ? (process.env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')
      : [''];

    for (const dir of searchPath.split(delimiter)) {
      if (!dir) continue;
      for (const extension of extensions) {
        try {
          await fs.access(join(dir, command + extension), fsConstants.X_OK);
          return true;
        } catch {
          // keep searching
        }
      }
    }
    return false;
  }
}
