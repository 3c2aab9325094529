/**
 * @fileOverview: Applies unified diffs to the repository through the system patch tool
 * @module: PatchApplier
 * @keyFunctions:
 *   - detectStripLevel(): -p1 when every header path carries an a/ or b/ prefix, else -p0
 *   - changedFilesFromOutput(): Paths reported on "patching file" lines
 *   - SystemPatchApplier.apply(): Dry run, then the real run, both fed the diff on stdin
 * @dependencies:
 *   - child_process: Spawning patch
 * @context: A failed dry run never touches the working tree; failures carry the exit status and output verbatim
 */

import { spawn } from 'child_process';
import type { PatchApplier, PatchResult } from '../shared/types';
import { PatchError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export interface CommandResult {
  exitCode: number | null;
  output: string;
}

export type CommandRunner = (command: string, args: string[], input: string, cwd: string) => Promise<CommandResult>;

const HEADER = /^(?:---|\+\+\+) (\S+)/;

/**
 * Run a command with stdin input; stdout and stderr are merged in arrival order
 */
export const spawnRunner: CommandRunner = (command, args, input, cwd) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd });
    let output = '';
    child.stdout.on('data', (data: Buffer) => {
      output += data.toString();
    });
    child.stderr.on('data', (data: Buffer) => {
      output += data.toString();
    });
    child.on('error', reject);
    child.on('close', code => resolve({ exitCode: code, output }));
    child.stdin.end(input);
  });

export function detectStripLevel(diffText: string): 0 | 1 {
  const paths: string[] = [];
  for (const line of diffText.split('\n')) {
    const match = HEADER.exec(line);
    if (match && match[1] !== '/dev/null') {
      paths.push(match[1]);
    }
  }
  return paths.length > 0 && paths.every(p => p.startsWith('a/') || p.startsWith('b/')) ? 1 : 0;
}

export function changedFilesFromOutput(output: string): string[] {
  const files: string[] = [];
  for (const line of output.split('\n')) {
    const match = /^(?:checking|patching) file (.+?)\s*$/.exec(line);
    if (match) {
      const file = match[1].replace(/^['"`]|['"`]$/g, '');
      if (!files.includes(file)) files.push(file);
    }
  }
  return files;
}

export class SystemPatchApplier implements PatchApplier {
  constructor(
    private readonly repoRoot: string,
    private readonly runner: CommandRunner = spawnRunner,
    private readonly command: string = 'patch'
  ) {}

  async apply(diffText: string): Promise<PatchResult> {
    const strip = `-p${detectStripLevel(diffText)}`;
    const baseArgs = [strip, '--forward', '--batch'];

    const dryRun = await this.run([...baseArgs, '--dry-run'], diffText);
    if (dryRun.exitCode !== 0) {
      logger.warn('⚠️ Patch dry run failed', { exitCode: dryRun.exitCode, strip });
      throw new PatchError('Patch does not apply cleanly', dryRun.exitCode, dryRun.output);
    }

    const applied = await this.run(baseArgs, diffText);
    if (applied.exitCode !== 0) {
      logger.error('❌ Patch failed after successful dry run', { exitCode: applied.exitCode, strip });
      throw new PatchError('Patch failed', applied.exitCode, applied.output);
    }

    const changedFiles = changedFilesFromOutput(applied.output);
    logger.info('🩹 Patch applied', { files: changedFiles, strip });
    return { changedFiles, output: applied.output };
  }

  private async run(args: string[], input: string): Promise<CommandResult> {
    try {
      return await this.runner(this.command, args, input, this.repoRoot);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new PatchError(`Could not run ${this.command}: ${message}`, null, message);
    }
  }
}
