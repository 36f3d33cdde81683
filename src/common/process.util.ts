import { spawn } from 'child_process';
import { Logger } from '@nestjs/common';
import { CommandFailedError } from './errors';

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

const logger = new Logger('Command');

/**
 * Runs one external command to completion without a shell.
 * Rejects with CommandFailedError on a non-zero exit or a spawn failure.
 */
export function runCommand(
  bin: string,
  args: string[],
  opts: { cwd?: string } = {},
): Promise<CommandResult> {
  const printable = [bin, ...args].join(' ');
  logger.log(`Running: ${printable}${opts.cwd ? ` (in ${opts.cwd})` : ''}`);

  return new Promise<CommandResult>((resolve, reject) => {
    const p = spawn(bin, args, {
      cwd: opts.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      env: process.env,
    });

    let stdout = '';
    let stderr = '';
    p.stdout.setEncoding('utf-8');
    p.stderr.setEncoding('utf-8');
    p.stdout.on('data', (v: string) => {
      stdout += v;
    });
    p.stderr.on('data', (v: string) => {
      stderr += v;
      v.trim()
        .split(/\r?\n/)
        .filter(Boolean)
        .forEach((line) => logger.debug(`[stderr] ${line}`));
    });

    p.on('error', (err) => {
      reject(new CommandFailedError(printable, null, err.message));
    });

    p.on('close', (code) => {
      if (code === 0) resolve({ code, stdout, stderr });
      else reject(new CommandFailedError(printable, code, stderr));
    });
  });
}
