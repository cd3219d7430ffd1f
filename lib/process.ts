import { spawn } from 'node:child_process';

export type ProcessOutput = { stdout: string; stderr: string };

export async function hasBinary(command: string, versionFlag = '-version'): Promise<boolean> {
  return new Promise((resolve) => {
    const proc = spawn(command, [versionFlag]);
    proc.once('error', () => resolve(false));
    proc.once('exit', (code) => resolve(code === 0));
  });
}

/** Runs a command to completion; rejects with its stderr on a non-zero exit. */
export function runProcess(command: string, args: string[], options: { signal?: AbortSignal } = {}): Promise<ProcessOutput> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { signal: options.signal });
    let stdout = '';
    let stderr = '';
    proc.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    proc.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    proc.once('error', reject);
    proc.once('exit', (code) => {
      if (code === 0) resolve({ stdout, stderr });
      else reject(new Error(stderr.trim() || `${command} exited with ${code}`));
    });
  });
}
