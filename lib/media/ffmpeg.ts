import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { hasBinary, runProcess } from '@/lib/process';

export function hasFfmpeg(): Promise<boolean> {
  return hasBinary('ffmpeg');
}

export function parseProbeDuration(output: string): number | null {
  const value = Number.parseFloat(output.trim());
  return Number.isFinite(value) && value > 0 ? value : null;
}

export async function probeDurationSec(path: string): Promise<number> {
  const { stdout } = await runProcess('ffprobe', [
    '-v',
    'error',
    '-show_entries',
    'format=duration',
    '-of',
    'default=noprint_wrappers=1:nokey=1',
    path
  ]);
  const duration = parseProbeDuration(stdout);
  if (duration === null) {
    throw new Error(`ffprobe reported no duration for ${path}`);
  }
  return duration;
}

export async function createConcatFile(paths: string[]): Promise<{ dir: string; file: string }> {
  const dir = await mkdtemp(join(tmpdir(), 'tutorial-ffmpeg-'));
  const file = join(dir, 'inputs.txt');
  const lines = paths.map((p) => `file '${p.replace(/'/g, "'\\''")}'`).join('\n');
  await writeFile(file, lines, 'utf8');
  return { dir, file };
}
