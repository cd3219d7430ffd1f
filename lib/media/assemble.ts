import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { TimelineEntry, TutorialTimeline } from '@/types/tutorial';
import { createLogger } from '@/lib/log';
import { errorMessage } from '@/lib/tutorial/errors';
import { createConcatFile, hasFfmpeg } from '@/lib/media/ffmpeg';
import { runProcess } from '@/lib/process';

const log = createLogger('assemble');

export type AssembleOptions = {
  fps: number;
  sampleRate?: number;
};

const sec = (value: number) => value.toFixed(3);

/**
 * One self-contained clip per timeline entry: the interval footage with its
 * last frame held for `holdSec`, and narration delayed to its offset and
 * padded with silence to the entry length.
 */
export function buildEntryRenderArgs(entry: TimelineEntry, outputPath: string, opts: AssembleOptions): string[] {
  const duration = sec(entry.endSec - entry.startSec);
  const sampleRate = opts.sampleRate ?? 44100;
  const args = ['-hide_banner', '-loglevel', 'error', '-y', '-i', entry.interval.filePath];
  const filters = [`[0:v]tpad=stop_mode=clone:stop_duration=${sec(entry.holdSec)}[v]`];

  if (entry.clip) {
    const delayMs = Math.round(entry.audioDelaySec * 1000);
    args.push('-i', entry.clip.audioPath);
    filters.push(`[1:a]adelay=${delayMs}|${delayMs},apad[a]`);
  } else {
    args.push('-f', 'lavfi', '-t', duration, '-i', `anullsrc=channel_layout=stereo:sample_rate=${sampleRate}`);
    filters.push('[1:a]anull[a]');
  }

  args.push(
    '-filter_complex',
    filters.join(';'),
    '-map',
    '[v]',
    '-map',
    '[a]',
    '-t',
    duration,
    '-r',
    String(opts.fps),
    '-c:v',
    'libx264',
    '-preset',
    'fast',
    '-pix_fmt',
    'yuv420p',
    '-c:a',
    'aac',
    '-b:a',
    '192k',
    '-ar',
    String(sampleRate),
    '-ac',
    '2',
    outputPath
  );
  return args;
}

export async function assembleTutorial(
  timeline: TutorialTimeline,
  outputPath: string,
  opts: AssembleOptions
): Promise<{ ok: true; path: string } | { ok: false; reason: string }> {
  if (!timeline.entries.length) {
    return { ok: false, reason: 'No segments to assemble' };
  }
  if (!(await hasFfmpeg())) {
    return { ok: false, reason: 'ffmpeg unavailable' };
  }

  const workDir = await mkdtemp(join(tmpdir(), 'tutorial-parts-'));
  let concatDir: string | null = null;
  try {
    const parts: string[] = [];
    for (const entry of timeline.entries) {
      const part = join(workDir, `part_${String(entry.segmentIndex).padStart(3, '0')}.mp4`);
      await runProcess('ffmpeg', buildEntryRenderArgs(entry, part, opts));
      parts.push(part);
      log.info(`rendered segment ${entry.segmentIndex} (${sec(entry.endSec - entry.startSec)}s, hold ${sec(entry.holdSec)}s)`);
    }
    const concat = await createConcatFile(parts);
    concatDir = concat.dir;
    await runProcess('ffmpeg', ['-hide_banner', '-loglevel', 'error', '-y', '-f', 'concat', '-safe', '0', '-i', concat.file, '-c', 'copy', outputPath]);
    log.info(`wrote ${outputPath} (${sec(timeline.totalSec)}s)`);
    return { ok: true, path: outputPath };
  } catch (err) {
    return { ok: false, reason: errorMessage(err) };
  } finally {
    await rm(workDir, { recursive: true, force: true });
    if (concatDir) await rm(concatDir, { recursive: true, force: true });
  }
}
