import { createHash } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { TutorialManifest, TutorialRun, TutorialTimeline } from '@/types/tutorial';

/** Stable id derived from the topic, kernel and the moment the run started. */
export function tutorialId(topic: string, kernel: string, startedAt: Date): string {
  const hash = createHash('sha1');
  hash.update(topic.trim().toLowerCase());
  hash.update('\n');
  hash.update(kernel);
  hash.update('\n');
  hash.update(startedAt.toISOString());
  return `tut_${hash.digest('hex').slice(0, 16)}`;
}

export function buildManifest(args: {
  id: string;
  kernel: string;
  run: TutorialRun;
  timeline: TutorialTimeline;
  captions?: { srt?: string; vtt?: string };
  video?: string;
  now?: Date;
}): TutorialManifest {
  return {
    id: args.id,
    topic: args.run.topic,
    kernel: args.kernel,
    narrationMode: args.run.narrationMode,
    approvalPolicy: args.run.approvalPolicy,
    segments: args.run.segments
      .filter((s) => s.status === 'executed')
      .map((s) => ({ index: s.index, code: s.code, explanation: s.explanation })),
    timeline: args.timeline,
    captions: args.captions,
    video: args.video,
    createdAt: (args.now ?? new Date()).toISOString(),
    version: 1
  };
}

export async function writeManifest(dir: string, manifest: TutorialManifest): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, 'manifest.json');
  await writeFile(path, JSON.stringify(manifest, null, 2), 'utf8');
  return path;
}

export async function writeCaptions(
  dir: string,
  captions: { srt: string; vtt: string }
): Promise<{ srt: string; vtt: string }> {
  await mkdir(dir, { recursive: true });
  const srt = join(dir, 'captions.srt');
  const vtt = join(dir, 'captions.vtt');
  await writeFile(srt, captions.srt, 'utf8');
  await writeFile(vtt, captions.vtt, 'utf8');
  return { srt, vtt };
}
