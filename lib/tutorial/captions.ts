import type { TutorialTimeline } from '@/types/tutorial';

type CaptionEntry = { index: number; start: number; end: number; text: string };

function captionEntries(timeline: TutorialTimeline): CaptionEntry[] {
  const entries: CaptionEntry[] = [];
  for (const entry of timeline.entries) {
    if (!entry.clip || !entry.caption.trim()) continue;
    entries.push({
      index: entries.length + 1,
      start: entry.clip.startOffsetSec,
      end: entry.clip.startOffsetSec + entry.clip.durationSec,
      text: entry.caption.trim()
    });
  }
  return entries;
}

function pad(num: number, size = 2) {
  return String(num).padStart(size, '0');
}

function formatTime(seconds: number, separator: ',' | '.'): string {
  const totalMs = Math.round(seconds * 1000);
  const ms = totalMs % 1000;
  const totalSeconds = Math.floor(totalMs / 1000);
  const s = totalSeconds % 60;
  const m = Math.floor(totalSeconds / 60) % 60;
  const h = Math.floor(totalSeconds / 3600);
  return `${pad(h)}:${pad(m)}:${pad(s)}${separator}${pad(ms, 3)}`;
}

export function chunkText(text: string, maxChars = 64): string[] {
  if (text.length <= maxChars) return [text];
  const words = text.split(/\s+/);
  const lines: string[] = [];
  let current = '';
  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length > maxChars) {
      if (current) lines.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }
  if (current) lines.push(current);
  return lines;
}

export function generateSrt(timeline: TutorialTimeline): string {
  return captionEntries(timeline)
    .map((entry) => {
      const lines = chunkText(entry.text).join('\n');
      return `${entry.index}\n${formatTime(entry.start, ',')} --> ${formatTime(entry.end, ',')}\n${lines}`;
    })
    .join('\n\n');
}

export function generateVtt(timeline: TutorialTimeline): string {
  const body = captionEntries(timeline)
    .map((entry) => {
      const lines = chunkText(entry.text).join('\n');
      return `${formatTime(entry.start, '.')} --> ${formatTime(entry.end, '.')}\n${lines}`;
    })
    .join('\n\n');
  return `WEBVTT\n\n${body}`;
}

export function buildCaptions(timeline: TutorialTimeline): { srt: string; vtt: string } {
  return {
    srt: generateSrt(timeline),
    vtt: generateVtt(timeline)
  };
}
