import type { Clock } from '@/lib/clock';
import { systemClock } from '@/lib/clock';

export type TypingMode = 'char' | 'line';

export type DelayProfile = {
  baseMs: number;
  jitterMs: number;
  minMs: number;
  maxMs: number;
  /** Extra pause after punctuation that ends a clause. */
  punctuationPauseMs: number;
  /** Extra pause before starting a new line. */
  linePauseMs: number;
};

export const DEFAULT_DELAY_PROFILE: DelayProfile = {
  baseMs: 100,
  jitterMs: 40,
  minMs: 20,
  maxMs: 450,
  punctuationPauseMs: 90,
  linePauseMs: 160
};

export type CharContext = {
  char: string;
  previous: string | null;
};

const CLAUSE_END = new Set([',', ';', ':', '.', ')', ']', '}']);

/**
 * Delay after emitting `context.char`. Pure: the same context, sample and
 * profile always give the same delay, clamped to [minMs, maxMs].
 */
export function typingDelayMs(context: CharContext, sample: number, profile: DelayProfile = DEFAULT_DELAY_PROFILE): number {
  const unit = Math.min(Math.max(sample, 0), 1);
  let ms = profile.baseMs + (unit * 2 - 1) * profile.jitterMs;
  if (context.char === '\n') {
    ms += profile.linePauseMs;
  } else if (CLAUSE_END.has(context.char)) {
    ms += profile.punctuationPauseMs;
  } else if (context.char === ' ' && context.previous === ' ') {
    // runs of spaces go out quickly
    ms *= 0.5;
  }
  return Math.round(Math.min(profile.maxMs, Math.max(profile.minMs, ms)));
}

/** mulberry32: small seeded PRNG returning floats in [0, 1). */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export type Keystroke = { kind: 'text'; text: string } | { kind: 'enter' } | { kind: 'backspace' };

export type PlanOptions = {
  autoIndent: boolean;
  indentWidth: number;
};

const indentOf = (line: string) => line.length - line.trimStart().length;

/**
 * Splits code into strokes. With auto-indent the console re-indents after
 * each newline, so leading whitespace is dropped and each dedent becomes
 * backspaces (one per indent level) typed at the start of the next line.
 */
export function planKeystrokes(code: string, options: PlanOptions): Keystroke[] {
  const lines = code.replace(/\r\n?/g, '\n').split('\n');
  const strokes: Keystroke[] = [];
  // Blank lines keep the console at the indent of the last non-blank line.
  let level = 0;
  lines.forEach((line, idx) => {
    const text = options.autoIndent ? line.trimStart() : line;
    if (text) strokes.push({ kind: 'text', text });
    if (line.trim()) level = indentOf(line);
    if (idx === lines.length - 1) return;
    strokes.push({ kind: 'enter' });
    if (!options.autoIndent) return;
    const next = lines[idx + 1];
    if (!next.trim()) return;
    const gap = level - indentOf(next);
    if (gap > 0) {
      const levels = Math.ceil(gap / Math.max(1, options.indentWidth));
      for (let i = 0; i < levels; i += 1) strokes.push({ kind: 'backspace' });
    }
  });
  return strokes;
}

export type KeyName = 'enter' | 'backspace';

/** The subset of a live session the simulator drives. */
export interface TypingTarget {
  sendText(text: string, signal?: AbortSignal): Promise<void>;
  sendKey(key: KeyName, signal?: AbortSignal): Promise<void>;
  execute(signal?: AbortSignal): Promise<void>;
}

export type TypingOptions = PlanOptions & {
  mode: TypingMode;
  profile?: DelayProfile;
  seed: number;
  clock?: Clock;
};

export type TypingReport = {
  strokes: number;
  typedChars: number;
  elapsedMs: number;
};

export class TypingSimulator {
  private readonly random: () => number;
  private readonly clock: Clock;
  private readonly profile: DelayProfile;

  constructor(private readonly options: TypingOptions) {
    this.random = createRandom(options.seed);
    this.clock = options.clock ?? systemClock;
    this.profile = options.profile ?? DEFAULT_DELAY_PROFILE;
  }

  /**
   * Emits `code` into the target and executes it. Session faults and aborts
   * reject immediately; nothing after the failing stroke is sent.
   */
  async type(code: string, target: TypingTarget, signal?: AbortSignal): Promise<TypingReport> {
    const started = this.clock.now();
    const strokes = planKeystrokes(code, this.options);
    let typedChars = 0;
    let previous: string | null = null;

    for (const stroke of strokes) {
      signal?.throwIfAborted();
      if (stroke.kind === 'text') {
        if (this.options.mode === 'line') {
          await target.sendText(stroke.text, signal);
          typedChars += stroke.text.length;
          previous = stroke.text[stroke.text.length - 1] ?? previous;
          continue;
        }
        for (const char of stroke.text) {
          await target.sendText(char, signal);
          typedChars += 1;
          await this.pause({ char, previous }, signal);
          previous = char;
        }
      } else {
        await target.sendKey(stroke.kind, signal);
        if (stroke.kind === 'enter') {
          await this.pause({ char: '\n', previous }, signal);
          previous = '\n';
        }
      }
    }

    signal?.throwIfAborted();
    await target.execute(signal);
    return { strokes: strokes.length, typedChars, elapsedMs: this.clock.now() - started };
  }

  private pause(context: CharContext, signal?: AbortSignal): Promise<void> {
    return this.clock.sleep(typingDelayMs(context, this.random(), this.profile), signal);
  }
}
