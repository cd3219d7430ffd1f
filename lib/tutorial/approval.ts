import { createInterface, type Interface } from 'node:readline/promises';
import type { ApprovalPolicy, Segment, Verdict } from '@/types/tutorial';

/**
 * Where manual decisions come from. `ask` suspends the control flow until an
 * answer arrives; `null` means the source is closed and will never answer.
 */
export interface DecisionSource {
  show(text: string): void;
  ask(question: string, signal?: AbortSignal): Promise<string | null>;
}

const ACCEPT = new Set(['y', 'yes', 'accept', 'approve', 'ok']);
const REJECT = new Set(['n', 'no', 'reject', 'redo']);
const ABORT = new Set(['a', 'abort', 'q', 'quit', 'exit']);

export type ParsedAnswer = 'accept' | 'reject' | 'abort' | 'invalid';

export function parseAnswer(answer: string): ParsedAnswer {
  const normalized = answer.trim().toLowerCase();
  if (ACCEPT.has(normalized)) return 'accept';
  if (REJECT.has(normalized)) return 'reject';
  if (ABORT.has(normalized)) return 'abort';
  return 'invalid';
}

export function renderSegment(segment: Segment, fence = ''): string {
  return [
    `--- Segment ${segment.index + 1} ---`,
    `\`\`\`${fence}`,
    segment.code,
    '```',
    '',
    'Narration:',
    segment.explanation
  ].join('\n');
}

export class ApprovalGate {
  constructor(
    private readonly source: DecisionSource,
    private readonly fence = ''
  ) {}

  async review(segment: Segment, policy: ApprovalPolicy, signal?: AbortSignal): Promise<Verdict> {
    if (policy === 'force-approve') {
      return { kind: 'accept' };
    }

    this.source.show(renderSegment(segment, this.fence));
    for (;;) {
      const answer = await this.source.ask('Approve this segment? (yes / no / abort): ', signal);
      if (answer === null) {
        return { kind: 'abort', reason: 'approval input closed' };
      }
      const parsed = parseAnswer(answer);
      if (parsed === 'accept') return { kind: 'accept' };
      if (parsed === 'abort') return { kind: 'abort', reason: 'aborted by reviewer' };
      if (parsed === 'reject') {
        const feedback = await this.askFeedback(signal);
        return feedback === null
          ? { kind: 'abort', reason: 'approval input closed' }
          : { kind: 'reject', feedback };
      }
      this.source.show(`Unrecognised answer "${answer.trim()}". Type yes, no or abort.`);
    }
  }

  private async askFeedback(signal?: AbortSignal): Promise<string | null> {
    for (;;) {
      const feedback = await this.source.ask('What should change in this segment? ', signal);
      if (feedback === null) return null;
      if (feedback.trim()) return feedback;
      this.source.show('Feedback cannot be empty.');
    }
  }
}

export type ConsoleDecisionSourceOptions = {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  terminal?: boolean;
  /** Ctrl+C at the prompt. Defaults to raising SIGINT on the process. */
  onInterrupt?: () => void;
};

export class ConsoleDecisionSource implements DecisionSource {
  private rl: Interface | null = null;
  private closed: Promise<null> | null = null;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly onInterrupt: () => void;

  constructor(private readonly options: ConsoleDecisionSourceOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.onInterrupt = options.onInterrupt ?? (() => process.kill(process.pid, 'SIGINT'));
  }

  private open(): { rl: Interface; closed: Promise<null> } {
    if (!this.rl || !this.closed) {
      const rl = createInterface({ input: this.input, output: this.output, terminal: this.options.terminal });
      // readline swallows Ctrl+C in raw mode; hand it back to the process handlers
      rl.on('SIGINT', () => this.onInterrupt());
      this.rl = rl;
      this.closed = new Promise<null>((resolve) => rl.once('close', () => resolve(null)));
    }
    return { rl: this.rl, closed: this.closed };
  }

  show(text: string): void {
    this.output.write(`${text}\n`);
  }

  async ask(question: string, signal?: AbortSignal): Promise<string | null> {
    const { rl, closed } = this.open();
    const answer = signal ? rl.question(question, { signal }) : rl.question(question);
    return Promise.race([answer, closed]);
  }

  close(): void {
    this.rl?.close();
  }
}

/** Replays a fixed list of answers; closes once exhausted. */
export class ScriptedDecisionSource implements DecisionSource {
  readonly shown: string[] = [];
  readonly asked: string[] = [];
  private cursor = 0;

  constructor(private readonly answers: readonly string[]) {}

  show(text: string): void {
    this.shown.push(text);
  }

  async ask(question: string, signal?: AbortSignal): Promise<string | null> {
    signal?.throwIfAborted();
    this.asked.push(question);
    if (this.cursor >= this.answers.length) return null;
    const answer = this.answers[this.cursor];
    this.cursor += 1;
    return answer;
  }

  get remaining(): number {
    return this.answers.length - this.cursor;
  }
}
