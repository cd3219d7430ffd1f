import type {
  ApprovalPolicy,
  CaptureInterval,
  ExecutedSegment,
  NarrationClip,
  NarrationMode,
  Segment,
  TutorialOutcome,
  TutorialRun,
  TutorialState
} from '@/types/tutorial';
import type { Clock } from '@/lib/clock';
import { abortReason, systemClock } from '@/lib/clock';
import { createLogger, type Logger } from '@/lib/log';
import type { ApprovalGate } from '@/lib/tutorial/approval';
import type { CaptureController, CaptureHandle } from '@/lib/tutorial/capture';
import { END_OF_TOPIC, type SegmentGenerator } from '@/lib/tutorial/generator';
import type { NarrationPlayback, NarrationRecorder } from '@/lib/tutorial/narration';
import type { LiveSession } from '@/lib/tutorial/session';
import type { TypingSimulator } from '@/lib/tutorial/typing';
import {
  ExecutionError,
  TutorialRunError,
  errorMessage,
  isResourceViolation,
  isTutorialError
} from '@/lib/tutorial/errors';

const TRANSITIONS: Record<TutorialState, readonly TutorialState[]> = {
  idle: ['generating', 'aborted', 'failed'],
  generating: ['awaiting-approval', 'done', 'aborted', 'failed'],
  'awaiting-approval': ['capturing', 'generating', 'aborted', 'failed'],
  capturing: ['narrating', 'sealing', 'generating', 'aborted', 'failed'],
  narrating: ['sealing', 'generating', 'aborted', 'failed'],
  sealing: ['generating', 'done', 'aborted', 'failed'],
  done: [],
  aborted: [],
  failed: []
};

export type TransitionEvent = {
  from: TutorialState;
  to: TutorialState;
  segmentIndex: number;
};

export type TutorialCollaborators = {
  generator: SegmentGenerator;
  gate: ApprovalGate;
  typist: TypingSimulator;
  session: LiveSession;
  capture: CaptureController;
  narration: NarrationRecorder;
  clock?: Clock;
  logger?: Logger;
};

export type TutorialOptions = {
  topic: string;
  narrationMode: NarrationMode;
  approvalPolicy: ApprovalPolicy;
  maxSegments: number;
  maxSegmentAttempts: number;
  executionTimeoutMs: number;
  tailPaddingMs: number;
  /** Synthesis attempts per segment before it is marked degraded. */
  narrationAttempts?: number;
  onTransition?: (event: TransitionEvent) => void;
};

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

const settle = <T>(promise: Promise<T>): Promise<Settled<T>> =>
  promise.then(
    (value) => ({ ok: true as const, value }),
    (error: unknown) => ({ ok: false as const, error })
  );

const roundSec = (value: number) => Math.round(value * 1000) / 1000;

export const EXECUTION_FEEDBACK_PREFIX = 'The previous code failed when executed:';

export class TutorialOrchestrator {
  private stateValue: TutorialState = 'idle';
  private segmentIndex = 0;
  private readonly controller = new AbortController();
  private readonly transcript: ExecutedSegment[] = [];
  private readonly clock: Clock;
  private readonly logger: Logger;
  readonly run: TutorialRun;

  constructor(
    private readonly deps: TutorialCollaborators,
    private readonly options: TutorialOptions
  ) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('orchestrator');
    this.run = {
      topic: options.topic,
      narrationMode: options.narrationMode,
      approvalPolicy: options.approvalPolicy,
      segments: [],
      intervals: [],
      clips: [],
      degradedSegments: []
    };
  }

  get state(): TutorialState {
    return this.stateValue;
  }

  get executed(): readonly ExecutedSegment[] {
    return this.transcript;
  }

  /** Requests cancellation; the running `start()` resolves with an aborted outcome. */
  abort(reason = 'aborted'): void {
    if (this.isTerminal()) return;
    if (!this.controller.signal.aborted) {
      this.logger.warn(`abort requested: ${reason}`);
      this.controller.abort(reason);
    }
  }

  async start(): Promise<TutorialOutcome> {
    if (this.stateValue !== 'idle') {
      throw new Error(`Tutorial already started (state=${this.stateValue})`);
    }
    const signal = this.controller.signal;
    try {
      signal.throwIfAborted();
      this.transition('generating');
      for (;;) {
        if (this.segmentIndex >= this.options.maxSegments) {
          this.logger.info(`reached the segment limit (${this.options.maxSegments})`);
          this.transition('done');
          break;
        }
        const produced = await this.produceSegment(this.segmentIndex, signal);
        if (!produced) {
          this.transition('done');
          break;
        }
        this.segmentIndex += 1;
        if (this.segmentIndex < this.options.maxSegments) this.transition('generating');
      }
      this.logger.info(
        `done: ${this.transcript.length} segment(s), ${this.run.clips.length} clip(s), degraded=[${this.run.degradedSegments.join(',')}]`
      );
      return { status: 'done', run: this.run };
    } catch (err) {
      await this.release();
      if (signal.aborted) {
        const reason = abortReason(signal);
        this.transition('aborted');
        return { status: 'aborted', reason, run: this.run };
      }
      this.transition('failed');
      const label = isResourceViolation(err) ? 'capture invariant violated' : 'run failed';
      this.logger.error(`${label} at segment ${this.segmentIndex}: ${errorMessage(err)}`);
      if (err instanceof TutorialRunError) throw err;
      throw new TutorialRunError('RUN_FAILED', this.segmentIndex, errorMessage(err), { cause: err });
    }
  }

  /** Returns false when the topic is exhausted. */
  private async produceSegment(index: number, signal: AbortSignal): Promise<boolean> {
    const feedback: string[] = [];
    let attempts = 0;
    const consumeAttempt = (cause: unknown) => {
      attempts += 1;
      this.logger.warn(`segment ${index} attempt ${attempts}/${this.options.maxSegmentAttempts} failed: ${errorMessage(cause)}`);
      if (attempts >= this.options.maxSegmentAttempts) {
        throw new TutorialRunError(
          'RETRY_BUDGET_EXHAUSTED',
          index,
          `gave up after ${attempts} attempt(s): ${errorMessage(cause)}`,
          { cause }
        );
      }
    };

    for (;;) {
      const proposal = await this.propose(index, feedback, signal);
      if (proposal === END_OF_TOPIC) {
        this.logger.info(`topic exhausted after ${index} segment(s)`);
        return false;
      }
      if (proposal instanceof ExecutionError) {
        feedback.push(`${EXECUTION_FEEDBACK_PREFIX}\n${executionExcerpt(proposal)}`);
        consumeAttempt(proposal);
        continue;
      }
      if (proposal instanceof Error) {
        consumeAttempt(proposal);
        continue;
      }

      const segment = proposal;
      this.run.segments.push(segment);
      this.transition('awaiting-approval');
      const verdict = await this.deps.gate.review(segment, this.run.approvalPolicy, signal);

      if (verdict.kind === 'abort') {
        this.abort(verdict.reason);
        throw new Error(`Aborted at segment ${index}: ${verdict.reason}`);
      }
      if (verdict.kind === 'reject') {
        segment.status = 'rejected';
        feedback.push(verdict.feedback);
        consumeAttempt(new Error(`rejected by reviewer: ${verdict.feedback}`));
        this.transition('generating');
        continue;
      }

      segment.status = 'approved';
      this.transition('capturing');
      try {
        const { interval, clip } = await this.perform(segment, signal);
        this.seal(segment, interval, clip);
        return true;
      } catch (err) {
        if (signal.aborted || !(err instanceof ExecutionError)) throw err;
        segment.status = 'rejected';
        await this.deps.session.clear(signal);
        feedback.push(`${EXECUTION_FEEDBACK_PREFIX}\n${executionExcerpt(err)}`);
        consumeAttempt(err);
        this.transition('generating');
      }
    }
  }

  private async propose(index: number, feedback: readonly string[], signal: AbortSignal) {
    try {
      return await this.deps.generator.next(
        { topic: this.run.topic, index, transcript: [...this.transcript], feedback: [...feedback] },
        signal
      );
    } catch (err) {
      if (signal.aborted) throw err;
      if (err instanceof ExecutionError || isTutorialError(err, 'GENERATION_FAILURE')) return err;
      throw err;
    }
  }

  /**
   * Captures one approved segment. The interval stays open until typing and
   * execution finish and, in parallel mode, until the narration clip has
   * played out, then for the tail padding. After-mode narration is
   * synthesized once the interval is sealed; if that fails fatally the sealed
   * file is dropped as well.
   */
  private async perform(
    segment: Segment,
    signal: AbortSignal
  ): Promise<{ interval: CaptureInterval; clip: NarrationClip | null }> {
    const { capture } = this.deps;
    const { interval, value } = await capture.withInterval(segment.index, (handle) =>
      this.record(segment, handle, signal)
    );
    if (this.run.narrationMode === 'parallel') return { interval, clip: value };
    try {
      return { interval, clip: await this.synthesizeAfter(segment, interval, signal) };
    } catch (err) {
      await capture.discardSealed(interval);
      throw err;
    }
  }

  private async record(segment: Segment, handle: CaptureHandle, signal: AbortSignal): Promise<NarrationClip | null> {
    const { capture, narration, typist, session } = this.deps;
    const offsetAt = () => roundSec(handle.startOffsetSec + capture.elapsedSec(handle));
    let playback: NarrationPlayback | null = null;
    let pending: Promise<Settled<NarrationClip>> | null = null;

    try {
      if (this.run.narrationMode === 'parallel') {
        playback = narration.beginPlayback(segment.index, segment.explanation, offsetAt, signal);
        pending = settle(playback.finished);
      }

      const report = await typist.type(segment.code, session, signal);
      this.logger.info(`segment ${segment.index} typed ${report.typedChars} chars in ${report.elapsedMs}ms`);
      const idle = await session.waitForIdle(this.options.executionTimeoutMs, signal);
      if (idle === 'timeout') {
        this.logger.warn(
          `segment ${segment.index} still running after ${this.options.executionTimeoutMs}ms; continuing`
        );
      }

      let clip: NarrationClip | null = null;
      if (pending) {
        this.transition('narrating');
        clip = await this.awaitParallelClip(segment, offsetAt, pending, signal);
        if (clip) {
          const clipEndSec = clip.startOffsetSec - handle.startOffsetSec + clip.durationSec;
          const remainingMs = Math.round((clipEndSec - capture.elapsedSec(handle)) * 1000);
          if (remainingMs > 0) await this.clock.sleep(remainingMs, signal);
        }
        await this.clock.sleep(this.options.tailPaddingMs, signal);
      }

      this.transition('sealing');
      return clip;
    } catch (err) {
      playback?.stop();
      throw err;
    }
  }

  private async awaitParallelClip(
    segment: Segment,
    offsetAt: () => number,
    first: Promise<Settled<NarrationClip>>,
    signal: AbortSignal
  ): Promise<NarrationClip | null> {
    const attempts = this.options.narrationAttempts ?? 2;
    let settled = await first;
    for (let attempt = 1; ; attempt += 1) {
      if (settled.ok) return settled.value;
      signal.throwIfAborted();
      if (!isTutorialError(settled.error, 'SYNTHESIS_ERROR')) throw settled.error;
      this.logger.warn(`narration attempt ${attempt}/${attempts} for segment ${segment.index} failed: ${errorMessage(settled.error)}`);
      if (attempt >= attempts) return null;
      settled = await settle(this.deps.narration.beginPlayback(segment.index, segment.explanation, offsetAt, signal).finished);
    }
  }

  private async synthesizeAfter(
    segment: Segment,
    interval: CaptureInterval,
    signal: AbortSignal
  ): Promise<NarrationClip | null> {
    const attempts = this.options.narrationAttempts ?? 2;
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        const clip = await this.deps.narration.synthesize(segment.index, segment.explanation, interval.endOffsetSec, signal);
        this.deps.capture.advance(clip.durationSec);
        return clip;
      } catch (err) {
        if (signal.aborted || !isTutorialError(err, 'SYNTHESIS_ERROR')) throw err;
        this.logger.warn(`narration attempt ${attempt}/${attempts} for segment ${segment.index} failed: ${errorMessage(err)}`);
      }
    }
    return null;
  }

  private seal(segment: Segment, interval: CaptureInterval, clip: NarrationClip | null) {
    const executed: ExecutedSegment = Object.freeze({ ...segment, status: 'executed' as const });
    const position = this.run.segments.lastIndexOf(segment);
    if (position >= 0) this.run.segments[position] = executed;
    this.transcript.push(executed);
    this.run.intervals.push(interval);
    if (clip) {
      this.run.clips.push(clip);
    } else {
      this.run.degradedSegments.push(segment.index);
      this.logger.warn(`segment ${segment.index} has no narration; run is degraded`);
    }
  }

  private async release() {
    try {
      await this.deps.capture.dispose();
    } catch (err) {
      this.logger.error(`cleanup failed: ${errorMessage(err)}`);
    }
  }

  private isTerminal() {
    return this.stateValue === 'done' || this.stateValue === 'aborted' || this.stateValue === 'failed';
  }

  private transition(to: TutorialState) {
    const from = this.stateValue;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal tutorial transition ${from} -> ${to}`);
    }
    this.stateValue = to;
    this.logger.info(`state ${from} -> ${to} (segment ${this.segmentIndex})`);
    this.options.onTransition?.({ from, to, segmentIndex: this.segmentIndex });
  }
}

function executionExcerpt(err: ExecutionError): string {
  return err.excerpt.trim() || err.message;
}
