import { join } from 'node:path';
import type { CaptureInterval } from '@/types/tutorial';
import type { Clock } from '@/lib/clock';
import { systemClock } from '@/lib/clock';
import { createLogger, type Logger } from '@/lib/log';
import { CaptureAlreadyOpenError, errorMessage } from '@/lib/tutorial/errors';

export type RecordingHandle = {
  id: number;
  outputPath: string;
};

/**
 * A screen recorder. At most one recording may be active per device; a
 * second `start` must throw `RecordingDeviceBusyError`.
 */
export interface RecordingDevice {
  start(outputPath: string): Promise<RecordingHandle>;
  stop(handle: RecordingHandle): Promise<string>;
  discard(filePath: string): Promise<void>;
}

export type CaptureHandle = {
  readonly segmentIndex: number;
  readonly recording: RecordingHandle;
  readonly openedAt: number;
  readonly startOffsetSec: number;
};

export type CaptureControllerOptions = {
  outputDir: string;
  clock?: Clock;
  logger?: Logger;
  fileName?: (segmentIndex: number) => string;
};

const roundSec = (value: number) => Math.round(value * 1000) / 1000;

/**
 * Owns the recording device and the timeline cursor. Capture is strictly
 * segment-serial: one handle at a time, sealed or discarded before the next.
 */
export class CaptureController {
  private current: CaptureHandle | null = null;
  private opening = false;
  private cursorSec = 0;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly device: RecordingDevice,
    private readonly options: CaptureControllerOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('capture');
  }

  get openCount(): number {
    return this.current || this.opening ? 1 : 0;
  }

  get openSegmentIndex(): number | null {
    return this.current?.segmentIndex ?? null;
  }

  /** Timeline position, in seconds, where the next interval will start. */
  get cursor(): number {
    return this.cursorSec;
  }

  async open(segmentIndex: number): Promise<CaptureHandle> {
    if (this.current || this.opening) {
      throw new CaptureAlreadyOpenError(this.current?.segmentIndex ?? segmentIndex, segmentIndex);
    }
    this.opening = true;
    try {
      const name = this.options.fileName?.(segmentIndex) ?? `segment_${String(segmentIndex).padStart(3, '0')}.mp4`;
      const recording = await this.device.start(join(this.options.outputDir, name));
      this.current = {
        segmentIndex,
        recording,
        openedAt: this.clock.now(),
        startOffsetSec: this.cursorSec
      };
      this.logger.info(`opened segment ${segmentIndex} at ${this.cursorSec.toFixed(3)}s -> ${recording.outputPath}`);
      return this.current;
    } finally {
      this.opening = false;
    }
  }

  /** Seconds the handle has been open. */
  elapsedSec(handle: CaptureHandle): number {
    return (this.clock.now() - handle.openedAt) / 1000;
  }

  async close(handle: CaptureHandle): Promise<CaptureInterval> {
    this.assertCurrent(handle);
    const endOffsetSec = roundSec(handle.startOffsetSec + this.elapsedSec(handle));
    this.current = null;
    const filePath = await this.device.stop(handle.recording);
    this.cursorSec = endOffsetSec;
    this.logger.info(`sealed segment ${handle.segmentIndex} [${handle.startOffsetSec.toFixed(3)}s, ${endOffsetSec.toFixed(3)}s]`);
    return {
      segmentIndex: handle.segmentIndex,
      filePath,
      startOffsetSec: handle.startOffsetSec,
      endOffsetSec
    };
  }

  /** Stops the recording and drops its file; the timeline does not move. */
  async discard(handle: CaptureHandle): Promise<void> {
    this.assertCurrent(handle);
    this.current = null;
    const filePath = await this.device.stop(handle.recording);
    await this.device.discard(filePath);
    this.logger.warn(`discarded partial capture for segment ${handle.segmentIndex}`);
  }

  /**
   * Drops the file of an interval that was sealed but never committed to the
   * run. The cursor returns to the interval start.
   */
  async discardSealed(interval: CaptureInterval): Promise<void> {
    if (this.current) {
      throw new CaptureAlreadyOpenError(this.current.segmentIndex, interval.segmentIndex);
    }
    this.cursorSec = interval.startOffsetSec;
    await this.device.discard(interval.filePath);
    this.logger.warn(`discarded sealed capture for segment ${interval.segmentIndex}`);
  }

  /** Moves the cursor past footage that is not recorded, such as a narration hold. */
  advance(seconds: number): void {
    if (this.current) {
      throw new CaptureAlreadyOpenError(this.current.segmentIndex, this.current.segmentIndex);
    }
    if (seconds > 0) this.cursorSec = roundSec(this.cursorSec + seconds);
  }

  /** Scoped acquisition: sealed when `fn` resolves, discarded when it throws. */
  async withInterval<T>(
    segmentIndex: number,
    fn: (handle: CaptureHandle) => Promise<T>
  ): Promise<{ interval: CaptureInterval; value: T }> {
    const handle = await this.open(segmentIndex);
    let value: T;
    try {
      value = await fn(handle);
    } catch (err) {
      await this.discard(handle);
      throw err;
    }
    return { interval: await this.close(handle), value };
  }

  /** Discards whatever is still open. Safe to call repeatedly. */
  async dispose(): Promise<void> {
    const handle = this.current;
    if (!handle) return;
    try {
      await this.discard(handle);
    } catch (err) {
      this.logger.error(`failed to release capture for segment ${handle.segmentIndex}: ${errorMessage(err)}`);
      throw err;
    }
  }

  private assertCurrent(handle: CaptureHandle) {
    if (this.current !== handle) {
      throw new Error(`Capture handle for segment ${handle.segmentIndex} is not the open interval`);
    }
  }
}
