import type { NarrationClip } from '@/types/tutorial';
import { SynthesisError, errorMessage, isTutorialError } from '@/lib/tutorial/errors';

export type SpokenAudio = {
  audioPath: string;
  durationSec: number;
};

export interface SpeechSynthesizer {
  /** Writes narration audio for `text`; rejects with `SynthesisError` on provider failure. */
  speak(text: string, fileStem: string, signal?: AbortSignal): Promise<SpokenAudio>;
}

export interface AudioPlayer {
  /** Resolves when playback ends; rejects if aborted. */
  play(audioPath: string, signal?: AbortSignal): Promise<void>;
}

export type NarrationPlayback = {
  readonly segmentIndex: number;
  readonly finished: Promise<NarrationClip>;
  stop(): void;
};

const stemFor = (segmentIndex: number) => `narration_${String(segmentIndex).padStart(3, '0')}`;

export class NarrationRecorder {
  constructor(
    private readonly synthesizer: SpeechSynthesizer,
    private readonly player: AudioPlayer
  ) {}

  async synthesize(
    segmentIndex: number,
    text: string,
    startOffsetSec: number,
    signal?: AbortSignal
  ): Promise<NarrationClip> {
    const audio = await this.speak(segmentIndex, text, signal);
    return { segmentIndex, audioPath: audio.audioPath, durationSec: audio.durationSec, startOffsetSec };
  }

  /**
   * Synthesizes and plays narration without blocking the caller. `finished`
   * resolves with the clip once playback completes; its offset is read from
   * `offsetAt` as the player starts, after synthesis latency.
   */
  beginPlayback(segmentIndex: number, text: string, offsetAt: () => number, signal?: AbortSignal): NarrationPlayback {
    const controller = new AbortController();
    const onOuterAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onOuterAbort, { once: true });

    const finished = (async () => {
      try {
        const audio = await this.speak(segmentIndex, text, controller.signal);
        controller.signal.throwIfAborted();
        const startOffsetSec = offsetAt();
        try {
          await this.player.play(audio.audioPath, controller.signal);
        } catch (err) {
          if (controller.signal.aborted) throw err;
          throw new SynthesisError(`Playback failed for segment ${segmentIndex}: ${errorMessage(err)}`, { cause: err });
        }
        return { segmentIndex, audioPath: audio.audioPath, durationSec: audio.durationSec, startOffsetSec };
      } finally {
        signal?.removeEventListener('abort', onOuterAbort);
      }
    })();

    return {
      segmentIndex,
      finished,
      stop: () => controller.abort('narration stopped')
    };
  }

  private async speak(segmentIndex: number, text: string, signal?: AbortSignal): Promise<SpokenAudio> {
    if (!text.trim()) {
      throw new SynthesisError(`Segment ${segmentIndex} has no narration text`);
    }
    try {
      const audio = await this.synthesizer.speak(text, stemFor(segmentIndex), signal);
      if (!Number.isFinite(audio.durationSec) || audio.durationSec <= 0) {
        throw new SynthesisError(`Narration for segment ${segmentIndex} has no measurable duration`);
      }
      return audio;
    } catch (err) {
      if (signal?.aborted || isTutorialError(err, 'SYNTHESIS_ERROR')) throw err;
      throw new SynthesisError(`Narration failed for segment ${segmentIndex}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
