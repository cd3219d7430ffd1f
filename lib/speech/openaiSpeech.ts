import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import OpenAI from 'openai';
import { getClient } from '@/lib/openai-client';
import type { SpeechVoice } from '@/config/tutorial';
import { probeDurationSec } from '@/lib/media/ffmpeg';
import type { SpeechSynthesizer, SpokenAudio } from '@/lib/tutorial/narration';
import { SynthesisError, errorMessage } from '@/lib/tutorial/errors';

export type OpenAISpeechOptions = {
  outDir: string;
  model: string;
  voice: SpeechVoice;
  instructions?: string;
  /** Measures the written file; ffprobe by default. */
  measure?: (path: string) => Promise<number>;
};

export class OpenAISpeechSynthesizer implements SpeechSynthesizer {
  constructor(private readonly options: OpenAISpeechOptions) {}

  async speak(text: string, fileStem: string, signal?: AbortSignal): Promise<SpokenAudio> {
    const { outDir, model, voice, instructions } = this.options;
    const audioPath = join(outDir, `${fileStem}.mp3`);
    await mkdir(outDir, { recursive: true });

    console.info(`[TTS] speech model=${model} voice=${voice} chars=${text.length} -> ${audioPath}`);
    let data: ArrayBuffer;
    try {
      const response = await getClient().audio.speech.create(
        {
          model,
          voice,
          input: text,
          response_format: 'mp3',
          ...(instructions ? { instructions } : {})
        },
        { signal }
      );
      data = await response.arrayBuffer();
    } catch (err) {
      if (signal?.aborted) throw err;
      const status = err instanceof OpenAI.APIError ? ` ${err.status ?? ''}` : '';
      throw new SynthesisError(`OpenAI speech error${status}: ${errorMessage(err)}`, { cause: err });
    }
    await writeFile(audioPath, Buffer.from(data));

    const measure = this.options.measure ?? probeDurationSec;
    const durationSec = await measure(audioPath);
    return { audioPath, durationSec };
  }
}
