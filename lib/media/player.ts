import { spawn } from 'node:child_process';
import type { AudioPlayer } from '@/lib/tutorial/narration';

/** Plays audio through ffplay without a window; aborting the signal kills the player. */
export class FfplayAudioPlayer implements AudioPlayer {
  play(audioPath: string, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const proc = spawn('ffplay', ['-nodisp', '-autoexit', '-loglevel', 'error', audioPath], {
        stdio: 'ignore',
        signal
      });
      proc.once('error', reject);
      proc.once('close', (code) => {
        if (code === 0) resolve();
        else reject(new Error(`ffplay exited with ${code}`));
      });
    });
  }
}
