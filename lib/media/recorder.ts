import { spawn, type ChildProcess } from 'node:child_process';
import { mkdir, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger, type Logger } from '@/lib/log';
import type { RecordingDevice, RecordingHandle } from '@/lib/tutorial/capture';
import { RecordingDeviceBusyError } from '@/lib/tutorial/errors';

export type ScreenRegion = { x: number; y: number; width: number; height: number };

export type ScreenRecorderOptions = {
  display: string;
  fps: number;
  /** Region to grab; resolved on every start so a moved window is followed. */
  region: () => Promise<ScreenRegion>;
  stopTimeoutMs?: number;
  logger?: Logger;
};

const even = (value: number) => Math.max(2, Math.floor(value / 2) * 2);

export function buildCaptureArgs(display: string, region: ScreenRegion, fps: number, outputPath: string): string[] {
  return [
    '-hide_banner',
    '-loglevel',
    'error',
    '-f',
    'x11grab',
    '-video_size',
    `${even(region.width)}x${even(region.height)}`,
    '-framerate',
    String(fps),
    '-i',
    `${display}+${region.x},${region.y}`,
    '-c:v',
    'libx264',
    '-preset',
    'ultrafast',
    '-pix_fmt',
    'yuv420p',
    '-an',
    '-y',
    outputPath
  ];
}

type ActiveRecording = { handle: RecordingHandle; proc: ChildProcess; exited: Promise<number | null> };

export class FfmpegScreenRecorder implements RecordingDevice {
  private active: ActiveRecording | null = null;
  private starting = false;
  private nextId = 1;
  private readonly logger: Logger;

  constructor(private readonly options: ScreenRecorderOptions) {
    this.logger = options.logger ?? createLogger('recorder');
  }

  async start(outputPath: string): Promise<RecordingHandle> {
    if (this.active || this.starting) throw new RecordingDeviceBusyError();
    this.starting = true;
    let region: ScreenRegion;
    try {
      await mkdir(dirname(outputPath), { recursive: true });
      region = await this.options.region();
    } finally {
      this.starting = false;
    }
    const args = buildCaptureArgs(this.options.display, region, this.options.fps, outputPath);
    const proc = spawn('ffmpeg', args, { stdio: ['pipe', 'ignore', 'pipe'] });
    proc.stderr?.on('data', (chunk: Buffer) => this.logger.warn(`ffmpeg: ${chunk.toString().trim()}`));
    const exited = new Promise<number | null>((resolve) => {
      proc.once('error', (err) => {
        this.logger.error(`ffmpeg failed: ${err.message}`);
        resolve(null);
      });
      proc.once('close', (code) => resolve(code));
    });
    const handle = { id: this.nextId++, outputPath };
    this.active = { handle, proc, exited };
    this.logger.info(`recording ${region.width}x${region.height}@${this.options.fps}fps -> ${outputPath}`);
    return handle;
  }

  async stop(handle: RecordingHandle): Promise<string> {
    const active = this.active;
    if (!active || active.handle.id !== handle.id) {
      throw new Error(`Recording ${handle.id} is not active`);
    }
    this.active = null;
    // ffmpeg finalises the container when it reads 'q' on stdin.
    active.proc.stdin?.write('q');
    active.proc.stdin?.end();
    const timeoutMs = this.options.stopTimeoutMs ?? 10_000;
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });
    try {
      const result = await Promise.race([active.exited, timedOut]);
      if (result === 'timeout') {
        this.logger.warn(`ffmpeg did not stop within ${timeoutMs}ms, killing it`);
        active.proc.kill('SIGKILL');
      }
    } finally {
      clearTimeout(timer);
    }
    return handle.outputPath;
  }

  async discard(filePath: string): Promise<void> {
    await rm(filePath, { force: true });
  }
}
