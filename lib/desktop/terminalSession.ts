import { spawn } from 'node:child_process';
import { mkdir, readFile, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { KernelProfile } from '@/config/kernels';
import type { Clock } from '@/lib/clock';
import { systemClock } from '@/lib/clock';
import { createLogger, type Logger } from '@/lib/log';
import { runProcess } from '@/lib/process';
import type { ScreenRegion } from '@/lib/media/recorder';
import type { X11Desktop } from '@/lib/desktop/x11';
import type { IdleResult, LiveSession } from '@/lib/tutorial/session';
import type { KeyName } from '@/lib/tutorial/typing';
import { ExecutionError } from '@/lib/tutorial/errors';

const ANSI = /\u001b\[[0-?]*[ -/]*[@-~]|\u001b\][^\u0007]*\u0007|\u001b[()][A-Za-z0-9]/g;
const PROMPT = /In \[\d+\]:/;
const EXCERPT_LINES = 20;
const PLOT_WINDOW = /^Figure \d+$/;
const PLOT_HOLD_MS = 3000;

const KEYS: Record<KeyName, string> = {
  enter: 'Return',
  backspace: 'BackSpace'
};

export function stripAnsi(text: string): string {
  return text.replace(ANSI, '').replace(/\r/g, '');
}

export type CellOutput = { state: 'running' } | { state: 'idle'; output: string };

/**
 * Inspects console output written after a cell was submitted. The cell is
 * finished once the next input prompt appears.
 */
export function inspectCellOutput(raw: string): CellOutput {
  const text = stripAnsi(raw);
  const prompt = PROMPT.exec(text);
  if (!prompt) return { state: 'running' };
  return { state: 'idle', output: text.slice(0, prompt.index) };
}

export function findExecutionError(output: string, patterns: readonly RegExp[]): string | null {
  if (!patterns.some((pattern) => pattern.test(output))) return null;
  const lines = output.split('\n').filter((line) => line.trim());
  return lines.slice(-EXCERPT_LINES).join('\n');
}

export type TerminalSessionOptions = {
  profile: KernelProfile;
  desktop: X11Desktop;
  /** Transcript written by `script -f`; read back to detect prompts and errors. */
  logPath: string;
  windowTitle: string;
  terminal?: string;
  startupDelayMs: number;
  idlePollMs: number;
  /** Titles of plot windows a cell opens; they block the cell until closed. */
  plotWindowPattern?: RegExp;
  /** How long a plot window stays on screen before it is closed. */
  plotHoldMs?: number;
  clock?: Clock;
  logger?: Logger;
};

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * A `jupyter console` running in a terminal window, driven through xdotool.
 * Output is observed through the `script` transcript of the terminal.
 */
export class TerminalConsoleSession implements LiveSession {
  private windowId: string | null = null;
  private submittedAt = 0;
  private plotLookupFailed = false;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly options: TerminalSessionOptions) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('console');
  }

  async start(signal?: AbortSignal): Promise<void> {
    const { logPath, profile, windowTitle, desktop } = this.options;
    await mkdir(dirname(logPath), { recursive: true });
    await rm(logPath, { force: true });

    const consoleCommand = `jupyter console --kernel ${profile.kernel}`;
    const terminal = spawn(
      this.options.terminal ?? 'gnome-terminal',
      [`--title=${windowTitle}`, '--', 'script', '-q', '-f', logPath, '-c', consoleCommand],
      { stdio: 'ignore', detached: true }
    );
    terminal.once('error', (err) => this.logger.error(`terminal failed to start: ${err.message}`));
    terminal.unref();

    this.logger.info(`waiting ${this.options.startupDelayMs}ms for ${profile.label} console`);
    await this.clock.sleep(this.options.startupDelayMs, signal);

    const found = await desktop.findWindow(windowTitle);
    if (!found.ok) throw new Error(`Console window not found: ${found.reason}`);
    this.windowId = found.windowId;

    for (const result of [await desktop.disableBell(), await desktop.maximize(found.windowId), await desktop.activate(found.windowId)]) {
      if (!result.ok) this.logger.warn(result.reason);
    }
    // Let the window manager settle before geometry is read.
    await this.clock.sleep(500, signal);
  }

  async region(): Promise<ScreenRegion> {
    if (!this.windowId) throw new Error('Console session has not been started');
    const geometry = await this.options.desktop.geometry(this.windowId);
    if (!geometry.ok) throw new Error(geometry.reason);
    return geometry.region;
  }

  async sendText(text: string, signal?: AbortSignal): Promise<void> {
    await runProcess('xdotool', ['type', '--clearmodifiers', '--delay', '0', '--', text], { signal });
  }

  async sendKey(key: KeyName, signal?: AbortSignal): Promise<void> {
    await runProcess('xdotool', ['key', '--clearmodifiers', KEYS[key]], { signal });
  }

  async execute(signal?: AbortSignal): Promise<void> {
    this.submittedAt = (await this.readLog()).length;
    await runProcess('xdotool', ['key', '--clearmodifiers', 'alt+Return'], { signal });
  }

  async waitForIdle(timeoutMs: number, signal?: AbortSignal): Promise<IdleResult> {
    const deadline = this.clock.now() + timeoutMs;
    const plotsSeenAt = new Map<string, number>();
    for (;;) {
      const cell = inspectCellOutput((await this.readLog()).slice(this.submittedAt));
      if (cell.state === 'idle') {
        const excerpt = findExecutionError(cell.output, this.options.profile.errorPatterns);
        if (excerpt) throw new ExecutionError('Cell raised an error', excerpt);
        return 'idle';
      }
      if (this.clock.now() >= deadline) return 'timeout';
      await this.closePlotWindows(plotsSeenAt);
      await this.clock.sleep(this.options.idlePollMs, signal);
    }
  }

  async clear(signal?: AbortSignal): Promise<void> {
    await runProcess('xdotool', ['key', '--clearmodifiers', 'ctrl+l'], { signal });
  }

  async close(): Promise<void> {
    if (!this.windowId) return;
    const result = await this.options.desktop.close(this.windowId);
    if (!result.ok) this.logger.warn(result.reason);
    this.windowId = null;
  }

  /** Closes plot windows once they have been on screen for the hold time. */
  private async closePlotWindows(seenAt: Map<string, number>): Promise<void> {
    const { desktop } = this.options;
    const found = await desktop.findWindows(this.options.plotWindowPattern ?? PLOT_WINDOW);
    if (!found.ok) {
      if (!this.plotLookupFailed) this.logger.warn(found.reason);
      this.plotLookupFailed = true;
      return;
    }

    const now = this.clock.now();
    let closed = false;
    for (const windowId of found.windowIds) {
      const firstSeen = seenAt.get(windowId);
      if (firstSeen === undefined) {
        seenAt.set(windowId, now);
        continue;
      }
      if (now - firstSeen < (this.options.plotHoldMs ?? PLOT_HOLD_MS)) continue;
      const result = await desktop.close(windowId);
      if (!result.ok) {
        this.logger.warn(result.reason);
        continue;
      }
      this.logger.info(`closed plot window ${windowId}`);
      seenAt.delete(windowId);
      closed = true;
    }

    if (closed && this.windowId) {
      const result = await desktop.activate(this.windowId);
      if (!result.ok) this.logger.warn(result.reason);
    }
  }

  private async readLog(): Promise<string> {
    try {
      return await readFile(this.options.logPath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return '';
      throw err;
    }
  }
}
