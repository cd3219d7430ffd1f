import { appendFile, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { X11Desktop, findWindowId, findWindowIds, parseWindowGeometry, type DesktopResult } from '@/lib/desktop/x11';
import { TerminalConsoleSession, findExecutionError, inspectCellOutput, stripAnsi } from '@/lib/desktop/terminalSession';
import { resolveKernelProfile } from '@/config/kernels';
import { silentLogger } from '@/lib/log';
import { FakeClock } from '@/tests/helpers/fakes';

const XWININFO = `
xwininfo: Window id: 0x5a00003 "tutorial-console"

  Absolute upper-left X:  -4
  Absolute upper-left Y:  27
  Relative upper-left X:  0
  Relative upper-left Y:  0
  Width: 1920
  Height: 1053
  Depth: 32
`;

describe('window lookup', () => {
  it('finds a window id by title substring', () => {
    const list = ['0x04000007  0 devbox Terminal', '0x05a00003  0 devbox tutorial-console python3'].join('\n');

    expect(findWindowId(list, 'tutorial-console')).toBe('0x05a00003');
    expect(findWindowId(list, 'missing')).toBeNull();
  });

  it('lists every window whose title matches a pattern', () => {
    const list = ['0x04000007  0 devbox Terminal', '0x06200004  0 devbox Figure 1', '0x06200009  0 devbox Figure 12 draft'].join('\n');

    expect(findWindowIds(list, /^Figure \d+$/)).toEqual(['0x06200004']);
    expect(findWindowIds(list, /^Figure/)).toEqual(['0x06200004', '0x06200009']);
    expect(findWindowIds('', /^Figure/)).toEqual([]);
  });

  it('reads absolute geometry and clamps off-screen corners', () => {
    expect(parseWindowGeometry(XWININFO)).toEqual({ x: 0, y: 27, width: 1920, height: 1053 });
    expect(parseWindowGeometry('Width: 10')).toBeNull();
  });
});

describe('console transcript', () => {
  const patterns = resolveKernelProfile('python3').errorPatterns;

  it('strips colour codes and carriage returns', () => {
    expect(stripAnsi('\u001b[32mIn [1]: \u001b[0mx = 1\r\n')).toBe('In [1]: x = 1\n');
  });

  it('waits for the next prompt before reporting idle', () => {
    expect(inspectCellOutput('\u001b[31mOut[1]: \u001b[0m3')).toEqual({ state: 'running' });
    expect(inspectCellOutput('\u001b[31mOut[1]: \u001b[0m3\r\n\r\n\u001b[32mIn [2]: \u001b[0m')).toEqual({
      state: 'idle',
      output: 'Out[1]: 3\n\n'
    });
  });

  it('extracts an excerpt when the output matches an error pattern', () => {
    const output = 'Traceback (most recent call last)\n  File "<stdin>", line 1\n\nZeroDivisionError: division by zero\n';

    expect(findExecutionError(output, patterns)).toBe(
      'Traceback (most recent call last)\n  File "<stdin>", line 1\nZeroDivisionError: division by zero'
    );
    expect(findExecutionError('Out[3]: 42\n', patterns)).toBeNull();
  });

  it('keeps only the tail of long tracebacks', () => {
    const lines = Array.from({ length: 30 }, (_, i) => `frame ${i}`);
    const excerpt = findExecutionError([...lines, 'ValueError: bad value'].join('\n'), patterns);

    expect(excerpt?.split('\n')).toHaveLength(20);
    expect(excerpt?.startsWith('frame 11\n')).toBe(true);
    expect(excerpt?.endsWith('ValueError: bad value')).toBe(true);
  });
});

/** Plot windows that write the next prompt to the transcript when closed. */
class PlotDesktop extends X11Desktop {
  readonly closed: string[] = [];

  constructor(
    private readonly logPath: string,
    private windows: string[]
  ) {
    super();
  }

  async findWindows(): Promise<{ ok: true; windowIds: string[] }> {
    return { ok: true, windowIds: [...this.windows] };
  }

  async close(windowId: string): Promise<DesktopResult> {
    this.closed.push(windowId);
    this.windows = this.windows.filter((id) => id !== windowId);
    await appendFile(this.logPath, 'In [2]: ');
    return { ok: true };
  }
}

describe('TerminalConsoleSession', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tutorial-console-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('closes a plot window after the hold so the cell can finish', async () => {
    const logPath = join(dir, 'console.log');
    await writeFile(logPath, 'plt.plot([1, 2, 3])\n');
    const clock = new FakeClock();
    const desktop = new PlotDesktop(logPath, ['0x06200004']);
    const session = new TerminalConsoleSession({
      profile: resolveKernelProfile('python3'),
      desktop,
      logPath,
      windowTitle: 'tutorial-test',
      startupDelayMs: 0,
      idlePollMs: 500,
      plotHoldMs: 1000,
      clock,
      logger: silentLogger
    });

    await expect(session.waitForIdle(60_000)).resolves.toBe('idle');
    expect(desktop.closed).toEqual(['0x06200004']);
    expect(clock.now()).toBe(1500);
  });
});
