import { runProcess } from '@/lib/process';
import type { ScreenRegion } from '@/lib/media/recorder';
import { errorMessage } from '@/lib/tutorial/errors';

export type DesktopResult = { ok: true } | { ok: false; reason: string };

type WindowRow = { id: string; title: string };

/** `wmctrl -l` rows: `<id> <desktop> <host> <title...>`. */
function parseWindowList(wmctrlList: string): WindowRow[] {
  const rows: WindowRow[] = [];
  for (const line of wmctrlList.split('\n')) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 4) continue;
    rows.push({ id: parts[0], title: parts.slice(3).join(' ') });
  }
  return rows;
}

export function findWindowId(wmctrlList: string, title: string): string | null {
  return parseWindowList(wmctrlList).find((row) => row.title.includes(title))?.id ?? null;
}

export function findWindowIds(wmctrlList: string, pattern: RegExp): string[] {
  return parseWindowList(wmctrlList)
    .filter((row) => pattern.test(row.title))
    .map((row) => row.id);
}

function readField(output: string, label: string): number | null {
  const match = output.match(new RegExp(`${label}:\\s*(-?\\d+)`));
  return match ? Number.parseInt(match[1], 10) : null;
}

export function parseWindowGeometry(xwininfo: string): ScreenRegion | null {
  const x = readField(xwininfo, 'Absolute upper-left X');
  const y = readField(xwininfo, 'Absolute upper-left Y');
  const width = readField(xwininfo, 'Width');
  const height = readField(xwininfo, 'Height');
  if (x === null || y === null || width === null || height === null) return null;
  return { x: Math.max(0, x), y: Math.max(0, y), width, height };
}

/** Window management through wmctrl, xwininfo and xset. */
export class X11Desktop {
  async findWindow(title: string): Promise<{ ok: true; windowId: string } | { ok: false; reason: string }> {
    try {
      const { stdout } = await runProcess('wmctrl', ['-l']);
      const windowId = findWindowId(stdout, title);
      return windowId ? { ok: true, windowId } : { ok: false, reason: `No window titled "${title}"` };
    } catch (err) {
      return { ok: false, reason: `wmctrl failed: ${errorMessage(err)}` };
    }
  }

  async findWindows(pattern: RegExp): Promise<{ ok: true; windowIds: string[] } | { ok: false; reason: string }> {
    try {
      const { stdout } = await runProcess('wmctrl', ['-l']);
      return { ok: true, windowIds: findWindowIds(stdout, pattern) };
    } catch (err) {
      return { ok: false, reason: `wmctrl failed: ${errorMessage(err)}` };
    }
  }

  async geometry(windowId: string): Promise<{ ok: true; region: ScreenRegion } | { ok: false; reason: string }> {
    try {
      const { stdout } = await runProcess('xwininfo', ['-id', windowId]);
      const region = parseWindowGeometry(stdout);
      return region ? { ok: true, region } : { ok: false, reason: `Unreadable geometry for window ${windowId}` };
    } catch (err) {
      return { ok: false, reason: `xwininfo failed: ${errorMessage(err)}` };
    }
  }

  activate(windowId: string): Promise<DesktopResult> {
    return this.run('wmctrl', ['-i', '-a', windowId]);
  }

  maximize(windowId: string): Promise<DesktopResult> {
    return this.run('wmctrl', ['-i', '-r', windowId, '-b', 'add,maximized_vert,maximized_horz']);
  }

  close(windowId: string): Promise<DesktopResult> {
    return this.run('wmctrl', ['-i', '-c', windowId]);
  }

  disableBell(): Promise<DesktopResult> {
    return this.run('xset', ['b', 'off']);
  }

  private async run(command: string, args: string[]): Promise<DesktopResult> {
    try {
      await runProcess(command, args);
      return { ok: true };
    } catch (err) {
      return { ok: false, reason: `${command} failed: ${errorMessage(err)}` };
    }
  }
}
