import { describe, it, expect } from 'vitest';
import { silentLogger } from '@/lib/log';
import { CaptureController } from '@/lib/tutorial/capture';
import { CaptureAlreadyOpenError, RecordingDeviceBusyError } from '@/lib/tutorial/errors';
import { FakeClock, StubRecordingDevice } from '@/tests/helpers/fakes';

function setup() {
  const clock = new FakeClock();
  const device = new StubRecordingDevice();
  const capture = new CaptureController(device, { outputDir: '/tmp/rec', clock, logger: silentLogger });
  return { clock, device, capture };
}

describe('CaptureController', () => {
  it('seals an interval with offsets on the tutorial timeline', async () => {
    const { clock, capture } = setup();

    const handle = await capture.open(0);
    clock.current += 1500;
    const interval = await capture.close(handle);

    expect(interval).toEqual({ segmentIndex: 0, filePath: '/tmp/rec/segment_000.mp4', startOffsetSec: 0, endOffsetSec: 1.5 });
    expect(capture.cursor).toBe(1.5);

    capture.advance(2);
    const next = await capture.open(1);
    expect(next.startOffsetSec).toBe(3.5);
  });

  it('refuses a second open interval', async () => {
    const { capture } = setup();
    await capture.open(0);

    await expect(capture.open(1)).rejects.toBeInstanceOf(CaptureAlreadyOpenError);
    expect(capture.openCount).toBe(1);
    expect(capture.openSegmentIndex).toBe(0);
  });

  it('discards without moving the cursor', async () => {
    const { clock, device, capture } = setup();
    const handle = await capture.open(4);
    clock.current += 900;

    await capture.discard(handle);

    expect(device.discarded).toEqual(['/tmp/rec/segment_004.mp4']);
    expect(capture.cursor).toBe(0);
    expect(capture.openCount).toBe(0);
  });

  it('seals or discards around a scoped body', async () => {
    const { clock, device, capture } = setup();

    const ok = await capture.withInterval(0, async () => {
      clock.current += 1000;
      return 'typed';
    });
    expect(ok.value).toBe('typed');
    expect(ok.interval.endOffsetSec).toBe(1);

    await expect(
      capture.withInterval(1, async () => {
        throw new Error('typing failed');
      })
    ).rejects.toThrow('typing failed');
    expect(device.discarded).toEqual(['/tmp/rec/segment_001.mp4']);
    expect(capture.openCount).toBe(0);
  });

  it('drops a sealed interval and rewinds the cursor', async () => {
    const { clock, device, capture } = setup();
    const handle = await capture.open(0);
    clock.current += 2000;
    const interval = await capture.close(handle);

    await capture.discardSealed(interval);

    expect(device.discarded).toEqual(['/tmp/rec/segment_000.mp4']);
    expect(capture.cursor).toBe(0);

    await capture.open(1);
    await expect(capture.discardSealed(interval)).rejects.toBeInstanceOf(CaptureAlreadyOpenError);
  });

  it('rejects cursor moves while an interval is open', async () => {
    const { capture } = setup();
    await capture.open(0);

    expect(() => capture.advance(1)).toThrow(CaptureAlreadyOpenError);
  });

  it('releases an open interval on dispose, once', async () => {
    const { device, capture } = setup();
    await capture.open(2);

    await capture.dispose();
    await capture.dispose();

    expect(device.discarded).toEqual(['/tmp/rec/segment_002.mp4']);
    expect(device.activeCount).toBe(0);
  });

  it('rejects a close for a handle that is no longer open', async () => {
    const { capture } = setup();
    const handle = await capture.open(0);
    await capture.close(handle);

    await expect(capture.close(handle)).rejects.toThrow('is not the open interval');
  });
});

describe('StubRecordingDevice', () => {
  it('reports busy on a second start', async () => {
    const device = new StubRecordingDevice();
    await device.start('/tmp/a.mp4');

    await expect(device.start('/tmp/b.mp4')).rejects.toBeInstanceOf(RecordingDeviceBusyError);
  });
});
