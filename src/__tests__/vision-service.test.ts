import { describe, it, expect, vi, afterEach } from 'vitest';
import { SettingsService } from '../services/SettingsService';
import type { VisionConfig } from '../services/SettingsService';
import { VisionService } from '../services/VisionService';
import type { CaptureResult, CaptureSource, VisionEvent } from '../services/VisionService';
import { makeTempDir } from './fixtures/fakeModel';

function settingsWith(config: Partial<VisionConfig>): SettingsService {
  const settings = new SettingsService(makeTempDir());
  settings.saveVisionConfig({ ...settings.loadVisionConfig(), ...config });
  return settings;
}

function countingSource(): CaptureSource & { count: number } {
  const source = {
    count: 0,
    async capture() {
      source.count += 1;
      return { text: ` shot ${source.count} `, meta: { width: 4, height: 3 } };
    }
  };
  return source;
}

/** First capture waits for `release`; later ones answer immediately. */
function stallingSource(): CaptureSource & { count: number; release: (result: CaptureResult) => void } {
  let release: (result: CaptureResult) => void = () => undefined;
  const first = new Promise<CaptureResult>((resolve) => {
    release = resolve;
  });
  const source = {
    count: 0,
    release: (result: CaptureResult) => release(result),
    capture(): Promise<CaptureResult | null> {
      source.count += 1;
      return source.count === 1 ? first : Promise.resolve({ text: `shot ${source.count}` });
    }
  };
  return source;
}

afterEach(() => {
  vi.useRealTimers();
});

describe('VisionService', () => {
  it('captures, emits and keeps a bounded history', async () => {
    const source = countingSource();
    let tick = 0;
    const service = new VisionService(source, settingsWith({ enabled: true, capture_interval: 0.01, max_history: 2 }), {
      now: () => ++tick
    });
    const events: VisionEvent[] = [];
    const thirdEvent = new Promise<void>((resolve) => {
      service.registerListener((event) => {
        events.push(event);
        if (events.length === 3) resolve();
      });
    });

    service.start();
    expect(service.isRunning()).toBe(true);
    await thirdEvent;
    await service.stop();

    expect(service.isRunning()).toBe(false);
    expect(events[0]).toEqual({ type: 'vision', payload: { timestamp: 1, text: 'shot 1', meta: { width: 4, height: 3 } } });
    expect(service.history().map((s) => s.text)).toEqual(['shot 2', 'shot 3']);
  });

  it('does not capture while disabled', async () => {
    vi.useFakeTimers();
    const source = countingSource();
    const service = new VisionService(source, settingsWith({ enabled: false, capture_interval: 1 }));
    service.start();
    await vi.advanceTimersByTimeAsync(5000);
    await service.stop();
    expect(source.count).toBe(0);
  });

  it('uses a ten second interval when the configured one is not positive', async () => {
    vi.useFakeTimers();
    const source = countingSource();
    const service = new VisionService(source, settingsWith({ enabled: true, capture_interval: 0 }));
    service.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(source.count).toBe(1);
    await vi.advanceTimersByTimeAsync(9999);
    expect(source.count).toBe(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(source.count).toBe(2);
    await service.stop();
  });

  it('stops waiting for a stuck capture after 1.5 seconds', async () => {
    vi.useFakeTimers();
    const stuck: CaptureSource = { capture: () => new Promise(() => undefined) };
    const service = new VisionService(stuck, settingsWith({ enabled: true }));
    service.start();

    let stopped = false;
    const stopping = service.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(1499);
    expect(stopped).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await stopping;
    expect(service.isRunning()).toBe(false);
  });

  it('drops a capture that finishes after stop', async () => {
    vi.useFakeTimers();
    const source = stallingSource();
    const service = new VisionService(source, settingsWith({ enabled: true, capture_interval: 1 }));
    const events: VisionEvent[] = [];
    service.registerListener((event) => events.push(event));

    service.start();
    const stopping = service.stop();
    await vi.advanceTimersByTimeAsync(1500);
    await stopping;

    source.release({ text: 'late' });
    await vi.advanceTimersByTimeAsync(5000);
    expect(source.count).toBe(1);
    expect(events).toEqual([]);
    expect(service.history()).toEqual([]);
  });

  it('runs a single loop after a restart while the old capture is still pending', async () => {
    vi.useFakeTimers();
    const source = stallingSource();
    const service = new VisionService(source, settingsWith({ enabled: true, capture_interval: 1, max_history: 50 }));

    service.start();
    const stopping = service.stop();
    await vi.advanceTimersByTimeAsync(1500);
    await stopping;

    service.start();
    source.release({ text: 'late' });
    await vi.advanceTimersByTimeAsync(10_000);
    await service.stop();

    // one immediate capture on restart plus one per second
    expect(source.count).toBe(12);
    expect(service.history().map((s) => s.text)).not.toContain('late');
    expect(service.history()).toHaveLength(11);
  });

  it('isolates listener errors and skips history for simulated detections', () => {
    const service = new VisionService(countingSource(), settingsWith({}), { now: () => 42 });
    const received: VisionEvent[] = [];
    service.registerListener(() => {
      throw new Error('listener bug');
    });
    service.registerListener((event) => received.push(event));

    service.simulateDetection('hello', { source: 'test' });

    expect(received).toEqual([{ type: 'vision', payload: { timestamp: 42, text: 'hello', meta: { source: 'test' } } }]);
    expect(service.history()).toEqual([]);
  });

  it('picks up config changes on reload', () => {
    const settings = settingsWith({ enabled: false });
    const service = new VisionService(countingSource(), settings);
    settings.saveVisionConfig({ ...service.getConfig(), enabled: true });
    service.reloadConfig();
    expect(service.getConfig().enabled).toBe(true);
  });
});
