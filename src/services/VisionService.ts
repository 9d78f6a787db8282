import { createLogger, NAMESPACES } from '../logging';
import type { SettingsService, VisionConfig } from './SettingsService';

const visionLog = createLogger(NAMESPACES.services.vision);

export const DEFAULT_CAPTURE_INTERVAL_SECONDS = 10;
export const STOP_TIMEOUT_MS = 1500;

export interface CaptureResult {
  text: string;
  /** Path of a preview image written by the source, if any. */
  snapshotPath?: string;
  meta?: Record<string, unknown>;
}

/**
 * Screen capture and OCR backend. Returns null when nothing could be captured;
 * a rejection is logged and treated the same way.
 */
export interface CaptureSource {
  capture(config: VisionConfig): Promise<CaptureResult | null>;
}

export interface VisionSnapshot {
  /** Milliseconds since the epoch. */
  timestamp: number;
  text: string;
  snapshot?: string;
  meta: Record<string, unknown>;
}

export interface VisionEvent {
  type: 'vision';
  payload: VisionSnapshot;
}

export type VisionListener = (event: VisionEvent) => void;

/** One `start()`..`stop()` cycle. A loop only ever looks at its own run. */
interface LoopRun {
  stopped: boolean;
  wake: (() => void) | null;
  done: Promise<void>;
}

export interface VisionServiceOptions {
  now?: () => number;
}

export class VisionService {
  private listeners: VisionListener[] = [];
  private snapshots: VisionSnapshot[] = [];
  private config: VisionConfig;
  private run: LoopRun | null = null;
  private readonly now: () => number;

  constructor(
    private readonly source: CaptureSource,
    private readonly settings: SettingsService,
    options: VisionServiceOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.config = settings.loadVisionConfig();
  }

  registerListener(listener: VisionListener): void {
    if (!this.listeners.includes(listener)) this.listeners.push(listener);
  }

  unregisterListener(listener: VisionListener): void {
    this.listeners = this.listeners.filter((entry) => entry !== listener);
  }

  start(): void {
    if (this.run) return;
    const run: LoopRun = { stopped: false, wake: null, done: Promise.resolve() };
    run.done = this.runLoop(run).catch((error: unknown) => {
      visionLog('capture loop crashed: %o', error);
    });
    this.run = run;
    visionLog('vision loop started');
  }

  /**
   * Signal the loop and wait up to 1.5 s for an in-flight capture to finish. A capture
   * that completes later is dropped and its loop exits.
   */
  async stop(): Promise<void> {
    const run = this.run;
    this.run = null;
    if (run) {
      run.stopped = true;
      run.wake?.();
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, STOP_TIMEOUT_MS);
      });
      await Promise.race([run.done, timeout]);
      clearTimeout(timer);
    }
    visionLog('vision loop stopped');
  }

  isRunning(): boolean {
    return this.run !== null;
  }

  reloadConfig(): void {
    this.config = this.settings.loadVisionConfig();
  }

  getConfig(): VisionConfig {
    return this.config;
  }

  history(): VisionSnapshot[] {
    return [...this.snapshots];
  }

  /** Emit a synthetic capture without touching the history. */
  simulateDetection(text: string, meta: Record<string, unknown> = {}): void {
    this.emit({ timestamp: this.now(), text, meta });
  }

  private async runLoop(run: LoopRun): Promise<void> {
    while (!run.stopped) {
      const config = this.config;
      const interval = config.capture_interval > 0 ? config.capture_interval : DEFAULT_CAPTURE_INTERVAL_SECONDS;
      if (config.enabled) {
        const snapshot = await this.captureOnce(config);
        if (run.stopped) break;
        if (snapshot) {
          this.snapshots.push(snapshot);
          this.snapshots = config.max_history > 0 ? this.snapshots.slice(-config.max_history) : [];
          this.emit(snapshot);
        }
      }
      if (run.stopped) break;
      await this.sleep(run, interval * 1000);
    }
  }

  private async captureOnce(config: VisionConfig): Promise<VisionSnapshot | null> {
    try {
      const result = await this.source.capture(config);
      if (!result) return null;
      return {
        timestamp: this.now(),
        text: result.text.trim(),
        ...(result.snapshotPath ? { snapshot: result.snapshotPath } : {}),
        meta: result.meta ?? {}
      };
    } catch (error) {
      visionLog('capture failed: %o', error);
      return null;
    }
  }

  private sleep(run: LoopRun, ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        run.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      run.wake = done;
    });
  }

  private emit(snapshot: VisionSnapshot): void {
    const event: VisionEvent = { type: 'vision', payload: snapshot };
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        visionLog('vision listener failed: %o', error);
      }
    }
  }
}
