import * as fs from 'fs/promises';
import { createLogger, NAMESPACES } from '../logging';
import type { MotionReference } from '../types/directives';
import { CapabilityCache } from './capabilities';
import type { CandidateCall, CallOutcome } from './capabilities';
import { HitAreaCollider } from './collision';
import type { Collider } from './collision';
import { MotionIndex } from './motionIndex';

const modelLog = createLogger(NAMESPACES.avatar.model);

/**
 * Creates the runtime object for a model manifest. The object's methods are probed by
 * name (`SetParameterValue`, `StartMotion`, `Drag`, ...) rather than through a fixed
 * interface, because runtime bindings disagree on naming and arity.
 */
export type ModelFactory = (manifestPath: string) => object | Promise<object>;

export type ClickHandler = (colliderName: string, x: number, y: number) => void;

export interface ParameterOptions {
  blend?: number;
  additive?: boolean;
}

export interface ModelManagerOptions {
  /** Source of randomness for random motion picks; defaults to Math.random. */
  random?: () => number;
}

export const DEFAULT_MOTION_PRIORITY = 3;
export const MIN_SCALE = 0.1;
export const MAX_SCALE = 5.0;

const SETTER_NAMES = ['SetParameterValue', 'SetParamFloat', 'SetParamValue', 'SetParam'];
const GETTER_NAMES = ['GetParameterValue', 'GetParamFloat', 'GetParamValue', 'GetParam'];

export class ModelManager {
  private model: object | null = null;
  private readonly capabilities = new CapabilityCache();
  private motionIndex = new MotionIndex();
  private colliders: Collider[] = [];
  private clickHandlers: Array<{ collider: string; handler: ClickHandler }> = [];
  private readonly random: () => number;
  private modelX = 0;
  private modelY = 0;
  private modelScale = 1;

  constructor(
    private readonly factory: ModelFactory,
    options: ModelManagerOptions = {}
  ) {
    this.random = options.random ?? Math.random;
  }

  get isLoaded(): boolean {
    return this.model !== null;
  }

  /** Load a model manifest; capability probes and the motion index start fresh. */
  async loadModel(manifestPath: string): Promise<void> {
    const model = await this.factory(manifestPath);
    let manifest: unknown = null;
    try {
      manifest = JSON.parse(await fs.readFile(manifestPath, 'utf-8'));
    } catch (error) {
      modelLog('failed to read motion metadata from %s: %o', manifestPath, error);
    }
    this.attachModel(model, manifest);
    modelLog('loaded model %s (%d motion groups)', manifestPath, this.motionIndex.groupNames().length);
  }

  /** Use an already constructed runtime object together with its parsed manifest. */
  attachModel(model: object, manifest: unknown): void {
    this.model = model;
    this.capabilities.clear();
    this.motionIndex = MotionIndex.fromManifest(manifest);
    this.colliders = [new HitAreaCollider('head', 'Head'), new HitAreaCollider('body', 'Body')];
  }

  dispose(): void {
    const model = this.model;
    if (model) {
      this.capabilities.call(model, 'release', [{ name: 'Release', args: [] }, { name: 'dispose', args: [] }]);
    }
    this.model = null;
    this.capabilities.clear();
    this.motionIndex = new MotionIndex();
    modelLog('model disposed');
  }

  private call(operation: string, candidates: CandidateCall[]): CallOutcome {
    if (!this.model) return { found: false };
    return this.capabilities.call(this.model, operation, candidates);
  }

  /** Per-frame hook for the render loop: push the transform, then update and draw. */
  update(): void {
    if (!this.model) return;
    this.call('setPosition', [{ name: 'SetPosition', args: [this.modelX, this.modelY] }]);
    this.call('setScale', [{ name: 'SetScale', args: [this.modelScale, this.modelScale] }]);
    this.call('update', [{ name: 'Update', args: [] }]);
    this.call('draw', [{ name: 'Draw', args: [] }]);
  }

  resize(width: number, height: number): void {
    this.call('resize', [{ name: 'Resize', args: [width, height] }]);
  }

  /** Window-relative pointer position; the runtime turns it into a look-at target. */
  drag(x: number, y: number): void {
    this.call('drag', [{ name: 'Drag', args: [x, y] }]);
  }

  // --- Transform ---

  setPosition(x: number, y: number): void {
    this.modelX = x;
    this.modelY = y;
  }

  getPosition(): [number, number] {
    return [this.modelX, this.modelY];
  }

  translate(dx: number, dy: number): void {
    this.modelX += dx;
    this.modelY += dy;
  }

  setScale(scale: number): void {
    this.modelScale = Math.max(MIN_SCALE, Math.min(MAX_SCALE, scale));
  }

  getScale(): number {
    return this.modelScale;
  }

  // --- Parameters ---

  setParameterValue(id: string, value: number, blend = 1): boolean {
    const candidates: CandidateCall[] = [];
    for (const name of SETTER_NAMES) {
      candidates.push({ name, args: [id, value, blend] }, { name, args: [id, value] });
    }
    candidates.push({ name: 'UpdateParameter', args: [id, value] });
    return this.call('setParameter', candidates).found;
  }

  /** Current value of a parameter, or 0 when no getter works. */
  getParameterValue(id: string): number {
    const outcome = this.call(
      'getParameter',
      GETTER_NAMES.map((name) => ({ name, args: [id] }))
    );
    if (!outcome.found || outcome.error !== undefined) return 0;
    const value = Number(outcome.value);
    return Number.isFinite(value) ? value : 0;
  }

  addParameterValue(id: string, delta: number): boolean {
    return this.call('addParameter', [{ name: 'AddParameterValue', args: [id, delta] }]).found;
  }

  /**
   * Apply a parameter map. Additive mode adds `value * blend`, falling back to
   * read-then-write when the runtime has no additive operation. Returns true when at
   * least one parameter went through.
   */
  applyParameters(parameters: Record<string, number>, options: ParameterOptions = {}): boolean {
    if (!this.model) return false;
    const blend = options.blend ?? 1;
    let applied = false;
    for (const [id, raw] of Object.entries(parameters)) {
      const value = Number(raw);
      if (!Number.isFinite(value)) continue;
      let success: boolean;
      if (options.additive) {
        const delta = value * blend;
        success = this.addParameterValue(id, delta);
        if (!success) {
          success = this.setParameterValue(id, this.getParameterValue(id) + delta);
        }
      } else {
        success = this.setParameterValue(id, value, blend);
      }
      applied = applied || success;
    }
    return applied;
  }

  // --- Motions ---

  /** Start a motion by group and position. False when the runtime rejects it. */
  startMotion(group: string, index = 0, priority = DEFAULT_MOTION_PRIORITY): boolean {
    if (!this.model) return false;
    const motionIndex = Number.isFinite(index) ? Math.max(0, Math.trunc(index)) : 0;

    const direct = this.call('startMotion', [{ name: 'StartMotion', args: [group, motionIndex, priority] }]);
    if (direct.found) return direct.error === undefined;

    const file = this.motionIndex.fileAt(group, motionIndex);
    if (file) {
      const byName = this.call('startMotionByName', [{ name: 'StartMotionByName', args: [group, file] }]);
      if (byName.found) return byName.error === undefined;
    }
    modelLog('no way to start motion %s[%d]', group, motionIndex);
    return false;
  }

  findMotion(identifier: string): MotionReference | null {
    return this.motionIndex.find(identifier);
  }

  /** Random motion from `group`, or from any group when none is given. */
  startRandomMotion(group?: string, priority = DEFAULT_MOTION_PRIORITY): boolean {
    if (!this.model) return false;
    if (group) {
      const native = this.call('startRandomMotion', [
        { name: 'StartRandomMotion', args: [group, priority] },
        { name: 'StartRandomMotion', args: [group] }
      ]);
      if (native.found) return native.error === undefined;
      const size = this.motionIndex.groupSize(group);
      const index = size > 0 ? Math.floor(this.random() * size) : 0;
      return this.startMotion(group, index, priority);
    }

    const groups = this.motionIndex.groupNames();
    if (groups.length > 0) {
      const picked = groups[Math.floor(this.random() * groups.length)];
      return this.startRandomMotion(picked, priority);
    }
    const anyGroup = this.call('startRandomMotionAnyGroup', [
      { name: 'StartRandomMotion', args: [] }
    ]);
    return anyGroup.found && anyGroup.error === undefined;
  }

  listMotions(): Record<string, string[]> {
    return this.motionIndex.list();
  }

  // --- Hit testing ---

  registerCollider(collider: Collider): void {
    this.colliders.push(collider);
  }

  clearColliders(): void {
    this.colliders = [];
  }

  queryColliders(x: number, y: number): string[] {
    const names: string[] = [];
    for (const collider of this.colliders) {
      try {
        if (collider.contains(x, y, this.model)) names.push(collider.name);
      } catch (error) {
        modelLog('collider %s failed: %o', collider.name, error);
      }
    }
    return names;
  }

  addClickHandler(collider: string, handler: ClickHandler): void {
    this.clickHandlers.push({ collider, handler });
  }

  removeClickHandler(collider: string, handler: ClickHandler): void {
    this.clickHandlers = this.clickHandlers.filter((entry) => entry.collider !== collider || entry.handler !== handler);
  }

  /** Dispatch a click to handlers of every collider it hits. True when anything was hit. */
  handleClick(x: number, y: number): boolean {
    const hits = this.queryColliders(x, y);
    if (hits.length === 0) return false;
    for (const { collider, handler } of [...this.clickHandlers]) {
      if (!hits.includes(collider)) continue;
      try {
        handler(collider, x, y);
      } catch (error) {
        modelLog('click handler for %s failed: %o', collider, error);
      }
    }
    return true;
  }

  /** Head taps play a random `Tap` motion, body taps a random `Tap@Body` one. */
  attachDefaultTapHandlers(): void {
    const playTap: ClickHandler = (name) => {
      this.startRandomMotion(name === 'head' ? 'Tap' : 'Tap@Body');
    };
    this.addClickHandler('head', playTap);
    this.addClickHandler('body', playTap);
  }

  /** True when the point is over any drawable part of the model. */
  hitTest(x: number, y: number): boolean {
    const hitPart = this.call('hitPart', [{ name: 'HitPart', args: [x, y] }]);
    if (hitPart.found) {
      const value = hitPart.value;
      return Array.isArray(value) ? value.length > 0 : Boolean(value);
    }
    const areaHit = this.call('isAreaHit', [{ name: 'IsAreaHit', args: ['Head', x, y] }]);
    return areaHit.found && Boolean(areaHit.value);
  }
}
