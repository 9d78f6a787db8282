import { isRecord } from '../types/directives';
import type { MotionReference } from '../types/directives';

export function motionBasename(filePath: string): string {
  const parts = filePath.split(/[\\/]/);
  return parts[parts.length - 1] ?? '';
}

/**
 * Lookup from motion identifier (manifest file path or its basename) to the group and
 * position it was declared at. When two motions share an identifier the first one
 * registered keeps it.
 */
export class MotionIndex {
  private readonly groups = new Map<string, Array<string | null>>();
  private readonly lookup = new Map<string, MotionReference>();

  /**
   * Build from a model manifest: `FileReferences.Motions` maps group names to ordered
   * `{ File }` entries. Malformed groups or entries are skipped; positions still count
   * them so indices match what the runtime expects.
   */
  static fromManifest(manifest: unknown): MotionIndex {
    const index = new MotionIndex();
    if (!isRecord(manifest)) return index;
    const refs = manifest.FileReferences;
    const motions = isRecord(refs) ? refs.Motions : undefined;
    if (!isRecord(motions)) return index;

    for (const [group, entries] of Object.entries(motions)) {
      if (!Array.isArray(entries)) continue;
      const files = entries.map((entry: unknown) => (isRecord(entry) && typeof entry.File === 'string' ? entry.File : null));
      index.addGroup(group, files);
    }
    return index;
  }

  addGroup(group: string, files: Array<string | null>): void {
    if (!files.some((file) => file !== null)) return;
    this.groups.set(group, [...files]);
    files.forEach((file, position) => {
      if (file === null) return;
      this.register(file, { group, index: position });
      const base = motionBasename(file);
      if (base) this.register(base, { group, index: position });
    });
  }

  private register(identifier: string, reference: MotionReference): void {
    if (!this.lookup.has(identifier)) {
      this.lookup.set(identifier, reference);
    }
  }

  find(identifier: string): MotionReference | null {
    const found = this.lookup.get(identifier);
    return found ? { ...found } : null;
  }

  /** File declared at `index` in `group`, if any. */
  fileAt(group: string, index: number): string | null {
    return this.groups.get(group)?.[index] ?? null;
  }

  groupSize(group: string): number {
    return this.groups.get(group)?.length ?? 0;
  }

  groupNames(): string[] {
    return [...this.groups.keys()];
  }

  list(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const [group, files] of this.groups) {
      out[group] = files.filter((file): file is string => file !== null);
    }
    return out;
  }

  get isEmpty(): boolean {
    return this.groups.size === 0;
  }
}
