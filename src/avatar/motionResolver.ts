import { createLogger, NAMESPACES } from '../logging';
import { DEFAULT_MOTION_PRIORITY } from './ModelManager';
import type { ModelManager } from './ModelManager';

const motionLog = createLogger(NAMESPACES.avatar.motion);

export interface MotionRequest {
  group?: string;
  index?: number;
  file?: string;
  identifier?: string;
  priority: number;
}

export type MotionStep = 'group-index' | 'file' | 'identifier' | 'random-in-group' | 'random-any';

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value ? value : undefined;
}

function toInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string' && value.trim() && Number.isFinite(Number(value))) {
    return Math.trunc(Number(value));
  }
  return undefined;
}

export function parseMotionRequest(payload: Record<string, unknown>): MotionRequest {
  return {
    group: nonEmptyString(payload.group),
    index: toInteger(payload.index),
    file: nonEmptyString(payload.file) ?? nonEmptyString(payload.path) ?? nonEmptyString(payload.motionFile),
    identifier:
      nonEmptyString(payload.motion) ??
      nonEmptyString(payload.name) ??
      nonEmptyString(payload.identifier) ??
      nonEmptyString(payload.value),
    priority: toInteger(payload.priority) ?? DEFAULT_MOTION_PRIORITY
  };
}

/**
 * Play the best matching motion:
 * group+index, then file reference, then identifier (only inside the requested group
 * when one was named), then a random motion in the group, then any random motion.
 * Returns the step that started something, or null when every step was rejected.
 */
export function resolveMotion(manager: ModelManager, request: MotionRequest): MotionStep | null {
  const { group, index, file, identifier, priority } = request;

  if (group && index !== undefined && manager.startMotion(group, index, priority)) {
    return 'group-index';
  }

  for (const [step, candidate] of [
    ['file', file],
    ['identifier', identifier]
  ] as const) {
    if (!candidate) continue;
    const reference = manager.findMotion(candidate);
    if (!reference) continue;
    if (group && reference.group !== group) {
      motionLog('%s %s belongs to group %s, not %s; skipping', step, candidate, reference.group, group);
      continue;
    }
    if (manager.startMotion(reference.group, reference.index, priority)) return step;
  }

  if (group) {
    if (manager.startRandomMotion(group, priority)) return 'random-in-group';
  } else if (manager.startRandomMotion(undefined, priority)) {
    return 'random-any';
  }

  motionLog('no motion could be started for %o', request);
  return null;
}
