import { createLogger, NAMESPACES } from '../logging';

const capabilityLog = createLogger(NAMESPACES.avatar.capabilities);

export type Operation = (...args: unknown[]) => unknown;

/** One way of performing a logical operation: a method name and the arguments to pass. */
export interface CandidateCall {
  name: string;
  args: unknown[];
}

export interface ResolvedCapability {
  name: string;
  arity: number;
}

export type CallOutcome =
  | { found: true; name: string; value: unknown; error?: undefined }
  | { found: true; name: string; value?: undefined; error: unknown }
  | { found: false };

export function isOperation(value: unknown): value is Operation {
  return typeof value === 'function';
}

export function lookupOperation(target: object, name: string): Operation | null {
  const value: unknown = Reflect.get(target, name);
  return isOperation(value) ? value : null;
}

/**
 * Bindings reject a wrong argument count with a TypeError; that is the only signal
 * that another arity or method should be tried.
 */
export function isArityError(error: unknown): boolean {
  return error instanceof TypeError;
}

type Attempt = { kind: 'arity' } | { kind: 'done'; value: unknown } | { kind: 'raised'; error: unknown };

function attempt(target: object, fn: Operation, args: unknown[]): Attempt {
  try {
    return { kind: 'done', value: Reflect.apply(fn, target, args) };
  } catch (error) {
    if (isArityError(error)) return { kind: 'arity' };
    return { kind: 'raised', error };
  }
}

/**
 * Remembers which concrete method (and arity) serves each logical operation on the
 * currently loaded model. `null` records that nothing matched. Clear it whenever the
 * model is replaced or disposed.
 */
export class CapabilityCache {
  private readonly entries = new Map<string, ResolvedCapability | null>();

  get(operation: string): ResolvedCapability | null | undefined {
    return this.entries.get(operation);
  }

  has(operation: string): boolean {
    return this.entries.has(operation);
  }

  clear(): void {
    if (this.entries.size > 0) {
      capabilityLog('clearing %d cached capability entries', this.entries.size);
    }
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Run `operation` on `target`, trying `candidates` in order. The first candidate that
   * does not fail with an arity error wins and is cached, even when it threw something
   * else (the throw is reported in the outcome).
   */
  call(target: object, operation: string, candidates: CandidateCall[]): CallOutcome {
    const cached = this.entries.get(operation);
    if (cached === null) return { found: false };

    if (cached) {
      const candidate = candidates.find((c) => c.name === cached.name && c.args.length === cached.arity);
      const fn = candidate ? lookupOperation(target, candidate.name) : null;
      if (candidate && fn) {
        const result = attempt(target, fn, candidate.args);
        if (result.kind !== 'arity') return this.toOutcome(operation, candidate.name, result);
      }
      capabilityLog('cached capability %s -> %s/%d no longer usable, probing again', operation, cached.name, cached.arity);
      this.entries.delete(operation);
    }

    for (const candidate of candidates) {
      const fn = lookupOperation(target, candidate.name);
      if (!fn) continue;
      const result = attempt(target, fn, candidate.args);
      if (result.kind === 'arity') {
        capabilityLog('%s rejected %d argument(s) for %s', candidate.name, candidate.args.length, operation);
        continue;
      }
      this.entries.set(operation, { name: candidate.name, arity: candidate.args.length });
      capabilityLog('resolved %s -> %s/%d', operation, candidate.name, candidate.args.length);
      return this.toOutcome(operation, candidate.name, result);
    }

    capabilityLog('no capability found for %s', operation);
    this.entries.set(operation, null);
    return { found: false };
  }

  private toOutcome(operation: string, name: string, result: Exclude<Attempt, { kind: 'arity' }>): CallOutcome {
    if (result.kind === 'raised') {
      capabilityLog('%s (%s) raised: %o', operation, name, result.error);
      return { found: true, name, error: result.error };
    }
    return { found: true, name, value: result.value };
  }
}
