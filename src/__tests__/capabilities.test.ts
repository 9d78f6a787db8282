import { describe, it, expect } from 'vitest';
import { CapabilityCache, isArityError, lookupOperation } from '../avatar/capabilities';
import { fakeModel, withArity } from './fixtures/fakeModel';

const setterCandidates = (id: string, value: number, blend: number) => [
  { name: 'SetParameterValue', args: [id, value, blend] },
  { name: 'SetParameterValue', args: [id, value] }
];

describe('CapabilityCache', () => {
  it('falls back to a shorter arity and remembers it', () => {
    const { model, calls } = fakeModel({ SetParameterValue: withArity(2) });
    const cache = new CapabilityCache();

    const first = cache.call(model, 'setParameter', setterCandidates('ParamAngleX', 10, 0.5));
    expect(first).toEqual({ found: true, name: 'SetParameterValue', value: undefined });
    expect(cache.get('setParameter')).toEqual({ name: 'SetParameterValue', arity: 2 });

    cache.call(model, 'setParameter', setterCandidates('ParamAngleY', 5, 1));
    expect(calls.map((c) => c.args)).toEqual([
      ['ParamAngleX', 10, 0.5],
      ['ParamAngleX', 10],
      ['ParamAngleY', 5]
    ]);
  });

  it('caches absence until cleared', () => {
    const target: Record<string, unknown> = {};
    const cache = new CapabilityCache();
    const candidates = [{ name: 'Drag', args: [1, 2] }];

    expect(cache.call(target, 'drag', candidates)).toEqual({ found: false });
    expect(cache.get('drag')).toBeNull();

    let dragged = 0;
    target.Drag = () => {
      dragged += 1;
    };
    expect(cache.call(target, 'drag', candidates)).toEqual({ found: false });
    expect(dragged).toBe(0);

    cache.clear();
    expect(cache.call(target, 'drag', candidates).found).toBe(true);
    expect(dragged).toBe(1);
  });

  it('reports errors that are not about arity without trying further candidates', () => {
    const { model, calls } = fakeModel({
      StartMotion: () => {
        throw new Error('motion busy');
      },
      StartMotionByName: withArity(2)
    });
    const cache = new CapabilityCache();
    const outcome = cache.call(model, 'startMotion', [
      { name: 'StartMotion', args: ['Idle', 0, 3] },
      { name: 'StartMotionByName', args: ['Idle', 'idle.motion'] }
    ]);

    expect(outcome.found).toBe(true);
    expect(outcome.found && outcome.error).toBeInstanceOf(Error);
    expect(calls.map((c) => c.name)).toEqual(['StartMotion']);
    expect(cache.get('startMotion')).toEqual({ name: 'StartMotion', arity: 3 });
  });

  it('probes again when the cached binding starts rejecting its arity', () => {
    let arity = 2;
    const target = {
      SetParameterValue: (...args: unknown[]) => {
        if (args.length !== arity) throw new TypeError('bad arity');
      }
    };
    const cache = new CapabilityCache();
    cache.call(target, 'setParameter', setterCandidates('A', 1, 1));
    expect(cache.get('setParameter')).toEqual({ name: 'SetParameterValue', arity: 2 });

    arity = 3;
    expect(cache.call(target, 'setParameter', setterCandidates('A', 1, 1)).found).toBe(true);
    expect(cache.get('setParameter')).toEqual({ name: 'SetParameterValue', arity: 3 });
  });
});

describe('helpers', () => {
  it('finds only callable members', () => {
    expect(lookupOperation({ Update: () => 1 }, 'Update')).toBeTypeOf('function');
    expect(lookupOperation({ Update: 1 }, 'Update')).toBeNull();
    expect(lookupOperation({}, 'Update')).toBeNull();
  });

  it('treats TypeError as the arity signal', () => {
    expect(isArityError(new TypeError('x'))).toBe(true);
    expect(isArityError(new RangeError('x'))).toBe(false);
  });
});
