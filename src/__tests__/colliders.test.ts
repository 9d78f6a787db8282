import { describe, it, expect } from 'vitest';
import { CircleCollider, HitAreaCollider, PolygonCollider, RectCollider } from '../avatar/collision';
import { ModelManager } from '../avatar/ModelManager';

describe('colliders', () => {
  it('rect includes its edges and respects enabled', () => {
    const rect = new RectCollider('box', 0, 0, 10, 20);
    expect(rect.contains(10, 20)).toBe(true);
    expect(rect.contains(10.5, 5)).toBe(false);
    rect.enabled = false;
    expect(rect.contains(5, 5)).toBe(false);
  });

  it('circle measures distance from its centre', () => {
    const circle = new CircleCollider('dot', 5, 5, 2);
    expect(circle.contains(7, 5)).toBe(true);
    expect(circle.contains(7, 7)).toBe(false);
  });

  it('polygon uses ray casting', () => {
    const triangle = new PolygonCollider('tri', [
      [0, 0],
      [10, 0],
      [0, 10]
    ]);
    expect(triangle.contains(2, 2)).toBe(true);
    expect(triangle.contains(8, 8)).toBe(false);
    expect(new PolygonCollider('line', [[0, 0], [1, 1]]).contains(0, 0)).toBe(false);
  });

  it('hit-area colliders ask the runtime', () => {
    const collider = new HitAreaCollider('head', 'Head');
    const model = { HitTest: (area: string, x: number) => area === 'Head' && x > 0 };
    expect(collider.contains(1, 1, model)).toBe(true);
    expect(collider.contains(-1, 1, model)).toBe(false);
    expect(collider.contains(1, 1, null)).toBe(false);
    expect(
      collider.contains(1, 1, {
        HitTest: () => {
          throw new Error('runtime gone');
        }
      })
    ).toBe(false);
  });

  it('model manager reports every collider under the point', () => {
    const manager = new ModelManager(() => ({}));
    manager.attachModel({}, null);
    manager.clearColliders();
    manager.registerCollider(new RectCollider('a', 0, 0, 10, 10));
    manager.registerCollider(new CircleCollider('b', 5, 5, 1));
    manager.registerCollider(new RectCollider('c', 20, 20, 1, 1));
    expect(manager.queryColliders(5, 5)).toEqual(['a', 'b']);
  });
});
