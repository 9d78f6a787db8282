import { lookupOperation } from './capabilities';

export interface Collider {
  readonly name: string;
  enabled: boolean;
  /** `model` is the live runtime object, needed by colliders that ask the runtime. */
  contains(x: number, y: number, model: object | null): boolean;
}

export type Point = [number, number];

/** Axis-aligned rectangle in screen coordinates. */
export class RectCollider implements Collider {
  enabled = true;

  constructor(
    readonly name: string,
    readonly x: number,
    readonly y: number,
    readonly width: number,
    readonly height: number
  ) {}

  contains(x: number, y: number): boolean {
    if (!this.enabled) return false;
    return x >= this.x && x <= this.x + this.width && y >= this.y && y <= this.y + this.height;
  }
}

export class CircleCollider implements Collider {
  enabled = true;

  constructor(
    readonly name: string,
    readonly cx: number,
    readonly cy: number,
    readonly r: number
  ) {}

  contains(x: number, y: number): boolean {
    if (!this.enabled) return false;
    const dx = x - this.cx;
    const dy = y - this.cy;
    return dx * dx + dy * dy <= this.r * this.r;
  }
}

export class PolygonCollider implements Collider {
  enabled = true;
  readonly points: Point[];

  constructor(readonly name: string, points: Iterable<Point>) {
    this.points = [...points];
  }

  // ray casting
  contains(x: number, y: number): boolean {
    if (!this.enabled || this.points.length < 3) return false;
    let crossings = 0;
    const n = this.points.length;
    for (let i = 0; i < n; i++) {
      const [x1, y1] = this.points[i];
      const [x2, y2] = this.points[(i + 1) % n];
      if (y1 > y !== y2 > y) {
        const xAtY = x1 + ((y - y1) * (x2 - x1)) / (y2 - y1);
        if (x < xAtY) crossings += 1;
      }
    }
    return crossings % 2 === 1;
  }
}

/** Delegates to the runtime's own hit areas through `HitTest(areaName, x, y)`. */
export class HitAreaCollider implements Collider {
  enabled = true;

  constructor(
    readonly name: string,
    readonly areaName: string
  ) {}

  contains(x: number, y: number, model: object | null): boolean {
    if (!this.enabled || !model) return false;
    const hitTest = lookupOperation(model, 'HitTest');
    if (!hitTest) return false;
    try {
      return Boolean(Reflect.apply(hitTest, model, [this.areaName, x, y]));
    } catch {
      return false;
    }
  }
}
