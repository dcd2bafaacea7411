import type { ParameterDefinition, Vec2 } from './puppetModel';
import { clamp } from './utils';

export type ParameterRef = number | string;

const normalizeAxis = (value: number, min: number, max: number): number => (
  max > min ? (value - min) / (max - min) : 0
);

/**
 * Current values of every parameter, stored flat as [x0, y0, x1, y1, ...].
 * Writes are clamped per axis; reads never fail for a known parameter.
 */
export class ParameterSystem {
  readonly definitions: readonly ParameterDefinition[];
  private readonly values: Float64Array;
  private readonly byName = new Map<string, number>();

  constructor(definitions: readonly ParameterDefinition[]) {
    this.definitions = definitions;
    this.values = new Float64Array(definitions.length * 2);
    definitions.forEach((definition, index) => {
      if (!this.byName.has(definition.name)) {
        this.byName.set(definition.name, index);
      }
    });
    this.reset();
  }

  get size(): number {
    return this.definitions.length;
  }

  find(ref: ParameterRef): number | undefined {
    if (typeof ref === 'string') {
      return this.byName.get(ref);
    }
    return Number.isInteger(ref) && ref >= 0 && ref < this.definitions.length ? ref : undefined;
  }

  /**
   * Clamps each axis into the declared range. NaN leaves the axis untouched;
   * an omitted `y` on a 2D parameter keeps the current `y`.
   */
  setValue(ref: ParameterRef, x: number, y?: number): boolean {
    const index = this.find(ref);
    if (index === undefined) {
      return false;
    }
    const { min, max, isVec2 } = this.definitions[index];
    if (!Number.isNaN(x)) {
      this.values[index * 2] = clamp(x, min.x, max.x);
    }
    if (isVec2 && y !== undefined && !Number.isNaN(y)) {
      this.values[index * 2 + 1] = clamp(y, min.y, max.y);
    }
    return true;
  }

  value(ref: ParameterRef): Vec2 | undefined {
    const index = this.find(ref);
    if (index === undefined) {
      return undefined;
    }
    return { x: this.values[index * 2], y: this.values[index * 2 + 1] };
  }

  /** Position of the current value inside the range, per axis in [0, 1]. */
  normalizedPosition(ref: ParameterRef): Vec2 | undefined {
    const index = this.find(ref);
    if (index === undefined) {
      return undefined;
    }
    const { min, max } = this.definitions[index];
    return {
      x: normalizeAxis(this.values[index * 2], min.x, max.x),
      y: normalizeAxis(this.values[index * 2 + 1], min.y, max.y),
    };
  }

  reset(): void {
    this.definitions.forEach((definition, index) => {
      const { min, max, defaults, isVec2 } = definition;
      this.values[index * 2] = clamp(defaults.x, min.x, max.x);
      this.values[index * 2 + 1] = isVec2 ? clamp(defaults.y, min.y, max.y) : min.y;
    });
  }
}
