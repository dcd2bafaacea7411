import {
  zeroTransformOffset,
  type BindingDefinition,
  type BindingGrid,
  type TransformOffset,
  type Vec2,
} from './puppetModel';
import type { ParameterSystem } from './parameters';
import { clamp } from './utils';

export interface AxisLocation {
  /** Lower breakpoint of the bracketing interval. */
  index: number;
  /** Fraction inside the interval; exactly 0 or 1 on a breakpoint. */
  t: number;
}

export interface BindingContributions {
  transforms: Map<number, TransformOffset>;
  /** Per-vertex displacement, flat [x0, y0, x1, y1, ...]. */
  deforms: Map<number, Float64Array>;
}

export const locateOnAxis = (points: readonly number[], position: number): AxisLocation => {
  const last = points.length - 1;
  if (last <= 0) {
    return { index: 0, t: 0 };
  }
  const p = Number.isNaN(position) ? 0 : clamp(position, 0, 1);
  if (p <= points[0]) {
    return { index: 0, t: 0 };
  }
  if (p >= points[last]) {
    return { index: last - 1, t: 1 };
  }

  for (let index = 0; index < last; index += 1) {
    const lower = points[index];
    const upper = points[index + 1];
    if (p === lower) {
      return { index, t: 0 };
    }
    if (p < upper) {
      return { index, t: (p - lower) / (upper - lower) };
    }
  }
  return { index: last - 1, t: 1 };
};

/** Linear blend that returns the endpoints themselves at t = 0 and t = 1. */
export const lerpExact = (a: number, b: number, t: number): number => {
  if (t === 0) {
    return a;
  }
  if (t === 1) {
    return b;
  }
  return a + (b - a) * t;
};

const upperIndex = (location: AxisLocation, count: number): number => (
  Math.min(location.index + 1, count - 1)
);

const corners = <T>(grid: BindingGrid<T>, x: AxisLocation, y: AxisLocation): [T, T, T, T] => {
  const x1 = upperIndex(x, grid.length);
  const y1 = upperIndex(y, grid[0].length);
  return [grid[x.index][y.index], grid[x1][y.index], grid[x.index][y1], grid[x1][y1]];
};

/** Bilinear over the bracketing cell; a 1D grid degenerates to linear since y.t is 0. */
export const interpolateScalar = (grid: BindingGrid<number>, x: AxisLocation, y: AxisLocation): number => {
  const [v00, v10, v01, v11] = corners(grid, x, y);
  const bottom = lerpExact(v00, v10, x.t);
  if (y.t === 0) {
    return bottom;
  }
  return lerpExact(bottom, lerpExact(v01, v11, x.t), y.t);
};

export const interpolateVec2 = (grid: BindingGrid<Vec2>, x: AxisLocation, y: AxisLocation): Vec2 => {
  const [v00, v10, v01, v11] = corners(grid, x, y);
  return {
    x: lerpExact(lerpExact(v00.x, v10.x, x.t), lerpExact(v01.x, v11.x, x.t), y.t),
    y: lerpExact(lerpExact(v00.y, v10.y, x.t), lerpExact(v01.y, v11.y, x.t), y.t),
  };
};

/** Adds the interpolated displacement of every vertex into `out`. */
export const accumulateDeform = (
  grid: BindingGrid<readonly Vec2[]>,
  x: AxisLocation,
  y: AxisLocation,
  out: Float64Array
): Float64Array => {
  const [c00, c10, c01, c11] = corners(grid, x, y);
  c00.forEach((v00, vertex) => {
    const v10 = c10[vertex];
    const v01 = c01[vertex];
    const v11 = c11[vertex];
    out[vertex * 2] += lerpExact(lerpExact(v00.x, v10.x, x.t), lerpExact(v01.x, v11.x, x.t), y.t);
    out[vertex * 2 + 1] += lerpExact(lerpExact(v00.y, v10.y, x.t), lerpExact(v01.y, v11.y, x.t), y.t);
  });
  return out;
};

export const transformOffsetFor = (offsets: Map<number, TransformOffset>, node: number): TransformOffset => {
  const existing = offsets.get(node);
  if (existing) {
    return existing;
  }
  const created = zeroTransformOffset();
  offsets.set(node, created);
  return created;
};

const applyBinding = (
  contributions: BindingContributions,
  binding: BindingDefinition,
  x: AxisLocation,
  y: AxisLocation
): void => {
  switch (binding.property) {
    case 'rotation':
      transformOffsetFor(contributions.transforms, binding.node).rotation += interpolateScalar(binding.values, x, y);
      return;
    case 'opacity':
      transformOffsetFor(contributions.transforms, binding.node).opacity += interpolateScalar(binding.values, x, y);
      return;
    case 'translation': {
      const value = interpolateVec2(binding.values, x, y);
      const offset = transformOffsetFor(contributions.transforms, binding.node);
      offset.translation.x += value.x;
      offset.translation.y += value.y;
      return;
    }
    case 'scale': {
      const value = interpolateVec2(binding.values, x, y);
      const offset = transformOffsetFor(contributions.transforms, binding.node);
      offset.scale.x += value.x;
      offset.scale.y += value.y;
      return;
    }
    case 'vertexDeform': {
      const vertexCount = binding.values[0][0].length;
      let deform = contributions.deforms.get(binding.node);
      if (!deform) {
        deform = new Float64Array(vertexCount * 2);
        contributions.deforms.set(binding.node, deform);
      }
      accumulateDeform(binding.values, x, y, deform);
      return;
    }
  }
};

/**
 * Interpolates every binding at its parameter's current position and sums
 * the results per node and property. Parameters are visited in declaration
 * order so the summation order is fixed.
 */
export const evaluateBindings = (parameters: ParameterSystem): BindingContributions => {
  const contributions: BindingContributions = {
    transforms: new Map(),
    deforms: new Map(),
  };
  parameters.definitions.forEach((definition, index) => {
    if (!definition.bindings.length) {
      return;
    }
    const position = parameters.normalizedPosition(index);
    if (!position) {
      return;
    }
    const x = locateOnAxis(definition.axisPoints[0], position.x);
    const y = locateOnAxis(definition.axisPoints[1], position.y);
    definition.bindings.forEach((binding) => applyBinding(contributions, binding, x, y));
  });
  return contributions;
};
