import { describe, expect, it } from 'vitest';
import {
  accumulateDeform,
  evaluateBindings,
  interpolateScalar,
  interpolateVec2,
  lerpExact,
  locateOnAxis,
} from './bindingEngine';
import { ParameterSystem } from './parameters';
import { scalarParameter } from './fixtures/rigs';
import type { ParameterDefinition } from './puppetModel';

describe('bindingEngine', () => {
  it('locates a position on an uneven axis', () => {
    const points = [0, 0.25, 1];
    expect(locateOnAxis(points, 0)).toEqual({ index: 0, t: 0 });
    expect(locateOnAxis(points, 0.125)).toEqual({ index: 0, t: 0.5 });
    expect(locateOnAxis(points, 0.25)).toEqual({ index: 1, t: 0 });
    expect(locateOnAxis(points, 0.625)).toEqual({ index: 1, t: 0.5 });
    expect(locateOnAxis(points, 1)).toEqual({ index: 1, t: 1 });
  });

  it('clamps positions outside the axis and collapses single-point axes', () => {
    expect(locateOnAxis([0.2, 0.8], 0)).toEqual({ index: 0, t: 0 });
    expect(locateOnAxis([0.2, 0.8], 2)).toEqual({ index: 0, t: 1 });
    expect(locateOnAxis([0.2, 0.8], Number.NaN)).toEqual({ index: 0, t: 0 });
    expect(locateOnAxis([0], 0.7)).toEqual({ index: 0, t: 0 });
  });

  it('returns breakpoint values without rounding', () => {
    expect(lerpExact(0.1, 0.7, 0)).toBe(0.1);
    expect(lerpExact(0.1, 0.7, 1)).toBe(0.7);
    expect(lerpExact(2, 4, 0.25)).toBe(2.5);
  });

  it('interpolates bilinearly inside a cell', () => {
    const grid = [[0, 10], [20, 30]];
    const half = { index: 0, t: 0.5 };
    expect(interpolateScalar(grid, half, half)).toBe(15);
    expect(interpolateScalar(grid, { index: 0, t: 1 }, { index: 0, t: 0 })).toBe(20);
    expect(interpolateVec2(
      [[{ x: 0, y: 0 }, { x: 0, y: 4 }], [{ x: 8, y: 0 }, { x: 8, y: 4 }]],
      { index: 0, t: 0.25 },
      { index: 0, t: 0.5 }
    )).toEqual({ x: 2, y: 2 });
  });

  it('adds deform vectors into an existing buffer', () => {
    const out = Float64Array.from([1, 1, 1, 1]);
    accumulateDeform(
      [[[{ x: 0, y: 0 }, { x: 0, y: 0 }]], [[{ x: 4, y: -2 }, { x: 0, y: 6 }]]],
      { index: 0, t: 0.5 },
      { index: 0, t: 0 },
      out
    );
    expect(Array.from(out)).toEqual([3, 0, 1, 4]);
  });

  it('sums every parameter bound to the same property', () => {
    const system = new ParameterSystem([
      scalarParameter(1, 'Tilt', [{ node: 2, property: 'rotation', values: [[0], [10]] }]),
      scalarParameter(2, 'Lean', [{ node: 2, property: 'rotation', values: [[0], [30]] }]),
    ]);
    system.setValue('Tilt', 0.5);
    system.setValue('Lean', 0.5);
    const { transforms, deforms } = evaluateBindings(system);
    expect(transforms.get(2)?.rotation).toBe(20);
    expect(deforms.size).toBe(0);
  });

  it('sums deforms from several parameters per vertex', () => {
    const zero = [{ x: 0, y: 0 }, { x: 0, y: 0 }];
    const system = new ParameterSystem([
      scalarParameter(1, 'Squint', [{
        node: 1,
        property: 'vertexDeform',
        values: [[zero], [[{ x: 1, y: 0 }, { x: 0, y: 2 }]]],
      }]),
      scalarParameter(2, 'Frown', [{
        node: 1,
        property: 'vertexDeform',
        values: [[zero], [[{ x: 3, y: 0 }, { x: 0, y: -1 }]]],
      }]),
    ]);
    system.setValue('Squint', 0.5);
    system.setValue('Frown', 1);
    const { deforms, transforms } = evaluateBindings(system);
    expect(Array.from(deforms.get(1) ?? [])).toEqual([3.5, 0, 0, 0]);
    expect(transforms.size).toBe(0);
  });

  it('blends a two-axis deform inside a cell and returns corners exactly', () => {
    const pucker: ParameterDefinition = {
      uuid: 4,
      name: 'Pucker',
      isVec2: true,
      min: { x: 0, y: 0 },
      max: { x: 1, y: 1 },
      defaults: { x: 0, y: 0 },
      axisPoints: [[0, 1], [0, 1]],
      bindings: [{
        node: 2,
        property: 'vertexDeform',
        values: [
          [[{ x: 0, y: 0 }], [{ x: 0, y: 8 }]],
          [[{ x: 4, y: 0 }], [{ x: 0.3, y: 0.7 }]],
        ],
      }],
    };
    const system = new ParameterSystem([pucker]);

    system.setValue('Pucker', 0.5, 0.5);
    const inside = evaluateBindings(system).deforms.get(2);
    // x: bottom 2, top 0.15, blended 1.075; y: bottom 0, top 4.35, blended 2.175.
    expect(inside?.[0]).toBeCloseTo(1.075, 12);
    expect(inside?.[1]).toBeCloseTo(2.175, 12);

    system.setValue('Pucker', 1, 1);
    expect(Array.from(evaluateBindings(system).deforms.get(2) ?? [])).toEqual([0.3, 0.7]);
  });

  it('reproduces the authored value at a breakpoint', () => {
    const offset: ParameterDefinition = {
      uuid: 3,
      name: 'Offset',
      isVec2: true,
      min: { x: 0, y: 0 },
      max: { x: 1, y: 1 },
      defaults: { x: 0, y: 0 },
      axisPoints: [[0, 0.3, 1], [0, 1]],
      bindings: [{
        node: 0,
        property: 'translation',
        values: [
          [{ x: 0, y: 0 }, { x: 0, y: 1 }],
          [{ x: 0.1, y: 0.7 }, { x: 5, y: 5 }],
          [{ x: 9, y: 9 }, { x: 9, y: 9 }],
        ],
      }],
    };
    const system = new ParameterSystem([offset]);
    system.setValue('Offset', 0.3, 0);
    expect(evaluateBindings(system).transforms.get(0)?.translation).toEqual({ x: 0.1, y: 0.7 });
  });

  it('leaves untouched properties at zero', () => {
    const system = new ParameterSystem([
      scalarParameter(1, 'Fade', [{ node: 4, property: 'opacity', values: [[0], [-0.5]] }]),
    ]);
    system.setValue('Fade', 1);
    const offset = evaluateBindings(system).transforms.get(4);
    expect(offset).toEqual({
      translation: { x: 0, y: 0 },
      rotation: 0,
      scale: { x: 0, y: 0 },
      opacity: -0.5,
    });
  });
});
