import { describe, expect, it } from 'vitest';
import { validatePuppetSource } from './puppetValidation';
import { isPuppetLoadError, type PuppetLoadErrorKind } from './puppetErrors';
import {
  blinkPuppet,
  composite,
  linkChildren,
  mask,
  part,
  quadMesh,
  scalarParameter,
  zeroDeform,
} from './fixtures/rigs';
import type { PuppetSource } from './puppetModel';

const failureKind = (source: PuppetSource): PuppetLoadErrorKind | undefined => {
  try {
    validatePuppetSource(source);
  } catch (error) {
    if (isPuppetLoadError(error)) {
      return error.kind;
    }
    throw error;
  }
  return undefined;
};

const withNodes = (nodes: PuppetSource['nodes']): PuppetSource => ({ nodes, parameters: [] });

describe('puppetValidation', () => {
  it('accepts a well-formed puppet and returns its root', () => {
    expect(validatePuppetSource(blinkPuppet())).toBe(0);
  });

  it('rejects unknown node kinds', () => {
    const raw = JSON.parse(JSON.stringify(blinkPuppet()));
    raw.nodes[1].kind = 'bone';
    expect(failureKind(raw)).toBe('UnknownNodeVariant');
  });

  it('rejects a deform whose vector count differs from the mesh', () => {
    const source = blinkPuppet();
    expect(failureKind({
      ...source,
      parameters: [scalarParameter(100, 'Blink', [
        { node: 1, property: 'vertexDeform', values: [[zeroDeform(3)], [zeroDeform(2)]] },
      ])],
    })).toBe('VertexCountMismatch');
  });

  it('rejects a mesh with fewer uvs than vertices', () => {
    const mesh = quadMesh();
    expect(failureKind(withNodes(linkChildren([
      composite(1, 'Root', null),
      part(2, 'Face', 0, { mesh: { ...mesh, uvs: mesh.uvs.slice(1) } }),
    ])))).toBe('VertexCountMismatch');
  });

  it('rejects references to missing nodes', () => {
    expect(failureKind({
      ...blinkPuppet(),
      parameters: [scalarParameter(1, 'Tilt', [{ node: 9, property: 'rotation', values: [[0], [1]] }])],
    })).toBe('DanglingReference');
    expect(failureKind(withNodes([
      composite(1, 'Root', null),
      part(2, 'Face', 7),
    ]))).toBe('DanglingReference');
    expect(failureKind(withNodes(linkChildren([
      composite(1, 'Root', null),
      mask(2, 'Clip', 0, [5]),
    ])))).toBe('DanglingReference');
    expect(failureKind({
      ...blinkPuppet(),
      physics: [{ node: 4, model: 'pendulum', length: 1, gravityScale: 1, damping: 0, restore: 0 }],
    })).toBe('DanglingReference');
  });

  it('rejects forests and parent cycles', () => {
    expect(failureKind(withNodes([
      composite(1, 'Root', null),
      composite(2, 'Other Root', null),
    ]))).toBe('MalformedStructure');
    expect(failureKind(withNodes(linkChildren([
      composite(1, 'Root', null),
      composite(2, 'A', 2),
      composite(3, 'B', 1),
    ])))).toBe('MalformedStructure');
  });

  it('rejects child lists that disagree with parent links', () => {
    expect(failureKind(withNodes([
      composite(1, 'Root', null, { children: [1, 1] }),
      part(2, 'Face', 0),
    ]))).toBe('MalformedStructure');
  });

  it('rejects a part claimed by two masks', () => {
    expect(failureKind(withNodes(linkChildren([
      composite(1, 'Root', null),
      part(2, 'Face', 0),
      mask(3, 'Clip A', 0, [1]),
      mask(4, 'Clip B', 0, [1]),
    ])))).toBe('MalformedStructure');
  });

  it('rejects out-of-order or out-of-range axis points', () => {
    const unordered = { ...scalarParameter(1, 'Tilt'), axisPoints: [[0, 0.6, 0.4], [0]] as const };
    expect(failureKind({ ...blinkPuppet(), parameters: [unordered] })).toBe('MalformedStructure');
    const outside = { ...scalarParameter(1, 'Tilt'), axisPoints: [[0, 1.5], [0]] as const };
    expect(failureKind({ ...blinkPuppet(), parameters: [outside] })).toBe('MalformedStructure');
  });

  it('rejects binding grids that do not match the axis points', () => {
    expect(failureKind({
      ...blinkPuppet(),
      parameters: [scalarParameter(1, 'Tilt', [{ node: 1, property: 'rotation', values: [[0]] }])],
    })).toBe('MalformedStructure');
  });

  it('reports the kind in the message', () => {
    expect(() => validatePuppetSource(withNodes([]))).toThrow('MalformedStructure: puppet has no nodes');
  });
});
