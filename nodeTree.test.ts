import { mat2d, vec2 } from 'gl-matrix';
import { describe, expect, it } from 'vitest';
import { NodeTree, composeLocalMatrix, createMatrix, localDirection, worldRotation } from './nodeTree';
import { composite, linkChildren, mask, part, restTransform } from './fixtures/rigs';
import { zeroTransformOffset, type PuppetNode } from './puppetModel';

const buildTree = (nodes: PuppetNode[]): NodeTree => new NodeTree(linkChildren(nodes), 0);

const armRig = (): NodeTree => buildTree([
  composite(1, 'Root', null, { transform: restTransform({ translation: { x: 10, y: 0 }, opacity: 0.5 }) }),
  part(2, 'Arm', 0, {
    transform: restTransform({
      translation: { x: 0, y: 5 },
      rotation: 90,
      scale: { x: 2, y: 1 },
      opacity: 0.5,
    }),
  }),
  part(3, 'Hand', 1, { transform: restTransform({ translation: { x: 1, y: 0 } }) }),
]);

const apply = (matrix: mat2d, x: number, y: number): [number, number] => {
  const out = vec2.transformMat2d(vec2.create(), [x, y], matrix);
  return [out[0], out[1]];
};

describe('nodeTree', () => {
  it('composes translation, rotation then scale from the root down', () => {
    const tree = armRig();
    const [x, y] = apply(tree.worldTransform(1), 1, 0);
    // scale -> (2, 0), rotate 90 -> (0, 2), translate -> (0, 7), root -> (10, 7)
    expect(x).toBeCloseTo(10, 5);
    expect(y).toBeCloseTo(7, 5);
  });

  it('propagates the same matrices as the per-node root walk', () => {
    const tree = armRig();
    const pose = tree.propagate();
    [0, 1, 2].forEach((index) => {
      expect(Array.from(pose.matrices[index])).toEqual(Array.from(tree.worldTransform(index)));
    });
  });

  it('multiplies opacity down the hierarchy', () => {
    const pose = armRig().propagate();
    expect(pose.opacities[0]).toBe(0.5);
    expect(pose.opacities[1]).toBe(0.25);
    expect(pose.opacities[2]).toBe(0.25);
  });

  it('applies offsets only to the node they are keyed by', () => {
    const tree = armRig();
    const offset = zeroTransformOffset();
    offset.translation.x = 3;
    offset.opacity = -1;
    const pose = tree.propagate(new Map([[2, offset]]));
    const [x, y] = apply(pose.matrices[2], 0, 0);
    const [restX, restY] = apply(tree.worldTransform(2), 0, 0);
    // +3 along the arm's x, scaled by 2 and turned onto world y.
    expect(x - restX).toBeCloseTo(0, 4);
    expect(y - restY).toBeCloseTo(6, 4);
    expect(pose.opacities[2]).toBe(0);
    expect(pose.opacities[1]).toBe(0.25);
  });

  it('walks children in authoring order', () => {
    const tree = buildTree([
      composite(1, 'Root', null),
      composite(2, 'Body', 0),
      part(3, 'Torso', 1),
      part(4, 'Head', 0),
      part(5, 'Arm', 1),
    ]);
    expect(tree.preorder()).toEqual([0, 1, 2, 4, 3]);
    expect(tree.preorderIndex(4)).toBe(3);
    expect(tree.ancestors(4)).toEqual([1, 0]);
    expect(tree.ancestors(0)).toEqual([]);
  });

  it('looks nodes up by uuid and name', () => {
    const tree = armRig();
    expect(tree.findByUuid(3)).toBe(2);
    expect(tree.findByName('Arm')).toBe(1);
    expect(tree.findByName('Tail')).toBeUndefined();
    expect(tree.get(7)).toBeUndefined();
  });

  it('describes the tree with one indented line per node', () => {
    const tree = buildTree([
      composite(1, 'Root', null),
      part(2, 'Face', 0),
      mask(3, 'Clip', 1, []),
      composite(4, 'Hair', 0),
    ]);
    expect(tree.describe()).toBe([
      '- [Composite] Root',
      '  - [Part] Face',
      '    - [Mask] Clip',
      '  - [Composite] Hair',
    ].join('\n'));
  });

  it('rejects structural edits after construction', () => {
    const tree = armRig();
    expect(() => Array.prototype.push.call(tree.nodes[0].children, 2)).toThrow(TypeError);
    expect(() => Object.assign(tree.nodes[1], { parent: null })).toThrow(TypeError);
    expect(() => Object.assign(tree.nodes[1].transform, { rotation: 5 })).toThrow(TypeError);
  });

  it('handles rigs deeper than the call stack', () => {
    const depth = 20000;
    const nodes: PuppetNode[] = Array.from({ length: depth }, (_, index) => (
      composite(index + 1, `Link ${index}`, index === 0 ? null : index - 1, {
        children: index === depth - 1 ? [] : [index + 1],
        transform: restTransform({ translation: { x: 1, y: 0 } }),
      })
    ));
    const tree = new NodeTree(nodes, 0);
    const pose = tree.propagate();
    expect(tree.preorder().length).toBe(depth);
    expect(pose.matrices[depth - 1][4]).toBe(depth);
    expect(tree.describe().split('\n').length).toBe(depth);
  });

  it('keeps long chains in double precision', () => {
    const depth = 2000;
    const nodes: PuppetNode[] = Array.from({ length: depth }, (_, index) => (
      composite(index + 1, `Link ${index}`, index === 0 ? null : index - 1, {
        children: index === depth - 1 ? [] : [index + 1],
        transform: restTransform({ translation: { x: 0.1, y: 0 } }),
      })
    ));
    let expected = 0;
    for (let index = 0; index < depth; index += 1) {
      expected += 0.1;
    }
    const tree = new NodeTree(nodes, 0);
    expect(tree.propagate().matrices[depth - 1][4]).toBe(expected);
    expect(tree.worldTransform(depth - 1)[4]).toBeCloseTo(200, 6);
  });

  it('maps world directions into a rotated or mirrored frame', () => {
    const turned = composeLocalMatrix(createMatrix(), restTransform({ rotation: 90, scale: { x: 2, y: 2 } }));
    const down = localDirection(turned, { x: 0, y: 1 });
    expect(down.x).toBeCloseTo(0.5, 12);
    expect(down.y).toBeCloseTo(0, 12);
    const mirrored = composeLocalMatrix(createMatrix(), restTransform({ scale: { x: -1, y: 1 } }));
    expect(localDirection(mirrored, { x: 0, y: 1 }).y).toBe(1);
    const flat = composeLocalMatrix(createMatrix(), restTransform({ scale: { x: 0, y: 1 } }));
    expect(localDirection(flat, { x: 0, y: 1 })).toEqual({ x: 0, y: 0 });
  });

  it('reads the rotation back out of a world matrix', () => {
    const matrix = composeLocalMatrix(mat2d.create(), restTransform({ rotation: 30 }));
    expect(worldRotation(matrix)).toBeCloseTo(Math.PI / 6, 5);
  });
});
