import type {
  CompositeNode,
  MaskNode,
  MeshData,
  NodeTransform,
  ParameterDefinition,
  PartNode,
  PuppetNode,
  PuppetSource,
  Vec2,
} from '../puppetModel';

type NodeOverrides<T extends PuppetNode> = Partial<Omit<T, 'kind' | 'uuid' | 'name' | 'parent'>>;

export const restTransform = (overrides: Partial<NodeTransform> = {}): NodeTransform => ({
  translation: { x: 0, y: 0 },
  rotation: 0,
  scale: { x: 1, y: 1 },
  opacity: 1,
  ...overrides,
});

export const quadMesh = (size: number = 10, origin: Vec2 = { x: 0, y: 0 }): MeshData => ({
  vertices: [{ x: 0, y: 0 }, { x: size, y: 0 }, { x: size, y: size }, { x: 0, y: size }],
  uvs: [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }, { x: 0, y: 1 }],
  indices: [0, 1, 2, 0, 2, 3],
  origin,
});

export const eyelidMesh = (): MeshData => ({
  vertices: [{ x: 10, y: 20 }, { x: 14, y: 20 }, { x: 12, y: 24 }],
  uvs: [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0.5, y: 1 }],
  indices: [0, 1, 2],
  origin: { x: 12, y: 22 },
});

export const part = (
  uuid: number,
  name: string,
  parent: number | null,
  overrides: NodeOverrides<PartNode> = {}
): PartNode => ({
  uuid,
  name,
  parent,
  children: [],
  transform: restTransform(),
  zsort: 0,
  mesh: quadMesh(),
  ...overrides,
  kind: 'part',
});

export const composite = (
  uuid: number,
  name: string,
  parent: number | null,
  overrides: NodeOverrides<CompositeNode> = {}
): CompositeNode => ({
  uuid,
  name,
  parent,
  children: [],
  transform: restTransform(),
  zsort: 0,
  ...overrides,
  kind: 'composite',
});

export const mask = (
  uuid: number,
  name: string,
  parent: number | null,
  maskedParts: number[],
  overrides: NodeOverrides<MaskNode> = {}
): MaskNode => ({
  uuid,
  name,
  parent,
  children: [],
  transform: restTransform(),
  zsort: 0,
  mesh: quadMesh(),
  mode: 'mask',
  ...overrides,
  maskedParts,
  kind: 'mask',
});

/** Fills every node's child list from the parent links, in arena order. */
export const linkChildren = (nodes: PuppetNode[]): PuppetNode[] => (
  nodes.map((node, index) => ({
    ...node,
    children: nodes
      .map((candidate, childIndex) => (candidate.parent === index ? childIndex : -1))
      .filter((childIndex) => childIndex >= 0),
  }))
);

export const zeroDeform = (vertexCount: number): Vec2[] => (
  Array.from({ length: vertexCount }, () => ({ x: 0, y: 0 }))
);

export const scalarParameter = (
  uuid: number,
  name: string,
  bindings: ParameterDefinition['bindings'] = [],
  range: [number, number] = [0, 1]
): ParameterDefinition => ({
  uuid,
  name,
  isVec2: false,
  min: { x: range[0], y: 0 },
  max: { x: range[1], y: 0 },
  defaults: { x: range[0], y: 0 },
  axisPoints: [[0, 1], [0]],
  bindings,
});

/** Root composite with one eyelid part; "Blink" closes the first vertex by 5 units. */
export const blinkPuppet = (): PuppetSource => ({
  name: 'Blink rig',
  nodes: linkChildren([
    composite(1, 'Root', null),
    part(2, 'Eyelid', 0, { mesh: eyelidMesh() }),
  ]),
  parameters: [
    scalarParameter(100, 'Blink', [
      {
        node: 1,
        property: 'vertexDeform',
        values: [
          [zeroDeform(3)],
          [[{ x: 0, y: -5 }, { x: 0, y: 0 }, { x: 0, y: 0 }]],
        ],
      },
    ]),
  ],
});
