import { mat2d } from 'gl-matrix';
import type {
  MeshData,
  NodeKind,
  NodeTransform,
  PuppetNode,
  TransformOffset,
  Vec2,
} from './puppetModel';
import { clamp, d2r } from './utils';

export interface WorldPose {
  /** World matrix per arena index. */
  matrices: mat2d[];
  /** Inherited opacity per arena index. */
  opacities: Float64Array;
}

const KIND_LABELS: Record<NodeKind, string> = {
  part: 'Part',
  composite: 'Composite',
  mask: 'Mask',
};

const freezeMesh = (mesh: MeshData): MeshData => Object.freeze({
  vertices: Object.freeze(mesh.vertices.map((vertex) => Object.freeze({ ...vertex }))),
  uvs: Object.freeze(mesh.uvs.map((uv) => Object.freeze({ ...uv }))),
  indices: Object.freeze([...mesh.indices]),
  origin: Object.freeze({ ...mesh.origin }),
});

const freezeTransform = (transform: NodeTransform): NodeTransform => Object.freeze({
  translation: Object.freeze({ ...transform.translation }),
  rotation: transform.rotation,
  scale: Object.freeze({ ...transform.scale }),
  opacity: transform.opacity,
});

const freezeNode = (node: PuppetNode): PuppetNode => {
  const children = Object.freeze([...node.children]);
  const transform = freezeTransform(node.transform);
  switch (node.kind) {
    case 'part':
      return Object.freeze({ ...node, children, transform, mesh: freezeMesh(node.mesh) });
    case 'mask':
      return Object.freeze({
        ...node,
        children,
        transform,
        mesh: freezeMesh(node.mesh),
        maskedParts: Object.freeze([...node.maskedParts]),
      });
    case 'composite':
      return Object.freeze({ ...node, children, transform });
  }
};

/** Identity matrix backed by float64; gl-matrix defaults to float32. */
export const createMatrix = (): mat2d => mat2d.identity(new Float64Array(6));

/** Local matrix T * R * S, with binding/physics offsets added to each field. */
export const composeLocalMatrix = (
  out: mat2d,
  transform: NodeTransform,
  offset?: TransformOffset
): mat2d => {
  const tx = transform.translation.x + (offset?.translation.x ?? 0);
  const ty = transform.translation.y + (offset?.translation.y ?? 0);
  const rotation = transform.rotation + (offset?.rotation ?? 0);
  const sx = transform.scale.x + (offset?.scale.x ?? 0);
  const sy = transform.scale.y + (offset?.scale.y ?? 0);
  mat2d.fromTranslation(out, [tx, ty]);
  mat2d.rotate(out, out, d2r(rotation));
  mat2d.scale(out, out, [sx, sy]);
  return out;
};

export const localOpacity = (transform: NodeTransform, offset?: TransformOffset): number => (
  clamp(transform.opacity + (offset?.opacity ?? 0), 0, 1)
);

/** Rotation of a world matrix in radians. */
export const worldRotation = (matrix: mat2d): number => Math.atan2(matrix[1], matrix[0]);

/**
 * A world-space direction in the frame of `matrix`: the inverse of its linear
 * part applied to `direction`. Translation is ignored; a degenerate frame gives zero.
 */
export const localDirection = (matrix: mat2d, direction: Vec2): Vec2 => {
  const det = matrix[0] * matrix[3] - matrix[1] * matrix[2];
  if (det === 0 || !Number.isFinite(det)) {
    return { x: 0, y: 0 };
  }
  return {
    x: (matrix[3] * direction.x - matrix[2] * direction.y) / det,
    y: (matrix[0] * direction.y - matrix[1] * direction.x) / det,
  };
};

/**
 * Arena-backed scene graph. Structure is frozen on construction: nodes, child
 * lists and meshes reject writes, so there is no runtime add/remove.
 */
export class NodeTree {
  readonly nodes: readonly PuppetNode[];
  readonly root: number;
  private readonly order: readonly number[];
  private readonly rank: Int32Array;
  private readonly byUuid = new Map<number, number>();

  constructor(nodes: readonly PuppetNode[], root: number) {
    this.nodes = Object.freeze(nodes.map(freezeNode));
    this.root = root;

    const order: number[] = [];
    const stack = [root];
    while (stack.length) {
      const index = stack.pop();
      if (index === undefined) {
        break;
      }
      order.push(index);
      const { children } = this.nodes[index];
      for (let child = children.length - 1; child >= 0; child -= 1) {
        stack.push(children[child]);
      }
    }
    this.order = Object.freeze(order);
    this.rank = new Int32Array(this.nodes.length).fill(-1);
    order.forEach((index, position) => {
      this.rank[index] = position;
    });
    this.nodes.forEach((node, index) => {
      if (!this.byUuid.has(node.uuid)) {
        this.byUuid.set(node.uuid, index);
      }
    });
  }

  get size(): number {
    return this.nodes.length;
  }

  get(index: number): PuppetNode | undefined {
    return this.nodes[index];
  }

  preorder(): readonly number[] {
    return this.order;
  }

  preorderIndex(index: number): number {
    return this.rank[index] ?? -1;
  }

  /** Parent chain from the node's parent up to the root. */
  ancestors(index: number): number[] {
    const out: number[] = [];
    let current = this.nodes[index]?.parent ?? null;
    while (current !== null) {
      out.push(current);
      current = this.nodes[current].parent;
    }
    return out;
  }

  findByUuid(uuid: number): number | undefined {
    return this.byUuid.get(uuid);
  }

  findByName(name: string): number | undefined {
    return this.order.find((candidate) => this.nodes[candidate].name === name);
  }

  worldTransform(index: number, offsets?: ReadonlyMap<number, TransformOffset>): mat2d {
    const path = [index, ...this.ancestors(index)].reverse();
    const world = createMatrix();
    const local = createMatrix();
    path.forEach((pathIndex) => {
      composeLocalMatrix(local, this.nodes[pathIndex].transform, offsets?.get(pathIndex));
      mat2d.multiply(world, world, local);
    });
    return world;
  }

  /** World matrices and opacities for every node, parents before children. */
  propagate(offsets?: ReadonlyMap<number, TransformOffset>): WorldPose {
    const matrices = new Array<mat2d>(this.nodes.length);
    const opacities = new Float64Array(this.nodes.length);
    this.order.forEach((index) => {
      const node = this.nodes[index];
      const offset = offsets?.get(index);
      const world = composeLocalMatrix(createMatrix(), node.transform, offset);
      const opacity = localOpacity(node.transform, offset);
      if (node.parent === null) {
        matrices[index] = world;
        opacities[index] = opacity;
        return;
      }
      matrices[index] = mat2d.multiply(world, matrices[node.parent], world);
      opacities[index] = opacities[node.parent] * opacity;
    });
    return { matrices, opacities };
  }

  describe(): string {
    const lines: string[] = [];
    const stack: Array<[number, number]> = [[this.root, 0]];
    while (stack.length) {
      const entry = stack.pop();
      if (!entry) {
        break;
      }
      const [index, depth] = entry;
      const node = this.nodes[index];
      lines.push(`${'  '.repeat(depth)}- [${KIND_LABELS[node.kind]}] ${node.name}`);
      for (let child = node.children.length - 1; child >= 0; child -= 1) {
        stack.push([node.children[child], depth + 1]);
      }
    }
    return lines.join('\n');
  }
}
