import { vec2, type mat2d } from 'gl-matrix';
import type { DrawPart, MeshNode, Vec2 } from './puppetModel';
import type { NodeTree } from './nodeTree';

interface MeshBuffers {
  /** Base positions, flat [x0, y0, ...]. */
  positions: Float64Array;
  uvs: Float32Array;
  indices: Uint32Array;
  vertexCount: number;
}

const toBuffers = (node: MeshNode): MeshBuffers => {
  const { vertices, uvs, indices } = node.mesh;
  const positions = new Float64Array(vertices.length * 2);
  const uvBuffer = new Float32Array(uvs.length * 2);
  vertices.forEach((vertex, index) => {
    positions[index * 2] = vertex.x;
    positions[index * 2 + 1] = vertex.y;
  });
  uvs.forEach((uv, index) => {
    uvBuffer[index * 2] = uv.x;
    uvBuffer[index * 2 + 1] = uv.y;
  });
  return {
    positions,
    uvs: uvBuffer,
    indices: Uint32Array.from(indices),
    vertexCount: vertices.length,
  };
};

/**
 * Base mesh + summed binding deforms + physics displacement, in that order.
 * The physics displacement is last so it sits on top of the bound shape.
 */
export const composeLocalVertices = (
  base: Float64Array,
  deform?: Float64Array,
  physicsDisplacement?: Vec2
): Float64Array => {
  const out = Float64Array.from(base);
  if (deform) {
    for (let index = 0; index < out.length; index += 1) {
      out[index] += deform[index];
    }
  }
  if (physicsDisplacement) {
    for (let index = 0; index < out.length; index += 2) {
      out[index] += physicsDisplacement.x;
      out[index + 1] += physicsDisplacement.y;
    }
  }
  return out;
};

/** Interleaved world-space x, y, u, v. */
export const toWorldVertexBuffer = (local: Float64Array, uvs: Float32Array, matrix: mat2d): Float32Array => {
  const vertexCount = local.length / 2;
  const out = new Float32Array(vertexCount * 4);
  const point = new Float64Array(2);
  for (let index = 0; index < vertexCount; index += 1) {
    vec2.set(point, local[index * 2], local[index * 2 + 1]);
    vec2.transformMat2d(point, point, matrix);
    out[index * 4] = point[0];
    out[index * 4 + 1] = point[1];
    out[index * 4 + 2] = uvs[index * 2];
    out[index * 4 + 3] = uvs[index * 2 + 1];
  }
  return out;
};

/** Per-mesh composition for every Part and Mask node of one tree. */
export class DeformationStack {
  private readonly tree: NodeTree;
  private readonly buffers = new Map<number, MeshBuffers>();

  constructor(tree: NodeTree) {
    this.tree = tree;
    tree.nodes.forEach((node, index) => {
      if (node.kind !== 'composite') {
        this.buffers.set(index, toBuffers(node));
      }
    });
  }

  vertexCount(node: number): number {
    return this.buffers.get(node)?.vertexCount ?? 0;
  }

  compose(node: number, deform?: Float64Array, physicsDisplacement?: Vec2): Float64Array {
    const buffers = this.buffers.get(node);
    if (!buffers) {
      return new Float64Array(0);
    }
    return composeLocalVertices(buffers.positions, deform, physicsDisplacement);
  }

  emit(node: number, local: Float64Array, matrix: mat2d, opacity: number): DrawPart | undefined {
    const source = this.tree.get(node);
    const buffers = this.buffers.get(node);
    if (!source || source.kind === 'composite' || !buffers) {
      return undefined;
    }
    const origin = vec2.transformMat2d(new Float64Array(2), [source.mesh.origin.x, source.mesh.origin.y], matrix);
    const part: DrawPart = {
      node,
      name: source.name,
      kind: source.kind,
      vertices: toWorldVertexBuffer(local, buffers.uvs, matrix),
      vertexCount: buffers.vertexCount,
      indices: buffers.indices.slice(),
      opacity,
      origin: { x: origin[0], y: origin[1] },
    };
    if (source.kind === 'part' && source.textureId !== undefined) {
      part.textureId = source.textureId;
    }
    return part;
  }
}
