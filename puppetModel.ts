// ─── TYPES (shared by nodeTree, bindingEngine, deformationStack, puppet) ─────
export interface Vec2 { x: number; y: number; }

export interface NodeTransform {
  translation: Vec2;
  /** Degrees, counter-clockwise in a y-down space. */
  rotation: number;
  scale: Vec2;
  opacity: number;
}

export type NodeKind = 'part' | 'composite' | 'mask';
export const NODE_KINDS: readonly string[] = ['part', 'composite', 'mask'];

export type MaskMode = 'mask' | 'dodge';

export interface MeshData {
  vertices: readonly Vec2[];
  uvs: readonly Vec2[];
  indices: readonly number[];
  origin: Vec2;
}

interface NodeBase {
  uuid: number;
  name: string;
  /** Arena index of the parent; `null` only for the root. */
  parent: number | null;
  children: readonly number[];
  transform: NodeTransform;
  zsort: number;
}

export interface PartNode extends NodeBase {
  kind: 'part';
  mesh: MeshData;
  textureId?: number;
}

export interface CompositeNode extends NodeBase {
  kind: 'composite';
}

export interface MaskNode extends NodeBase {
  kind: 'mask';
  mesh: MeshData;
  maskedParts: readonly number[];
  mode: MaskMode;
}

export type PuppetNode = PartNode | CompositeNode | MaskNode;
export type MeshNode = PartNode | MaskNode;

export const hasMesh = (node: PuppetNode): node is MeshNode => node.kind !== 'composite';

export type TransformProperty = 'translation' | 'rotation' | 'scale' | 'opacity';
export type BindingProperty = TransformProperty | 'vertexDeform';

// Grids are indexed values[xIndex][yIndex]; 1D parameters have one y entry.
export type BindingGrid<T> = readonly (readonly T[])[];

interface BindingBase {
  node: number;
}

export interface ScalarBinding extends BindingBase {
  property: 'rotation' | 'opacity';
  values: BindingGrid<number>;
}

export interface VectorBinding extends BindingBase {
  property: 'translation' | 'scale';
  values: BindingGrid<Vec2>;
}

export interface DeformBinding extends BindingBase {
  property: 'vertexDeform';
  values: BindingGrid<readonly Vec2[]>;
}

export type BindingDefinition = ScalarBinding | VectorBinding | DeformBinding;

export interface ParameterDefinition {
  uuid: number;
  name: string;
  isVec2: boolean;
  min: Vec2;
  max: Vec2;
  defaults: Vec2;
  /** Normalized [0,1] breakpoints per axis, ascending. */
  axisPoints: readonly [readonly number[], readonly number[]];
  bindings: readonly BindingDefinition[];
}

export type PhysicsModel = 'pendulum' | 'spring';

export interface PhysicsDefinition {
  node: number;
  model: PhysicsModel;
  length: number;
  gravityScale: number;
  damping: number;
  restore: number;
  /** Radians, pendulum only. */
  initialAngle?: number;
  /** Spring only. */
  initialOffset?: Vec2;
}

export interface PuppetSource {
  name?: string;
  nodes: readonly PuppetNode[];
  parameters: readonly ParameterDefinition[];
  physics?: readonly PhysicsDefinition[];
}

export interface TransformOffset {
  translation: Vec2;
  rotation: number;
  scale: Vec2;
  opacity: number;
}

export const zeroTransformOffset = (): TransformOffset => ({
  translation: { x: 0, y: 0 },
  rotation: 0,
  scale: { x: 0, y: 0 },
  opacity: 0,
});

// ─── FRAME OUTPUT ────────────────────────────────────────────────────────────
export interface DrawPart {
  node: number;
  name: string;
  kind: 'part' | 'mask';
  /** Interleaved x, y, u, v in world space. */
  vertices: Float32Array;
  vertexCount: number;
  indices: Uint32Array;
  opacity: number;
  origin: Vec2;
  textureId?: number;
}

export type DrawGroup =
  | { kind: 'part'; part: DrawPart }
  | { kind: 'masked'; mode: MaskMode; maskSource: DrawPart; maskedParts: DrawPart[] };

export interface FrameResult {
  frame: number;
  dt: number;
  groups: DrawGroup[];
  physicsResets: number;
}
