import {
  NODE_KINDS,
  type BindingDefinition,
  type MaskMode,
  type MeshData,
  type NodeKind,
  type NodeTransform,
  type PartNode,
  type ParameterDefinition,
  type PhysicsDefinition,
  type PuppetNode,
  type PuppetSource,
  type Vec2,
} from '../puppetModel';
import { PuppetLoadError } from '../puppetErrors';
import { isFiniteNumber } from '../utils';

// Shape of the JSON payload a container carries. Nodes nest through
// `children` and reference each other by uuid; fields not listed are ignored.
//
// { name?, nodes: DocNode, params?: DocParam[] }
// DocNode:  { uuid, name?, type: 'Part' | 'Composite' | 'Mask', zsort?, opacity?,
//             transform?: { trans?: [x, y], rot?: degrees, scale?: [x, y] },
//             mesh?: { verts: number[], uvs: number[], indices: number[], origin?: [x, y] },
//             textureId?, maskedParts?: uuid[], maskMode?: 'mask' | 'dodge',
//             physics?: { model, length, gravityScale?, damping?, restore?, initialAngle?, initialOffset? },
//             children?: DocNode[] }
// DocParam: { uuid, name, isVec2?, min, max, defaults?, axisPoints, bindings?: DocBinding[] }
// DocBinding: { node: uuid, property, values }

type JsonRecord = Record<string, unknown>;

const TYPE_TAGS: Record<string, NodeKind> = {
  Part: 'part',
  Composite: 'composite',
  Mask: 'mask',
};

const malformed = (message: string): PuppetLoadError => new PuppetLoadError('MalformedStructure', message);

const isRecord = (value: unknown): value is JsonRecord => (
  typeof value === 'object' && value !== null && !Array.isArray(value)
);

const readNumber = (record: JsonRecord, key: string, owner: string, fallback?: number): number => {
  const value = record[key];
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  if (!isFiniteNumber(value)) {
    throw malformed(`${owner}.${key} must be a finite number`);
  }
  return value;
};

const readVec2 = (value: unknown, owner: string, fallback?: Vec2): Vec2 => {
  if (value === undefined && fallback) {
    return { ...fallback };
  }
  if (Array.isArray(value) && value.length === 2 && isFiniteNumber(value[0]) && isFiniteNumber(value[1])) {
    return { x: value[0], y: value[1] };
  }
  if (typeof value === 'number' && isFiniteNumber(value)) {
    // 1D parameters may store a bare number for their x axis.
    return { x: value, y: 0 };
  }
  throw malformed(`${owner} must be an [x, y] pair`);
};

const readNumberList = (value: unknown, owner: string): number[] => {
  if (!Array.isArray(value) || !value.every(isFiniteNumber)) {
    throw malformed(`${owner} must be a list of finite numbers`);
  }
  return [...value];
};

const readPairs = (flat: number[], owner: string): Vec2[] => {
  if (flat.length % 2 !== 0) {
    throw malformed(`${owner} has an odd number of coordinates`);
  }
  const out: Vec2[] = [];
  for (let index = 0; index < flat.length; index += 2) {
    out.push({ x: flat[index], y: flat[index + 1] });
  }
  return out;
};

const readTransform = (record: JsonRecord, owner: string): NodeTransform => {
  const transform = isRecord(record.transform) ? record.transform : {};
  return {
    translation: readVec2(transform.trans, `${owner}.transform.trans`, { x: 0, y: 0 }),
    rotation: readNumber(transform, 'rot', `${owner}.transform`, 0),
    scale: readVec2(transform.scale, `${owner}.transform.scale`, { x: 1, y: 1 }),
    opacity: readNumber(record, 'opacity', owner, 1),
  };
};

const readMesh = (value: unknown, owner: string): MeshData => {
  if (!isRecord(value)) {
    throw malformed(`${owner}.mesh is missing`);
  }
  return {
    vertices: readPairs(readNumberList(value.verts, `${owner}.mesh.verts`), `${owner}.mesh.verts`),
    uvs: readPairs(readNumberList(value.uvs, `${owner}.mesh.uvs`), `${owner}.mesh.uvs`),
    indices: readNumberList(value.indices, `${owner}.mesh.indices`),
    origin: readVec2(value.origin, `${owner}.mesh.origin`, { x: 0, y: 0 }),
  };
};

const readMaskMode = (value: unknown, owner: string): MaskMode => {
  if (value === undefined || value === 'mask') {
    return 'mask';
  }
  if (value === 'dodge') {
    return 'dodge';
  }
  throw malformed(`${owner}.maskMode "${String(value)}" is not mask or dodge`);
};

interface FlatEntry {
  record: JsonRecord;
  parent: number | null;
  owner: string;
}

/** Pre-order flattening of the nested node document; the root lands at index 0. */
const flattenNodes = (rootValue: unknown): FlatEntry[] => {
  if (!isRecord(rootValue)) {
    throw malformed('document has no root node');
  }
  const entries: FlatEntry[] = [];
  const stack: FlatEntry[] = [{ record: rootValue, parent: null, owner: 'nodes' }];
  while (stack.length) {
    const entry = stack.pop();
    if (!entry) {
      break;
    }
    const index = entries.length;
    entries.push(entry);
    const children = entry.record.children ?? [];
    if (!Array.isArray(children)) {
      throw malformed(`${entry.owner}.children must be a list`);
    }
    for (let child = children.length - 1; child >= 0; child -= 1) {
      const record: unknown = children[child];
      if (!isRecord(record)) {
        throw malformed(`${entry.owner}.children[${child}] is not a node`);
      }
      stack.push({ record, parent: index, owner: `${entry.owner}.children[${child}]` });
    }
  }
  return entries;
};

const resolveUuid = (uuids: Map<number, number>, value: unknown, owner: string): number => {
  const index = isFiniteNumber(value) ? uuids.get(value) : undefined;
  if (index === undefined) {
    throw new PuppetLoadError('DanglingReference', `${owner} references unknown node uuid ${String(value)}`);
  }
  return index;
};

const readPhysics = (value: JsonRecord, node: number, owner: string): PhysicsDefinition => {
  const model = value.model ?? 'pendulum';
  if (model !== 'pendulum' && model !== 'spring') {
    throw malformed(`${owner}.physics.model "${String(model)}" is not pendulum or spring`);
  }
  const definition: PhysicsDefinition = {
    node,
    model,
    length: readNumber(value, 'length', `${owner}.physics`, 1),
    gravityScale: readNumber(value, 'gravityScale', `${owner}.physics`, 1),
    damping: readNumber(value, 'damping', `${owner}.physics`, 0.5),
    restore: readNumber(value, 'restore', `${owner}.physics`, 0),
  };
  if (value.initialAngle !== undefined) {
    definition.initialAngle = readNumber(value, 'initialAngle', `${owner}.physics`);
  }
  if (value.initialOffset !== undefined) {
    definition.initialOffset = readVec2(value.initialOffset, `${owner}.physics.initialOffset`);
  }
  return definition;
};

const readGrid = <T>(value: unknown, owner: string, readCell: (cell: unknown, cellOwner: string) => T): T[][] => {
  if (!Array.isArray(value)) {
    throw malformed(`${owner}.values must be a grid`);
  }
  return value.map((row: unknown, x) => {
    if (!Array.isArray(row)) {
      throw malformed(`${owner}.values[${x}] must be a list`);
    }
    return row.map((cell: unknown, y) => readCell(cell, `${owner}.values[${x}][${y}]`));
  });
};

const readScalarCell = (cell: unknown, owner: string): number => {
  if (!isFiniteNumber(cell)) {
    throw malformed(`${owner} must be a finite number`);
  }
  return cell;
};

const readDeformCell = (cell: unknown, owner: string): Vec2[] => {
  if (!Array.isArray(cell)) {
    throw malformed(`${owner} must be a list of [x, y] pairs`);
  }
  return cell.map((pair: unknown, vertex) => readVec2(pair, `${owner}[${vertex}]`));
};

const readBinding = (value: unknown, uuids: Map<number, number>, owner: string): BindingDefinition => {
  if (!isRecord(value)) {
    throw malformed(`${owner} is not a binding`);
  }
  const node = resolveUuid(uuids, value.node, owner);
  const property = value.property;
  switch (property) {
    case 'rotation':
    case 'opacity':
      return { node, property, values: readGrid(value.values, owner, readScalarCell) };
    case 'translation':
    case 'scale':
      return { node, property, values: readGrid(value.values, owner, readVec2) };
    case 'vertexDeform':
      return { node, property, values: readGrid(value.values, owner, readDeformCell) };
    default:
      throw malformed(`${owner}.property "${String(property)}" is not a bindable property`);
  }
};

const readParameter = (value: unknown, uuids: Map<number, number>, owner: string): ParameterDefinition => {
  if (!isRecord(value)) {
    throw malformed(`${owner} is not a parameter`);
  }
  const isVec2 = value.isVec2 === true;
  const min = readVec2(value.min, `${owner}.min`);
  const max = readVec2(value.max, `${owner}.max`);
  const axisPoints = value.axisPoints;
  if (!Array.isArray(axisPoints) || axisPoints.length < 1) {
    throw malformed(`${owner}.axisPoints must list the x axis`);
  }
  const xPoints = readNumberList(axisPoints[0], `${owner}.axisPoints[0]`);
  const yPoints = isVec2 ? readNumberList(axisPoints[1], `${owner}.axisPoints[1]`) : [0];
  const bindings = value.bindings ?? [];
  if (!Array.isArray(bindings)) {
    throw malformed(`${owner}.bindings must be a list`);
  }
  return {
    uuid: readNumber(value, 'uuid', owner),
    name: typeof value.name === 'string' ? value.name : `param ${owner}`,
    isVec2,
    min,
    max,
    defaults: readVec2(value.defaults, `${owner}.defaults`, min),
    axisPoints: [xPoints, yPoints],
    bindings: bindings.map((binding: unknown, index) => readBinding(binding, uuids, `${owner}.bindings[${index}]`)),
  };
};

/**
 * Converts a parsed puppet document into a PuppetSource. Only shape errors
 * are raised here; structural checks happen when the Puppet is built.
 */
export const loadPuppetDocument = (document: unknown): PuppetSource => {
  if (!isRecord(document)) {
    throw malformed('document is not an object');
  }
  const entries = flattenNodes(document.nodes);

  const uuids = new Map<number, number>();
  entries.forEach(({ record, owner }, index) => {
    const uuid = readNumber(record, 'uuid', owner);
    if (uuids.has(uuid)) {
      throw malformed(`${owner} repeats uuid ${uuid}`);
    }
    uuids.set(uuid, index);
  });

  const children: number[][] = entries.map(() => []);
  entries.forEach(({ parent }, index) => {
    if (parent !== null) {
      children[parent].push(index);
    }
  });

  const physics: PhysicsDefinition[] = [];
  const nodes = entries.map(({ record, parent, owner }, index): PuppetNode => {
    const tag = record.type;
    const kind = typeof tag === 'string' ? TYPE_TAGS[tag] : undefined;
    if (!kind || !NODE_KINDS.includes(kind)) {
      throw new PuppetLoadError('UnknownNodeVariant', `${owner}.type "${String(tag)}" is not Part, Composite or Mask`);
    }
    if (isRecord(record.physics)) {
      physics.push(readPhysics(record.physics, index, owner));
    }
    const base = {
      uuid: readNumber(record, 'uuid', owner),
      name: typeof record.name === 'string' ? record.name : '',
      parent,
      children: children[index],
      transform: readTransform(record, owner),
      zsort: readNumber(record, 'zsort', owner, 0),
    };
    switch (kind) {
      case 'composite':
        return { ...base, kind };
      case 'part': {
        const part: PartNode = { ...base, kind, mesh: readMesh(record.mesh, owner) };
        if (record.textureId !== undefined) {
          part.textureId = readNumber(record, 'textureId', owner);
        }
        return part;
      }
      case 'mask': {
        const masked = record.maskedParts ?? [];
        if (!Array.isArray(masked)) {
          throw malformed(`${owner}.maskedParts must be a list`);
        }
        return {
          ...base,
          kind,
          mesh: readMesh(record.mesh, owner),
          maskedParts: masked.map((uuid: unknown, target) => resolveUuid(uuids, uuid, `${owner}.maskedParts[${target}]`)),
          mode: readMaskMode(record.maskMode, owner),
        };
      }
    }
  });

  const params = document.params ?? [];
  if (!Array.isArray(params)) {
    throw malformed('document params must be a list');
  }

  return {
    name: typeof document.name === 'string' ? document.name : undefined,
    nodes,
    parameters: params.map((param: unknown, index) => readParameter(param, uuids, `params[${index}]`)),
    physics,
  };
};

export const parsePuppetDocument = (json: string): PuppetSource => {
  let document: unknown;
  try {
    document = JSON.parse(json);
  } catch (error) {
    throw malformed(`document is not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }
  return loadPuppetDocument(document);
};
