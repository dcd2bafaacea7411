import {
  NODE_KINDS,
  hasMesh,
  type BindingDefinition,
  type MeshData,
  type ParameterDefinition,
  type PhysicsDefinition,
  type PuppetNode,
  type PuppetSource,
  type Vec2,
} from './puppetModel';
import { PuppetLoadError } from './puppetErrors';
import { isFiniteNumber } from './utils';

const isFiniteVec2 = (value: Vec2 | undefined): boolean => (
  Boolean(value) && isFiniteNumber(value?.x) && isFiniteNumber(value?.y)
);

const BINDING_PROPERTIES: readonly string[] = ['translation', 'rotation', 'scale', 'opacity', 'vertexDeform'];

const malformed = (message: string): PuppetLoadError => new PuppetLoadError('MalformedStructure', message);
const dangling = (message: string): PuppetLoadError => new PuppetLoadError('DanglingReference', message);

const label = (node: PuppetNode, index: number): string => `node #${index} "${node.name}"`;

const vertexCountOf = (node: PuppetNode): number => (hasMesh(node) ? node.mesh.vertices.length : 0);

const validateMesh = (mesh: MeshData, owner: string): void => {
  if (!mesh || !Array.isArray(mesh.vertices) || !Array.isArray(mesh.uvs) || !Array.isArray(mesh.indices)) {
    throw malformed(`${owner} has no mesh`);
  }
  if (mesh.uvs.length !== mesh.vertices.length) {
    throw new PuppetLoadError(
      'VertexCountMismatch',
      `${owner} has ${mesh.vertices.length} vertices but ${mesh.uvs.length} uvs`
    );
  }
  if (!mesh.vertices.every(isFiniteVec2) || !mesh.uvs.every(isFiniteVec2) || !isFiniteVec2(mesh.origin)) {
    throw malformed(`${owner} mesh contains non-finite coordinates`);
  }
  if (mesh.indices.length % 3 !== 0) {
    throw malformed(`${owner} triangle list length ${mesh.indices.length} is not a multiple of 3`);
  }
  const vertexCount = mesh.vertices.length;
  mesh.indices.forEach((index) => {
    if (!Number.isInteger(index) || index < 0 || index >= vertexCount) {
      throw malformed(`${owner} triangle index ${index} is outside 0..${vertexCount - 1}`);
    }
  });
};

const validateNodes = (nodes: readonly PuppetNode[]): number => {
  if (!nodes.length) {
    throw malformed('puppet has no nodes');
  }

  const roots: number[] = [];
  nodes.forEach((node, index) => {
    if (!NODE_KINDS.includes(node.kind)) {
      throw new PuppetLoadError('UnknownNodeVariant', `${label(node, index)} has kind "${String(node.kind)}"`);
    }
    const { transform } = node;
    if (
      !transform
      || !isFiniteVec2(transform.translation)
      || !isFiniteVec2(transform.scale)
      || !isFiniteNumber(transform.rotation)
      || !isFiniteNumber(transform.opacity)
      || !isFiniteNumber(node.zsort)
    ) {
      throw malformed(`${label(node, index)} has a non-finite transform or zsort`);
    }
    if (node.parent === null) {
      roots.push(index);
    } else if (!Number.isInteger(node.parent) || node.parent < 0 || node.parent >= nodes.length) {
      throw dangling(`${label(node, index)} references missing parent ${node.parent}`);
    }
    node.children.forEach((child) => {
      if (!Number.isInteger(child) || child < 0 || child >= nodes.length) {
        throw dangling(`${label(node, index)} references missing child ${child}`);
      }
      if (nodes[child].parent !== index) {
        throw malformed(`${label(node, index)} lists child ${child} whose parent is ${nodes[child].parent}`);
      }
    });
    if (hasMesh(node)) {
      validateMesh(node.mesh, label(node, index));
    }
  });

  if (roots.length !== 1) {
    throw malformed(roots.length ? `puppet has ${roots.length} roots` : 'puppet has no root node');
  }
  const root = roots[0];

  // Every parent link must be mirrored by exactly one children entry.
  const listedBy = new Array<number>(nodes.length).fill(0);
  nodes.forEach((node) => node.children.forEach((child) => { listedBy[child] += 1; }));
  nodes.forEach((node, index) => {
    const expected = node.parent === null ? 0 : 1;
    if (listedBy[index] !== expected) {
      throw malformed(`${label(node, index)} is listed as a child ${listedBy[index]} times`);
    }
  });

  // With consistent links, anything unreachable from the root sits on a cycle.
  const visited = new Array<boolean>(nodes.length).fill(false);
  const stack = [root];
  let reached = 0;
  while (stack.length) {
    const index = stack.pop();
    if (index === undefined) {
      break;
    }
    if (visited[index]) {
      throw malformed(`${label(nodes[index], index)} is reachable twice`);
    }
    visited[index] = true;
    reached += 1;
    stack.push(...nodes[index].children);
  }
  if (reached !== nodes.length) {
    const orphan = visited.indexOf(false);
    throw malformed(`${label(nodes[orphan], orphan)} is not reachable from the root (parent cycle)`);
  }

  return root;
};

const validateMasks = (nodes: readonly PuppetNode[]): void => {
  const claimedBy = new Map<number, number>();
  nodes.forEach((node, index) => {
    if (node.kind !== 'mask') {
      return;
    }
    if (node.mode !== 'mask' && node.mode !== 'dodge') {
      throw malformed(`${label(node, index)} has mask mode "${String(node.mode)}"`);
    }
    node.maskedParts.forEach((target) => {
      const part = Number.isInteger(target) ? nodes[target] : undefined;
      if (!part) {
        throw dangling(`${label(node, index)} masks missing node ${target}`);
      }
      if (part.kind !== 'part') {
        throw malformed(`${label(node, index)} masks ${label(part, target)} which is not a part`);
      }
      const previous = claimedBy.get(target);
      if (previous !== undefined) {
        throw malformed(`${label(part, target)} is masked by both node #${previous} and node #${index}`);
      }
      claimedBy.set(target, index);
    });
  });
};

const validateAxisPoints = (points: readonly number[], owner: string): void => {
  if (!points.length) {
    throw malformed(`${owner} has an empty axis`);
  }
  points.forEach((point, index) => {
    if (!isFiniteNumber(point) || point < 0 || point > 1) {
      throw malformed(`${owner} axis point ${point} is outside [0, 1]`);
    }
    if (index > 0 && point <= points[index - 1]) {
      throw malformed(`${owner} axis points are not strictly ascending`);
    }
  });
};

const validateBinding = (
  binding: BindingDefinition,
  parameter: ParameterDefinition,
  nodes: readonly PuppetNode[],
  owner: string
): void => {
  const target = Number.isInteger(binding.node) ? nodes[binding.node] : undefined;
  if (!target) {
    throw dangling(`${owner} binds missing node ${binding.node}`);
  }
  const [xPoints, yPoints] = parameter.axisPoints;
  const grid: readonly (readonly unknown[])[] = binding.values;
  if (grid.length !== xPoints.length || grid.some((row) => row.length !== yPoints.length)) {
    throw malformed(`${owner} grid does not match the ${xPoints.length}x${yPoints.length} axis points`);
  }

  const property: string = binding.property;
  if (!BINDING_PROPERTIES.includes(property)) {
    throw malformed(`${owner} targets unknown property "${property}"`);
  }
  switch (binding.property) {
    case 'rotation':
    case 'opacity':
      if (!binding.values.every((row) => row.every(isFiniteNumber))) {
        throw malformed(`${owner} has non-finite ${binding.property} values`);
      }
      return;
    case 'translation':
    case 'scale':
      if (!binding.values.every((row) => row.every(isFiniteVec2))) {
        throw malformed(`${owner} has non-finite ${binding.property} values`);
      }
      return;
    case 'vertexDeform': {
      const expected = vertexCountOf(target);
      binding.values.forEach((row) => row.forEach((cell) => {
        if (cell.length !== expected) {
          throw new PuppetLoadError(
            'VertexCountMismatch',
            `${owner} deform cell has ${cell.length} vectors for ${expected} vertices of "${target.name}"`
          );
        }
        if (!cell.every(isFiniteVec2)) {
          throw malformed(`${owner} has non-finite deform vectors`);
        }
      }));
      return;
    }
  }
};

const validateParameters = (parameters: readonly ParameterDefinition[], nodes: readonly PuppetNode[]): void => {
  parameters.forEach((parameter, index) => {
    const owner = `parameter #${index} "${parameter.name}"`;
    if (!isFiniteVec2(parameter.min) || !isFiniteVec2(parameter.max) || !isFiniteVec2(parameter.defaults)) {
      throw malformed(`${owner} has a non-finite range or default`);
    }
    if (parameter.min.x > parameter.max.x || parameter.min.y > parameter.max.y) {
      throw malformed(`${owner} has min greater than max`);
    }
    const [xPoints, yPoints] = parameter.axisPoints;
    validateAxisPoints(xPoints, owner);
    validateAxisPoints(yPoints, owner);
    if (!parameter.isVec2 && yPoints.length !== 1) {
      throw malformed(`${owner} is 1D but has ${yPoints.length} y axis points`);
    }
    parameter.bindings.forEach((binding, bindingIndex) => {
      validateBinding(binding, parameter, nodes, `${owner} binding #${bindingIndex}`);
    });
  });
};

const validatePhysics = (physics: readonly PhysicsDefinition[], nodes: readonly PuppetNode[]): void => {
  const seen = new Set<number>();
  physics.forEach((definition, index) => {
    const owner = `physics #${index}`;
    if (!Number.isInteger(definition.node) || !nodes[definition.node]) {
      throw dangling(`${owner} references missing node ${definition.node}`);
    }
    if (seen.has(definition.node)) {
      throw malformed(`${owner} duplicates physics on node ${definition.node}`);
    }
    seen.add(definition.node);
    if (definition.model !== 'pendulum' && definition.model !== 'spring') {
      throw malformed(`${owner} has unknown model "${String(definition.model)}"`);
    }
    const numbers = [definition.length, definition.gravityScale, definition.damping, definition.restore];
    if (!numbers.every(isFiniteNumber)) {
      throw malformed(`${owner} has non-finite parameters`);
    }
    if (definition.length <= 0) {
      throw malformed(`${owner} has non-positive length ${definition.length}`);
    }
    if (definition.initialAngle !== undefined && !isFiniteNumber(definition.initialAngle)) {
      throw malformed(`${owner} has a non-finite initial angle`);
    }
    if (definition.initialOffset !== undefined && !isFiniteVec2(definition.initialOffset)) {
      throw malformed(`${owner} has a non-finite initial offset`);
    }
  });
};

/**
 * Checks a loader-built source before any runtime structure is created.
 * Throws {@link PuppetLoadError} on the first problem found; returns the root index.
 */
export const validatePuppetSource = (source: PuppetSource): number => {
  const root = validateNodes(source.nodes);
  validateMasks(source.nodes);
  validateParameters(source.parameters, source.nodes);
  validatePhysics(source.physics ?? [], source.nodes);
  return root;
};
