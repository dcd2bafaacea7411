import { evaluateBindings, transformOffsetFor } from './bindingEngine';
import { DeformationStack } from './deformationStack';
import { resolveDrawOrder, type DrawPlanGroup } from './drawOrder';
import { NodeTree, localDirection, worldRotation, type WorldPose } from './nodeTree';
import { ParameterSystem, type ParameterRef } from './parameters';
import {
  PhysicsSolver,
  type PhysicsAnchor,
  type PhysicsOutput,
  type PhysicsState,
} from './physicsSolver';
import type {
  DrawGroup,
  DrawPart,
  FrameResult,
  PuppetSource,
  TransformOffset,
  Vec2,
} from './puppetModel';
import { validatePuppetSource } from './puppetValidation';
import { normalizePuppetRuntimeOptions, type PuppetRuntimeOptions } from './runtimeOptions';

const NO_PHYSICS: PhysicsOutput = {
  rotations: new Map(),
  displacements: new Map(),
};

const WORLD_DOWN: Vec2 = { x: 0, y: 1 };

const sanitizeFrameTime = (dt: number): number => {
  if (Number.isFinite(dt) && dt >= 0) {
    return dt;
  }
  console.warn(`Ignoring invalid frame time ${dt}; advancing by 0.`);
  return 0;
};

/**
 * A loaded puppet and its per-frame evaluation. Construction validates the
 * whole source and throws PuppetLoadError before anything is built.
 *
 * Frame order: bindings, physics tick, deformation (with the physics output
 * of the previous tick), transform propagation, draw order.
 */
export class Puppet {
  readonly name: string;
  readonly tree: NodeTree;
  readonly parameters: ParameterSystem;
  readonly options: PuppetRuntimeOptions;
  private readonly physics: PhysicsSolver;
  private readonly deformation: DeformationStack;
  private previousPose: WorldPose;
  private frameCount = 0;

  constructor(source: PuppetSource, options?: Partial<PuppetRuntimeOptions> | null) {
    const root = validatePuppetSource(source);
    this.name = source.name ?? '';
    this.options = normalizePuppetRuntimeOptions(options);
    this.tree = new NodeTree(source.nodes, root);
    this.parameters = new ParameterSystem(Object.freeze(structuredClone(source.parameters)));
    this.physics = new PhysicsSolver(
      structuredClone(source.physics ?? []),
      this.options,
      (node) => this.tree.get(node)?.name ?? `#${node}`
    );
    this.deformation = new DeformationStack(this.tree);
    this.previousPose = this.tree.propagate();
  }

  get frame(): number {
    return this.frameCount;
  }

  get physicsResets(): number {
    return this.physics.divergences;
  }

  setParameter(ref: ParameterRef, x: number, y?: number): boolean {
    return this.parameters.setValue(ref, x, y);
  }

  resetParameters(): void {
    this.parameters.reset();
  }

  resetPhysics(): void {
    this.physics.reset();
  }

  physicsState(): PhysicsState[] {
    return this.physics.snapshot();
  }

  describe(): string {
    return this.tree.describe();
  }

  update(dt: number): FrameResult {
    const step = sanitizeFrameTime(dt);
    const contributions = evaluateBindings(this.parameters);

    // Read before the tick: this frame deforms with last tick's result.
    const lagged = this.options.physicsEnabled ? this.physics.output() : NO_PHYSICS;
    if (this.options.physicsEnabled) {
      const previous = this.previousPose;
      this.physics.tick(step, (state) => this.physicsAnchor(state, previous));
    }

    const offsets = this.applyPhysicsOffsets(contributions.transforms, lagged);
    const locals = new Map<number, Float64Array>();
    this.tree.nodes.forEach((node, index) => {
      if (node.kind !== 'composite') {
        locals.set(
          index,
          this.deformation.compose(index, contributions.deforms.get(index), lagged.displacements.get(index))
        );
      }
    });

    const pose = this.tree.propagate(offsets);
    const groups = resolveDrawOrder(this.tree).flatMap((group) => this.buildGroup(group, locals, pose));

    this.previousPose = pose;
    this.frameCount += 1;
    return {
      frame: this.frameCount,
      dt: step,
      groups,
      physicsResets: this.physics.divergences,
    };
  }

  private physicsAnchor(state: PhysicsState, pose: WorldPose): PhysicsAnchor {
    const node = this.tree.get(state.node);
    const parent = node?.parent ?? null;
    const parentMatrix = parent === null ? undefined : pose.matrices[parent];
    // A mesh spring moves the node's own vertices; a composite spring becomes
    // a translation in its parent's frame.
    const frame = state.model === 'spring' && node && node.kind !== 'composite'
      ? pose.matrices[state.node]
      : parentMatrix;
    return {
      rotation: parentMatrix ? worldRotation(parentMatrix) : 0,
      down: frame ? localDirection(frame, WORLD_DOWN) : { ...WORLD_DOWN },
    };
  }

  private applyPhysicsOffsets(
    offsets: Map<number, TransformOffset>,
    physics: PhysicsOutput
  ): Map<number, TransformOffset> {
    physics.rotations.forEach((degrees, node) => {
      transformOffsetFor(offsets, node).rotation += degrees;
    });
    // Meshless nodes take a spring displacement as a translation instead.
    physics.displacements.forEach((displacement, node) => {
      if (this.tree.get(node)?.kind === 'composite') {
        const offset = transformOffsetFor(offsets, node);
        offset.translation.x += displacement.x;
        offset.translation.y += displacement.y;
      }
    });
    return offsets;
  }

  private drawPart(node: number, locals: Map<number, Float64Array>, pose: WorldPose): DrawPart | undefined {
    const local = locals.get(node);
    if (!local) {
      return undefined;
    }
    return this.deformation.emit(node, local, pose.matrices[node], pose.opacities[node]);
  }

  private buildGroup(group: DrawPlanGroup, locals: Map<number, Float64Array>, pose: WorldPose): DrawGroup[] {
    if (group.kind === 'part') {
      const part = this.drawPart(group.node, locals, pose);
      return part ? [{ kind: 'part', part }] : [];
    }
    const maskSource = this.drawPart(group.maskSource, locals, pose);
    if (!maskSource) {
      return [];
    }
    const maskedParts = group.maskedParts.flatMap((node) => {
      const part = this.drawPart(node, locals, pose);
      return part ? [part] : [];
    });
    return [{ kind: 'masked', mode: group.mode, maskSource, maskedParts }];
  }
}

export const createPuppet = (
  source: PuppetSource,
  options?: Partial<PuppetRuntimeOptions> | null
): Puppet => new Puppet(source, options);
