export { Puppet, createPuppet } from './puppet';
export { PuppetLoadError, isPuppetLoadError } from './puppetErrors';
export type { PuppetLoadErrorKind } from './puppetErrors';
export { validatePuppetSource } from './puppetValidation';
export {
  DEFAULT_PUPPET_RUNTIME_OPTIONS,
  normalizePuppetRuntimeOptions,
} from './runtimeOptions';
export type { PuppetRuntimeOptions } from './runtimeOptions';
export {
  NodeTree,
  composeLocalMatrix,
  createMatrix,
  localDirection,
  worldRotation,
} from './nodeTree';
export type { WorldPose } from './nodeTree';
export { ParameterSystem } from './parameters';
export type { ParameterRef } from './parameters';
export { evaluateBindings, locateOnAxis } from './bindingEngine';
export type { AxisLocation, BindingContributions } from './bindingEngine';
export { PhysicsSolver, planSubsteps } from './physicsSolver';
export type {
  AnchorLookup,
  PhysicsAnchor,
  PhysicsOutput,
  PhysicsState,
  PhysicsTickResult,
} from './physicsSolver';
export { DeformationStack } from './deformationStack';
export { resolveDrawOrder, sortDrawables } from './drawOrder';
export type { DrawPlanGroup } from './drawOrder';
export { loadPuppetDocument, parsePuppetDocument } from './adapters/puppetDocument';
export { NODE_KINDS, hasMesh, zeroTransformOffset } from './puppetModel';
export type {
  BindingDefinition,
  BindingGrid,
  BindingProperty,
  CompositeNode,
  DeformBinding,
  DrawGroup,
  DrawPart,
  FrameResult,
  MaskMode,
  MaskNode,
  MeshData,
  MeshNode,
  NodeKind,
  NodeTransform,
  ParameterDefinition,
  PartNode,
  PhysicsDefinition,
  PhysicsModel,
  PuppetNode,
  PuppetSource,
  ScalarBinding,
  TransformOffset,
  TransformProperty,
  Vec2,
  VectorBinding,
} from './puppetModel';
