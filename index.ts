export { mapReaction } from 'src/reaction/reaction-mapper';
export type { ReactionMapping } from 'src/reaction/reaction-mapper';
export { resolveMappingConfig, DEFAULT_MAPPING_CONFIG } from 'src/reaction/config';
export type { MappingConfig } from 'src/reaction/config';
export {
  ReactionMappingError,
  DanglingBondError,
  DuplicateAtomError,
  NoPathFoundError,
  CountMismatchError,
  InvalidReactionError,
} from 'src/reaction/errors';
export { buildStructureGraph, StructureGraph } from 'src/utils/structure-graph';
export type { StructureGraphOptions } from 'src/utils/structure-graph';
export { findBondPath, tryFindBondPath } from 'src/utils/path-search';
export { detectReactingRing, isRingOpening } from 'src/reaction/ring-detection';
export {
  initialRetention,
  mirrorWorkingSets,
  findEdgeAtoms,
  findAllEdgeAtoms,
  verifyEdgeAtoms,
  expandBoundary,
  expandForReactingChange,
  stabilizeBoundary,
} from 'src/reaction/boundary-classifier';
export type { BoundaryContext, WorkingSets, StabilizationResult } from 'src/reaction/boundary-classifier';
export { findDetachedFragments, resolveByproducts } from 'src/reaction/byproduct-resolver';
export { emitMapping, buildTemplate } from 'src/reaction/mapping-emitter';
export type { MappingInput } from 'src/reaction/mapping-emitter';
export { writeMapFile } from 'src/generators/map-writer';
export { writeMoleculeTemplate } from 'src/generators/molecule-writer';
export type * from 'types';
