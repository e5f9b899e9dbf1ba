import { uniq } from 'es-toolkit';
import type { BondPath, MappingRecord, Reaction, ReactionTemplate } from 'types';
import { buildStructureGraph } from 'src/utils/structure-graph';
import type { StructureGraph } from 'src/utils/structure-graph';
import { tryFindBondPath } from 'src/utils/path-search';
import { resolveMappingConfig } from './config';
import type { MappingConfig } from './config';
import { InvalidReactionError, NoPathFoundError } from './errors';
import { detectReactingRing, isRingOpening } from './ring-detection';
import {
  expandForReactingChange,
  findEdgeAtoms,
  initialRetention,
  mirrorWorkingSets,
  stabilizeBoundary,
} from './boundary-classifier';
import type { BoundaryContext } from './boundary-classifier';
import { findDetachedFragments, resolveByproducts } from './byproduct-resolver';
import { buildTemplate, emitMapping } from './mapping-emitter';

export interface ReactionMapping {
  record: MappingRecord;
  templates: { pre: ReactionTemplate; post: ReactionTemplate };
  paths: { pre: BondPath | null; post: BondPath | null };
  ringOpening: boolean;
  /** Atoms of the ring that opens or closes; empty otherwise. */
  ringAtoms: number[];
  byproducts: number[];
  /** Retained atom ids per side, before renumbering. */
  retained: { pre: number[]; post: number[] };
  iterations: number;
  expansions: number;
}

function validateReaction(reaction: Reaction, pre: StructureGraph, post: StructureGraph): void {
  const [atomA, atomB] = reaction.reactingAtoms;
  if (atomA === atomB) {
    throw new InvalidReactionError(`Reacting atoms must differ, got ${atomA} twice`);
  }
  for (const id of reaction.reactingAtoms) {
    if (!pre.has(id) || !post.has(id)) {
      throw new InvalidReactionError(`Reacting atom ${id} must exist in both pre- and post-reaction structures`);
    }
  }

  const deleteAtoms = reaction.deleteAtoms ?? [];
  const createAtoms = reaction.createAtoms ?? [];
  for (const id of deleteAtoms) {
    if (!pre.has(id) || post.has(id)) {
      throw new InvalidReactionError(`Delete atom ${id} must exist in the pre-reaction structure only`);
    }
  }
  for (const id of createAtoms) {
    if (!post.has(id) || pre.has(id)) {
      throw new InvalidReactionError(`Create atom ${id} must exist in the post-reaction structure only`);
    }
  }
  if (uniq(deleteAtoms).length !== deleteAtoms.length || uniq(createAtoms).length !== createAtoms.length) {
    throw new InvalidReactionError('Delete and create atom lists must not repeat ids');
  }
}

/**
 * Derive both reaction templates and their atom correspondence.
 * Nothing is returned unless every check passes.
 */
export function mapReaction(reaction: Reaction, overrides: Partial<MappingConfig> = {}): ReactionMapping {
  const config = resolveMappingConfig(overrides);
  const graphOptions = { elementsByType: config.elementsByType, hydrogenTypes: config.hydrogenTypes };
  const pre = buildStructureGraph(reaction.pre, { ...graphOptions, side: 'pre' });
  const post = buildStructureGraph(reaction.post, { ...graphOptions, side: 'post' });
  validateReaction(reaction, pre, post);

  const [atomA, atomB] = reaction.reactingAtoms;
  const prePath = tryFindBondPath(pre, atomA, atomB);
  const postPath = tryFindBondPath(post, atomA, atomB);
  if (!prePath && !postPath) {
    throw new NoPathFoundError(atomA, atomB, 'disconnected in both pre- and post-reaction structures');
  }
  const pathAtoms = uniq([...(prePath?.atoms ?? []), ...(postPath?.atoms ?? [])]);

  const preRing = detectReactingRing(pre, atomA, atomB);
  const postRing = detectReactingRing(post, atomA, atomB);
  const ringOpening = isRingOpening(preRing, postRing);
  const openingRing = ringOpening ? preRing ?? postRing : null;
  const ringAtoms = openingRing?.ringAtoms ?? [];

  const context: BoundaryContext = {
    pre,
    post,
    exempt: new Set([...(reaction.deleteAtoms ?? []), ...(reaction.createAtoms ?? [])]),
    config,
  };

  const initial = initialRetention(context, pathAtoms, openingRing?.preservedAtoms);
  for (const id of findDetachedFragments(post, reaction.reactingAtoms)) {
    initial.post.add(id);
  }
  mirrorWorkingSets(context, initial);
  const reactingExpansions = expandForReactingChange(context, initial, reaction.reactingAtoms);

  const stable = stabilizeBoundary(context, initial);

  const byproducts = new Set([
    ...resolveByproducts(pre, stable.pre, pathAtoms),
    ...resolveByproducts(post, stable.post, pathAtoms),
  ]);

  if (config.verbose) {
    console.debug(
      `[reaction] path length pre=${prePath?.length ?? 'none'} post=${postPath?.length ?? 'none'}, ` +
        `ring opening=${ringOpening}, retained pre=${stable.pre.size} post=${stable.post.size}, ` +
        `byproducts=[${Array.from(byproducts).join(', ')}]`
    );
  }

  const record = emitMapping({
    pre: stable.pre,
    post: stable.post,
    reactingAtoms: reaction.reactingAtoms,
    deleteAtoms: reaction.deleteAtoms,
    createAtoms: reaction.createAtoms,
    byproducts,
    edgeAtoms: findEdgeAtoms(pre, stable.pre, context.exempt),
  });

  return {
    record,
    templates: {
      pre: buildTemplate(reaction.pre, record, 'pre'),
      post: buildTemplate(reaction.post, record, 'post'),
    },
    paths: { pre: prePath, post: postPath },
    ringOpening,
    ringAtoms,
    byproducts: Array.from(byproducts).sort((a, b) => a - b),
    retained: {
      pre: Array.from(stable.pre).sort((a, b) => a - b),
      post: Array.from(stable.post).sort((a, b) => a - b),
    },
    iterations: stable.iterations,
    expansions: reactingExpansions + stable.expansions,
  };
}
