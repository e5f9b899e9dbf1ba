import { uniq } from 'es-toolkit';
import type { StructureGraph } from 'src/utils/structure-graph';
import type { MappingConfig } from './config';

export interface BoundaryContext {
  pre: StructureGraph;
  post: StructureGraph;
  /** Declared delete and create atoms: always kept, never edge atoms. */
  exempt: ReadonlySet<number>;
  config: MappingConfig;
}

export interface WorkingSets {
  pre: Set<number>;
  post: Set<number>;
}

export interface StabilizationResult extends WorkingSets {
  iterations: number;
  /** Edge-atom expansions applied across all iterations. */
  expansions: number;
}

/**
 * Copy every atom that exists in both structures into the other side's set,
 * so persisting atoms are always retained on both sides.
 */
export function mirrorWorkingSets(context: BoundaryContext, sets: WorkingSets): void {
  for (const id of sets.pre) {
    if (context.post.has(id)) sets.post.add(id);
  }
  for (const id of sets.post) {
    if (context.pre.has(id)) sets.pre.add(id);
  }
}

function retainAround(structure: StructureGraph, set: Set<number>, atomId: number, radius: number): void {
  if (!structure.has(atomId)) return;
  set.add(atomId);
  for (const id of structure.neighborhood(atomId, radius)) set.add(id);
}

/**
 * Starting working sets: everything within `initialRadius` bonds of the
 * path atoms, the atoms preserved around an opening ring, and the declared
 * delete/create atoms.
 */
export function initialRetention(
  context: BoundaryContext,
  pathAtoms: Iterable<number>,
  preservedAtoms: Iterable<number> = []
): WorkingSets {
  const sets: WorkingSets = { pre: new Set(), post: new Set() };
  const { initialRadius } = context.config;

  for (const atomId of pathAtoms) {
    retainAround(context.pre, sets.pre, atomId, initialRadius);
    retainAround(context.post, sets.post, atomId, initialRadius);
  }

  for (const atomId of [...preservedAtoms, ...context.exempt]) {
    if (context.pre.has(atomId)) sets.pre.add(atomId);
    if (context.post.has(atomId)) sets.post.add(atomId);
  }

  mirrorWorkingSets(context, sets);
  return sets;
}

/**
 * Retained atoms bonded to at least one atom outside the set.
 * Hydrogens and exempt atoms are never edge atoms.
 */
export function findEdgeAtoms(
  structure: StructureGraph,
  workingSet: ReadonlySet<number>,
  exempt: ReadonlySet<number> = new Set()
): number[] {
  const edges: number[] = [];
  for (const atomId of workingSet) {
    if (exempt.has(atomId) || structure.isHydrogen(atomId)) continue;
    if (structure.bonded(atomId).some(neighbor => !workingSet.has(neighbor))) {
      edges.push(atomId);
    }
  }
  return edges.sort((a, b) => a - b);
}

function typeChanged(context: BoundaryContext, atomId: number): boolean {
  const preType = context.pre.typeOf(atomId);
  const postType = context.post.typeOf(atomId);
  return preType !== undefined && postType !== undefined && preType !== postType;
}

function shellChanged(context: BoundaryContext, atomId: number, radius: number): boolean {
  const shell = new Set([...context.pre.neighbors(atomId, radius), ...context.post.neighbors(atomId, radius)]);
  for (const id of shell) {
    if (typeChanged(context, id)) return true;
  }
  return false;
}

/**
 * Decide how far the boundary must grow past each edge atom.
 * @returns Edge atom id -> extra hops; edge atoms needing nothing are absent
 */
export function verifyEdgeAtoms(context: BoundaryContext, edgeAtoms: readonly number[]): Map<number, number> {
  const { selfChangeHops, firstShellChangeHops, secondShellChangeHops } = context.config;
  const expansions = new Map<number, number>();

  for (const atomId of edgeAtoms) {
    if (context.exempt.has(atomId)) continue;

    if (typeChanged(context, atomId)) {
      expansions.set(atomId, selfChangeHops);
    } else if (shellChanged(context, atomId, 1)) {
      expansions.set(atomId, firstShellChangeHops);
    } else if (shellChanged(context, atomId, 2)) {
      expansions.set(atomId, secondShellChangeHops);
    }
  }

  return expansions;
}

/**
 * Grow both working sets around the given edge atoms.
 * @returns Number of atoms added across both sets
 */
export function expandBoundary(context: BoundaryContext, sets: WorkingSets, expansions: ReadonlyMap<number, number>): number {
  const before = sets.pre.size + sets.post.size;

  for (const [atomId, hops] of expansions) {
    retainAround(context.pre, sets.pre, atomId, hops);
    retainAround(context.post, sets.post, atomId, hops);
  }
  mirrorWorkingSets(context, sets);

  return sets.pre.size + sets.post.size - before;
}

/**
 * When a reacting atom itself changes type, grow every current edge atom by
 * `selfChangeHops`, as an edge atom with a type change would be.
 * @returns Number of edge atoms expanded
 */
export function expandForReactingChange(
  context: BoundaryContext,
  sets: WorkingSets,
  reactingAtoms: readonly number[]
): number {
  if (!reactingAtoms.some(atomId => typeChanged(context, atomId))) return 0;

  const edges = findAllEdgeAtoms(context, sets);
  const hops = context.config.selfChangeHops;
  const added = expandBoundary(context, sets, new Map<number, number>(edges.map(atomId => [atomId, hops])));
  if (context.config.verbose) {
    console.debug(`[boundary] reacting atom type changed: expanded ${edges.length} edge atoms, ${added} atoms added`);
  }
  return edges.length;
}

export function findAllEdgeAtoms(context: BoundaryContext, sets: WorkingSets): number[] {
  return uniq([
    ...findEdgeAtoms(context.pre, sets.pre, context.exempt),
    ...findEdgeAtoms(context.post, sets.post, context.exempt),
  ]).sort((a, b) => a - b);
}

/**
 * Expand the working sets until no edge atom sits too close to a type change.
 * Sets only grow and are bounded by the structure sizes, so the loop ends;
 * every iteration that finds required expansions adds at least one atom.
 */
export function stabilizeBoundary(context: BoundaryContext, sets: WorkingSets): StabilizationResult {
  const pre = new Set(sets.pre);
  const post = new Set(sets.post);
  const working: WorkingSets = { pre, post };
  let iterations = 0;
  let expansions = 0;

  for (;;) {
    iterations++;
    const edges = findAllEdgeAtoms(context, working);
    const required = verifyEdgeAtoms(context, edges);
    if (required.size === 0) break;

    const added = expandBoundary(context, working, required);
    expansions += required.size;
    if (context.config.verbose) {
      console.debug(
        `[boundary] iteration ${iterations}: expanded ${required.size} edge atoms ` +
          `(${Array.from(required, ([id, hops]) => `${id}+${hops}`).join(', ')}), ${added} atoms added`
      );
    }
    if (added === 0) break;
  }

  return { pre, post, iterations, expansions };
}
