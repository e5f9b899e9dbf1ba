import type { BondPath } from 'types';
import { NoPathFoundError } from 'src/reaction/errors';
import { findShortestPath } from './graph';
import type { StructureGraph } from './structure-graph';

export interface PathSearchOptions {
  /** Search as if this bond were absent. */
  excludeBond?: readonly [number, number];
  /** Only traverse atoms in this set; the goal atom is always accepted. */
  within?: ReadonlySet<number>;
}

/**
 * Shortest bond path between two atoms, or null if they are disconnected.
 * Among equally short paths the one reached first by an ascending-id
 * frontier wins.
 */
export function tryFindBondPath(
  structure: StructureGraph,
  start: number,
  goal: number,
  options: PathSearchOptions = {}
): BondPath | null {
  const atoms = findShortestPath(structure.graph, start, goal, {
    excludeEdge: options.excludeBond,
    within: options.within,
  });
  if (!atoms) return null;
  return { atoms, length: atoms.length - 1 };
}

export function findBondPath(
  structure: StructureGraph,
  start: number,
  goal: number,
  options: PathSearchOptions = {}
): BondPath {
  const path = tryFindBondPath(structure, start, goal, options);
  if (!path) {
    const where = structure.side ? `${structure.side}-reaction structure` : undefined;
    throw new NoPathFoundError(start, goal, where);
  }
  return path;
}
