import { difference } from 'es-toolkit';
import type { StructureGraph } from 'src/utils/structure-graph';
import { bfsDistances } from 'src/utils/graph';

function reachableFrom(
  structure: StructureGraph,
  anchors: Iterable<number>,
  within?: ReadonlySet<number>
): Set<number> {
  const reached = new Set<number>();
  for (const anchor of anchors) {
    if (!structure.has(anchor) || reached.has(anchor)) continue;
    if (within && !within.has(anchor)) continue;
    for (const id of bfsDistances(structure.graph, anchor, { within }).keys()) {
      reached.add(id);
    }
  }
  return reached;
}

/**
 * Atoms of the whole structure with no bond path to any anchor atom,
 * such as a small molecule split off by a condensation.
 */
export function findDetachedFragments(structure: StructureGraph, anchors: Iterable<number>): number[] {
  const reached = reachableFrom(structure, anchors);
  return difference(structure.atomIds(), Array.from(reached)).sort((a, b) => a - b);
}

/**
 * Retained atoms cut off from the reacting-bond path atoms once only bonds
 * between retained atoms are considered.
 */
export function resolveByproducts(
  structure: StructureGraph,
  workingSet: ReadonlySet<number>,
  pathAtoms: Iterable<number>
): Set<number> {
  const reached = reachableFrom(structure, pathAtoms, workingSet);
  const byproducts = new Set<number>();
  for (const id of workingSet) {
    if (!reached.has(id)) byproducts.add(id);
  }
  return byproducts;
}
