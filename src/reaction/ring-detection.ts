import { uniq } from 'es-toolkit';
import type { StructureGraph } from 'src/utils/structure-graph';
import { tryFindBondPath } from 'src/utils/path-search';

export interface ReactingRing {
  /** Atoms of the smallest ring through the reacting bond. */
  ringAtoms: number[];
  /** Ring atoms plus their immediate neighbours. */
  preservedAtoms: Set<number>;
}

/**
 * Whether the reacting bond closes a ring in this structure.
 * The bond is dropped and an alternate route between its atoms is searched;
 * a structure in which the two atoms are not bonded has no reacting ring.
 */
export function detectReactingRing(structure: StructureGraph, atomA: number, atomB: number): ReactingRing | null {
  if (!structure.hasBond(atomA, atomB)) return null;

  const alternate = tryFindBondPath(structure, atomA, atomB, { excludeBond: [atomA, atomB] });
  if (!alternate) return null;

  const ringAtoms = uniq(alternate.atoms);
  const preservedAtoms = new Set<number>(ringAtoms);
  for (const atomId of ringAtoms) {
    for (const neighbor of structure.bonded(atomId)) preservedAtoms.add(neighbor);
  }

  return { ringAtoms, preservedAtoms };
}

/**
 * A ring opens (or closes) when exactly one side has the reacting bond in a ring.
 */
export function isRingOpening(preRing: ReactingRing | null, postRing: ReactingRing | null): boolean {
  return (preRing === null) !== (postRing === null);
}
