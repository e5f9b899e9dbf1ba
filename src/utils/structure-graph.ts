import type { GraphAtom, ReactionSide, Structure } from 'types';
import { DanglingBondError, DuplicateAtomError, InvalidReactionError } from 'src/reaction/errors';
import { MAX_SHELL_RADIUS } from 'src/reaction/config';
import { Graph, bfsDistances } from './graph';

export interface StructureGraphOptions {
  elementsByType?: readonly string[];
  hydrogenTypes?: readonly number[];
  side?: ReactionSide;
}

function checkRadius(radius: number): void {
  if (!Number.isInteger(radius) || radius < 1 || radius > MAX_SHELL_RADIUS) {
    throw new RangeError(`Neighbour radius must be between 1 and ${MAX_SHELL_RADIUS}, got ${radius}`);
  }
}

/**
 * Connectivity of one side of a reaction.
 * Neighbour shells are computed on first use and cached per atom.
 */
export class StructureGraph {
  readonly side: ReactionSide | undefined;
  private readonly hydrogenTypes: ReadonlySet<number>;
  private shellCache = new Map<number, Map<number, number>>();

  constructor(readonly graph: Graph<GraphAtom>, options: StructureGraphOptions = {}) {
    this.side = options.side;
    this.hydrogenTypes = new Set(options.hydrogenTypes ?? []);
  }

  has(id: number): boolean {
    return this.graph.hasNode(id);
  }

  atom(id: number): GraphAtom | undefined {
    return this.graph.getNodeData(id);
  }

  atomIds(): number[] {
    return this.graph.getNodes();
  }

  size(): number {
    return this.graph.nodeCount();
  }

  typeOf(id: number): number | undefined {
    return this.graph.getNodeData(id)?.type;
  }

  bonded(id: number): readonly number[] {
    return this.graph.getNodeData(id)?.bonded ?? [];
  }

  hasBond(a: number, b: number): boolean {
    return this.graph.hasEdge(a, b);
  }

  isHydrogen(id: number): boolean {
    const atom = this.graph.getNodeData(id);
    if (!atom) return false;
    if (this.hydrogenTypes.has(atom.type)) return true;
    return atom.element !== null && atom.element.toUpperCase() === 'H';
  }

  /**
   * Atoms exactly `radius` bonds away from `id`.
   */
  neighbors(id: number, radius = 1): Set<number> {
    checkRadius(radius);
    const result = new Set<number>();
    for (const [atomId, distance] of this.shells(id)) {
      if (distance === radius) result.add(atomId);
    }
    return result;
  }

  /**
   * Atoms 1..`radius` bonds away from `id`, origin excluded.
   */
  neighborhood(id: number, radius: number): Set<number> {
    checkRadius(radius);
    const result = new Set<number>();
    for (const [atomId, distance] of this.shells(id)) {
      if (distance > 0 && distance <= radius) result.add(atomId);
    }
    return result;
  }

  private shells(id: number): Map<number, number> {
    let distances = this.shellCache.get(id);
    if (!distances) {
      distances = bfsDistances(this.graph, id, { maxDepth: MAX_SHELL_RADIUS });
      this.shellCache.set(id, distances);
    }
    return distances;
  }
}

function resolveElement(
  element: string | undefined,
  type: number,
  elementsByType: readonly string[] | undefined
): string | null {
  if (element) return element;
  return elementsByType?.[type - 1] ?? null;
}

export function buildStructureGraph(structure: Structure, options: StructureGraphOptions = {}): StructureGraph {
  const graph = new Graph<GraphAtom>();
  const bondedIds = new Map<number, number[]>();

  for (const atom of structure.atoms) {
    if (bondedIds.has(atom.id)) {
      throw new DuplicateAtomError(atom.id, options.side);
    }
    bondedIds.set(atom.id, []);
  }

  for (const bond of structure.bonds) {
    const pair = [bond.atom1, bond.atom2] as const;
    if (bond.atom1 === bond.atom2) {
      throw new InvalidReactionError(`Bond ${bond.atom1}-${bond.atom2} joins an atom to itself`);
    }
    const first = bondedIds.get(bond.atom1);
    if (!first) throw new DanglingBondError(pair, bond.atom1, options.side);
    const second = bondedIds.get(bond.atom2);
    if (!second) throw new DanglingBondError(pair, bond.atom2, options.side);

    if (!first.includes(bond.atom2)) {
      first.push(bond.atom2);
      second.push(bond.atom1);
    }
  }

  const terms: Array<[string, ReadonlyArray<{ atoms: readonly number[] }>]> = [
    ['Angle', structure.angles ?? []],
    ['Dihedral', structure.dihedrals ?? []],
    ['Improper', structure.impropers ?? []],
  ];
  for (const [label, entries] of terms) {
    for (const { atoms } of entries) {
      const missing = atoms.find(id => !bondedIds.has(id));
      if (missing !== undefined) {
        const where = options.side ? ` in ${options.side}-reaction structure` : '';
        throw new InvalidReactionError(
          `${label} ${atoms.join('-')} references atom ${missing}, which does not exist${where}`
        );
      }
    }
  }

  for (const atom of structure.atoms) {
    const bonded = (bondedIds.get(atom.id) ?? []).sort((a, b) => a - b);
    graph.addNode(atom.id, {
      id: atom.id,
      type: atom.type,
      element: resolveElement(atom.element, atom.type, options.elementsByType),
      charge: atom.charge,
      position: [...atom.position],
      bonded,
    });
  }

  for (const [id, bonded] of bondedIds) {
    for (const other of bonded) {
      if (id < other) graph.addEdge(id, other);
    }
  }

  return new StructureGraph(graph, options);
}
