// Core types for reaction mapping

export type Vec3 = [number, number, number];

/**
 * Atom of a loaded structure.
 * Ids are shared between the pre- and post-reaction structures when the same
 * physical atom persists through the reaction; type ids are already unified.
 */
export interface StructureAtom {
  id: number; // unique within one structure
  type: number; // unified atom type id
  charge: number;
  position: Vec3;
  element?: string; // e.g. 'C', 'H'; falls back to the elementsByType table
}

export interface StructureBond {
  atom1: number; // atom id
  atom2: number; // atom id
  type?: number; // bond type id (default 1)
}

/**
 * Angle term; the middle atom is the vertex.
 */
export interface StructureAngle {
  atoms: [number, number, number];
  type?: number; // default 1
}

/**
 * Dihedral or improper term over four atoms.
 */
export interface StructureTorsion {
  atoms: [number, number, number, number];
  type?: number; // default 1
}

/**
 * One side of a reaction, as handed over by the data-file reader.
 */
export interface Structure {
  atoms: StructureAtom[];
  bonds: StructureBond[];
  angles?: StructureAngle[];
  dihedrals?: StructureTorsion[];
  impropers?: StructureTorsion[];
}

/**
 * Atom node of a built structure graph. Never mutated after construction.
 */
export interface GraphAtom {
  readonly id: number;
  readonly type: number;
  readonly element: string | null;
  readonly charge: number;
  readonly position: Readonly<Vec3>;
  readonly bonded: readonly number[]; // bonded atom ids, ascending
}

export type ReactionSide = 'pre' | 'post';

/**
 * A reaction to map: both structures, the two atoms whose bond forms or
 * breaks, and the atoms the reaction removes or adds.
 */
export interface Reaction {
  pre: Structure;
  post: Structure;
  reactingAtoms: [number, number];
  deleteAtoms?: number[]; // present only in pre
  createAtoms?: number[]; // present only in post
}

export interface BondPath {
  atoms: number[]; // inclusive of both endpoints
  length: number; // bonds traversed
}

export type MappingEntry =
  | { kind: 'pair'; atomId: number; preId: number; postId: number; byproduct: boolean }
  | { kind: 'delete'; atomId: number; preId: number }
  | { kind: 'create'; atomId: number; postId: number };

/**
 * Local-id correspondence between the two templates.
 * Local ids start at 1 in each template and are contiguous.
 */
export interface MappingRecord {
  entries: MappingEntry[];
  initiatorIds: [number, number]; // pre template ids of the reacting atoms
  edgeIds: number[]; // pre template ids
  deleteIds: number[]; // pre template ids
  createIds: number[]; // post template ids
  preLocalIds: Map<number, number>; // atom id -> pre template id
  postLocalIds: Map<number, number>; // atom id -> post template id
}

export interface TemplateAtom {
  localId: number;
  atomId: number;
  type: number;
  charge: number;
  position: Vec3;
}

export interface TemplateBond {
  type: number;
  atom1: number; // local id
  atom2: number; // local id
}

/**
 * Angle, dihedral or improper term of a template, in local ids.
 */
export interface TemplateTerm {
  type: number;
  atoms: number[];
}

export interface ReactionTemplate {
  side: ReactionSide;
  atoms: TemplateAtom[];
  bonds: TemplateBond[];
  angles: TemplateTerm[];
  dihedrals: TemplateTerm[];
  impropers: TemplateTerm[];
}
