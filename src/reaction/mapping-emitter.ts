import { difference, intersection } from 'es-toolkit';
import type {
  MappingEntry,
  MappingRecord,
  ReactionSide,
  ReactionTemplate,
  Structure,
  TemplateAtom,
  TemplateBond,
  TemplateTerm,
} from 'types';
import { CountMismatchError, InvalidReactionError } from './errors';

export interface MappingInput {
  pre: ReadonlySet<number>;
  post: ReadonlySet<number>;
  reactingAtoms: readonly [number, number];
  deleteAtoms?: readonly number[];
  createAtoms?: readonly number[];
  byproducts?: ReadonlySet<number>;
  /** Edge atom ids, reported in pre template numbering. */
  edgeAtoms?: readonly number[];
}

const ascending = (a: number, b: number) => a - b;

/**
 * Pair the retained atoms of both templates and give them local ids.
 * Persisting atoms share a local id in both templates (ascending atom id);
 * deleted atoms follow in the pre template and created atoms in the post one.
 */
export function emitMapping(input: MappingInput): MappingRecord {
  const preIds = Array.from(input.pre);
  const postIds = Array.from(input.post);
  const deleteAtoms = input.deleteAtoms ?? [];
  const createAtoms = input.createAtoms ?? [];

  for (const id of deleteAtoms) {
    if (!input.pre.has(id) || input.post.has(id)) {
      throw new InvalidReactionError(`Delete atom ${id} must be retained in the pre-reaction template only`);
    }
  }
  for (const id of createAtoms) {
    if (!input.post.has(id) || input.pre.has(id)) {
      throw new InvalidReactionError(`Create atom ${id} must be retained in the post-reaction template only`);
    }
  }

  const remainingPre = difference(preIds, deleteAtoms);
  const remainingPost = difference(postIds, createAtoms);
  const unmatchedPre = difference(remainingPre, remainingPost).sort(ascending);
  const unmatchedPost = difference(remainingPost, remainingPre).sort(ascending);

  if (remainingPre.length !== remainingPost.length || unmatchedPre.length > 0 || unmatchedPost.length > 0) {
    throw new CountMismatchError(remainingPre.length - remainingPost.length, unmatchedPre, unmatchedPost);
  }

  const paired = intersection(remainingPre, remainingPost).sort(ascending);
  const deleted = [...deleteAtoms].sort(ascending);
  const created = [...createAtoms].sort(ascending);

  const preLocalIds = new Map<number, number>();
  const postLocalIds = new Map<number, number>();
  const entries: MappingEntry[] = [];

  paired.forEach((atomId, index) => {
    const localId = index + 1;
    preLocalIds.set(atomId, localId);
    postLocalIds.set(atomId, localId);
    entries.push({ kind: 'pair', atomId, preId: localId, postId: localId, byproduct: input.byproducts?.has(atomId) ?? false });
  });

  deleted.forEach((atomId, index) => {
    const preId = paired.length + index + 1;
    preLocalIds.set(atomId, preId);
    entries.push({ kind: 'delete', atomId, preId });
  });

  created.forEach((atomId, index) => {
    const postId = paired.length + index + 1;
    postLocalIds.set(atomId, postId);
    entries.push({ kind: 'create', atomId, postId });
  });

  const [atomA, atomB] = input.reactingAtoms;
  const initiatorA = preLocalIds.get(atomA);
  const initiatorB = preLocalIds.get(atomB);
  if (initiatorA === undefined || initiatorB === undefined) {
    throw new InvalidReactionError(`Reacting atoms ${atomA} and ${atomB} must both be retained in the pre-reaction template`);
  }

  const edgeIds: number[] = [];
  for (const atomId of input.edgeAtoms ?? []) {
    const localId = preLocalIds.get(atomId);
    if (localId !== undefined) edgeIds.push(localId);
  }

  return {
    entries,
    initiatorIds: [initiatorA, initiatorB],
    edgeIds: edgeIds.sort(ascending),
    deleteIds: deleted.map((_, index) => paired.length + index + 1),
    createIds: created.map((_, index) => paired.length + index + 1),
    preLocalIds,
    postLocalIds,
  };
}

function toLocalIds(atomIds: readonly number[], localIds: ReadonlyMap<number, number>): number[] | null {
  const local: number[] = [];
  for (const atomId of atomIds) {
    const localId = localIds.get(atomId);
    if (localId === undefined) return null;
    local.push(localId);
  }
  return local;
}

// Bonds, angles and dihedrals read the same in either direction; impropers do not.
function termKey(atoms: readonly number[], reversible: boolean): string {
  const forward = atoms.join('-');
  if (!reversible) return forward;
  const backward = [...atoms].reverse().join('-');
  return forward < backward ? forward : backward;
}

function retainedTerms(
  terms: ReadonlyArray<{ atoms: readonly number[]; type?: number }>,
  localIds: ReadonlyMap<number, number>,
  reversible: boolean
): TemplateTerm[] {
  const seen = new Set<string>();
  const kept: TemplateTerm[] = [];
  for (const term of terms) {
    const atoms = toLocalIds(term.atoms, localIds);
    if (!atoms) continue;
    const key = termKey(atoms, reversible);
    if (seen.has(key)) continue;
    seen.add(key);
    kept.push({ type: term.type ?? 1, atoms });
  }
  return kept;
}

/**
 * Cut one side's structure down to the mapped atoms, renumbered to local ids.
 * Bonds and angle, dihedral and improper terms are kept only when all their
 * atoms are retained; repeated entries collapse to the first.
 */
export function buildTemplate(structure: Structure, record: MappingRecord, side: ReactionSide): ReactionTemplate {
  const localIds = side === 'pre' ? record.preLocalIds : record.postLocalIds;

  const atoms: TemplateAtom[] = [];
  for (const atom of structure.atoms) {
    const localId = localIds.get(atom.id);
    if (localId === undefined) continue;
    atoms.push({ localId, atomId: atom.id, type: atom.type, charge: atom.charge, position: [...atom.position] });
  }
  atoms.sort((a, b) => a.localId - b.localId);

  const bondTerms = structure.bonds.map(bond => ({ atoms: [bond.atom1, bond.atom2], type: bond.type }));
  const bonds: TemplateBond[] = [];
  for (const { type, atoms: [atom1, atom2] } of retainedTerms(bondTerms, localIds, true)) {
    if (atom1 !== undefined && atom2 !== undefined) bonds.push({ type, atom1, atom2 });
  }

  return {
    side,
    atoms,
    bonds,
    angles: retainedTerms(structure.angles ?? [], localIds, true),
    dihedrals: retainedTerms(structure.dihedrals ?? [], localIds, true),
    impropers: retainedTerms(structure.impropers ?? [], localIds, false),
  };
}
