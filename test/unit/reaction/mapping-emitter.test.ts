import { describe, it, expect } from 'vitest';
import { buildTemplate, emitMapping } from 'src/reaction/mapping-emitter';
import { CountMismatchError, InvalidReactionError } from 'src/reaction/errors';
import { atom, structure } from '../../fixtures/structures';

describe('emitMapping', () => {
  it('should number persisting atoms identically in both templates', () => {
    const record = emitMapping({
      pre: new Set([30, 10, 20]),
      post: new Set([20, 30, 10]),
      reactingAtoms: [20, 30],
      edgeAtoms: [30, 10],
    });
    expect(record.entries).toEqual([
      { kind: 'pair', atomId: 10, preId: 1, postId: 1, byproduct: false },
      { kind: 'pair', atomId: 20, preId: 2, postId: 2, byproduct: false },
      { kind: 'pair', atomId: 30, preId: 3, postId: 3, byproduct: false },
    ]);
    expect(record.initiatorIds).toEqual([2, 3]);
    expect(record.edgeIds).toEqual([1, 3]);
  });

  it('should emit one delete and one create entry for one deleted and one created atom', () => {
    const record = emitMapping({
      pre: new Set([1, 2, 3, 4]),
      post: new Set([1, 2, 3, 5]),
      reactingAtoms: [1, 2],
      deleteAtoms: [4],
      createAtoms: [5],
    });
    expect(record.entries.filter(entry => entry.kind === 'delete')).toEqual([{ kind: 'delete', atomId: 4, preId: 4 }]);
    expect(record.entries.filter(entry => entry.kind === 'create')).toEqual([{ kind: 'create', atomId: 5, postId: 4 }]);
    expect(record.entries.filter(entry => entry.kind === 'pair')).toHaveLength(3);
    expect(record.deleteIds).toEqual([4]);
    expect(record.createIds).toEqual([4]);
    expect(record.preLocalIds.get(4)).toBe(4);
    expect(record.postLocalIds.has(4)).toBe(false);
  });

  it('should mark byproduct atoms on their self pairing', () => {
    const record = emitMapping({
      pre: new Set([1, 2, 3]),
      post: new Set([1, 2, 3]),
      reactingAtoms: [1, 2],
      byproducts: new Set([3]),
    });
    expect(record.entries[2]).toEqual({ kind: 'pair', atomId: 3, preId: 3, postId: 3, byproduct: true });
  });

  it('should raise CountMismatchError with the delta when counts differ', () => {
    try {
      emitMapping({ pre: new Set([1, 2, 3, 4]), post: new Set([1, 2, 3]), reactingAtoms: [1, 2] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CountMismatchError);
      if (error instanceof CountMismatchError) {
        expect(error.delta).toBe(1);
        expect(error.unmatchedPre).toEqual([4]);
        expect(error.unmatchedPost).toEqual([]);
      }
    }
  });

  it('should raise CountMismatchError when equal counts hold different atoms', () => {
    try {
      emitMapping({ pre: new Set([1, 2, 3]), post: new Set([1, 2, 4]), reactingAtoms: [1, 2] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CountMismatchError);
      if (error instanceof CountMismatchError) {
        expect(error.delta).toBe(0);
        expect(error.unmatchedPre).toEqual([3]);
        expect(error.unmatchedPost).toEqual([4]);
      }
    }
  });

  it('should satisfy count symmetry whenever it succeeds', () => {
    const pre = new Set([1, 2, 3, 4, 6]);
    const post = new Set([1, 2, 3, 5]);
    const record = emitMapping({ pre, post, reactingAtoms: [1, 2], deleteAtoms: [4, 6], createAtoms: [5] });
    const pairs = record.entries.filter(entry => entry.kind === 'pair').length;
    expect(pairs).toBe(3);
    expect(pairs + record.deleteIds.length).toBe(record.preLocalIds.size);
    expect(pairs + record.createIds.length).toBe(record.postLocalIds.size);
  });

  it('should reject a delete atom that is not retained in the pre template only', () => {
    expect(() =>
      emitMapping({ pre: new Set([1, 2]), post: new Set([1, 2]), reactingAtoms: [1, 2], deleteAtoms: [2] })
    ).toThrow(InvalidReactionError);
  });

  it('should reject reacting atoms missing from the templates', () => {
    expect(() => emitMapping({ pre: new Set([1, 2]), post: new Set([1, 2]), reactingAtoms: [1, 9] })).toThrow(
      InvalidReactionError
    );
  });
});

describe('buildTemplate', () => {
  it('should renumber retained atoms and keep only bonds between them', () => {
    const pre = structure([atom(10), atom(20), atom(30), atom(40, 2, 'H')], [[10, 20], [20, 30], [30, 40]]);
    pre.bonds[1] = { atom1: 20, atom2: 30, type: 2 };
    const record = emitMapping({
      pre: new Set([20, 30, 40]),
      post: new Set([20, 30]),
      reactingAtoms: [20, 30],
      deleteAtoms: [40],
    });

    const template = buildTemplate(pre, record, 'pre');
    expect(template.atoms).toEqual([
      { localId: 1, atomId: 20, type: 1, charge: 0, position: [20, 0, 0] },
      { localId: 2, atomId: 30, type: 1, charge: 0, position: [30, 0, 0] },
      { localId: 3, atomId: 40, type: 2, charge: 0, position: [40, 0, 0] },
    ]);
    expect(template.bonds).toEqual([
      { type: 2, atom1: 1, atom2: 2 },
      { type: 1, atom1: 2, atom2: 3 },
    ]);
  });

  it('should keep each retained bond, angle, dihedral and improper once', () => {
    const pre = structure([atom(1), atom(2), atom(3), atom(4), atom(5)], [[1, 2], [2, 1], [2, 3], [3, 4], [4, 5]]);
    pre.angles = [{ atoms: [1, 2, 3] }, { atoms: [3, 2, 1] }, { atoms: [2, 3, 4], type: 2 }, { atoms: [3, 4, 5] }];
    pre.dihedrals = [{ atoms: [1, 2, 3, 4] }, { atoms: [2, 3, 4, 5] }];
    pre.impropers = [{ atoms: [2, 1, 3, 4] }, { atoms: [2, 3, 1, 4] }, { atoms: [2, 1, 3, 4] }];
    const record = emitMapping({ pre: new Set([1, 2, 3, 4]), post: new Set([1, 2, 3, 4]), reactingAtoms: [1, 2] });

    const template = buildTemplate(pre, record, 'pre');
    expect(template.bonds).toEqual([
      { type: 1, atom1: 1, atom2: 2 },
      { type: 1, atom1: 2, atom2: 3 },
      { type: 1, atom1: 3, atom2: 4 },
    ]);
    expect(template.angles).toEqual([
      { type: 1, atoms: [1, 2, 3] },
      { type: 2, atoms: [2, 3, 4] },
    ]);
    expect(template.dihedrals).toEqual([{ type: 1, atoms: [1, 2, 3, 4] }]);
    // an improper's atom order matters: only the exact repeat collapses
    expect(template.impropers).toEqual([
      { type: 1, atoms: [2, 1, 3, 4] },
      { type: 1, atoms: [2, 3, 1, 4] },
    ]);
  });
});
