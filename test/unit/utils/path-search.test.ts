import { describe, it, expect } from 'vitest';
import { buildStructureGraph } from 'src/utils/structure-graph';
import { findBondPath, tryFindBondPath } from 'src/utils/path-search';
import { NoPathFoundError } from 'src/reaction/errors';
import { chain, chainBonds, structure } from '../../fixtures/structures';

const linear = () => buildStructureGraph(structure(chain(1, 6), chainBonds(1, 6)));
const hexagon = () => buildStructureGraph(structure(chain(1, 6), [...chainBonds(1, 6), [6, 1]]));

describe('findBondPath', () => {
  it('should return the bond path along a chain', () => {
    expect(findBondPath(linear(), 2, 5)).toEqual({ atoms: [2, 3, 4, 5], length: 3 });
  });

  it('should report length 1 for directly bonded atoms and 0 for the same atom', () => {
    expect(findBondPath(linear(), 3, 4)).toEqual({ atoms: [3, 4], length: 1 });
    expect(findBondPath(linear(), 3, 3)).toEqual({ atoms: [3], length: 0 });
  });

  it('should pick the path through the lower neighbour id when several are shortest', () => {
    // 1 -> 4 in a six-ring: both directions are three bonds long
    const path = findBondPath(hexagon(), 1, 4);
    expect(path.length).toBe(3);
    expect(path.atoms).toEqual([1, 2, 3, 4]);
  });

  it('should find the alternate route when the direct bond is excluded', () => {
    expect(findBondPath(hexagon(), 1, 2, { excludeBond: [1, 2] }).atoms).toEqual([1, 6, 5, 4, 3, 2]);
  });

  it('should raise NoPathFoundError with both atom ids for disconnected atoms', () => {
    const graph = buildStructureGraph(structure(chain(1, 4), [[1, 2], [3, 4]]), { side: 'post' });
    try {
      findBondPath(graph, 1, 4);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(NoPathFoundError);
      if (error instanceof NoPathFoundError) {
        expect(error.startAtomId).toBe(1);
        expect(error.goalAtomId).toBe(4);
        expect(error.message).toBe('No bond path between atoms 1 and 4 (post-reaction structure)');
      }
    }
  });
});

describe('tryFindBondPath', () => {
  it('should return null when the allowed atoms do not connect the endpoints', () => {
    expect(tryFindBondPath(linear(), 1, 4, { within: new Set([1, 2]) })).toBeNull();
  });

  it('should return null for an unknown atom', () => {
    expect(tryFindBondPath(linear(), 1, 40)).toBeNull();
  });
});
