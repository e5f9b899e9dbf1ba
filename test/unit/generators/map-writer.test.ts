import { describe, it, expect } from 'vitest';
import { emitMapping } from 'src/reaction/mapping-emitter';
import { writeMapFile } from 'src/generators/map-writer';

describe('writeMapFile', () => {
  it('should write counts, id sections and equivalences', () => {
    const record = emitMapping({
      pre: new Set([1, 2, 3, 4]),
      post: new Set([1, 2, 3, 5]),
      reactingAtoms: [1, 2],
      deleteAtoms: [4],
      createAtoms: [5],
      edgeAtoms: [3],
    });

    expect(writeMapFile(record)).toBe(
      [
        '# Reaction map generated by reactmap',
        '',
        '3 equivalences',
        '1 edgeIDs',
        '1 deleteIDs',
        '1 createIDs',
        '',
        'InitiatorIDs',
        '',
        '1',
        '2',
        '',
        'EdgeIDs',
        '',
        '3',
        '',
        'DeleteIDs',
        '',
        '4',
        '',
        'CreateIDs',
        '',
        '4',
        '',
        'Equivalences',
        '',
        '1\t1',
        '2\t2',
        '3\t3',
        '',
      ].join('\n')
    );
  });

  it('should omit empty sections and use a custom comment', () => {
    const record = emitMapping({ pre: new Set([7, 8]), post: new Set([7, 8]), reactingAtoms: [8, 7] });
    expect(writeMapFile(record, { comment: 'ester exchange' })).toBe(
      '# ester exchange\n\n2 equivalences\n\nInitiatorIDs\n\n2\n1\n\nEquivalences\n\n1\t1\n2\t2\n'
    );
  });
});
