import type { ReactionSide } from 'types';

/**
 * Base class of every failure raised while mapping a reaction.
 * A mapping is either produced whole or not at all.
 */
export class ReactionMappingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DanglingBondError extends ReactionMappingError {
  readonly bond: readonly [number, number];
  readonly missingAtomId: number;
  readonly side: ReactionSide | undefined;

  constructor(bond: readonly [number, number], missingAtomId: number, side?: ReactionSide) {
    const where = side ? ` in ${side}-reaction structure` : '';
    super(`Bond ${bond[0]}-${bond[1]} references atom ${missingAtomId}, which does not exist${where}`);
    this.bond = bond;
    this.missingAtomId = missingAtomId;
    this.side = side;
  }
}

export class DuplicateAtomError extends ReactionMappingError {
  readonly atomId: number;

  constructor(atomId: number, side?: ReactionSide) {
    const where = side ? ` in ${side}-reaction structure` : '';
    super(`Atom id ${atomId} is defined more than once${where}`);
    this.atomId = atomId;
  }
}

export class NoPathFoundError extends ReactionMappingError {
  readonly startAtomId: number;
  readonly goalAtomId: number;

  constructor(startAtomId: number, goalAtomId: number, detail?: string) {
    super(`No bond path between atoms ${startAtomId} and ${goalAtomId}${detail ? ` (${detail})` : ''}`);
    this.startAtomId = startAtomId;
    this.goalAtomId = goalAtomId;
  }
}

export class CountMismatchError extends ReactionMappingError {
  /** Remaining pre count minus remaining post count. */
  readonly delta: number;
  readonly unmatchedPre: readonly number[];
  readonly unmatchedPost: readonly number[];

  constructor(delta: number, unmatchedPre: readonly number[], unmatchedPost: readonly number[]) {
    super(
      `Pre- and post-reaction templates do not pair up (count delta ${delta}); ` +
        `unmatched pre atoms: [${unmatchedPre.join(', ')}], unmatched post atoms: [${unmatchedPost.join(', ')}]`
    );
    this.delta = delta;
    this.unmatchedPre = unmatchedPre;
    this.unmatchedPost = unmatchedPost;
  }
}

export class InvalidReactionError extends ReactionMappingError {}
