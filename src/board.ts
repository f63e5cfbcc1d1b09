import { Piece, Role, Square } from './types.js';
import { squareFromCoords } from './util.js';

const BACKRANK: readonly Role[] = ['rook', 'knight', 'bishop', 'queen', 'king', 'bishop', 'knight', 'rook'];

/**
 * Immutable 8x8 grid of pieces, indexed by {@link Square}.
 */
export class Board {
  private readonly squares: ReadonlyArray<Piece | undefined>;

  private constructor(squares: ReadonlyArray<Piece | undefined>) {
    this.squares = Object.freeze(squares.map(piece => piece && Object.freeze({ ...piece })));
  }

  static default(): Board {
    const squares = new Array<Piece | undefined>(64).fill(undefined);
    for (let file = 0; file < 8; file++) {
      squares[file] = { role: BACKRANK[file], color: 'white' };
      squares[file + 8] = { role: 'pawn', color: 'white' };
      squares[file + 48] = { role: 'pawn', color: 'black' };
      squares[file + 56] = { role: BACKRANK[file], color: 'black' };
    }
    return new Board(squares);
  }

  /**
   * Builds a board from ranks listed top down, rank 8 first, as they appear
   * in a FEN placement. Returns undefined unless the grid is exactly 8x8.
   */
  static fromRanks(ranks: ReadonlyArray<ReadonlyArray<Piece | undefined>>): Board | undefined {
    if (ranks.length !== 8 || ranks.some(rank => rank.length !== 8)) return;
    const squares = new Array<Piece | undefined>(64).fill(undefined);
    ranks.forEach((rank, i) =>
      rank.forEach((piece, file) => {
        const square = squareFromCoords(file, 7 - i);
        if (square !== undefined) squares[square] = piece;
      }),
    );
    return new Board(squares);
  }

  get(square: Square): Piece | undefined {
    return this.squares[square];
  }

  /**
   * Squares of one rank, files a to h. `rank` 0 is rank 1.
   */
  rank(rank: number): Square[] {
    return Array.from({ length: 8 }, (_, file) => file + 8 * rank);
  }
}

export const boardEquals = (left: Board, right: Board): boolean => {
  for (let square = 0; square < 64; square++) {
    const l = left.get(square);
    const r = right.get(square);
    if (l?.role !== r?.role || l?.color !== r?.color) return false;
  }
  return true;
};
