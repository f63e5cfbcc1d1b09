import { FILE_NAMES, RANK_NAMES, Role, Square, SquareName, Tone } from './types.js';

export const squareRank = (square: Square): number => square >> 3;

export const squareFile = (square: Square): number => square & 0x7;

export const squareFromCoords = (file: number, rank: number): Square | undefined =>
  0 <= file && file < 8 && 0 <= rank && rank < 8 ? file + 8 * rank : undefined;

export const roleToChar = (role: Role): string => {
  switch (role) {
    case 'pawn':
      return 'p';
    case 'knight':
      return 'n';
    case 'bishop':
      return 'b';
    case 'rook':
      return 'r';
    case 'queen':
      return 'q';
    case 'king':
      return 'k';
  }
};

export const charToRole = (ch: string): Role | undefined => {
  switch (ch.toLowerCase()) {
    case 'p':
      return 'pawn';
    case 'n':
      return 'knight';
    case 'b':
      return 'bishop';
    case 'r':
      return 'rook';
    case 'q':
      return 'queen';
    case 'k':
      return 'king';
    default:
      return;
  }
};

export const makeSquare = (square: Square): SquareName =>
  `${FILE_NAMES[squareFile(square)]}${RANK_NAMES[squareRank(square)]}`;

/**
 * 0 for dark squares (a1, h8), 1 for light squares (a8, h1). Depends only on
 * the absolute square, so a flipped board shades the same squares the same way.
 */
export const squareParity = (square: Square): 0 | 1 => ((squareFile(square) + squareRank(square)) % 2 === 0 ? 0 : 1);

export const squareTone = (square: Square): Tone => (squareParity(square) === 0 ? 'dark' : 'light');
