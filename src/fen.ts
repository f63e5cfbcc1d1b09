import { Result } from '@badrap/result';
import { Board } from './board.js';
import { Setup } from './setup.js';
import { ActiveColor, Piece } from './types.js';
import { charToRole, roleToChar } from './util.js';

export const INITIAL_BOARD_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR';
export const INITIAL_FEN = INITIAL_BOARD_FEN + ' w';
export const EMPTY_BOARD_FEN = '8/8/8/8/8/8/8/8';

export enum InvalidFen {
  NoFen = 'ERR_NO_FEN',
  Board = 'ERR_BOARD',
  Rank = 'ERR_RANK',
}

export class FenError extends Error {}

// Eight ranks over the placement alphabet. A match may not start or end
// next to a digit, so a 0 or 9 is never cut off to shorten a rank.
const PLACEMENT = '(?<![0-9])(?:[pnbrqkPNBRQK1-8]+\\/){7}[pnbrqkPNBRQK1-8]+(?![0-9])';

const TURN = /^[\s_]*([wb])(?![A-Za-z0-9])/;

export interface ExtractedFen {
  placement: string;
  turn?: 'w' | 'b';
  /** Offset of the placement in the input. */
  index: number;
}

const charToPiece = (ch: string): Piece | undefined => {
  const role = charToRole(ch);
  return role && { role, color: ch.toLowerCase() === ch ? 'black' : 'white' };
};

/**
 * Expands one run-length encoded rank. Digits 1-9 become that many empty
 * squares, piece letters one occupied square, anything else one blank.
 * The width is not checked here.
 */
export const parseRank = (token: string): Array<Piece | undefined> => {
  const squares: Array<Piece | undefined> = [];
  for (const c of token) {
    const step = c.charCodeAt(0) - '0'.charCodeAt(0);
    if (step >= 1 && step <= 9) {
      for (let i = 0; i < step; i++) squares.push(undefined);
    } else squares.push(charToPiece(c));
  }
  return squares;
};

const isFullWidth = (placement: string): boolean =>
  placement.split('/').every(rank => parseRank(rank).length === 8);

const extracted = (input: string, match: RegExpExecArray): ExtractedFen => {
  const placement = match[0];
  const turn = TURN.exec(input.slice(match.index + placement.length))?.[1];
  return {
    placement,
    turn: turn === 'w' || turn === 'b' ? turn : undefined,
    index: match.index,
  };
};

/**
 * Finds the first piece placement in `input`, ignoring whatever surrounds
 * it, and the side-to-move token right after it if there is one.
 *
 * Piece letters glued to the front of the field (`fenrnbq...` would make `n`
 * part of rank 8) are skipped by trying later starts until every rank is
 * 8 squares wide. When no start gives full ranks, the first match is
 * returned and {@link parseBoardFen} reports the malformed rank.
 */
export const extractFen = (input: string): Result<ExtractedFen, FenError> => {
  const pattern = new RegExp(PLACEMENT, 'g');
  let first: RegExpExecArray | undefined;
  for (let match = pattern.exec(input); match; match = pattern.exec(input)) {
    if (isFullWidth(match[0])) return Result.ok(extracted(input, match));
    if (!first) first = match;
    pattern.lastIndex = match.index + 1;
  }
  if (!first) return Result.err(new FenError(InvalidFen.NoFen));
  return Result.ok(extracted(input, first));
};

export const parseBoardFen = (boardPart: string): Result<Board, FenError> => {
  const tokens = boardPart.split('/');
  if (tokens.length !== 8) return Result.err(new FenError(InvalidFen.Board));
  const ranks = tokens.map(parseRank);
  const board = Board.fromRanks(ranks);
  if (!board) return Result.err(new FenError(InvalidFen.Rank));
  return Result.ok(board);
};

export const parseTurn = (token: string | undefined): ActiveColor => {
  if (token === 'w') return 'white';
  if (token === 'b') return 'black';
  return 'unknown';
};

export const parseFen = (input: string): Result<Setup, FenError> =>
  extractFen(input).chain(({ placement, turn }) =>
    parseBoardFen(placement).map(board => ({
      board,
      turn: parseTurn(turn),
    })),
  );

export const parsePiece = (str: string): Piece | undefined => {
  if (str.length !== 1) return;
  return charToPiece(str);
};

export const makePiece = (piece: Piece): string => {
  let r = roleToChar(piece.role);
  if (piece.color === 'white') r = r.toUpperCase();
  return r;
};

export const makeBoardFen = (board: Board): string => {
  let fen = '';
  let empty = 0;
  for (let rank = 7; rank >= 0; rank--) {
    for (const square of board.rank(rank)) {
      const piece = board.get(square);
      if (!piece) empty++;
      else {
        if (empty > 0) {
          fen += empty;
          empty = 0;
        }
        fen += makePiece(piece);
      }
    }
    if (empty > 0) {
      fen += empty;
      empty = 0;
    }
    if (rank !== 0) fen += '/';
  }
  return fen;
};
