import { Board } from "./board.js";
import { makePiece } from "./fen.js";
import { Piece, Square } from "./types.js";
import { makeSquare } from "./util.js";


export const piece = (piece: Piece): string => makePiece(piece)


export const board = (board: Board): string => {
  const r: string[] = [];
  for (let y = 7; y >= 0; y--) {
    for (const square of board.rank(y)) {
      const p = board.get(square);
      r.push(p ? piece(p) : '.');
      r.push(square % 8 < 7 ? ' ' : '\n');
    }
  }
  return r.join('');
};

export const square = (sq: Square): string => makeSquare(sq);


const ESCAPE = /\x1b\[[0-9;]*m/g

/**
 * Drops terminal styling, leaving the text a rendered line shows.
 */
export const strip = (line: string): string => line.replace(ESCAPE, '')
