import { Board, boardEquals } from "./board.js";
import { ActiveColor } from "./types.js";

/**
 * A board as read from a FEN placement, plus the side to move when the
 * input carried one.
 */
export interface Setup {
    board: Board;
    turn: ActiveColor;
}


export const defaultSetup = (): Setup => ({
    board: Board.default(),
    turn: 'white'
})


export const setupEquals = (left: Setup, right: Setup): boolean =>
    boardEquals(left.board, right.board)
    && left.turn === right.turn
