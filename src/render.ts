import { Result } from '@badrap/result';
import { FenError, parseFen } from './fen.js';
import { GlyphSetName, PALETTES, PaletteName, RESET, pieceStyle } from './palette.js';
import { Setup } from './setup.js';
import { ActiveColor, FILE_NAMES, Piece, Square } from './types.js';
import { squareTone } from './util.js';

export interface RenderOpts {
  /** Black's point of view: rank 1 on top, files h to a. */
  flip?: boolean;
  palette?: PaletteName;
  glyphs?: GlyphSetName;
  /**
   * When to add the active color line. `known` prints it for white or black
   * only, `always` prints `Unknown` as well.
   */
  turn?: 'known' | 'always' | 'never';
}

export const resolveOpts = (opts?: RenderOpts): Required<RenderOpts> => ({
  flip: opts?.flip ?? false,
  palette: opts?.palette ?? 'classic',
  glyphs: opts?.glyphs ?? 'solid',
  turn: opts?.turn ?? 'known',
});

/**
 * One 3-column cell: background by square tone, piece glyph in its color,
 * then a reset so the styling stops at the cell edge.
 */
export const renderSquare = (piece: Piece | undefined, square: Square, opts?: RenderOpts): string => {
  const { palette, glyphs } = resolveOpts(opts);
  const background = PALETTES[palette].background[squareTone(square)];
  if (!piece) return background + '   ' + RESET;
  const style = pieceStyle(piece, glyphs, palette);
  return background + style.foreground + ' ' + style.glyph + ' ' + RESET;
};

export const renderFileLabels = (flip: boolean): string => {
  const files = flip ? [...FILE_NAMES].reverse() : [...FILE_NAMES];
  return '   ' + files.join('  ');
};

export const activeColorName = (turn: ActiveColor): string =>
  turn === 'white' ? 'White' : turn === 'black' ? 'Black' : 'Unknown';

export const renderBoard = (setup: Setup, opts?: RenderOpts): string[] => {
  const resolved = resolveOpts(opts);
  const { flip } = resolved;
  const labels = renderFileLabels(flip);
  const lines = [labels];
  for (let row = 0; row < 8; row++) {
    const rank = flip ? row : 7 - row;
    const squares = setup.board.rank(rank);
    if (flip) squares.reverse();
    const cells = squares.map(square => renderSquare(setup.board.get(square), square, resolved)).join('');
    const label = flip ? row + 1 : 8 - row;
    lines.push(`${label} ${cells} ${label}`);
  }
  lines.push(labels);
  if (resolved.turn === 'always' || (resolved.turn === 'known' && setup.turn !== 'unknown')) {
    lines.push(`Active color: ${activeColorName(setup.turn)}`);
  }
  return lines;
};

export const renderFen = (input: string, opts?: RenderOpts): Result<string[], FenError> =>
  parseFen(input).map(setup => renderBoard(setup, opts));
