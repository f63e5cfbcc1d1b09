import { describe, expect, it } from 'vitest'
import { INITIAL_BOARD_FEN, INITIAL_FEN, parseFen } from '../src/fen.js'
import { PALETTES, RESET, pieceStyle } from '../src/palette.js'
import { renderBoard, renderFen, renderFileLabels, renderSquare } from '../src/render.js'
import { strip } from '../src/debug.js'
import { COLORS, Piece, ROLES } from '../src/types.js'

const DARK = PALETTES.classic.background.dark
const LIGHT = PALETTES.classic.background.light

const cells = (line: string): string[] => line.slice(2, -2).split(RESET).slice(0, 8)

const tone = (cell: string): string => (cell.startsWith(LIGHT) ? 'light' : cell.startsWith(DARK) ? 'dark' : '?')

const reflip = (line: string): string => `${line[0]} ${cells(line).reverse().map(cell => cell + RESET).join('')} ${line[line.length - 1]}`

const PIECES: Piece[] = COLORS.flatMap(color => ROLES.map(role => ({ role, color })))

describe('renderSquare', () => {

    it('styles a piece on its square tone', () => {
        expect(renderSquare({ role: 'rook', color: 'black' }, 56)).toBe('\x1b[48;5;249m\x1b[38;5;0m ♜ \x1b[0m')
        expect(renderSquare({ role: 'rook', color: 'white' }, 0)).toBe('\x1b[48;5;246m\x1b[38;5;231m ♜ \x1b[0m')
    })

    it('renders empty squares as three blanks', () => {
        expect(renderSquare(undefined, 0)).toBe('\x1b[48;5;246m   \x1b[0m')
        expect(renderSquare(undefined, 7)).toBe('\x1b[48;5;249m   \x1b[0m')
    })

    it('follows the palette and glyph options', () => {
        expect(renderSquare({ role: 'king', color: 'white' }, 4, { palette: 'simple', glyphs: 'outline' }))
            .toBe('\x1b[100m\x1b[97m ♔ \x1b[0m')
        expect(renderSquare({ role: 'queen', color: 'black' }, 59, { glyphs: 'letters' }))
            .toBe('\x1b[48;5;246m\x1b[38;5;0m q \x1b[0m')
    })

    it('writes the pawn with a text presentation selector', () => {
        expect(pieceStyle({ role: 'pawn', color: 'black' }, 'solid', 'classic').glyph).toBe('\u265F\uFE0E')
    })

    it('gives all twelve pieces a distinct non-blank cell in every glyph set', () => {
        for (const glyphs of ['solid', 'outline', 'letters'] as const) {
            const rendered = PIECES.map(piece => renderSquare(piece, 0, { glyphs }))
            expect(new Set(rendered).size).toBe(12)
            for (const piece of PIECES) {
                expect(pieceStyle(piece, glyphs, 'classic').glyph.trim()).not.toBe('')
            }
        }
    })

    it('uses distinct glyphs where colors share no tone', () => {
        for (const glyphs of ['outline', 'letters'] as const) {
            expect(new Set(PIECES.map(piece => pieceStyle(piece, glyphs, 'classic').glyph)).size).toBe(12)
        }
    })
})


describe('renderBoard', () => {

    it('labels files', () => {
        expect(renderFileLabels(false)).toBe('   a  b  c  d  e  f  g  h')
        expect(renderFileLabels(true)).toBe('   h  g  f  e  d  c  b  a')
    })

    it('renders the initial position from white', () => {
        const lines = renderFen(INITIAL_BOARD_FEN, { glyphs: 'letters' }).unwrap()
        expect(lines).toHaveLength(10)
        expect(lines[0]).toBe('   a  b  c  d  e  f  g  h')
        expect(lines[9]).toBe(lines[0])
        expect(lines.slice(1, 9).map(strip)).toEqual([
            '8  r  n  b  q  k  b  n  r  8',
            '7  p  p  p  p  p  p  p  p  7',
            '6                          6',
            '5                          5',
            '4                          4',
            '3                          3',
            '2  P  P  P  P  P  P  P  P  2',
            '1  R  N  B  Q  K  B  N  R  1',
        ])
        expect(cells(lines[1]).map(tone)).toEqual(['light', 'dark', 'light', 'dark', 'light', 'dark', 'light', 'dark'])
        expect(cells(lines[1]).every(cell => cell.includes(PALETTES.classic.foreground.black))).toBe(true)
        expect(cells(lines[8]).map(tone)).toEqual(['dark', 'light', 'dark', 'light', 'dark', 'light', 'dark', 'light'])
    })

    it('renders the initial position from black', () => {
        const lines = renderFen(INITIAL_BOARD_FEN, { glyphs: 'letters', flip: true }).unwrap()
        expect(lines[0]).toBe('   h  g  f  e  d  c  b  a')
        expect(lines[9]).toBe(lines[0])
        expect(lines.slice(1, 9).map(strip)).toEqual([
            '1  R  N  B  K  Q  B  N  R  1',
            '2  P  P  P  P  P  P  P  P  2',
            '3                          3',
            '4                          4',
            '5                          5',
            '6                          6',
            '7  p  p  p  p  p  p  p  p  7',
            '8  r  n  b  k  q  b  n  r  8',
        ])
        expect(cells(lines[1]).map(tone)).toEqual(['light', 'dark', 'light', 'dark', 'light', 'dark', 'light', 'dark'])
        expect(cells(lines[1]).every(cell => cell.includes(PALETTES.classic.foreground.white))).toBe(true)
    })

    it('shades every square the same either way up', () => {
        const setup = parseFen('r1bqkb1r/pppp1ppp/2n2n2/4p3/2B1P3/5N2/PPPP1PPP/RNBQK2R b').unwrap()
        const white = renderBoard(setup).slice(1, 9).map(cells)
        const black = renderBoard(setup, { flip: true }).slice(1, 9).map(cells)
        for (let rank = 0; rank < 8; rank++) {
            for (let file = 0; file < 8; file++) {
                expect(black[rank][7 - file]).toBe(white[7 - rank][file])
            }
        }
    })

    it('flips back to the white layout', () => {
        const setup = parseFen('8/5k2/3p4/1p1Pp2p/pP2Pp1P/P4P1K/8/8').unwrap()
        const white = renderBoard(setup)
        const black = renderBoard(setup, { flip: true })
        expect(black.slice(1, 9).reverse().map(reflip)).toEqual(white.slice(1, 9))
        expect(black[0].trim().split(/\s+/).reverse()).toEqual(white[0].trim().split(/\s+/))
    })

    it('expands each digit to that many blank cells', () => {
        for (let d = 1; d <= 8; d++) {
            const lines = renderFen(`${d}${'p'.repeat(8 - d)}/8/8/8/8/8/8/8`).unwrap()
            expect(cells(lines[1]).filter(cell => strip(cell) === '   ')).toHaveLength(d)
        }
    })

    it('adds the active color when known', () => {
        const lines = renderFen(INITIAL_FEN).unwrap()
        expect(lines).toHaveLength(11)
        expect(lines[10]).toBe('Active color: White')
        expect(renderFen(`${INITIAL_BOARD_FEN} b`).unwrap()[10]).toBe('Active color: Black')
    })

    it('prints or hides the active color on request', () => {
        expect(renderFen(INITIAL_BOARD_FEN, { turn: 'always' }).unwrap()[10]).toBe('Active color: Unknown')
        expect(renderFen(INITIAL_FEN, { turn: 'never' }).unwrap()).toHaveLength(10)
    })

    it('ends every body line with a reset before the label', () => {
        for (const line of renderFen(INITIAL_BOARD_FEN).unwrap().slice(1, 9)) {
            expect(line.endsWith(RESET + ' ' + line[0])).toBe(true)
        }
    })

    it('gives the same lines across repeated and interleaved calls', async () => {
        const white = renderFen(INITIAL_FEN).unwrap()
        const black = renderFen(INITIAL_FEN, { flip: true }).unwrap()
        const runs = await Promise.all(
            Array.from({ length: 20 }, async (_, i) => renderFen(INITIAL_FEN, { flip: i % 2 === 1 }).unwrap()),
        )
        runs.forEach((lines, i) => expect(lines).toEqual(i % 2 === 1 ? black : white))
    })
})
