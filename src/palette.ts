import { ByColor, ByRole, Piece, Tone } from "./types.js";

export const RESET = '\x1b[0m'

export interface Palette {
    /** Background escape per square tone. */
    background: { [tone in Tone]: string }
    /** Foreground escape per piece color. */
    foreground: ByColor<string>
}

// Both piece tones stay legible on both backgrounds.
export const PALETTES = Object.freeze({
    classic: Object.freeze({
        background: Object.freeze({ dark: '\x1b[48;5;246m', light: '\x1b[48;5;249m' }),
        foreground: Object.freeze({ white: '\x1b[38;5;231m', black: '\x1b[38;5;0m' }),
    }),
    simple: Object.freeze({
        background: Object.freeze({ dark: '\x1b[100m', light: '\x1b[47m' }),
        foreground: Object.freeze({ white: '\x1b[97m', black: '\x1b[30m' }),
    }),
}) satisfies Record<string, Palette>

export type PaletteName = keyof typeof PALETTES

export const PALETTE_NAMES = Object.freeze(Object.keys(PALETTES))


const SOLID: ByRole<string> = Object.freeze({
    pawn: '\u265F\uFE0E',
    knight: '♞',
    bishop: '♝',
    rook: '♜',
    queen: '♛',
    king: '♚',
})

const OUTLINE: ByRole<string> = Object.freeze({
    pawn: '♙',
    knight: '♘',
    bishop: '♗',
    rook: '♖',
    queen: '♕',
    king: '♔',
})

const LETTERS: ByRole<string> = Object.freeze({
    pawn: 'p',
    knight: 'n',
    bishop: 'b',
    rook: 'r',
    queen: 'q',
    king: 'k',
})

export const GLYPH_SETS = Object.freeze({
    solid: Object.freeze({ white: SOLID, black: SOLID }),
    outline: Object.freeze({ white: OUTLINE, black: SOLID }),
    letters: Object.freeze({
        white: Object.freeze({
            pawn: 'P',
            knight: 'N',
            bishop: 'B',
            rook: 'R',
            queen: 'Q',
            king: 'K',
        }),
        black: LETTERS,
    }),
}) satisfies Record<string, ByColor<ByRole<string>>>

export type GlyphSetName = keyof typeof GLYPH_SETS

export const GLYPH_SET_NAMES = Object.freeze(Object.keys(GLYPH_SETS))


export interface PieceStyle {
    foreground: string
    glyph: string
}

export const pieceStyle = (piece: Piece, glyphs: GlyphSetName, palette: PaletteName): PieceStyle => ({
    foreground: PALETTES[palette].foreground[piece.color],
    glyph: GLYPH_SETS[glyphs][piece.color][piece.role],
})


export const isPaletteName = (name: string): name is PaletteName => PALETTE_NAMES.includes(name)

export const isGlyphSetName = (name: string): name is GlyphSetName => GLYPH_SET_NAMES.includes(name)

