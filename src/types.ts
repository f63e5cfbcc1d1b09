export const FILE_NAMES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const
export const RANK_NAMES = ['1', '2', '3', '4', '5', '6', '7', '8'] as const

export type FileName = (typeof FILE_NAMES)[number]
export type RankName = (typeof RANK_NAMES)[number]


/** 0 = a1, 7 = h1, 56 = a8, 63 = h8 */
export type Square = number

export type SquareName = `${FileName}${RankName}`


export const COLORS = ['white', 'black'] as const;

export type Color = (typeof COLORS)[number]


export type ByColor<T> = {
    [color in Color]: T
}


export const ROLES = ['pawn', 'knight', 'bishop', 'rook' , 'queen', 'king'] as const


export type Role = (typeof ROLES)[number]


export type ByRole<T> = {
    [role in Role]: T
}


export interface Piece {
    role: Role;
    color: Color;
}


/**
 * Side to move, as given by the optional token after the placement.
 */
export type ActiveColor = Color | 'unknown'


/**
 * Light or dark, from the absolute square.
 */
export type Tone = 'light' | 'dark'
