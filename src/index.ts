export * from './types.js'
export * from './util.js'
export * from './board.js'

export * from './setup.js'

export * from './palette.js'
export * from './render.js'


export * as debug from './debug.js'
export * from './fen.js'
