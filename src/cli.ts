import { readFile } from 'node:fs/promises';
import { text } from 'node:stream/consumers';
import { Command, Option } from 'commander';
import { FenError, InvalidFen, parseFen } from './fen.js';
import { GLYPH_SET_NAMES, PALETTE_NAMES, isGlyphSetName, isPaletteName } from './palette.js';
import { RenderOpts, renderBoard } from './render.js';

export const VERSION = '0.1.0';

/**
 * Everything the CLI touches outside the core. Tests swap it for buffers.
 */
export interface CliIo {
  readFile(path: string): Promise<string>;
  readStdin(): Promise<string>;
  writeOut(str: string): void;
  writeErr(str: string): void;
}

export const nodeIo: CliIo = {
  readFile: path => readFile(path, 'utf8'),
  readStdin: () => text(process.stdin),
  writeOut: str => process.stdout.write(str),
  writeErr: str => process.stderr.write(str),
};

interface CliOptions {
  flip: boolean;
  autoFlip: boolean;
  palette: string;
  glyphs: string;
  turn: boolean;
  showUnknown: boolean;
}

export const describeFenError = (error: FenError): string => {
  switch (error.message) {
    case InvalidFen.NoFen:
      return 'No FEN string provided or not readable.';
    case InvalidFen.Rank:
      return 'Malformed rank in FEN placement.';
    case InvalidFen.Board:
      return 'FEN placement must have exactly 8 ranks.';
    default:
      return error.message;
  }
};

const readInput = async (file: string | undefined, io: CliIo): Promise<string> =>
  file === undefined ? io.readStdin() : io.readFile(file);

/**
 * Create the fenboard command.
 */
export function createProgram(io: CliIo = nodeIo): Command {
  const program = new Command();

  program
    .name('fenboard')
    .description('Print the first FEN board found in a file or stdin as a colored chessboard.')
    .version(VERSION)
    .argument('[file]', 'file holding the FEN; stdin when omitted')
    .option('-f, --flip', "show the board from Black's side", false)
    .option('-a, --auto-flip', 'flip the board when Black is to move', false)
    .addOption(new Option('-p, --palette <name>', 'color scheme').choices(PALETTE_NAMES).default('classic'))
    .addOption(new Option('-g, --glyphs <set>', 'piece glyphs').choices(GLYPH_SET_NAMES).default('solid'))
    .option('--no-turn', 'never print the active color')
    .option('--show-unknown', 'print the active color even when the input has none', false)
    .configureOutput({ writeOut: io.writeOut, writeErr: io.writeErr })
    .showHelpAfterError()
    .addHelpText(
      'after',
      [
        '',
        'Examples:',
        '  $ echo rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR | fenboard',
        '  $ fenboard fen.txt',
        '  $ fenboard --flip fen.txt',
      ].join('\n'),
    )
    .action(async (file: string | undefined, options: CliOptions) => {
      let input: string;
      try {
        input = await readInput(file, io);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        program.error(`Could not read ${file ?? 'stdin'}: ${reason}`, { exitCode: 1, code: 'fenboard.read' });
        return;
      }

      const setup = parseFen(input);
      if (setup.isErr) {
        program.error(describeFenError(setup.error), { exitCode: 1, code: 'fenboard.fen' });
        return;
      }

      const opts: RenderOpts = {
        flip: options.flip || (options.autoFlip && setup.value.turn === 'black'),
        palette: isPaletteName(options.palette) ? options.palette : undefined,
        glyphs: isGlyphSetName(options.glyphs) ? options.glyphs : undefined,
        turn: !options.turn ? 'never' : options.showUnknown ? 'always' : 'known',
      };
      io.writeOut(renderBoard(setup.value, opts).join('\n') + '\n');
    });

  return program;
}

export async function main(argv: string[] = process.argv, io: CliIo = nodeIo): Promise<void> {
  await createProgram(io).parseAsync(argv);
}
