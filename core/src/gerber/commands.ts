import { InterpolationMode } from '../types';
import { ZeroSuppression } from '../units/CoordinateResolver';
import { FormatError, ParseError } from '../utils/error-handler';
import { GerberCommand, OperationCode, RawGerberCommand } from './types';

/**
 * Splits a Gerber program into `*`-terminated commands. Parameter blocks
 * (%...%) may hold several commands; every one of them is flagged as
 * extended. Line breaks carry no meaning except for diagnostics.
 *
 * Text after the last `*` is an unterminated command and is dropped.
 */
export function tokenizeGerber(content: string): RawGerberCommand[] {
  const commands: RawGerberCommand[] = [];
  let buffer = '';
  let bufferLine = 1;
  let line = 1;
  let extended = false;

  const flush = () => {
    const text = buffer.trim();
    if (text) {
      commands.push({ text, line: bufferLine, extended });
    }
    buffer = '';
  };

  for (const ch of content) {
    if (ch === '\n') {
      line++;
      continue;
    }
    if (ch === '\r') continue;

    if (ch === '%') {
      // a block delimiter closes whatever was not terminated inside it
      buffer = '';
      extended = !extended;
      continue;
    }

    if (ch === '*') {
      flush();
      continue;
    }

    if (!buffer.trim()) {
      bufferLine = line;
    }
    buffer += ch;
  }

  return commands;
}

const ZERO_SUPPRESSION: Record<string, ZeroSuppression> = {
  L: 'leading',
  T: 'trailing',
  D: 'none',
};

const INTERPOLATION: Record<number, InterpolationMode> = {
  1: 'linear',
  2: 'clockwise',
  3: 'counterclockwise',
};

const FORMAT_STATEMENT = /^FS([LTD])([AI])?X(\d)(\d)Y(\d)(\d)$/;
const APERTURE_DEFINITION = /^ADD(\d+)/;
const COMMENT = /^G0*4(?!\d)/;
const END_OF_PROGRAM = /^M0*(?:0|2|30)$/;
const WORD_COMMAND = /^(?:[A-Z][^A-Z]*)+$/;
const FIELD = /([A-Z])([^A-Z]*)/g;
const COORDINATE_LETTERS = new Set(['X', 'Y', 'I', 'J']);

/**
 * Classifies one raw command. Anything not needed for outline extraction
 * comes back as `unknown`; only malformed declarations and malformed
 * operation fields throw.
 */
export function classifyGerberCommand(raw: RawGerberCommand, source?: string): GerberCommand {
  const text = raw.text.toUpperCase();
  return raw.extended
    ? classifyExtended(text, raw.line, source)
    : classifyWord(text, raw.line, source);
}

function classifyExtended(text: string, line: number, source?: string): GerberCommand {
  if (text.startsWith('FS')) {
    const m = FORMAT_STATEMENT.exec(text);
    if (!m) {
      throw new FormatError(`Malformed format statement "%${text}*%"`, { source, line });
    }
    return {
      kind: 'format',
      zeroSuppression: ZERO_SUPPRESSION[m[1]],
      mode: m[2] === 'I' ? 'incremental' : 'absolute',
      x: { integerDigits: parseInt(m[3], 10), decimalDigits: parseInt(m[4], 10) },
      y: { integerDigits: parseInt(m[5], 10), decimalDigits: parseInt(m[6], 10) },
    };
  }

  if (text.startsWith('MO')) {
    if (text === 'MOMM') return { kind: 'units', units: 'mm' };
    if (text === 'MOIN') return { kind: 'units', units: 'inch' };
    throw new FormatError(`Malformed unit declaration "%${text}*%"`, { source, line });
  }

  const aperture = APERTURE_DEFINITION.exec(text);
  if (aperture) {
    return { kind: 'aperture-definition', code: parseInt(aperture[1], 10) };
  }

  return { kind: 'unknown', text };
}

function classifyWord(text: string, line: number, source?: string): GerberCommand {
  if (COMMENT.test(text)) return { kind: 'comment' };
  if (END_OF_PROGRAM.test(text)) return { kind: 'end-of-program' };
  if (!WORD_COMMAND.test(text)) return { kind: 'unknown', text };

  const gCodes: number[] = [];
  const coordinates: Partial<Record<'x' | 'y' | 'i' | 'j', string>> = {};
  const foreign: string[] = [];
  let dCode: number | undefined;

  for (const [, letter, value] of text.matchAll(FIELD)) {
    if (COORDINATE_LETTERS.has(letter)) {
      coordinates[toCoordinateKey(letter)] = value;
    } else if (letter === 'G' || letter === 'D') {
      if (!/^\d+$/.test(value)) {
        return { kind: 'unknown', text };
      }
      if (letter === 'G') gCodes.push(parseInt(value, 10));
      else dCode = parseInt(value, 10);
    } else {
      foreign.push(`${letter}${value}`);
    }
  }

  const hasCoordinates = Object.keys(coordinates).length > 0;
  const isOperation = hasCoordinates || (dCode !== undefined && dCode >= 1 && dCode <= 3);

  if (isOperation) {
    if (foreign.length > 0) {
      throw new ParseError(`Unexpected field "${foreign[0]}" in "${text}"`, { source, line });
    }
    const interpolation = gCodes.map((g) => INTERPOLATION[g]).find((mode) => mode !== undefined);
    return {
      kind: 'operation',
      interpolation,
      code: toOperationCode(dCode),
      ...coordinates,
    };
  }

  if (foreign.length > 0) return { kind: 'unknown', text };

  if (dCode !== undefined && dCode >= 10) {
    // G54 is an obsolete prefix for aperture selection
    return { kind: 'select-aperture', code: dCode };
  }

  if (gCodes.length === 1) {
    const g = gCodes[0];
    if (INTERPOLATION[g]) return { kind: 'interpolation', mode: INTERPOLATION[g] };
    if (g === 70) return { kind: 'units', units: 'inch' };
    if (g === 71) return { kind: 'units', units: 'mm' };
    if (g === 90) return { kind: 'coordinate-mode', mode: 'absolute' };
    if (g === 91) return { kind: 'coordinate-mode', mode: 'incremental' };
  }

  return { kind: 'unknown', text };
}

function toCoordinateKey(letter: string): 'x' | 'y' | 'i' | 'j' {
  switch (letter) {
    case 'X':
      return 'x';
    case 'Y':
      return 'y';
    case 'I':
      return 'i';
    default:
      return 'j';
  }
}

function toOperationCode(dCode: number | undefined): OperationCode | undefined {
  if (dCode === 1 || dCode === 2 || dCode === 3) {
    return dCode;
  }
  return undefined;
}
