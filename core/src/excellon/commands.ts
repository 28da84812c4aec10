import { Units } from '../types';
import { CoordinateFormat, ZeroSuppression } from '../units/CoordinateResolver';
import { FormatError, ParseError } from '../utils/error-handler';
import { ExcellonCommand } from './types';

const UNITS_LINE = /^(METRIC|INCH)((?:,[^,]*)*)$/;
const FORMAT_TEMPLATE = /^(0*)\.(0*)$/;
const TOOL_DEFINITION = /^T(\d+)(?:[FSBH][+-]?[\d.]*)*C([^A-Z]*)/;
const TOOL_SELECT = /^T(\d+)(?:[FSBH][+-]?[\d.]*)*$/;
const HIT = /^(?:X([^A-Z]*))?(?:Y([^A-Z]*))?$/;
const DIAMETER = /^\+?(\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Classifies one trimmed Excellon line. Routing, canned cycles and
 * everything else outside drill hits come back as `unknown`.
 */
export function classifyExcellonLine(rawLine: string, line: number, source?: string): ExcellonCommand {
  const text = rawLine.trim().toUpperCase();

  if (!text || text.startsWith(';')) return { kind: 'comment' };
  if (text === 'M48') return { kind: 'header-start' };
  if (text === '%' || text === 'M95') return { kind: 'header-end' };
  if (text === 'M30' || text === 'M00') return { kind: 'end-of-program' };
  if (text === 'M71') return { kind: 'units', units: 'mm' };
  if (text === 'M72') return { kind: 'units', units: 'inch' };
  if (text === 'G90' || text === 'ICI,OFF') return { kind: 'coordinate-mode', mode: 'absolute' };
  if (text === 'G91' || text === 'ICI,ON' || text === 'ICI') {
    return { kind: 'coordinate-mode', mode: 'incremental' };
  }

  const units = UNITS_LINE.exec(text);
  if (units) {
    return parseUnitsLine(units[1] === 'METRIC' ? 'mm' : 'inch', units[2], text, line, source);
  }

  const definition = TOOL_DEFINITION.exec(text);
  if (definition) {
    const diameter = DIAMETER.exec(definition[2]);
    if (!diameter) {
      throw new ParseError(`Invalid tool diameter "${definition[2]}" in "${text}"`, { source, line });
    }
    return {
      kind: 'tool-definition',
      tool: parseInt(definition[1], 10),
      diameter: parseFloat(diameter[1]),
    };
  }

  const select = TOOL_SELECT.exec(text);
  if (select) {
    return { kind: 'tool-select', tool: parseInt(select[1], 10) };
  }

  const hit = HIT.exec(text);
  if (hit && (hit[1] !== undefined || hit[2] !== undefined)) {
    return { kind: 'hit', x: hit[1], y: hit[2] };
  }

  return { kind: 'unknown', text };
}

function parseUnitsLine(
  units: Units,
  options: string,
  text: string,
  line: number,
  source?: string
): ExcellonCommand {
  let zeroSuppression: ZeroSuppression | undefined;
  let format: CoordinateFormat | undefined;

  for (const option of options.split(',').slice(1)) {
    if (option === 'LZ') {
      // leading zeros are kept, so trailing ones may be missing
      zeroSuppression = 'trailing';
      continue;
    }
    if (option === 'TZ') {
      zeroSuppression = 'leading';
      continue;
    }
    const template = FORMAT_TEMPLATE.exec(option);
    if (template && template[1].length + template[2].length > 0) {
      format = { integerDigits: template[1].length, decimalDigits: template[2].length };
      continue;
    }
    throw new FormatError(`Malformed unit declaration "${text}"`, { source, line });
  }

  return { kind: 'units', units, zeroSuppression, format };
}

export function formatToolCode(tool: number): string {
  return `T${String(tool).padStart(2, '0')}`;
}
