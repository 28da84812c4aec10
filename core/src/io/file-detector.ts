import fs from 'fs/promises';
import path from 'path';
import { OUTPUT_SUFFIX } from '../config';
import { InputNotFoundError } from '../utils/error-handler';
import { Logger } from '../utils/logger';

export interface DetectedFiles {
  outline: string;
  pth: string | null;
  npth: string | null;
}

const EDGE_CUTS_SUFFIX = '-Edge_Cuts.gbr';
const PROFILE_MARKERS = ['FileFunction,Profile', 'AperFunction,Profile'];

async function listFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Finds the outline Gerber and the PTH/NPTH drill files of a KiCad-style
 * export in `dir`. The outline is the first `*-Edge_Cuts.gbr`, or failing
 * that the first `*.gbr` tagged as the board profile.
 */
export async function detectInputFiles(dir: string, logger = new Logger('Detect')): Promise<DetectedFiles> {
  const names = await listFiles(dir);

  let outline: string | undefined;
  const edgeCuts = names.filter((name) => name.endsWith(EDGE_CUTS_SUFFIX));
  if (edgeCuts.length > 0) {
    outline = edgeCuts[0];
    if (edgeCuts.length > 1) {
      logger.warn(`Several edge-cuts files found, using ${outline}: ${edgeCuts.join(', ')}`);
    }
  } else {
    for (const name of names.filter((n) => n.endsWith('.gbr'))) {
      const text = await fs.readFile(path.join(dir, name), 'utf-8');
      if (PROFILE_MARKERS.some((marker) => text.includes(marker))) {
        outline = name;
        break;
      }
    }
  }

  if (!outline) {
    throw new InputNotFoundError('No edge-cuts/profile Gerber found.', { source: dir });
  }

  const pth = names.find((name) => name.endsWith('-PTH.drl'));
  const npth = names.find((name) => name.endsWith('-NPTH.drl'));

  return {
    outline: path.join(dir, outline),
    pth: pth ? path.join(dir, pth) : null,
    npth: npth ? path.join(dir, npth) : null,
  };
}

// board-Edge_Cuts.gbr -> board-outline-mounting-holes.dxf
export function deriveOutputName(outlinePath: string): string {
  const name = path.basename(outlinePath);
  let project = name.replace(/-Edge_Cuts\.gbr$/i, '');
  if (project === name) {
    project = path.parse(name).name;
  }
  return `${project}${OUTPUT_SUFFIX}`;
}
