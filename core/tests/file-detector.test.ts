import path from 'path';
import { deriveOutputName, detectInputFiles } from '../src/io/file-detector';
import { InputNotFoundError } from '../src/utils/error-handler';
import { Logger } from '../src/utils/logger';
import { GERBER_FIXTURES } from './fixtures/board-fixtures';
import { createTempDir, removeTempDir } from './helpers/temp-dir';

describe('detectInputFiles', () => {
  let dir: string | null = null;
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger('test', { quiet: true });
  });

  afterEach(async () => {
    if (dir) {
      await removeTempDir(dir);
      dir = null;
    }
  });

  test('should find the edge cuts and both drill files', async () => {
    dir = await createTempDir({
      'board-Edge_Cuts.gbr': GERBER_FIXTURES.rectangle,
      'board-F_Cu.gbr': 'G04 copper*\nM02*\n',
      'board-PTH.drl': 'M48\n',
      'board-NPTH.drl': 'M48\n',
    });

    await expect(detectInputFiles(dir, logger)).resolves.toEqual({
      outline: path.join(dir, 'board-Edge_Cuts.gbr'),
      pth: path.join(dir, 'board-PTH.drl'),
      npth: path.join(dir, 'board-NPTH.drl'),
    });
  });

  test('should fall back to a Gerber tagged as the board profile', async () => {
    dir = await createTempDir({
      'copper.gbr': 'G04 copper*\nM02*\n',
      'outline.gbr': GERBER_FIXTURES.rectangle,
    });

    await expect(detectInputFiles(dir, logger)).resolves.toEqual({
      outline: path.join(dir, 'outline.gbr'),
      pth: null,
      npth: null,
    });
  });

  test('should take the first of several edge cuts files and warn', async () => {
    dir = await createTempDir({
      'b-Edge_Cuts.gbr': GERBER_FIXTURES.rectangle,
      'a-Edge_Cuts.gbr': GERBER_FIXTURES.rectangle,
    });
    const warn = jest.spyOn(logger, 'warn');

    const detected = await detectInputFiles(dir, logger);

    expect(detected.outline).toBe(path.join(dir, 'a-Edge_Cuts.gbr'));
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test('should fail when no outline is present', async () => {
    dir = await createTempDir({ 'copper.gbr': 'G04 copper*\nM02*\n' });

    await expect(detectInputFiles(dir, logger)).rejects.toThrow(InputNotFoundError);
    await expect(detectInputFiles(dir, logger)).rejects.toThrow('No edge-cuts/profile Gerber found.');
  });
});

describe('deriveOutputName', () => {
  test('should strip the edge cuts suffix', () => {
    expect(deriveOutputName('/boards/board-Edge_Cuts.gbr')).toBe('board-outline-mounting-holes.dxf');
    expect(deriveOutputName('Board-edge_cuts.GBR')).toBe('Board-outline-mounting-holes.dxf');
  });

  test('should fall back to the file stem', () => {
    expect(deriveOutputName('outline.gbr')).toBe('outline-outline-mounting-holes.dxf');
  });
});
