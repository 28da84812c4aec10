#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import path from 'path';
import { DEFAULT_MIN_DIAMETER_MM, resolveConversionOptions } from './config';
import { OutlineConverter } from './converter/OutlineConverter';
import { ConversionResult, DrillFile } from './converter/types';
import { deriveOutputName, detectInputFiles } from './io/file-detector';
import { formatSummary } from './report/summary';
import { ErrorHandler } from './utils/error-handler';
import { Logger } from './utils/logger';

export interface CliOptions {
  min?: string;
  max?: string;
  dir: string;
  outline?: string;
  pth?: string;
  npth?: string;
  output?: string;
  quiet?: boolean;
}

export function buildProgram(): Command {
  return new Command()
    .name('board-outline-dxf')
    .description('Create a DXF with board outline and mounting holes from Gerber/Excellon files.')
    .version('0.1.0')
    .option(
      '--min <mm>',
      `Minimum drill diameter in mm to include as a mounting hole (default: ${DEFAULT_MIN_DIAMETER_MM.toFixed(1)})`
    )
    .option('--max <mm>', 'Maximum drill diameter in mm to include as a mounting hole (default: no maximum)')
    .option('-d, --dir <path>', 'Directory searched for input files', process.cwd())
    .option('--outline <file>', 'Outline Gerber file (skips detection)')
    .option('--pth <file>', 'Plated drill file')
    .option('--npth <file>', 'Non-plated drill file')
    .option('-o, --output <file>', 'Output DXF path (default: <project>-outline-mounting-holes.dxf in --dir)')
    .option('-q, --quiet', 'Only print the summary and errors');
}

export async function runConversion(options: CliOptions, logger: Logger): Promise<ConversionResult> {
  const conversionOptions = resolveConversionOptions({ min: options.min, max: options.max });

  let outlinePath = options.outline;
  let pth = options.pth ?? null;
  let npth = options.npth ?? null;

  if (!outlinePath) {
    const detected = await detectInputFiles(options.dir, logger.child('Detect'));
    outlinePath = detected.outline;
    pth = pth ?? detected.pth;
    npth = npth ?? detected.npth;
  }

  const drills: DrillFile[] = [];
  if (pth) drills.push({ path: pth, plated: true });
  if (npth) drills.push({ path: npth, plated: false });

  const outputPath = options.output ?? path.join(options.dir, deriveOutputName(outlinePath));

  const converter = new OutlineConverter(conversionOptions, { logger: logger.child('Converter') });
  converter.on('outlineParsed', (source, result) => {
    logger.info(`Outline ${path.basename(source)}: ${result.segments.length} segments (${result.units})`);
  });
  converter.on('drillParsed', (source, plated, result) => {
    logger.info(
      `${plated ? 'PTH' : 'NPTH'} ${path.basename(source)}: ${result.hits.length} hits, ${result.tools.size} tools`
    );
  });
  converter.on('documentWritten', (file) => {
    logger.success(`Wrote ${path.basename(file)}`);
  });

  return converter.convert({ outlinePath, drills, outputPath });
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();
  const logger = new Logger('board-outline-dxf', { quiet: options.quiet });

  try {
    const result = await runConversion(options, logger);
    const range = resolveConversionOptions({ min: options.min, max: options.max }).range;
    for (const line of formatSummary(result, range)) {
      console.log(line);
    }
  } catch (err) {
    const label = ErrorHandler.isParseFailure(err) ? 'Invalid input' : 'Error';
    console.error(chalk.red(`${label}: ${ErrorHandler.formatError(err)}`));
    process.exitCode = ErrorHandler.exitCodeFor(err);
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error(chalk.red(`Error: ${ErrorHandler.formatError(err)}`));
    process.exitCode = 1;
  });
}
