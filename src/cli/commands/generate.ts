/**
 * Generate command - turns snapshot files into PowerShell scripts
 */

import * as fs from 'fs';
import * as path from 'path';
import { generateScript } from '../../api/generate.js';
import { loadSnapshotFile } from '../../api/load.js';
import { loadConfig } from '../../config/loader.js';
import type { TDiagnostic } from '../../ast/types.js';
import { logger } from '../utils/logger.js';
import { findSnapshotFiles, scriptPathFor } from '../utils/files.js';
import { getErrorMessage, wrapError } from '../../utils/error-utils.js';

export interface GenerateOptions {
  /** Output file for a single input, output directory for several */
  output?: string;
  /** Print scripts instead of writing them */
  stdout?: boolean;
  indent?: string | number;
  /** `false` when `--no-header` is given */
  header?: boolean;
  timestamp?: boolean;
  /** Config file path */
  config?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

export interface GenerateSummary {
  /** Written (or, in a dry run, planned) script paths */
  written: string[];
  failed: string[];
}

export async function generateCommand(input: string, options: GenerateOptions = {}): Promise<GenerateSummary> {
  const { output, stdout = false, dryRun = false, verbose = false } = options;
  logger.setVerbose(verbose);

  const config = await loadConfig(
    {
      indent: options.indent,
      header: options.header === false ? false : undefined,
      timestamp: options.timestamp ? true : undefined,
    },
    options.config
  );
  logger.debug(`Config: ${JSON.stringify(config)}`);

  const files = await findSnapshotFiles(input);
  if (files.length === 0) {
    throw new Error(`No files found matching pattern: ${input}`);
  }

  const outputDir = output && (files.length > 1 || isDirectory(output)) ? path.resolve(output) : undefined;
  const outputFile = output && !outputDir ? path.resolve(output) : undefined;

  if (!stdout) {
    logger.section('Generating Scripts');
    logger.info(`Found ${files.length} file(s)`);
    if (dryRun) {
      logger.info('Dry run: no files will be written');
    }
    logger.newline();
  }

  const summary: GenerateSummary = { written: [], failed: [] };

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    const fileName = path.basename(file);
    if (!stdout) {
      logger.progress(i + 1, files.length, fileName);
    }

    try {
      const loaded = await loadSnapshotFile(file);
      const result = generateScript(loaded.snapshot, {
        indent: config.indent,
        header: config.header,
        sectionComments: config.sectionComments,
        generatedAt: config.timestamp ? new Date() : undefined,
      });

      const diagnostics: TDiagnostic[] = [...loaded.diagnostics, ...result.diagnostics];
      diagnostics.forEach((d) => logger.diagnostic(d));
      if (diagnostics.some((d) => d.type === 'error')) {
        logger.error(`  ${fileName}: not generated`);
        summary.failed.push(file);
        continue;
      }

      if (stdout) {
        process.stdout.write(result.script);
        continue;
      }

      const target = outputFile ?? scriptPathFor(file, outputDir);
      if (dryRun) {
        logger.info(`  Would write ${target}`);
      } else {
        await writeScript(target, result.script);
        logger.success(`  ${fileName} → ${path.relative(process.cwd(), target) || target}`);
      }
      logger.debug(`  ${result.bindings.length} binding(s)`);
      summary.written.push(target);
    } catch (error) {
      logger.error(`  ${fileName}: ${getErrorMessage(error)}`);
      summary.failed.push(file);
    }
  }

  if (!stdout) {
    logger.newline();
    logger.info(`${summary.written.length} generated, ${summary.failed.length} failed`);
  }

  if (summary.failed.length > 0) {
    throw new Error(`${summary.failed.length} file(s) failed to generate`);
  }
  return summary;
}

async function writeScript(target: string, script: string): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, script, 'utf8');
  } catch (error) {
    throw wrapError(error, `Failed to write ${target}`);
  }
}

/** An existing directory, or a path written with a trailing separator */
function isDirectory(target: string): boolean {
  if (target.endsWith('/') || target.endsWith(path.sep)) return true;
  return fs.existsSync(target) && fs.statSync(target).isDirectory();
}
