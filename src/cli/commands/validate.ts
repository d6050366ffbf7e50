/* eslint-disable no-console */
/**
 * Validate command - checks snapshot files without generating scripts
 */

import * as path from 'path';
import { loadSnapshotFile } from '../../api/load.js';
import type { TDiagnostic } from '../../ast/types.js';
import { validator } from '../../validator.js';
import { logger } from '../utils/logger.js';
import { findSnapshotFiles } from '../utils/files.js';
import { getErrorMessage } from '../../utils/error-utils.js';

export interface ValidateOptions {
  json?: boolean;
  verbose?: boolean;
}

interface JsonValidationItem {
  code: string;
  message: string;
  block?: string;
}

export interface JsonValidationResult {
  file: string;
  valid: boolean;
  errors: JsonValidationItem[];
  warnings: JsonValidationItem[];
}

export async function validateCommand(
  input: string,
  options: ValidateOptions = {}
): Promise<JsonValidationResult[]> {
  const { json = false, verbose = false } = options;
  logger.setVerbose(verbose);

  const files = await findSnapshotFiles(input);
  if (files.length === 0) {
    throw new Error(`No files found matching pattern: ${input}`);
  }

  if (!json) {
    logger.section('Validating Snapshots');
    logger.info(`Found ${files.length} file(s)`);
    logger.newline();
  }

  const results: JsonValidationResult[] = [];

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    const fileName = path.basename(file);
    if (!json) {
      logger.progress(i + 1, files.length, fileName);
    }

    let result: JsonValidationResult;
    try {
      const loaded = await loadSnapshotFile(file);
      const report = validator.validate(loaded.snapshot);
      result = {
        file,
        valid: report.valid,
        errors: report.errors.map(toJsonItem),
        warnings: [...loaded.diagnostics, ...report.warnings].map(toJsonItem),
      };
    } catch (error) {
      result = {
        file,
        valid: false,
        errors: [{ code: 'LOAD_FAILED', message: getErrorMessage(error) }],
        warnings: [],
      };
    }
    results.push(result);

    if (!json) {
      result.errors.forEach((e) => logger.error(`  [${e.code}] ${e.message}`));
      result.warnings.forEach((w) => logger.warn(`  [${w.code}] ${w.message}`));
      if (result.valid) {
        logger.success(`  ${fileName} is valid`);
      }
    }
  }

  const invalid = results.filter((r) => !r.valid).length;
  if (json) {
    console.log(JSON.stringify(results, null, 2));
  } else {
    logger.newline();
    logger.info(`${results.length - invalid} valid, ${invalid} invalid`);
  }

  if (invalid > 0) {
    throw new Error(`${invalid} file(s) failed validation`);
  }
  return results;
}

function toJsonItem(diagnostic: TDiagnostic): JsonValidationItem {
  const item: JsonValidationItem = { code: diagnostic.code, message: diagnostic.message };
  if (diagnostic.block !== undefined) item.block = diagnostic.block;
  return item;
}
