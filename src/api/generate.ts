import type {
  TDiagnostic,
  TGenerateOptions,
  TGenerateResult,
  TGraphSnapshot,
} from '../ast/types.js';
import { GraphIndex } from '../ast/graph-index.js';
import {
  BANNER_WIDTH,
  DEFAULT_INDENT,
  isCallable,
  SCRIPT_BANNER,
  SECTION_TITLES,
  SECTION_WIDTH,
} from '../constants.js';
import { BindingTable } from '../generator/bindings.js';
import { emitFunctionDefinition } from '../generator/containers.js';
import { emitScope, type TEmitContext } from '../generator/scope-emitter.js';
import { sortScope } from '../generator/topological-sort.js';

// ============================================================================
// Layout Helpers
// ============================================================================

function bannerLines(generatedAt: Date | undefined): string[] {
  const rule = `# ${'='.repeat(BANNER_WIDTH)}`;
  const lines = [rule, `# ${SCRIPT_BANNER}`];
  if (generatedAt) {
    lines.push(`# Generated: ${generatedAt.toISOString()}`);
  }
  lines.push(rule, '');
  return lines;
}

/**
 * `# ── Title ───────` padded to a fixed width.
 */
export function sectionLine(title: string): string {
  return `# ── ${title} `.padEnd(SECTION_WIDTH, '─');
}

function cycleScript(cycle: string[], diagnostics: TDiagnostic[]): string {
  const message = `Cycle detected in graph (blocks: ${cycle.join(', ')})`;
  diagnostics.push({ type: 'error', code: 'CYCLE', message, block: cycle[0] });
  return `# ERROR: ${message}\n`;
}

function normalizeIndent(indent: number | undefined): number {
  if (indent === undefined || !Number.isFinite(indent)) return DEFAULT_INDENT;
  return Math.max(0, Math.floor(indent));
}

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Generate a PowerShell script from a graph snapshot.
 *
 * Named callables anywhere in the graph are collected first, ordered among
 * themselves and emitted as hoisted function definitions. The top-level
 * blocks follow under the execution section. A cycle among the top-level
 * blocks (or among the callables) replaces the whole script with a single
 * error line.
 *
 * Never throws on a malformed snapshot: dangling references are skipped and
 * reported in `diagnostics` together with ambiguous upstreams and cycles.
 *
 * @example
 * ```typescript
 * const { script, diagnostics } = generateScript(snapshot, { indent: 2 });
 * ```
 */
export function generateScript(
  snapshot: TGraphSnapshot,
  options: TGenerateOptions = {}
): TGenerateResult {
  const index = new GraphIndex(snapshot);
  const table = new BindingTable();
  const generationDiagnostics: TDiagnostic[] = [];
  const ctx: TEmitContext = {
    index,
    table,
    diagnostics: generationDiagnostics,
    indentUnit: ' '.repeat(normalizeIndent(options.indent)),
  };
  const header = options.header ?? true;
  const sectionComments = options.sectionComments ?? true;

  const finish = (script: string): TGenerateResult => ({
    script,
    diagnostics: [...index.diagnostics, ...generationDiagnostics],
    bindings: table.since(0),
  });

  const callables = index.blocks.filter(isCallable);
  const sortedCallables = sortScope(callables, index);
  if (!sortedCallables.ok) {
    return finish(cycleScript(sortedCallables.cycle, generationDiagnostics));
  }

  const main = sortScope(index.topLevelBlocks(), index);
  if (!main.ok) {
    return finish(cycleScript(main.cycle, generationDiagnostics));
  }

  const lines: string[] = header ? bannerLines(options.generatedAt) : [];

  if (sortedCallables.order.length > 0) {
    if (sectionComments) {
      lines.push(sectionLine(SECTION_TITLES.FUNCTIONS), '');
    }
    for (const block of sortedCallables.order) {
      lines.push(...emitFunctionDefinition(ctx, block, 0), '');
    }
  }

  if (sectionComments) {
    lines.push(sectionLine(SECTION_TITLES.EXECUTION), '');
  }
  lines.push(...emitScope(ctx, main.order, null, 0).lines);

  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return finish(`${lines.join('\n')}\n`);
}

