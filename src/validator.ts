import type { TBlockAST, TDiagnostic, TGraphSnapshot } from './ast/types.js';
import { GraphIndex } from './ast/graph-index.js';
import { containerZones, isCallable, isContainer } from './constants.js';
import { sortScope } from './generator/topological-sort.js';

export type TValidationReport = {
  /** False when any error was found. Warnings alone keep a snapshot valid */
  valid: boolean;
  errors: TDiagnostic[];
  warnings: TDiagnostic[];
};

/**
 * Checks a snapshot without generating a script.
 *
 * Generation stops at the first cycle of the main scope; the validator keeps
 * going and reports the cycles of every scope (callables, main scope and each
 * container zone), plus every block with more than one upstream in its scope
 * and every reference the index had to skip.
 */
export class SnapshotValidator {
  private errors: TDiagnostic[] = [];
  private warnings: TDiagnostic[] = [];

  validate(snapshot: TGraphSnapshot): TValidationReport {
    this.errors = [];
    this.warnings = [];

    const index = new GraphIndex(snapshot);
    index.diagnostics.forEach((d) => this.add(d));

    this.checkScope(index.blocks.filter(isCallable), index, 'callables');
    this.checkScope(index.topLevelBlocks(), index, 'graph');

    for (const block of index.blocks) {
      if (!isContainer(block)) continue;
      for (const zone of containerZones(block.container)) {
        this.checkScope(index.zoneChildren(zone), index, `zone '${zone.name}' of "${block.id}"`);
      }
    }

    return { valid: this.errors.length === 0, errors: this.errors, warnings: this.warnings };
  }

  private checkScope(members: TBlockAST[], index: GraphIndex, label: string): void {
    if (members.length === 0) return;

    const sorted = sortScope(members, index);
    if (!sorted.ok) {
      this.add({
        type: 'error',
        code: 'CYCLE',
        message: `Cycle detected in ${label} (blocks: ${sorted.cycle.join(', ')})`,
        block: sorted.cycle[0],
      });
    }

    const scope = new Set(members.map((b) => b.id));
    for (const block of members) {
      const preds = index.predecessors(block.id, scope);
      if (preds.length > 1) {
        this.add({
          type: 'warning',
          code: 'AMBIGUOUS_UPSTREAM',
          message: `Block "${block.id}" has ${preds.length} upstream blocks (${preds
            .map((p) => p.id)
            .join(', ')})`,
          block: block.id,
        });
      }
    }
  }

  private add(diagnostic: TDiagnostic): void {
    (diagnostic.type === 'error' ? this.errors : this.warnings).push(diagnostic);
  }
}

export const validator = new SnapshotValidator();

export function validateSnapshot(snapshot: TGraphSnapshot): TValidationReport {
  return validator.validate(snapshot);
}
