/* eslint-disable no-console */
/**
 * Describe command - prints how a snapshot's main scope would be emitted
 */

import { describeSnapshot, type TScriptPlan } from '../../api/describe.js';
import { loadSnapshotFile } from '../../api/load.js';
import { toVariableReference } from '../../generator/identifiers.js';

export interface DescribeOptions {
  format?: 'text' | 'json';
}

export async function describeCommand(input: string, options: DescribeOptions = {}): Promise<string> {
  const { format = 'text' } = options;
  if (format !== 'text' && format !== 'json') {
    throw new Error(`Unknown format "${String(format)}" (expected text or json)`);
  }

  const loaded = await loadSnapshotFile(input);
  const plan = describeSnapshot(loaded.snapshot);
  plan.diagnostics = [...loaded.diagnostics, ...plan.diagnostics];

  const output = format === 'json' ? JSON.stringify(plan, null, 2) : formatPlanText(plan);
  console.log(output);
  return output;
}

/**
 * @example
 * ```text
 * Callables: Get-Report
 * Order: a1, b2, c3
 * Steps:
 *   1. a1 | b2
 *   2. if-else c3
 * Bindings:
 *   $GetItem_b2 ← b2
 * ```
 */
export function formatPlanText(plan: TScriptPlan): string {
  const lines: string[] = [];
  lines.push(`Callables: ${plan.callables.length > 0 ? plan.callables.join(', ') : '(none)'}`);

  if (plan.cycle) {
    lines.push(`Cycle: ${plan.cycle.join(' → ')}`);
  } else {
    lines.push(`Order: ${plan.order.length > 0 ? plan.order.join(', ') : '(empty)'}`);
    lines.push('Steps:');
    plan.steps.forEach((step, i) => {
      const text = step.kind === 'chain' ? step.blocks.join(' | ') : `${step.container} ${step.block}`;
      lines.push(`  ${i + 1}. ${text}`);
    });
    lines.push('Bindings:');
    if (plan.bindings.length === 0) {
      lines.push('  (none)');
    }
    plan.bindings.forEach((b) => lines.push(`  ${toVariableReference(b.name)} ← ${b.block}`));
  }

  if (plan.diagnostics.length > 0) {
    lines.push('Diagnostics:');
    plan.diagnostics.forEach((d) => lines.push(`  ${d.type} [${d.code}] ${d.message}`));
  }
  return lines.join('\n');
}
