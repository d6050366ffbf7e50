import type { TBinding, TDiagnostic, TGraphSnapshot } from '../ast/types.js';
import { GraphIndex } from '../ast/graph-index.js';
import { isCallable, isControlFlowContainer } from '../constants.js';
import { BindingTable } from '../generator/bindings.js';
import { callableName } from '../generator/parameters.js';
import { planScope } from '../generator/scope-emitter.js';
import { sortScope } from '../generator/topological-sort.js';

export type TPlanStep =
  | { kind: 'chain'; blocks: string[] }
  | { kind: 'container'; block: string; container: string };

/**
 * How the main scope of a snapshot would be emitted.
 */
export type TScriptPlan = {
  /** Function names of the hoisted callables, in definition order */
  callables: string[];
  /** Main-scope block ids in emission order; empty when `cycle` is set */
  order: string[];
  steps: TPlanStep[];
  /** Bindings the main scope would create */
  bindings: TBinding[];
  cycle?: string[];
  diagnostics: TDiagnostic[];
};

/**
 * Plan the main scope of a snapshot without emitting it.
 *
 * Binding names are those a fresh pass over the main scope alone would pick;
 * bindings created inside callable bodies during a full generation can
 * lengthen a clashing generated name.
 */
export function describeSnapshot(snapshot: TGraphSnapshot): TScriptPlan {
  const index = new GraphIndex(snapshot);
  const callables = sortScope(index.blocks.filter(isCallable), index);
  const plan: TScriptPlan = {
    callables: callables.ok ? callables.order.map((b) => callableName(b.container.name)) : [],
    order: [],
    steps: [],
    bindings: [],
    diagnostics: index.diagnostics,
  };
  if (!callables.ok) {
    return { ...plan, cycle: callables.cycle };
  }

  const main = sortScope(index.topLevelBlocks(), index);
  if (!main.ok) {
    return { ...plan, cycle: main.cycle };
  }

  const scopePlan = planScope(main.order, index);
  const table = new BindingTable();
  scopePlan.bound.forEach((chain) => table.bind(chain[chain.length - 1], chain));

  const chainHeads = new Map(scopePlan.chains.map((chain) => [chain[0].id, chain]));
  for (const block of main.order) {
    if (isControlFlowContainer(block)) {
      plan.steps.push({ kind: 'container', block: block.id, container: block.container.kind });
      continue;
    }
    const chain = chainHeads.get(block.id);
    if (chain) {
      plan.steps.push({ kind: 'chain', blocks: chain.map((b) => b.id) });
    }
  }

  plan.order = main.order.map((b) => b.id);
  plan.bindings = table.since(0);
  return plan;
}
