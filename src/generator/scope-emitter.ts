import type { TBinding, TBlockAST, TDiagnostic, TZoneAST } from '../ast/types.js';
import type { GraphIndex } from '../ast/graph-index.js';
import { EMPTY_ZONE_COMMENT, isControlFlowContainer } from '../constants.js';
import type { BindingTable, BindingView } from './bindings.js';
import { buildChains, indexChains, type TChain } from './chains.js';
import { emitControlFlowContainer } from './containers.js';
import { buildBlockExpression } from './parameters.js';
import { toVariableReference } from './identifiers.js';
import { sortScope } from './topological-sort.js';

/** State shared by every recursion level of one generation pass */
export type TEmitContext = {
  index: GraphIndex;
  table: BindingTable;
  diagnostics: TDiagnostic[];
  /** One level of indentation */
  indentUnit: string;
};

/** What one scope emitted, plus the bindings it and its descendants created */
export type TScopeEmission = {
  lines: string[];
  bindings: TBinding[];
};

export type TScopePlan = {
  order: TBlockAST[];
  chains: TChain[];
  /**
   * Pipelines of this scope whose terminal block needs a binding, in order of
   * binding. A bound control-flow container stands alone.
   */
  bound: TChain[];
};

export function indent(ctx: TEmitContext, depth: number): string {
  return ctx.indentUnit.repeat(depth);
}

/**
 * Decide the chains of a sorted scope and which blocks need a binding.
 *
 * A chain's terminal block is bound when its output reaches more than one
 * in-scope consumer or feeds a control-flow container. The binding takes its
 * name from the whole chain, so an output variable set on any member counts. A control-flow
 * container is bound as soon as anything in the scope consumes its output,
 * since a statement cannot be streamed into a pipeline stage.
 */
export function planScope(order: readonly TBlockAST[], index: GraphIndex): TScopePlan {
  const scope = new Set(order.map((b) => b.id));
  const chains = buildChains(order, index);
  const boundByTerminal = new Map<string, TChain>();

  for (const chain of chains) {
    const terminal = chain[chain.length - 1];
    const consumers = index.successors(terminal.id, scope);
    if (consumers.length > 1 || consumers.some(isControlFlowContainer)) {
      boundByTerminal.set(terminal.id, chain);
    }
  }

  for (const block of order) {
    if (isControlFlowContainer(block) && index.successors(block.id, scope).length > 0) {
      boundByTerminal.set(block.id, [block]);
    }
  }

  const bound: TChain[] = [];
  for (const block of order) {
    const chain = boundByTerminal.get(block.id);
    if (chain) bound.push(chain);
  }

  return { order: [...order], chains, bound };
}

/**
 * Emit one sorted scope.
 *
 * Walks the blocks in topological order. A control-flow container resolves
 * its input and hands off to its container emitter; any other block emits
 * its whole chain the first time one of the chain's members is reached.
 * A chain becomes `upstream | stage | stage ...`, assigned to the terminal
 * block's binding when it has one.
 *
 * @param order - Topologically sorted scope members
 * @param implicitInput - Value available to blocks with no in-scope predecessor
 * @param depth - Indentation level of the scope's statements
 */
export function emitScope(
  ctx: TEmitContext,
  order: readonly TBlockAST[],
  implicitInput: string | null,
  depth: number
): TScopeEmission {
  const mark = ctx.table.size;
  const plan = planScope(order, ctx.index);
  for (const chain of plan.bound) {
    ctx.table.bind(chain[chain.length - 1], chain);
  }
  const view = ctx.table.view();

  const scope = new Set(order.map((b) => b.id));
  const chainByBlock = indexChains(plan.chains);
  const emitted = new Set<string>();
  const statements: string[][] = [];
  const pad = indent(ctx, depth);

  for (const block of order) {
    if (emitted.has(block.id)) continue;

    if (isControlFlowContainer(block)) {
      emitted.add(block.id);
      const input = resolveInput(ctx, block, scope, view, implicitInput);
      const assignTo = view.lookup(block.id) ?? null;
      statements.push(emitControlFlowContainer(ctx, block.container, depth, input, assignTo));
      continue;
    }

    const chain = chainByBlock.get(block.id);
    if (!chain || chain.some((member) => emitted.has(member.id))) continue;
    chain.forEach((member) => emitted.add(member.id));

    const upstream = resolveInput(ctx, chain[0], scope, view, implicitInput);
    const pipeline = buildPipelineExpression(chain, upstream);
    const target = view.lookup(chain[chain.length - 1].id);

    if (target !== undefined) {
      statements.push([`${pad}${toVariableReference(target)} = ${pipeline === '' ? '$null' : pipeline}`]);
    } else if (pipeline !== '') {
      statements.push([`${pad}${pipeline}`]);
    }
  }

  return { lines: joinStatements(statements), bindings: ctx.table.since(mark) };
}

/**
 * Sort and emit the children of a zone.
 *
 * An empty zone emits a placeholder comment; a zone whose children form a
 * cycle emits an error comment and nothing else.
 */
export function emitZone(
  ctx: TEmitContext,
  zone: TZoneAST,
  depth: number,
  implicitInput: string | null
): TScopeEmission {
  const pad = indent(ctx, depth);
  const members = ctx.index.zoneChildren(zone);
  if (members.length === 0) {
    return { lines: [`${pad}${EMPTY_ZONE_COMMENT}`], bindings: [] };
  }

  const sorted = sortScope(members, ctx.index);
  if (!sorted.ok) {
    const message = `Cycle detected in zone '${zone.name}' (blocks: ${sorted.cycle.join(', ')})`;
    ctx.diagnostics.push({ type: 'error', code: 'CYCLE', message, block: sorted.cycle[0] });
    return { lines: [`${pad}# ERROR: ${message}`], bindings: [] };
  }

  return emitScope(ctx, sorted.order, implicitInput, depth);
}

/**
 * Resolve the value flowing into a block.
 *
 * - one in-scope predecessor: its binding, if it has one
 * - no in-scope predecessor: the scope's implicit input
 * - several in-scope predecessors: nothing, reported as a warning
 */
export function resolveInput(
  ctx: TEmitContext,
  block: TBlockAST,
  scope: ReadonlySet<string>,
  view: BindingView,
  implicitInput: string | null
): string | null {
  const preds = ctx.index.predecessors(block.id, scope);
  if (preds.length === 0) return implicitInput;
  if (preds.length > 1) {
    ctx.diagnostics.push({
      type: 'warning',
      code: 'AMBIGUOUS_UPSTREAM',
      message: `Block "${block.id}" has ${preds.length} upstream blocks (${preds
        .map((p) => p.id)
        .join(', ')}); no upstream value is piped into it`,
      block: block.id,
    });
    return null;
  }
  const name = view.lookup(preds[0].id);
  return name !== undefined ? toVariableReference(name) : null;
}

export function buildPipelineExpression(chain: TChain, upstream: string | null): string {
  const segments: string[] = [];
  if (upstream) segments.push(upstream);
  for (const block of chain) {
    const expression = buildBlockExpression(block);
    if (expression !== '') segments.push(expression);
  }
  return segments.join(' | ');
}

/** Statements of one scope, separated by a blank line */
export function joinStatements(statements: readonly string[][]): string[] {
  const lines: string[] = [];
  statements.forEach((statement, i) => {
    if (i > 0) lines.push('');
    lines.push(...statement);
  });
  return lines;
}
