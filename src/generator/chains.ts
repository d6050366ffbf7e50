import type { TBlockAST } from '../ast/types.js';
import type { GraphIndex } from '../ast/graph-index.js';
import { isControlFlowContainer } from '../constants.js';

/** A maximal run of 1:1 connected blocks, emitted as one pipeline */
export type TChain = TBlockAST[];

/**
 * Partition a sorted scope into chains.
 *
 * Control-flow containers never join a chain; named callables do, since from
 * the outside they are an ordinary pipeline stage.
 *
 * A block starts a chain unless its single in-scope predecessor has it as its
 * only successor and is not a control-flow container (in that case the
 * predecessor's chain absorbs it). From its head a chain follows the unique
 * successor while that successor is not a control-flow container and has no
 * other in-scope predecessor.
 *
 * @param order - Topologically sorted blocks of one scope
 * @param index - Snapshot index
 * @returns Chains in the order of their heads
 */
export function buildChains(order: readonly TBlockAST[], index: GraphIndex): TChain[] {
  const scope = new Set(order.map((b) => b.id));
  const chains: TChain[] = [];
  const assigned = new Set<string>();

  for (const block of order) {
    if (assigned.has(block.id) || isControlFlowContainer(block)) continue;

    const upstream = index.singlePredecessor(block.id, scope);
    if (
      upstream &&
      !isControlFlowContainer(upstream) &&
      index.successors(upstream.id, scope).length === 1
    ) {
      continue;
    }

    const chain: TChain = [block];
    assigned.add(block.id);

    let current = block;
    for (;;) {
      const next = index.singleSuccessor(current.id, scope);
      if (!next) break;
      if (assigned.has(next.id)) break;
      if (isControlFlowContainer(next)) break;
      if (index.predecessors(next.id, scope).length !== 1) break;

      chain.push(next);
      assigned.add(next.id);
      current = next;
    }

    chains.push(chain);
  }

  return chains;
}

/** Map every chain member to its chain */
export function indexChains(chains: readonly TChain[]): Map<string, TChain> {
  const byBlock = new Map<string, TChain>();
  for (const chain of chains) {
    for (const block of chain) {
      byBlock.set(block.id, chain);
    }
  }
  return byBlock;
}
