import type { TBlockAST } from '../ast/types.js';
import type { GraphIndex } from '../ast/graph-index.js';

export type TSortResult<T extends TBlockAST = TBlockAST> =
  | { ok: true; order: T[] }
  | { ok: false; cycle: string[] };

/**
 * Order the blocks of one scope so every block comes after the blocks feeding it.
 *
 * Only connections with both ends inside `blocks` count; anything that leaves
 * the scope is ignored. Depth-first over predecessors with a "visiting"
 * marker: meeting a block that is still being visited means a cycle, and the
 * blocks on that cycle are returned instead of an order.
 *
 * Blocks without a relative dependency keep their input order.
 *
 * @param blocks - The blocks of a single scope, in editor order
 * @param index - Snapshot index used to look up connections
 */
export function sortScope<T extends TBlockAST>(
  blocks: readonly T[],
  index: GraphIndex
): TSortResult<T> {
  const byId = new Map(blocks.map((b) => [b.id, b]));
  const scope = new Set(byId.keys());
  const order: T[] = [];
  const visited = new Set<string>();
  const visiting: string[] = [];

  function visit(block: T): string[] | null {
    const onStack = visiting.indexOf(block.id);
    if (onStack !== -1) {
      return visiting.slice(onStack);
    }
    if (visited.has(block.id)) return null;

    visiting.push(block.id);
    for (const dep of index.predecessors(block.id, scope)) {
      const member = byId.get(dep.id);
      if (!member) continue;
      const cycle = visit(member);
      if (cycle) return cycle;
    }
    visiting.pop();

    visited.add(block.id);
    order.push(block);
    return null;
  }

  for (const block of blocks) {
    const cycle = visit(block);
    if (cycle) return { ok: false, cycle };
  }
  return { ok: true, order };
}
