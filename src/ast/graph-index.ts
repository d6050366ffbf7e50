import type { TBlockAST, TConnectionAST, TDiagnostic, TGraphSnapshot, TZoneAST } from './types.js';
import { containerZones, isContainer } from '../constants.js';

/**
 * Read-only index over a graph snapshot.
 *
 * Construction resolves every id once and drops malformed elements (dangling
 * block or port references, self connections, duplicate connections, a second
 * connection into the same input port, zone members that are missing, already
 * claimed, or an ancestor of their container). Each dropped element becomes a
 * warning in `diagnostics`; nothing is thrown.
 *
 * Scope queries take the set of block ids forming the scope and only see
 * connections whose both ends are inside it.
 */
export class GraphIndex {
  readonly diagnostics: TDiagnostic[] = [];

  private readonly blocksById = new Map<string, TBlockAST>();
  private readonly blockOrder: TBlockAST[] = [];
  private readonly validConnections: TConnectionAST[] = [];
  private readonly incoming = new Map<string, TConnectionAST[]>();
  private readonly outgoing = new Map<string, TConnectionAST[]>();
  private readonly parentOf = new Map<string, { container: string; zone: string }>();
  private readonly zoneMembers = new Map<TZoneAST, TBlockAST[]>();

  constructor(snapshot: TGraphSnapshot) {
    this.indexBlocks(snapshot.blocks);
    this.indexZones();
    this.indexConnections(snapshot.connections);
  }

  // ============================================================================
  // BLOCK QUERIES
  // ============================================================================

  getBlock(id: string): TBlockAST | undefined {
    return this.blocksById.get(id);
  }

  /** Every valid block, in snapshot order */
  get blocks(): readonly TBlockAST[] {
    return this.blockOrder;
  }

  get connections(): readonly TConnectionAST[] {
    return this.validConnections;
  }

  /** Blocks no zone claims, in snapshot order */
  topLevelBlocks(): TBlockAST[] {
    return this.blockOrder.filter((b) => !this.parentOf.has(b.id));
  }

  /** Resolved children of a zone, in zone order. Unknown zones have none */
  zoneChildren(zone: TZoneAST): TBlockAST[] {
    return this.zoneMembers.get(zone) ?? [];
  }

  parentOfBlock(id: string): { container: string; zone: string } | undefined {
    return this.parentOf.get(id);
  }

  // ============================================================================
  // SCOPE QUERIES
  // ============================================================================

  /** Distinct in-scope blocks feeding `id`, in connection order */
  predecessors(id: string, scope: ReadonlySet<string>): TBlockAST[] {
    return this.distinctEnds(this.incoming.get(id), (c) => c.from.block, scope);
  }

  /** Distinct in-scope blocks consuming `id`, in connection order */
  successors(id: string, scope: ReadonlySet<string>): TBlockAST[] {
    return this.distinctEnds(this.outgoing.get(id), (c) => c.to.block, scope);
  }

  /** The sole in-scope predecessor, or undefined when there are zero or several */
  singlePredecessor(id: string, scope: ReadonlySet<string>): TBlockAST | undefined {
    const preds = this.predecessors(id, scope);
    return preds.length === 1 ? preds[0] : undefined;
  }

  /** The sole in-scope successor, or undefined when there are zero or several */
  singleSuccessor(id: string, scope: ReadonlySet<string>): TBlockAST | undefined {
    const succs = this.successors(id, scope);
    return succs.length === 1 ? succs[0] : undefined;
  }

  private distinctEnds(
    conns: TConnectionAST[] | undefined,
    end: (c: TConnectionAST) => string,
    scope: ReadonlySet<string>
  ): TBlockAST[] {
    const seen = new Set<string>();
    const result: TBlockAST[] = [];
    for (const conn of conns ?? []) {
      const id = end(conn);
      if (!scope.has(id) || seen.has(id)) continue;
      const block = this.blocksById.get(id);
      if (!block) continue;
      seen.add(id);
      result.push(block);
    }
    return result;
  }

  // ============================================================================
  // INDEXING
  // ============================================================================

  private indexBlocks(blocks: TBlockAST[]): void {
    for (const block of blocks) {
      if (this.blocksById.has(block.id)) {
        this.warn('DUPLICATE_BLOCK', `Duplicate block id "${block.id}" ignored`, { block: block.id });
        continue;
      }
      this.blocksById.set(block.id, block);
      this.blockOrder.push(block);
    }
  }

  private indexZones(): void {
    for (const container of this.blockOrder) {
      if (!isContainer(container)) continue;
      for (const zone of containerZones(container.container)) {
        const members: TBlockAST[] = [];
        for (const childId of zone.children) {
          const child = this.blocksById.get(childId);
          if (!child) {
            this.warn(
              'UNKNOWN_ZONE_MEMBER',
              `Zone "${zone.name}" of "${container.id}" lists unknown block "${childId}"`,
              { block: container.id }
            );
            continue;
          }
          const existing = this.parentOf.get(childId);
          if (existing) {
            this.warn(
              'ZONE_MEMBER_CLAIMED',
              `Block "${childId}" already belongs to zone "${existing.zone}" of "${existing.container}"`,
              { block: childId }
            );
            continue;
          }
          if (this.isSelfOrAncestor(childId, container.id)) {
            this.warn(
              'NESTING_CYCLE',
              `Block "${childId}" cannot be nested inside its own descendant "${container.id}"`,
              { block: childId }
            );
            continue;
          }
          this.parentOf.set(childId, { container: container.id, zone: zone.name });
          members.push(child);
        }
        this.zoneMembers.set(zone, members);
      }
    }
  }

  private isSelfOrAncestor(candidate: string, of: string): boolean {
    let current: string | undefined = of;
    while (current !== undefined) {
      if (current === candidate) return true;
      current = this.parentOf.get(current)?.container;
    }
    return false;
  }

  private indexConnections(connections: TConnectionAST[]): void {
    const pairs = new Set<string>();
    const occupiedInputs = new Set<string>();

    for (const conn of connections) {
      const from = this.blocksById.get(conn.from.block);
      const to = this.blocksById.get(conn.to.block);
      if (!from || !to) {
        const missing = !from ? conn.from.block : conn.to.block;
        this.warn('UNKNOWN_BLOCK', `Connection references unknown block "${missing}"`, {
          connection: conn,
        });
        continue;
      }
      if (!from.outputs.includes(conn.from.port)) {
        this.warn('UNKNOWN_PORT', `Block "${from.id}" has no output port "${conn.from.port}"`, {
          block: from.id,
          connection: conn,
        });
        continue;
      }
      if (!to.inputs.includes(conn.to.port)) {
        this.warn('UNKNOWN_PORT', `Block "${to.id}" has no input port "${conn.to.port}"`, {
          block: to.id,
          connection: conn,
        });
        continue;
      }
      if (from.id === to.id) {
        this.warn('SELF_CONNECTION', `Block "${from.id}" is connected to itself`, {
          block: from.id,
          connection: conn,
        });
        continue;
      }
      const pairKey = `${from.id}.${conn.from.port}->${to.id}.${conn.to.port}`;
      if (pairs.has(pairKey)) {
        this.warn('DUPLICATE_CONNECTION', `Duplicate connection ${pairKey}`, { connection: conn });
        continue;
      }
      const inputKey = `${to.id}.${conn.to.port}`;
      if (occupiedInputs.has(inputKey)) {
        this.warn(
          'INPUT_ALREADY_CONNECTED',
          `Input port "${conn.to.port}" of "${to.id}" already has a connection`,
          { block: to.id, connection: conn }
        );
        continue;
      }
      pairs.add(pairKey);
      occupiedInputs.add(inputKey);

      this.validConnections.push(conn);
      pushTo(this.outgoing, from.id, conn);
      pushTo(this.incoming, to.id, conn);
    }
  }

  private warn(
    code: TDiagnostic['code'],
    message: string,
    extra: Pick<TDiagnostic, 'block' | 'connection'> = {}
  ): void {
    this.diagnostics.push({ type: 'warning', code, message, ...extra });
  }
}

function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}
