/**
 * Fluent builder for in-memory graph snapshots used across generator tests.
 */

import type {
  TBlockAST,
  TConnectionAST,
  TContainerAST,
  TFunctionContainer,
  TGraphSnapshot,
  TParameterAST,
  TZoneAST,
} from '../../src/ast/types.js';
import { containerZones } from '../../src/constants.js';

const zone = (name: string): TZoneAST => ({ name, children: [] });

// ============================================================================
// Container factories
// ============================================================================

export const ifElse = (condition: string): TContainerAST => ({
  kind: 'if-else',
  condition,
  zones: { then: zone('Then'), else: zone('Else') },
});

export const forEach = (): TContainerAST => ({ kind: 'for-each', zones: { body: zone('Body') } });

export const whileLoop = (condition: string): TContainerAST => ({
  kind: 'while',
  condition,
  zones: { body: zone('Body') },
});

export const tryCatch = (errorAction?: string): TContainerAST => ({
  kind: 'try-catch',
  errorAction,
  zones: { try: zone('Try'), catch: zone('Catch') },
});

export const callable = (
  name: string,
  extra: Partial<Omit<TFunctionContainer, 'kind' | 'name' | 'zones'>> = {}
): TContainerAST => ({ kind: 'function', name, ...extra, zones: { body: zone('Body') } });

const CONTAINER_TITLES: Record<TContainerAST['kind'], string> = {
  'if-else': 'If Else',
  'for-each': 'For Each',
  while: 'While Loop',
  'try-catch': 'Try Catch',
  function: 'Function',
};

// ============================================================================
// Builder
// ============================================================================

export class GraphBuilder {
  private readonly blocks: TBlockAST[] = [];
  private readonly connections: TConnectionAST[] = [];

  /** A command block titled after its command */
  command(id: string, command: string, parameters: TParameterAST[] = [], extra: Partial<TBlockAST> = {}): this {
    return this.block({ id, title: command, command, parameters, ...extra });
  }

  /** A script block with a free-form body */
  script(id: string, script: string, extra: Partial<TBlockAST> = {}): this {
    return this.block({ id, title: 'Script', script, ...extra });
  }

  container(id: string, container: TContainerAST, extra: Partial<TBlockAST> = {}): this {
    return this.block({ id, title: CONTAINER_TITLES[container.kind], container, ...extra });
  }

  block(partial: Partial<TBlockAST> & { id: string }): this {
    this.blocks.push({
      title: partial.id,
      category: 'Test',
      parameters: [],
      inputs: ['In'],
      outputs: ['Out'],
      ...partial,
    });
    return this;
  }

  /** Place `childId` in the named zone of `containerId` */
  place(childId: string, containerId: string, zoneName: string): this {
    const container = this.blocks.find((b) => b.id === containerId)?.container;
    if (!container) {
      throw new Error(`No container "${containerId}" in builder`);
    }
    const target = containerZones(container).find((z) => z.name === zoneName);
    if (!target) {
      throw new Error(`Container "${containerId}" has no zone "${zoneName}"`);
    }
    target.children.push(childId);
    return this;
  }

  connect(from: string, to: string, fromPort = 'Out', toPort = 'In'): this {
    this.connections.push({ from: { block: from, port: fromPort }, to: { block: to, port: toPort } });
    return this;
  }

  build(): TGraphSnapshot {
    return { blocks: this.blocks, connections: this.connections };
  }
}

export const graph = (): GraphBuilder => new GraphBuilder();

export const param = (
  name: string,
  type: TParameterAST['type'],
  value?: string,
  defaultValue?: string
): TParameterAST => ({ name, type, value, defaultValue });

/** The `# ── Title ───` separator as it appears in generated scripts */
export const separator = (title: string): string =>
  `# ── ${title} ${'─'.repeat(46 - title.length - 6)}`;

export const BANNER_RULE = `# ${'='.repeat(43)}`;
