/**
 * Tests for pipeline chain partitioning
 */

import { GraphIndex } from '../../src/ast/graph-index.js';
import { buildChains, indexChains } from '../../src/generator/chains.js';
import { sortScope } from '../../src/generator/topological-sort.js';
import { callable, graph, ifElse } from '../helpers/graph-builder.js';

function chainIds(builder: ReturnType<typeof graph>): string[][] {
  const index = new GraphIndex(builder.build());
  const sorted = sortScope([...index.blocks], index);
  if (!sorted.ok) throw new Error('unexpected cycle');
  return buildChains(sorted.order, index).map((chain) => chain.map((b) => b.id));
}

describe('buildChains', () => {
  it('should fuse a linear run into one chain', () => {
    const builder = graph()
      .command('a', 'Get-Process')
      .command('b', 'Sort-Object')
      .command('c', 'Select-Object')
      .connect('a', 'b')
      .connect('b', 'c');

    expect(chainIds(builder)).toEqual([['a', 'b', 'c']]);
  });

  it('should end a chain at a fan-out', () => {
    const builder = graph()
      .command('s', 'Get-Service')
      .command('x', 'Stop-Service')
      .command('y', 'Export-Csv')
      .connect('s', 'x')
      .connect('s', 'y');

    expect(chainIds(builder)).toEqual([['s'], ['x'], ['y']]);
  });

  it('should start a new chain at a fan-in', () => {
    const builder = graph()
      .command('a', 'Get-Date')
      .command('b', 'Get-Random')
      .command('j', 'Compare-Object', [], { inputs: ['In', 'Difference'] })
      .connect('a', 'j')
      .connect('b', 'j', 'Out', 'Difference');

    expect(chainIds(builder)).toEqual([['a'], ['b'], ['j']]);
  });

  it('should leave control-flow containers out of chains', () => {
    const builder = graph()
      .command('a', 'Get-ChildItem')
      .container('cond', ifElse('$true'))
      .command('b', 'Out-Host')
      .connect('a', 'cond')
      .connect('cond', 'b');

    expect(chainIds(builder)).toEqual([['a'], ['b']]);
  });

  it('should treat a callable as an ordinary stage', () => {
    const builder = graph()
      .command('a', 'Get-Service')
      .container('fn', callable('Format-Report'))
      .command('b', 'Out-File')
      .connect('a', 'fn')
      .connect('fn', 'b');

    expect(chainIds(builder)).toEqual([['a', 'fn', 'b']]);
  });
});

describe('indexChains', () => {
  it('should map every member to its chain', () => {
    const index = new GraphIndex(
      graph().command('a', 'Get-Process').command('b', 'Sort-Object').connect('a', 'b').build()
    );
    const chains = buildChains([...index.blocks], index);
    const byBlock = indexChains(chains);

    expect(byBlock.get('a')).toBe(chains[0]);
    expect(byBlock.get('b')).toBe(chains[0]);
  });
});
