/**
 * Tests for snapshot validation without generation
 */

import { validateSnapshot, validator } from '../../src/validator.js';
import { forEach, graph } from '../helpers/graph-builder.js';

describe('SnapshotValidator', () => {
  it('should accept a well-formed snapshot', () => {
    const snapshot = graph().command('a', 'Get-Process').command('b', 'Sort-Object').connect('a', 'b').build();

    expect(validateSnapshot(snapshot)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('should report zone cycles, ambiguous upstreams and skipped references together', () => {
    const snapshot = graph()
      .container('loop', forEach())
      .command('p', 'Get-Item')
      .command('q', 'Set-Item')
      .place('p', 'loop', 'Body')
      .place('q', 'loop', 'Body')
      .command('a', 'Get-Date')
      .command('b', 'Get-Random')
      .command('c', 'Write-Output', [], { inputs: ['In', 'Extra'] })
      .connect('p', 'q')
      .connect('q', 'p')
      .connect('a', 'c')
      .connect('b', 'c', 'Out', 'Extra')
      .connect('a', 'ghost')
      .build();

    const report = validator.validate(snapshot);

    expect(report.valid).toBe(false);
    expect(report.errors).toEqual([
      {
        type: 'error',
        code: 'CYCLE',
        message: `Cycle detected in zone 'Body' of "loop" (blocks: p, q)`,
        block: 'p',
      },
    ]);
    expect(report.warnings.map((w) => w.code)).toEqual(['UNKNOWN_BLOCK', 'AMBIGUOUS_UPSTREAM']);
  });

  it('should report a top-level cycle', () => {
    const snapshot = graph().command('a', 'Get-Item').command('b', 'Set-Item').connect('a', 'b').connect('b', 'a').build();

    const report = validateSnapshot(snapshot);

    expect(report.errors.map((e) => e.message)).toEqual(['Cycle detected in graph (blocks: a, b)']);
  });

  it('should not carry results over between runs', () => {
    const cyclic = graph().command('a', 'Get-Item').command('b', 'Set-Item').connect('a', 'b').connect('b', 'a').build();
    validator.validate(cyclic);

    expect(validator.validate(graph().command('a', 'Get-Date').build()).valid).toBe(true);
  });
});
