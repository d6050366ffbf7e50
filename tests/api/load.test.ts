/**
 * Tests for reading snapshot files
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadSnapshotFile, parseSnapshot, SnapshotLoadError } from '../../src/api/load.js';
import { generateScript } from '../../src/api/generate.js';

const FLAT_SNAPSHOT = {
  blocks: [
    { id: 'list0001', title: 'Get-ChildItem', command: 'Get-ChildItem' },
    { id: 'loop0001', title: 'For Each', container: { kind: 'for-each' } },
    {
      id: 'del00001',
      title: 'Remove-Item',
      command: 'Remove-Item',
      parameters: [{ name: 'WhatIf', type: 'Bool', value: 'true' }],
      parent: { id: 'loop0001', zone: 'Body' },
    },
  ],
  connections: [{ from: { block: 'list0001', port: 'Out' }, to: { block: 'loop0001', port: 'In' } }],
};

describe('parseSnapshot', () => {
  it('should apply defaults and rebuild zone children from parent references', () => {
    const { snapshot, diagnostics } = parseSnapshot(FLAT_SNAPSHOT);

    expect(diagnostics).toEqual([]);
    expect(snapshot.blocks[0]).toEqual({
      id: 'list0001',
      title: 'Get-ChildItem',
      category: '',
      command: 'Get-ChildItem',
      parameters: [],
      inputs: ['In'],
      outputs: ['Out'],
    });
    expect(snapshot.blocks[1].container).toEqual({
      kind: 'for-each',
      zones: { body: { name: 'Body', children: ['del00001'] } },
    });
  });

  it('should produce a snapshot the generator accepts', () => {
    const { snapshot } = parseSnapshot(FLAT_SNAPSHOT);

    const { script } = generateScript(snapshot, { header: false, sectionComments: false });

    expect(script).toBe(
      [
        '$GetChildItem_list = Get-ChildItem',
        '',
        '$GetChildItem_list | ForEach-Object {',
        '    $_ | Remove-Item -WhatIf',
        '}',
        '',
      ].join('\n')
    );
  });

  it('should match zone names case-insensitively', () => {
    const { snapshot } = parseSnapshot({
      blocks: [
        { id: 'cond', title: 'If', container: { kind: 'if-else', condition: '$x' } },
        { id: 'then', title: 'Then', script: 'Write-Host', parent: { id: 'cond', zone: 'then' } },
      ],
    });

    expect(snapshot.blocks[0].container).toEqual({
      kind: 'if-else',
      condition: '$x',
      zones: { then: { name: 'Then', children: ['then'] }, else: { name: 'Else', children: [] } },
    });
  });

  it('should keep a block with an unknown parent at top level and warn', () => {
    const { snapshot, diagnostics } = parseSnapshot({
      blocks: [{ id: 'orphan', title: 'Get-Date', command: 'Get-Date', parent: { id: 'nope', zone: 'Body' } }],
    });

    expect(snapshot.blocks).toHaveLength(1);
    expect(diagnostics).toEqual([
      {
        type: 'warning',
        code: 'UNKNOWN_PARENT',
        message: 'Block "orphan" names parent zone "nope/Body", which does not exist; treated as top-level',
        block: 'orphan',
      },
    ]);
  });

  it('should reject data that does not match the schema', () => {
    expect(() => parseSnapshot({ blocks: [{ title: 'no id' }] })).toThrow(SnapshotLoadError);

    try {
      parseSnapshot({ blocks: [{ id: 'x', title: 'X', container: { kind: 'switch' } }] }, 'bad.json');
      expect.unreachable('parseSnapshot should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(SnapshotLoadError);
      if (error instanceof SnapshotLoadError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0].startsWith('blocks.0.container.kind: ')).toBe(true);
        expect(error.message.startsWith('Invalid snapshot bad.json\n')).toBe(true);
      }
    }
  });
});

describe('loadSnapshotFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipewright-load-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read and parse a JSON file', async () => {
    const file = path.join(tempDir, 'graph.json');
    fs.writeFileSync(file, JSON.stringify(FLAT_SNAPSHOT));

    const { snapshot } = await loadSnapshotFile(file);

    expect(snapshot.blocks.map((b) => b.id)).toEqual(['list0001', 'loop0001', 'del00001']);
    expect(snapshot.connections).toHaveLength(1);
  });

  it('should reject a missing file', async () => {
    await expect(loadSnapshotFile(path.join(tempDir, 'missing.json'))).rejects.toThrow(/^Cannot read /);
  });

  it('should reject invalid JSON', async () => {
    const file = path.join(tempDir, 'broken.json');
    fs.writeFileSync(file, '{ "blocks": [');

    await expect(loadSnapshotFile(file)).rejects.toThrow(/^Invalid JSON in /);
  });
});
