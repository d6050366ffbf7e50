/**
 * Tests for the generate command
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { generateCommand } from '../../src/cli/commands/generate.js';

const LINEAR = {
  blocks: [
    { id: 'a1', title: 'Get-Process', command: 'Get-Process' },
    { id: 'b1', title: 'Sort-Object', command: 'Sort-Object' },
  ],
  connections: [{ from: { block: 'a1', port: 'Out' }, to: { block: 'b1', port: 'In' } }],
};

const CYCLIC = {
  blocks: [
    { id: 'a', title: 'Get-Item', command: 'Get-Item' },
    { id: 'b', title: 'Set-Item', command: 'Set-Item' },
  ],
  connections: [
    { from: { block: 'a', port: 'Out' }, to: { block: 'b', port: 'In' } },
    { from: { block: 'b', port: 'Out' }, to: { block: 'a', port: 'In' } },
  ],
};

describe('generateCommand', () => {
  let tempDir: string;
  let configFile: string;

  const writeJson = (name: string, data: unknown): string => {
    const file = path.join(tempDir, name);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(data));
    return file;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipewright-generate-'));
    configFile = path.join(tempDir, 'settings.yaml');
    fs.writeFileSync(configFile, 'header: false\nsectionComments: false\n');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write the script beside the snapshot', async () => {
    const input = writeJson('linear.json', LINEAR);

    const summary = await generateCommand(input, { config: configFile });

    const output = path.join(tempDir, 'linear.ps1');
    expect(summary).toEqual({ written: [output], failed: [] });
    expect(fs.readFileSync(output, 'utf8')).toBe('Get-Process | Sort-Object\n');
  });

  it('should apply the indent flag over the config file', async () => {
    const input = writeJson('loop.json', {
      blocks: [
        { id: 'w', title: 'While', container: { kind: 'while', condition: '$true' } },
        { id: 's', title: 'Start-Sleep', command: 'Start-Sleep', parent: { id: 'w', zone: 'Body' } },
      ],
    });

    await generateCommand(input, { config: configFile, indent: '2' });

    expect(fs.readFileSync(path.join(tempDir, 'loop.ps1'), 'utf8')).toBe('while ($true) {\n  Start-Sleep\n}\n');
  });

  it('should write every snapshot of a directory into the output directory', async () => {
    writeJson('graphs/one.json', LINEAR);
    writeJson('graphs/nested/two.json', LINEAR);
    const outDir = path.join(tempDir, 'out');

    const summary = await generateCommand(path.join(tempDir, 'graphs'), { config: configFile, output: outDir });

    expect(summary.written).toEqual([path.join(outDir, 'two.ps1'), path.join(outDir, 'one.ps1')]);
    expect(fs.existsSync(path.join(outDir, 'one.ps1'))).toBe(true);
    expect(fs.existsSync(path.join(outDir, 'two.ps1'))).toBe(true);
  });

  it('should write a single input to an explicit output file', async () => {
    const input = writeJson('linear.json', LINEAR);
    const output = path.join(tempDir, 'scripts', 'Run-Linear.ps1');

    await generateCommand(input, { config: configFile, output });

    expect(fs.readFileSync(output, 'utf8')).toBe('Get-Process | Sort-Object\n');
  });

  it('should not write anything in a dry run', async () => {
    const input = writeJson('linear.json', LINEAR);

    const summary = await generateCommand(input, { config: configFile, dryRun: true });

    expect(summary.written).toEqual([path.join(tempDir, 'linear.ps1')]);
    expect(fs.existsSync(path.join(tempDir, 'linear.ps1'))).toBe(false);
  });

  it('should print scripts with --stdout', async () => {
    const input = writeJson('linear.json', LINEAR);
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await generateCommand(input, { config: configFile, stdout: true });

    expect(write).toHaveBeenCalledWith('Get-Process | Sort-Object\n');
    expect(fs.existsSync(path.join(tempDir, 'linear.ps1'))).toBe(false);
  });

  it('should fail and write nothing for a snapshot with a cycle', async () => {
    const input = writeJson('cyclic.json', CYCLIC);

    await expect(generateCommand(input, { config: configFile })).rejects.toThrow('1 file(s) failed to generate');
    expect(fs.existsSync(path.join(tempDir, 'cyclic.ps1'))).toBe(false);
  });

  it('should fail when nothing matches the input', async () => {
    const pattern = path.join(tempDir, 'none', '*.json');

    await expect(generateCommand(pattern, { config: configFile })).rejects.toThrow(
      `No files found matching pattern: ${pattern}`
    );
  });
});
