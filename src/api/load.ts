import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type {
  TBlockAST,
  TContainerAST,
  TDiagnostic,
  TGraphSnapshot,
  TZoneAST,
} from '../ast/types.js';
import { containerZones, DEFAULT_PORT_NAMES, ZONE_NAMES } from '../constants.js';
import { getErrorMessage } from '../utils/error-utils.js';

// ============================================================================
// File Schema
// ============================================================================

const portRefSchema = z.object({
  block: z.string().min(1),
  port: z.string().min(1),
});

const parameterSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['String', 'Int', 'Bool', 'StringArray', 'ScriptBlock', 'Path', 'Credential', 'Enum']),
  value: z.string().optional(),
  defaultValue: z.string().optional(),
});

const containerSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('if-else'), condition: z.string().default('') }),
  z.object({ kind: z.literal('for-each') }),
  z.object({ kind: z.literal('while'), condition: z.string().default('') }),
  z.object({ kind: z.literal('try-catch'), errorAction: z.string().optional() }),
  z.object({
    kind: z.literal('function'),
    name: z.string().default(''),
    inputParam: z.string().optional(),
    returnType: z.string().optional(),
    returnVariable: z.string().optional(),
  }),
]);

const blockSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  category: z.string().default(''),
  command: z.string().optional(),
  script: z.string().optional(),
  parameters: z.array(parameterSchema).default([]),
  outputVariable: z.string().optional(),
  inputs: z.array(z.string()).default([DEFAULT_PORT_NAMES.INPUT]),
  outputs: z.array(z.string()).default([DEFAULT_PORT_NAMES.OUTPUT]),
  /** The container zone holding this block; absent for top-level blocks */
  parent: z.object({ id: z.string().min(1), zone: z.string().min(1) }).optional(),
  container: containerSchema.optional(),
});

/**
 * On-disk snapshot layout. Blocks are flat and name their parent zone;
 * zone child lists are rebuilt on load.
 */
export const snapshotFileSchema = z.object({
  blocks: z.array(blockSchema),
  connections: z
    .array(z.object({ from: portRefSchema, to: portRefSchema }))
    .default([]),
});

export type TSnapshotFile = z.infer<typeof snapshotFileSchema>;
type TFileBlock = z.infer<typeof blockSchema>;
type TFileContainer = z.infer<typeof containerSchema>;

// ============================================================================
// Errors
// ============================================================================

export class SnapshotLoadError extends Error {
  constructor(
    message: string,
    /** Issue paths as `blocks.2.id: Required` */
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
    this.name = 'SnapshotLoadError';
  }
}

export type TLoadedSnapshot = {
  snapshot: TGraphSnapshot;
  /** Parent references that name no container zone */
  diagnostics: TDiagnostic[];
};

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate raw snapshot data and rebuild the zone child lists.
 *
 * A block whose parent names a missing container or zone stays top-level and
 * is reported as a warning.
 */
export function parseSnapshot(data: unknown, source = 'snapshot'): TLoadedSnapshot {
  const parsed = snapshotFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new SnapshotLoadError(`Invalid snapshot ${source}`, issues);
  }

  const diagnostics: TDiagnostic[] = [];
  const zonesByContainer = new Map<string, TZoneAST[]>();
  const blocks: TBlockAST[] = parsed.data.blocks.map((fileBlock) => {
    const block = toBlock(fileBlock);
    if (block.container && !zonesByContainer.has(block.id)) {
      zonesByContainer.set(block.id, containerZones(block.container));
    }
    return block;
  });

  parsed.data.blocks.forEach((fileBlock) => {
    if (!fileBlock.parent) return;
    const { id, zone } = fileBlock.parent;
    const target = zonesByContainer.get(id)?.find((candidate) => candidate.name.toLowerCase() === zone.toLowerCase());
    if (target) {
      target.children.push(fileBlock.id);
    } else {
      diagnostics.push({
        type: 'warning',
        code: 'UNKNOWN_PARENT',
        message: `Block "${fileBlock.id}" names parent zone "${id}/${zone}", which does not exist; treated as top-level`,
        block: fileBlock.id,
      });
    }
  });

  return {
    snapshot: { blocks, connections: parsed.data.connections },
    diagnostics,
  };
}

/**
 * Read and parse a snapshot JSON file.
 *
 * @throws SnapshotLoadError when the file is unreadable, not JSON, or fails validation
 */
export async function loadSnapshotFile(filePath: string): Promise<TLoadedSnapshot> {
  const absolutePath = path.resolve(filePath);
  let content: string;
  try {
    content = await fs.promises.readFile(absolutePath, 'utf8');
  } catch (error) {
    throw new SnapshotLoadError(`Cannot read ${filePath}: ${getErrorMessage(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new SnapshotLoadError(`Invalid JSON in ${filePath}: ${getErrorMessage(error)}`);
  }
  return parseSnapshot(data, filePath);
}

function toBlock(fileBlock: TFileBlock): TBlockAST {
  const block: TBlockAST = {
    id: fileBlock.id,
    title: fileBlock.title,
    category: fileBlock.category,
    parameters: fileBlock.parameters,
    inputs: fileBlock.inputs,
    outputs: fileBlock.outputs,
  };
  if (fileBlock.command !== undefined) block.command = fileBlock.command;
  if (fileBlock.script !== undefined) block.script = fileBlock.script;
  if (fileBlock.outputVariable !== undefined) block.outputVariable = fileBlock.outputVariable;
  if (fileBlock.container) block.container = toContainer(fileBlock.container);
  return block;
}

function toContainer(container: TFileContainer): TContainerAST {
  const zone = (name: string): TZoneAST => ({ name, children: [] });
  switch (container.kind) {
    case 'if-else':
      return { ...container, zones: { then: zone(ZONE_NAMES.THEN), else: zone(ZONE_NAMES.ELSE) } };
    case 'for-each':
      return { ...container, zones: { body: zone(ZONE_NAMES.BODY) } };
    case 'while':
      return { ...container, zones: { body: zone(ZONE_NAMES.BODY) } };
    case 'try-catch':
      return { ...container, zones: { try: zone(ZONE_NAMES.TRY), catch: zone(ZONE_NAMES.CATCH) } };
    case 'function':
      return { ...container, zones: { body: zone(ZONE_NAMES.BODY) } };
  }
}

