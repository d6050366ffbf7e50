/**
 * # Pipewright Constants
 *
 * Reserved names and fixed tokens of the generated PowerShell.
 *
 * ## Container Zones
 *
 * ```
 * ┌─────────────┬───────────────────┬───────────────────────────────────┐
 * │ Kind        │ Zones             │ Implicit input of each zone        │
 * ├─────────────┼───────────────────┼───────────────────────────────────┤
 * │ if-else     │ Then, Else        │ container input (both branches)    │
 * │ for-each    │ Body              │ $_ (current pipeline element)      │
 * │ while       │ Body              │ container input                    │
 * │ try-catch   │ Try, Catch        │ container input / none             │
 * │ function    │ Body              │ $<InputParam>, when declared       │
 * └─────────────┴───────────────────┴───────────────────────────────────┘
 * ```
 */

import type {
  TBlockAST,
  TContainerAST,
  TControlFlowContainer,
  TFunctionContainer,
  TZoneAST,
} from './ast/types.js';

export const DEFAULT_PORT_NAMES = {
  INPUT: 'In',
  OUTPUT: 'Out',
} as const;

export const ZONE_NAMES = {
  THEN: 'Then',
  ELSE: 'Else',
  BODY: 'Body',
  TRY: 'Try',
  CATCH: 'Catch',
} as const;

export const CONTAINER_KINDS = ['if-else', 'for-each', 'while', 'try-catch', 'function'] as const;

/** Zone names per container kind, in the order they are emitted */
export const CONTAINER_ZONES = {
  'if-else': [ZONE_NAMES.THEN, ZONE_NAMES.ELSE],
  'for-each': [ZONE_NAMES.BODY],
  while: [ZONE_NAMES.BODY],
  'try-catch': [ZONE_NAMES.TRY, ZONE_NAMES.CATCH],
  function: [ZONE_NAMES.BODY],
} as const satisfies Record<TContainerAST['kind'], readonly string[]>;

/** Automatic variable holding the current element inside ForEach-Object */
export const PIPELINE_ELEMENT = '$_';

/** Identifier used when sanitizing leaves nothing behind */
export const FALLBACK_IDENTIFIER = 'Result';

/** Characters of a block id appended to generated binding names */
export const ID_SUFFIX_LENGTH = 4;

export const DEFAULT_FUNCTION_NAME = 'Invoke-MyFunction';

export const DEFAULT_CONDITION = '$true';

export const DEFAULT_INDENT = 4;

export const SCRIPT_BANNER = 'Auto-generated PowerShell 5.1 Script';

/** Number of `=` in the banner rule lines */
export const BANNER_WIDTH = 43;

export const SECTION_TITLES = {
  FUNCTIONS: 'Function Definitions',
  EXECUTION: 'Execution',
} as const;

/** Width of the `# ── Title ───` separator lines */
export const SECTION_WIDTH = 46;

export const EMPTY_ZONE_COMMENT = '# (empty)';

export function isContainer(block: TBlockAST): block is TBlockAST & { container: TContainerAST } {
  return block.container !== undefined;
}

export function isCallable(
  block: TBlockAST
): block is TBlockAST & { container: TFunctionContainer } {
  return block.container?.kind === 'function';
}

/**
 * Control-flow containers are every container except named callables, which
 * behave like an ordinary pipeline stage from the outside.
 */
export function isControlFlowContainer(
  block: TBlockAST
): block is TBlockAST & { container: TControlFlowContainer } {
  return block.container !== undefined && block.container.kind !== 'function';
}

/** The zones of a container, in emission order */
export function containerZones(container: TContainerAST): TZoneAST[] {
  switch (container.kind) {
    case 'if-else':
      return [container.zones.then, container.zones.else];
    case 'try-catch':
      return [container.zones.try, container.zones.catch];
    case 'for-each':
    case 'while':
    case 'function':
      return [container.zones.body];
  }
}
