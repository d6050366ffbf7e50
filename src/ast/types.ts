/**
 * Graph Snapshot - The frozen view of an editor graph that the generator consumes.
 *
 * A snapshot is a directed graph where:
 * - `blocks` are every block in the graph, top-level and nested, in editor order
 * - container blocks own named `zones` listing their child block ids
 * - `connections` link an output port of one block to an input port of another
 *
 * ```
 * ┌──────────────────────────────────────────────────────────────┐
 * │                          SNAPSHOT                             │
 * │  ┌──────────────┐   Out → In   ┌────────────────────────────┐ │
 * │  │  Get-Process │─────────────►│ If / Else                  │ │
 * │  └──────────────┘              │ ┌── Then ──┐ ┌── Else ──┐ │ │
 * │                                │ │ child ids│ │ child ids│ │ │
 * │                                │ └──────────┘ └──────────┘ │ │
 * │                                └────────────────────────────┘ │
 * └──────────────────────────────────────────────────────────────┘
 * ```
 *
 * Blocks that no zone claims are top-level.
 *
 * @example
 * ```typescript
 * const snapshot: TGraphSnapshot = {
 *   blocks: [
 *     { id: 'a1b2c3d4', title: 'Get-Service', category: 'Services', command: 'Get-Service',
 *       parameters: [], inputs: ['In'], outputs: ['Out'] },
 *     { id: 'e5f6a7b8', title: 'Stop-Service', category: 'Services', command: 'Stop-Service',
 *       parameters: [], inputs: ['In'], outputs: ['Out'] },
 *   ],
 *   connections: [
 *     { from: { block: 'a1b2c3d4', port: 'Out' }, to: { block: 'e5f6a7b8', port: 'In' } },
 *   ],
 * };
 * ```
 */
export type TGraphSnapshot = {
  blocks: TBlockAST[];
  connections: TConnectionAST[];
};

export type TBlockAST = {
  /** Stable identity; its first characters also suffix generated binding names */
  id: string;
  /** Display title shown on the canvas */
  title: string;
  category: string;
  /** Command name for command blocks (e.g. `Get-ChildItem`) */
  command?: string;
  /** Free-form script body for script blocks, used when `command` is absent */
  script?: string;
  parameters: TParameterAST[];
  /** User-set binding name. Blank means "generate one when a binding is needed" */
  outputVariable?: string;
  /** Input port names */
  inputs: string[];
  /** Output port names */
  outputs: string[];
  /** Present only on container blocks */
  container?: TContainerAST;
};

export type TParamType =
  | 'String'
  | 'Int'
  | 'Bool'
  | 'StringArray'
  | 'ScriptBlock'
  | 'Path'
  | 'Credential'
  | 'Enum';

export type TParameterAST = {
  name: string;
  type: TParamType;
  /** User-entered value */
  value?: string;
  defaultValue?: string;
};

export type TZoneAST = {
  name: string;
  /** Ordered ids of the blocks placed in this zone */
  children: string[];
};

/**
 * Container variants. Each kind carries only the parameters it uses and
 * a fixed set of zones.
 */
export type TContainerAST =
  | TIfElseContainer
  | TForEachContainer
  | TWhileContainer
  | TTryCatchContainer
  | TFunctionContainer;

export type TContainerKind = TContainerAST['kind'];

/** Containers that emit a control-flow statement in place */
export type TControlFlowContainer = Exclude<TContainerAST, TFunctionContainer>;

export type TIfElseContainer = {
  kind: 'if-else';
  condition: string;
  zones: { then: TZoneAST; else: TZoneAST };
};

export type TForEachContainer = {
  kind: 'for-each';
  zones: { body: TZoneAST };
};

export type TWhileContainer = {
  kind: 'while';
  condition: string;
  zones: { body: TZoneAST };
};

export type TTryCatchContainer = {
  kind: 'try-catch';
  /** `$ErrorActionPreference` applied at the top of the protected region */
  errorAction?: string;
  zones: { try: TZoneAST; catch: TZoneAST };
};

export type TFunctionContainer = {
  kind: 'function';
  /** Function name, used for the definition and at every call site */
  name: string;
  /** Pipeline parameter name, without the `$` sigil */
  inputParam?: string;
  /** Type named in an `[OutputType()]` attribute */
  returnType?: string;
  /** Variable returned at the end of the body, without the `$` sigil */
  returnVariable?: string;
  zones: { body: TZoneAST };
};

export type TPortRef = {
  block: string;
  port: string;
};

export type TConnectionAST = {
  from: TPortRef;
  to: TPortRef;
};

export type TDiagnosticCode =
  | 'CYCLE'
  | 'AMBIGUOUS_UPSTREAM'
  | 'UNKNOWN_BLOCK'
  | 'UNKNOWN_PORT'
  | 'SELF_CONNECTION'
  | 'DUPLICATE_CONNECTION'
  | 'INPUT_ALREADY_CONNECTED'
  | 'DUPLICATE_BLOCK'
  | 'UNKNOWN_ZONE_MEMBER'
  | 'UNKNOWN_PARENT'
  | 'ZONE_MEMBER_CLAIMED'
  | 'NESTING_CYCLE';

export type TDiagnostic = {
  type: 'error' | 'warning';
  code: TDiagnosticCode;
  message: string;
  /** Block the diagnostic is about, when there is one */
  block?: string;
  connection?: TConnectionAST;
};

export type TGenerateOptions = {
  /** Spaces per indentation level */
  indent?: number;
  /** Emit the banner comment at the top of the script */
  header?: boolean;
  /** Emit the section separator comments */
  sectionComments?: boolean;
  /** Stamp the banner with this time. Omit for byte-identical output across runs */
  generatedAt?: Date;
};

/** A block whose result is captured into a named variable */
export type TBinding = {
  block: string;
  /** Variable name without the `$` sigil */
  name: string;
};

export type TGenerateResult = {
  /** The generated script, or only a diagnostic line when the main scope has a cycle */
  script: string;
  diagnostics: TDiagnostic[];
  /** Every binding created during the pass, in creation order */
  bindings: TBinding[];
};
