/**
 * pipewright - PowerShell script generation from block graph snapshots
 *
 * @example
 * ```typescript
 * import { loadSnapshotFile, generateScript } from 'pipewright';
 *
 * const { snapshot } = await loadSnapshotFile('graph.json');
 * const { script, diagnostics } = generateScript(snapshot);
 * ```
 */

export type * from './ast/types.js';
export { GraphIndex } from './ast/graph-index.js';

export { generateScript, sectionLine } from './api/generate.js';
export { describeSnapshot, type TScriptPlan, type TPlanStep } from './api/describe.js';
export {
  loadSnapshotFile,
  parseSnapshot,
  snapshotFileSchema,
  SnapshotLoadError,
  type TLoadedSnapshot,
  type TSnapshotFile,
} from './api/load.js';
export { SnapshotValidator, validator, validateSnapshot, type TValidationReport } from './validator.js';

export { sortScope, type TSortResult } from './generator/topological-sort.js';
export { buildChains, type TChain } from './generator/chains.js';
export { BindingTable, BindingView } from './generator/bindings.js';
export { sanitizeIdentifier, toVariableReference } from './generator/identifiers.js';
export { formatParameterArgument, buildBlockExpression } from './generator/parameters.js';

export { loadConfig, ConfigError, CONFIG_FILE_NAMES } from './config/loader.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export type { GeneratorConfig, PartialGeneratorConfig, CliConfigOverrides } from './config/types.js';

export { getErrorMessage, wrapError } from './utils/error-utils.js';
