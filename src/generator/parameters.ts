import type { TBlockAST, TParameterAST } from '../ast/types.js';
import { DEFAULT_FUNCTION_NAME, isCallable } from '../constants.js';

/**
 * Resolve a parameter's effective value: the user value when it is not blank,
 * otherwise the default. Always trimmed; empty when neither is set.
 */
export function effectiveValue(param: TParameterAST): string {
  const raw = param.value !== undefined && param.value.trim() !== '' ? param.value : param.defaultValue;
  return (raw ?? '').trim();
}

/**
 * Format one parameter as a command-line argument.
 *
 * Returns an empty string when the value is blank, so the parameter is omitted.
 *
 * | Type          | Output                     |
 * |---------------|----------------------------|
 * | String, Path  | `-Name "value"` (`"` → `` `" ``) |
 * | Int           | `-Name 42`                 |
 * | Bool          | `-Name` when true, else omitted |
 * | StringArray   | `-Name @("a", "b")`        |
 * | ScriptBlock   | `-Name { body }`           |
 * | anything else | `-Name "value"`            |
 */
export function formatParameterArgument(param: TParameterAST): string {
  const value = effectiveValue(param);
  if (value === '') return '';

  switch (param.type) {
    case 'String':
    case 'Path':
      return `-${param.name} "${value.replace(/"/g, '`"')}"`;
    case 'Int':
      return `-${param.name} ${value}`;
    case 'Bool':
      return value.toLowerCase() === 'true' ? `-${param.name}` : '';
    case 'StringArray': {
      const items = value.split(',').map((item) => `"${item.trim()}"`);
      return `-${param.name} @(${items.join(', ')})`;
    }
    case 'ScriptBlock':
      return `-${param.name} { ${value} }`;
    case 'Enum':
    case 'Credential':
      return `-${param.name} "${value}"`;
  }
}

/** Join a block's non-blank parameter arguments with single spaces */
export function formatArguments(block: TBlockAST): string {
  return block.parameters
    .map(formatParameterArgument)
    .filter((arg) => arg !== '')
    .join(' ');
}

/**
 * The expression a block contributes as one pipeline stage.
 *
 * - callables: their function name
 * - command blocks: `Command -Arg value ...`
 * - script blocks: the trimmed script body
 */
export function buildBlockExpression(block: TBlockAST): string {
  if (isCallable(block)) {
    return callableName(block.container.name);
  }
  if (block.command) {
    const args = formatArguments(block);
    return args === '' ? block.command : `${block.command} ${args}`;
  }
  return (block.script ?? '').trim();
}

export function callableName(name: string): string {
  const trimmed = name.trim();
  return trimmed === '' ? DEFAULT_FUNCTION_NAME : trimmed;
}
