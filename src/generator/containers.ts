import type {
  TBlockAST,
  TControlFlowContainer,
  TForEachContainer,
  TFunctionContainer,
  TIfElseContainer,
  TTryCatchContainer,
  TWhileContainer,
} from '../ast/types.js';
import { DEFAULT_CONDITION, PIPELINE_ELEMENT } from '../constants.js';
import { toVariableReference } from './identifiers.js';
import { callableName } from './parameters.js';
import { emitZone, indent, joinStatements, type TEmitContext } from './scope-emitter.js';

/**
 * Emit a control-flow container in place.
 *
 * Every strategy has the same shape: opening syntax, each zone emitted as its
 * own scope one level deeper, closing syntax. `assignTo` captures the whole
 * statement's output into a binding.
 *
 * @param input - Expression flowing into the container's input port
 * @param assignTo - Binding name (without `$`) for the statement's output
 */
export function emitControlFlowContainer(
  ctx: TEmitContext,
  container: TControlFlowContainer,
  depth: number,
  input: string | null,
  assignTo: string | null
): string[] {
  const lead = `${indent(ctx, depth)}${assignTo ? `${toVariableReference(assignTo)} = ` : ''}`;
  switch (container.kind) {
    case 'if-else':
      return emitIfElse(ctx, container, depth, lead, input);
    case 'for-each':
      return emitForEach(ctx, container, depth, lead, input);
    case 'while':
      return emitWhile(ctx, container, depth, lead, input);
    case 'try-catch':
      return emitTryCatch(ctx, container, depth, lead, input);
  }
}

function emitIfElse(
  ctx: TEmitContext,
  container: TIfElseContainer,
  depth: number,
  lead: string,
  input: string | null
): string[] {
  const pad = indent(ctx, depth);
  const lines = [`${lead}if (${condition(container.condition)}) {`];
  lines.push(...emitZone(ctx, container.zones.then, depth + 1, input).lines);
  lines.push(`${pad}}`);

  // Else branch only when something was placed in it
  if (ctx.index.zoneChildren(container.zones.else).length > 0) {
    lines.push(`${pad}else {`);
    lines.push(...emitZone(ctx, container.zones.else, depth + 1, input).lines);
    lines.push(`${pad}}`);
  }
  return lines;
}

function emitForEach(
  ctx: TEmitContext,
  container: TForEachContainer,
  depth: number,
  lead: string,
  input: string | null
): string[] {
  const lines = [input ? `${lead}${input} | ForEach-Object {` : `${lead}ForEach-Object {`];
  lines.push(...emitZone(ctx, container.zones.body, depth + 1, PIPELINE_ELEMENT).lines);
  lines.push(`${indent(ctx, depth)}}`);
  return lines;
}

function emitWhile(
  ctx: TEmitContext,
  container: TWhileContainer,
  depth: number,
  lead: string,
  input: string | null
): string[] {
  const lines = [`${lead}while (${condition(container.condition)}) {`];
  lines.push(...emitZone(ctx, container.zones.body, depth + 1, input).lines);
  lines.push(`${indent(ctx, depth)}}`);
  return lines;
}

/**
 * The catch region gets no implicit input: the caught error is not threaded
 * into it automatically.
 */
function emitTryCatch(
  ctx: TEmitContext,
  container: TTryCatchContainer,
  depth: number,
  lead: string,
  input: string | null
): string[] {
  const pad = indent(ctx, depth);
  const inner = indent(ctx, depth + 1);
  const lines = [`${lead}try {`];
  const errorAction = container.errorAction?.trim();
  if (errorAction) {
    lines.push(`${inner}$ErrorActionPreference = '${errorAction}'`);
  }
  lines.push(...emitZone(ctx, container.zones.try, depth + 1, input).lines);
  lines.push(`${pad}}`);
  lines.push(`${pad}catch {`);
  lines.push(...emitZone(ctx, container.zones.catch, depth + 1, null).lines);
  lines.push(`${pad}}`);
  return lines;
}

/**
 * Emit a hoisted function definition for a named callable.
 *
 * ```powershell
 * function Get-Report {
 *     [OutputType([string])]
 *     param(
 *         [Parameter(ValueFromPipeline)]
 *         $InputObject
 *     )
 *     process {
 *         $InputObject | Format-Table
 *     }
 * }
 * ```
 *
 * Without an input parameter the body sits directly in the function.
 */
export function emitFunctionDefinition(
  ctx: TEmitContext,
  block: TBlockAST & { container: TFunctionContainer },
  depth: number
): string[] {
  const fn = block.container;
  const pad = indent(ctx, depth);
  const inner = indent(ctx, depth + 1);
  const inputParam = bareName(fn.inputParam);
  const returnType = fn.returnType?.trim();
  const returnVariable = bareName(fn.returnVariable);

  const lines = [`${pad}function ${callableName(fn.name)} {`];
  if (returnType) {
    lines.push(`${inner}[OutputType([${returnType}])]`);
  }

  if (inputParam) {
    lines.push(`${inner}param(`);
    lines.push(`${indent(ctx, depth + 2)}[Parameter(ValueFromPipeline)]`);
    lines.push(`${indent(ctx, depth + 2)}${toVariableReference(inputParam)}`);
    lines.push(`${inner})`);
    lines.push(`${inner}process {`);
    lines.push(...bodyWithReturn(ctx, fn, depth + 2, toVariableReference(inputParam), returnVariable));
    lines.push(`${inner}}`);
  } else {
    if (returnType) {
      lines.push(`${inner}param()`);
    }
    lines.push(...bodyWithReturn(ctx, fn, depth + 1, null, returnVariable));
  }

  lines.push(`${pad}}`);
  return lines;
}

function bodyWithReturn(
  ctx: TEmitContext,
  fn: TFunctionContainer,
  depth: number,
  input: string | null,
  returnVariable: string | undefined
): string[] {
  const body = emitZone(ctx, fn.zones.body, depth, input).lines;
  if (!returnVariable) return body;
  return joinStatements([body, [`${indent(ctx, depth)}return ${toVariableReference(returnVariable)}`]]);
}

function condition(raw: string): string {
  const trimmed = raw.trim();
  return trimmed === '' ? DEFAULT_CONDITION : trimmed;
}

function bareName(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim().replace(/^\$/, '');
  return trimmed ? trimmed : undefined;
}
