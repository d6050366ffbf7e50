import type { TBinding, TBlockAST } from '../ast/types.js';
import { ID_SUFFIX_LENGTH, isCallable } from '../constants.js';
import { sanitizeIdentifier } from './identifiers.js';
import { callableName } from './parameters.js';

/**
 * Append-only table of the bindings created during one generation pass.
 *
 * Entries are never removed or rewritten. A recursion level reads the table
 * through a {@link BindingView}, which is frozen at the length the table had
 * when the view was taken, so a scope only ever sees its own bindings and
 * those of the scopes that were planned before it.
 *
 * Generated names are unique across the whole pass. Explicit names chosen by
 * the user are used as given, even when two blocks share one.
 */
export class BindingTable {
  private readonly entries: TBinding[] = [];
  private readonly positionByBlock = new Map<string, number>();
  private readonly taken = new Set<string>();

  get size(): number {
    return this.entries.length;
  }

  /**
   * Bind a block. Binding an already bound block returns the existing entry.
   *
   * The name comes from the block's own explicit output variable, then from
   * the first member of `chain` that has one, then from the title and id of
   * the chain head.
   *
   * @param chain - The pipeline the block terminates; defaults to the block alone
   */
  bind(block: TBlockAST, chain: readonly TBlockAST[] = [block]): TBinding {
    const existing = this.positionByBlock.get(block.id);
    if (existing !== undefined) {
      return this.entries[existing];
    }
    const binding: TBinding = { block: block.id, name: this.nameFor(block, chain) };
    this.positionByBlock.set(block.id, this.entries.length);
    this.entries.push(binding);
    this.taken.add(binding.name);
    return binding;
  }

  /** A frozen view over every binding created so far */
  view(): BindingView {
    return new BindingView(this.entries, this.positionByBlock, this.entries.length);
  }

  /** Bindings appended since the table had `mark` entries */
  since(mark: number): TBinding[] {
    return this.entries.slice(mark);
  }

  private nameFor(block: TBlockAST, chain: readonly TBlockAST[]): string {
    const explicit = [block, ...chain].find((member) => hasExplicitName(member));
    if (explicit?.outputVariable !== undefined) {
      return sanitizeIdentifier(explicit.outputVariable);
    }

    const source = chain.length > 0 ? chain[0] : block;
    const title = isCallable(source) ? callableName(source.container.name) : source.title;
    const base = sanitizeIdentifier(title);
    const idChars = source.id.replace(/[^a-zA-Z0-9]/g, '');

    for (let length = Math.min(ID_SUFFIX_LENGTH, idChars.length); length <= idChars.length; length++) {
      if (length === 0) continue;
      const candidate = `${base}_${idChars.slice(0, length)}`;
      if (!this.taken.has(candidate)) return candidate;
    }

    const stem = idChars.length > 0 ? `${base}_${idChars}` : base;
    let counter = 2;
    while (this.taken.has(`${stem}_${counter}`)) counter++;
    return `${stem}_${counter}`;
  }
}

function hasExplicitName(block: TBlockAST): boolean {
  return block.outputVariable !== undefined && block.outputVariable.trim() !== '';
}

/**
 * Immutable view of a {@link BindingTable} prefix.
 */
export class BindingView {
  constructor(
    private readonly entries: readonly TBinding[],
    private readonly positionByBlock: ReadonlyMap<string, number>,
    private readonly length: number
  ) {}

  /** The binding name of a block, if it was bound when this view was taken */
  lookup(blockId: string): string | undefined {
    const position = this.positionByBlock.get(blockId);
    if (position === undefined || position >= this.length) return undefined;
    return this.entries[position].name;
  }

  has(blockId: string): boolean {
    return this.lookup(blockId) !== undefined;
  }
}
