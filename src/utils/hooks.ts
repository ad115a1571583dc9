/**
 * @fileoverview Ordered hook lists.
 *
 * Instead of wrapping one callback inside another, hooks are collected in an
 * explicit list and run in list order. `addHookBefore`/`addHookAfter` cover
 * the common "chain onto an optional existing callback" case.
 *
 * @module utils/hooks
 */

export type Hook<TArgs extends unknown[]> = (...args: TArgs) => unknown;

/**
 * An ordered list of hooks sharing one argument list.
 *
 * @example
 * ```typescript
 * const onExit = new HookList<[code?: number]>()
 *   .append(() => registry.delete(root))
 *   .append(userOnExit)
 *   .toCallback();
 * ```
 */
export class HookList<TArgs extends unknown[]> {
  private hooks: Array<Hook<TArgs>> = [];

  /** Add a hook at the end. Missing hooks are ignored. */
  append(hook: Hook<TArgs> | null | undefined): this {
    if (hook) this.hooks.push(hook);
    return this;
  }

  /** Add a hook at the front. Missing hooks are ignored. */
  prepend(hook: Hook<TArgs> | null | undefined): this {
    if (hook) this.hooks.unshift(hook);
    return this;
  }

  get size(): number {
    return this.hooks.length;
  }

  /**
   * Run every hook in order with the same arguments. A throwing hook stops
   * the run and the error propagates to the caller.
   */
  run(...args: TArgs): void {
    for (const hook of [...this.hooks]) {
      hook(...args);
    }
  }

  /** A plain function that runs this list. */
  toCallback(): (...args: TArgs) => void {
    return (...args: TArgs) => this.run(...args);
  }
}

/** Callback that runs `added` and then `existing` (if any). */
export function addHookBefore<TArgs extends unknown[]>(
  existing: Hook<TArgs> | null | undefined,
  added: Hook<TArgs>,
): (...args: TArgs) => void {
  return new HookList<TArgs>().append(added).append(existing).toCallback();
}

/** Callback that runs `existing` (if any) and then `added`. */
export function addHookAfter<TArgs extends unknown[]>(
  existing: Hook<TArgs> | null | undefined,
  added: Hook<TArgs>,
): (...args: TArgs) => void {
  return new HookList<TArgs>().append(existing).append(added).toCallback();
}
