import { AsyncLocalStorage } from "node:async_hooks";
import { ContextError } from "agentry-shared";

/**
 * Identifiers of the work in progress, propagated through async calls.
 *
 * A worker loop enters a scope with its worker id; processing a run narrows
 * it with the run and agent ids, so every log line written meanwhile carries
 * all three.
 *
 * @example
 * ```typescript
 * await Context.run({ workerId: 'worker-1' }, () =>
 *   Context.fork({ runId, agentId }, async () => {
 *     log.info('Turn started'); // run_id, agent_id, worker_id
 *   }),
 * );
 * ```
 */
export interface KernelContext {
  runId?: string;
  agentId?: string;
  workerId?: string;
  owner?: string;
}

const storage = new AsyncLocalStorage<Readonly<KernelContext>>();

export const Context = {
  /**
   * Run `fn` in a scope holding exactly `context`, ignoring any enclosing one.
   */
  run<T>(context: KernelContext, fn: () => Promise<T>): Promise<T> {
    return storage.run({ ...context }, fn);
  },

  /**
   * Run `fn` in a scope that extends the current one with `overrides`.
   */
  fork<T>(overrides: KernelContext, fn: () => Promise<T>): Promise<T> {
    return storage.run({ ...storage.getStore(), ...overrides }, fn);
  },

  /**
   * @throws ContextError outside any scope
   */
  get(): Readonly<KernelContext> {
    const current = storage.getStore();
    if (!current) {
      throw ContextError.notFound();
    }
    return current;
  },

  tryGet(): Readonly<KernelContext> | undefined {
    return storage.getStore();
  },
};
