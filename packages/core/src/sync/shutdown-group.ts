/**
 * ShutdownGroup - in-flight work counter with a one-time stop broadcast.
 *
 * Intended to be used once per module:
 *
 *   const token = this.tg.acquire(); // throws ALREADY_STOPPED once stopping
 *   try {
 *     // work; long waits should also watch this.tg.stopSignal()
 *   } finally {
 *     this.tg.release(token);
 *   }
 *
 * Resources such as listeners are registered with onStop(). stop() fires the
 * signal, runs the hooks newest-first, then waits until every acquired token
 * has been released. The group never cancels work itself and imposes no
 * timeout; callers wanting a bound race stop() against a timer.
 */

import { PoolNodeError } from '../errors/base-error.js';

export type StopHook = () => void;

/** Opaque handle for one unit of in-flight work. Release it exactly once. */
export interface ShutdownToken {
  readonly id: number;
}

export class ShutdownGroup {
  private controller: AbortController | null = null;
  private hooks: StopHook[] = [];
  private readonly outstanding = new Set<ShutdownToken>();
  private drainWaiters: Array<() => void> = [];
  private nextTokenId = 1;

  /**
   * Read-only broadcast handle, aborted when stop() is first called.
   * Safe to call before or after stop; always returns the same signal.
   */
  stopSignal(): AbortSignal {
    // Created on first access so a freshly constructed group needs no setup call.
    this.controller ??= new AbortController();
    return this.controller.signal;
  }

  isStopped(): boolean {
    return this.stopSignal().aborted;
  }

  /** Number of acquired, unreleased tokens. */
  get activeCount(): number {
    return this.outstanding.size;
  }

  /** Resolves once the stop signal has fired. */
  whenStopped(): Promise<void> {
    const signal = this.stopSignal();
    if (signal.aborted) return Promise.resolve();
    return new Promise((resolve) => {
      signal.addEventListener('abort', () => resolve(), { once: true });
    });
  }

  /**
   * Register one unit of in-flight work.
   * @throws PoolNodeError ALREADY_STOPPED if stop() has been called.
   */
  acquire(): ShutdownToken {
    if (this.isStopped()) {
      throw new PoolNodeError('ALREADY_STOPPED');
    }
    const token: ShutdownToken = Object.freeze({ id: this.nextTokenId++ });
    this.outstanding.add(token);
    return token;
  }

  /**
   * Release a token obtained from acquire(). Must be called on every exit path
   * of the protected work, or stop() never returns.
   */
  release(token: ShutdownToken): void {
    if (!this.outstanding.delete(token)) {
      throw new Error(`ShutdownGroup: token ${token.id} already released or not issued by this group`);
    }
    if (this.outstanding.size === 0 && this.drainWaiters.length > 0) {
      const waiters = this.drainWaiters;
      this.drainWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  /** acquire() + fn + release() on every exit path. */
  async run<T>(fn: (signal: AbortSignal) => T | Promise<T>): Promise<T> {
    const token = this.acquire();
    try {
      return await fn(this.stopSignal());
    } finally {
      this.release(token);
    }
  }

  /**
   * Register a cleanup hook. Hooks run newest-first during stop(). If the group
   * is already stopped the hook runs inline before onStop returns.
   */
  onStop(hook: StopHook): void {
    if (this.isStopped()) {
      hook();
      return;
    }
    this.hooks.push(hook);
  }

  /**
   * Fire the stop signal, run hooks in reverse registration order, then wait
   * for all in-flight work to be released.
   *
   * Everything up to the drain happens synchronously within the call, so hooks
   * have run by the time stop() hands back its promise. A throwing hook does
   * not stop the others; failures are reported after the drain as
   * SHUTDOWN_HOOK_FAILED.
   *
   * @throws PoolNodeError ALREADY_STOPPED on every call after the first.
   */
  async stop(): Promise<void> {
    if (this.isStopped()) {
      throw new PoolNodeError('ALREADY_STOPPED');
    }
    this.controller ??= new AbortController();
    this.controller.abort();

    const hooks = this.hooks;
    this.hooks = [];
    const failures: unknown[] = [];
    for (const hook of hooks.reverse()) {
      try {
        hook();
      } catch (err) {
        failures.push(err);
      }
    }

    await this.drained();

    if (failures.length > 0) {
      throw new PoolNodeError('SHUTDOWN_HOOK_FAILED', {
        message: `${failures.length} shutdown hook(s) failed`,
        cause: new AggregateError(failures, 'shutdown hook errors'),
      });
    }
  }

  private drained(): Promise<void> {
    if (this.outstanding.size === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }
}
