import { getLogger } from '@courier/logger';
import { err, ok, type Result } from 'neverthrow';

import type { HttpRequest } from './request.js';
import type { HttpResponse } from './response.js';
import {
  type AfterResponseHook,
  type BeforeRequestHook,
  CancellationError,
  PreparationError,
  StreamError,
  TransportError,
} from './types.js';

const logger = getLogger('HookRegistry');

const isKnownError = (error: Error): boolean =>
  error instanceof PreparationError ||
  error instanceof CancellationError ||
  error instanceof TransportError ||
  error instanceof StreamError;

export interface BeforeRequestOutcome {
  result: Result<void, Error>;
  /** Hooks whose enter completed successfully, in order */
  entered: BeforeRequestHook[];
}

/**
 * Ordered before-request and after-response hooks of one client
 */
export class HookRegistry {
  private readonly beforeHooks: BeforeRequestHook[] = [];
  private readonly afterHooks: AfterResponseHook[] = [];

  registerBefore(...hooks: BeforeRequestHook[]): void {
    this.beforeHooks.push(...hooks);
  }

  registerAfter(...hooks: AfterResponseHook[]): void {
    this.afterHooks.push(...hooks);
  }

  get beforeCount(): number {
    return this.beforeHooks.length;
  }

  get afterCount(): number {
    return this.afterHooks.length;
  }

  /**
   * Run before-request hooks in order, stopping at the first error
   */
  async runBefore(request: HttpRequest): Promise<BeforeRequestOutcome> {
    const entered: BeforeRequestHook[] = [];
    for (const hook of [...this.beforeHooks]) {
      let result: Result<void, Error>;
      try {
        result = await (typeof hook === 'function' ? hook(request) : hook.enter(request));
      } catch (error) {
        result = err(error instanceof Error ? error : new Error(String(error)));
      }

      if (result.isErr()) {
        const error = isKnownError(result.error)
          ? result.error
          : new PreparationError(`Before-request hook failed: ${result.error.message}`, { cause: result.error });
        return { entered, result: err(error) };
      }
      entered.push(hook);
    }
    return { entered, result: ok() };
  }

  /**
   * Run every after-response hook in order. Failures are logged and ignored.
   */
  async runAfter(response: HttpResponse | undefined, error: Error | undefined): Promise<void> {
    await this.invokeAfter([...this.afterHooks], response, error);
  }

  /**
   * Exit the hooks that were entered before the call stopped early and that are
   * also registered as after-response hooks, so held resources are released.
   */
  async releaseEntered(entered: readonly BeforeRequestHook[], error: Error): Promise<void> {
    const paired = this.afterHooks.filter((hook) => entered.some((candidate) => Object.is(candidate, hook)));
    await this.invokeAfter(paired, undefined, error);
  }

  private async invokeAfter(
    hooks: readonly AfterResponseHook[],
    response: HttpResponse | undefined,
    error: Error | undefined
  ): Promise<void> {
    for (const hook of hooks) {
      try {
        await (typeof hook === 'function' ? hook(response, error) : hook.exit(response, error));
      } catch (hookError) {
        logger.warn(
          { error: hookError instanceof Error ? hookError.message : String(hookError) },
          'After-response hook failed'
        );
      }
    }
  }
}
