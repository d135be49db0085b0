import { err, ok } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import { HookRegistry } from '../hooks.js';
import { HttpRequest } from '../request.js';
import { CancellationError, PreparationError } from '../types.js';

const newRequest = () => HttpRequest.create('GET', 'http://example.test/')._unsafeUnwrap();

describe('HookRegistry', () => {
  it('runs before-request hooks in registration order', async () => {
    const calls: string[] = [];
    const hooks = new HookRegistry();
    hooks.registerBefore(
      () => {
        calls.push('first');
        return ok();
      },
      {
        enter: () => {
          calls.push('second');
          return Promise.resolve(ok());
        },
      }
    );

    const outcome = await hooks.runBefore(newRequest());

    expect(outcome.result.isOk()).toBe(true);
    expect(outcome.entered).toHaveLength(2);
    expect(calls).toEqual(['first', 'second']);
  });

  it('stops at the first failing hook and wraps its error', async () => {
    const later = vi.fn(() => ok());
    const hooks = new HookRegistry();
    hooks.registerBefore(() => err(new Error('quota exceeded')), later);

    const outcome = await hooks.runBefore(newRequest());

    const error = outcome.result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(PreparationError);
    expect(error.message).toBe('Before-request hook failed: quota exceeded');
    expect(outcome.entered).toEqual([]);
    expect(later).not.toHaveBeenCalled();
  });

  it('keeps errors that already belong to the taxonomy', async () => {
    const cancelled = new CancellationError(new Error('stop'));
    const hooks = new HookRegistry();
    hooks.registerBefore(() => err(cancelled));

    const outcome = await hooks.runBefore(newRequest());

    expect(outcome.result._unsafeUnwrapErr()).toBe(cancelled);
  });

  it('turns a throwing hook into an error result', async () => {
    const hooks = new HookRegistry();
    hooks.registerBefore(() => {
      throw new Error('boom');
    });

    const outcome = await hooks.runBefore(newRequest());

    expect(outcome.result._unsafeUnwrapErr().message).toBe('Before-request hook failed: boom');
  });

  it('runs every after-response hook even when one throws', async () => {
    const last = vi.fn();
    const hooks = new HookRegistry();
    hooks.registerAfter(() => {
      throw new Error('broken hook');
    }, last);
    const failure = new Error('network down');

    await hooks.runAfter(undefined, failure);

    expect(last).toHaveBeenCalledWith(undefined, failure);
  });

  it('releases only entered hooks that are also after-response hooks', async () => {
    const paired = { enter: vi.fn(() => ok()), exit: vi.fn() };
    const afterOnly = vi.fn();
    const hooks = new HookRegistry();
    hooks.registerBefore(paired);
    hooks.registerAfter(paired, afterOnly);
    const failure = new Error('later hook failed');

    await hooks.releaseEntered([paired], failure);

    expect(paired.exit).toHaveBeenCalledWith(undefined, failure);
    expect(afterOnly).not.toHaveBeenCalled();
  });
});
