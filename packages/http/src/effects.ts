import type { DelayOutcome, HttpEffects } from './core/types.js';

/**
 * setTimeout that resolves early, with 'aborted', when the signal fires
 */
export const abortableDelay = (ms: number, signal: AbortSignal): Promise<DelayOutcome> =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve('aborted');
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve('aborted');
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve('elapsed');
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });

export const defaultEffects: HttpEffects = {
  delay: abortableDelay,
  now: () => Date.now(),
  random: Math.random,
};

export const resolveEffects = (effects?: Partial<HttpEffects>): HttpEffects => ({
  ...defaultEffects,
  ...effects,
});
