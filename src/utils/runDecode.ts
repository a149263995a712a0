import once from 'call-once-fn';

/** Callback for async decode operations: (error, result) => void */
export type DecodeCallback<T = Buffer> = (error: Error | null, result?: T) => void;

const schedule = typeof setImmediate === 'function' ? setImmediate : (fn: () => void) => process.nextTick(fn);

/**
 * Run a synchronous decoder on a later tick.
 *
 * With a callback the result is delivered exactly once; without one a
 * Promise is returned.
 */
export function runDecode<T>(fn: () => T, callback?: DecodeCallback<T>): Promise<T> | void {
  if (typeof callback === 'function') {
    const cb = callback;
    let error: Error | null = null;
    let result: T | undefined;
    const done = once(() => cb(error, result));
    schedule(() => {
      try {
        result = fn();
      } catch (err) {
        error = err as Error;
      }
      done();
    });
    return;
  }

  return new Promise<T>((resolve, reject) => {
    schedule(() => {
      try {
        resolve(fn());
      } catch (err) {
        reject(err);
      }
    });
  });
}
