import { QueryTimeoutError } from '../errors';

/**
 * Shared timeout helper for promises. `onTimeout` runs before the rejection,
 * so callers can cancel the underlying work.
 */
export function withTimeout<T>(
  p: Promise<T>,
  ms: number,
  opts?: { label?: string; onTimeout?: () => void },
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const t = setTimeout(() => {
      opts?.onTimeout?.();
      reject(new QueryTimeoutError(ms, opts?.label));
    }, ms);
    p.then(
      (v) => { clearTimeout(t); resolve(v); },
      (e) => { clearTimeout(t); reject(e); },
    );
  });
}
