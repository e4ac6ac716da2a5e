import type { OpenLimiterPort } from '../application/ports/open-limiter.port';

/**
 * Run `operation` inside one limiter slot. The slot is released exactly once,
 * whether the operation resolves or throws.
 */
export const withOpenSlot = async <T>(limiter: OpenLimiterPort, operation: () => Promise<T>): Promise<T> => {
  await limiter.acquire();
  try {
    return await operation();
  } finally {
    limiter.release();
  }
};
