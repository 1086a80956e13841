import type { AuthorizationCode } from '@ewelink-bridge/shared';
import { BridgeError } from '../errors/bridge-error.js';

/**
 * Source of authorization codes for the acquisition protocol
 */
export interface AuthorizationCodeProvider {
  getCode(signal?: AbortSignal): Promise<AuthorizationCode>;
}

interface Waiter {
  resolve: (code: AuthorizationCode) => void;
  reject: (error: BridgeError) => void;
}

/**
 * Codes are pushed by whatever captures them (the redirect route, a
 * configured static code) and pulled by `acquire()`
 *
 * A pushed code goes to the oldest waiter, or is queued when nobody waits.
 */
export class QueuedCodeProvider implements AuthorizationCodeProvider {
  private readonly queued: AuthorizationCode[] = [];
  private readonly waiters: Waiter[] = [];

  deliver(code: AuthorizationCode): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(code);
    } else {
      this.queued.push(code);
    }
  }

  get pending(): number {
    return this.queued.length;
  }

  getCode(signal?: AbortSignal): Promise<AuthorizationCode> {
    const next = this.queued.shift();
    if (next) {
      return Promise.resolve(next);
    }

    if (signal?.aborted) {
      return Promise.reject(BridgeError.unauthenticated('No authorization code was received'));
    }

    return new Promise<AuthorizationCode>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        reject(BridgeError.unauthenticated('No authorization code was received'));
      };

      const waiter: Waiter = {
        resolve: (code) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(code);
        },
        reject,
      };

      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
