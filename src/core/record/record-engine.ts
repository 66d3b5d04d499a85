/**
 * Record-mode capture. Each response gets its own completion hook: a clone of the body
 * is read to the end and the finished transaction is appended to the store tail, so
 * transactions land in completion order. The caller keeps the original response and
 * can stream it as usual.
 */

import type { Logger, RecordedRequest, Transaction } from '../../types/schema';
import type { TransactionStore } from '../store/transaction-store';
import { snapshotResponse } from '../http/snapshot';

export class RecordEngine {
  private readonly store: TransactionStore;
  private readonly logger: Logger;
  private readonly pending = new Set<Promise<void>>();

  constructor(store: TransactionStore, logger: Logger = console) {
    this.store = store;
    this.logger = logger;
  }

  /**
   * Registers the completion hook for one request. Returns the response the caller
   * should use. A body that fails to arrive (abort, network error) is not recorded.
   */
  capture(request: RecordedRequest, response: Response): Response {
    const clone = response.clone();
    const hook = snapshotResponse(clone).then(
      (recorded) => {
        const transaction: Transaction = { request, response: recorded };
        this.store.pushBack(transaction);
      },
      (err: unknown) => {
        const details = err instanceof Error ? err.message : String(err);
        this.logger.warn(`[Mockable] Not recording ${request.method} ${request.url}: ${details}`);
      }
    );
    const tracked = hook.finally(() => {
      this.pending.delete(tracked);
    });
    this.pending.add(tracked);
    return response;
  }

  /** Number of captures whose response body has not finished yet. */
  get inFlight(): number {
    return this.pending.size;
  }

  /** Resolves once every capture registered so far has completed or been abandoned. */
  async settled(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
