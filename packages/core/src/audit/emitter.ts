// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * AuditEmitter: the append-only stream of audit records.
 *
 * The ledger publishes an operation's records, in the order the operation
 * produced them, once its transaction has committed. The ledger never reads
 * them back; observers (the journal, the API log, a wallet feed) do.
 */

import EventEmitter from "events";

import type { AuditRecord } from "../types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export type AuditObserver = (record: AuditRecord) => void;

const RECORD_EVENT = "record";

export class AuditEmitter extends EventEmitter {
  private published = 0;

  constructor(private readonly logger: Logger = silentLogger) {
    super();
  }

  /**
   * Register an observer. Returns the matching unsubscribe function.
   * An observer that throws is logged; the others still get the record.
   */
  subscribe(observer: AuditObserver): () => void {
    const isolated = (record: AuditRecord): void => {
      try {
        observer(record);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        this.logger.error(`Observer failed on ${record.kind} ${record.id}: ${reason}`);
      }
    };

    this.on(RECORD_EVENT, isolated);
    return () => {
      this.off(RECORD_EVENT, isolated);
    };
  }

  publish(records: readonly AuditRecord[]): void {
    for (const record of records) {
      this.published++;
      this.emit(RECORD_EVENT, record);
    }
  }

  /** Number of records published since construction. */
  get count(): number {
    return this.published;
  }
}
