/**
 * Unit of work for ledger operations
 * Wraps a synchronous body in one IMMEDIATE transaction and publishes the
 * collected events once it has committed.
 */

import { readTransaction, writeTransaction } from '@/lib/database';
import type { LedgerDatabase, LedgerExecutor } from '@/lib/database';
import { ledgerEvents } from '../../utils/ledgerEvents';
import type { LedgerEventBus, LedgerEventPayload } from '../../utils/ledgerEvents';

export interface WriteOptions {
  /** Recorded on every movement written by the operation */
  performedBy?: string | null;
  /** Bus receiving post-commit events; the shared `ledgerEvents` when omitted */
  events?: LedgerEventBus;
}

export interface WriteContext {
  readonly tx: LedgerExecutor;
  /** One timestamp for every row written by the unit of work */
  readonly timestamp: string;
  readonly performedBy: string | null;
  readonly events: LedgerEventPayload[];
}

export function runWrite<T>(db: LedgerDatabase, options: WriteOptions, body: (ctx: WriteContext) => T): T {
  const events: LedgerEventPayload[] = [];
  const result = writeTransaction(db, (tx) =>
    body({ tx, timestamp: db.now(), performedBy: options.performedBy ?? null, events })
  );
  (options.events ?? ledgerEvents).emitAll(events);
  return result;
}

export function runRead<T>(db: LedgerDatabase, body: (tx: LedgerExecutor) => T): T {
  return readTransaction(db, body);
}
