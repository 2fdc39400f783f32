/**
 * Supplier Lineage Tracker
 *
 * Resolves which supplier a movement is attributed to and enforces the rule that a
 * (part, job) pair is sourced from exactly one supplier. Every check runs on the
 * executor of the caller's unit of work, so check and write commit together.
 */

import { and, asc, desc, eq, isNotNull } from 'drizzle-orm';
import type { LedgerExecutor } from '@/lib/database';
import { jobParts, movements } from '../../db/schema';
import { toSupplierId } from '../../types/ledger.types';
import type { JobId, PartId, SupplierId, TruckId } from '../../types/ledger.types';
import { SupplierConflictError } from './errors';

export type LineageCheck = { ok: true } | { ok: false; existingSupplierId: SupplierId };

/** Supplier already bound to a (part, job), or null when nothing attributed has reached the job */
export function getBoundSupplier(tx: LedgerExecutor, partId: PartId, jobId: JobId): SupplierId | null {
  const jobPart = tx
    .select({ supplierId: jobParts.supplierId })
    .from(jobParts)
    .where(and(eq(jobParts.jobId, jobId), eq(jobParts.partId, partId)))
    .get();
  if (jobPart?.supplierId != null) return toSupplierId(jobPart.supplierId);

  const first = tx
    .select({ supplierId: movements.supplierId })
    .from(movements)
    .where(
      and(
        eq(movements.kind, 'consumption'),
        eq(movements.partId, partId),
        eq(movements.toKind, 'job'),
        eq(movements.toRef, jobId),
        isNotNull(movements.supplierId)
      )
    )
    .orderBy(asc(movements.createdAt), asc(movements.id))
    .limit(1)
    .get();
  return first?.supplierId != null ? toSupplierId(first.supplierId) : null;
}

export function checkConflict(
  tx: LedgerExecutor,
  partId: PartId,
  jobId: JobId,
  candidateSupplierId: SupplierId | null
): LineageCheck {
  // Unattributed stock never conflicts and never binds the job
  if (candidateSupplierId === null) return { ok: true };

  const existingSupplierId = getBoundSupplier(tx, partId, jobId);
  if (existingSupplierId === null || existingSupplierId === candidateSupplierId) return { ok: true };
  return { ok: false, existingSupplierId };
}

export function assertNoSupplierConflict(
  tx: LedgerExecutor,
  partId: PartId,
  jobId: JobId,
  candidateSupplierId: SupplierId | null
): void {
  const result = checkConflict(tx, partId, jobId, candidateSupplierId);
  if (!result.ok && candidateSupplierId !== null) {
    throw new SupplierConflictError(partId, jobId, result.existingSupplierId, candidateSupplierId);
  }
}

/** Supplier of the most recent receipt of a part (latest timestamp, then highest movement id) */
export function resolveLatestReceiveSupplier(tx: LedgerExecutor, partId: PartId): SupplierId | null {
  const row = tx
    .select({ supplierId: movements.supplierId })
    .from(movements)
    .where(and(eq(movements.kind, 'receive'), eq(movements.partId, partId), isNotNull(movements.supplierId)))
    .orderBy(desc(movements.createdAt), desc(movements.id))
    .limit(1)
    .get();
  return row?.supplierId != null ? toSupplierId(row.supplierId) : null;
}

/** Supplier of the most recently completed transfer of a part onto a truck */
export function resolveTruckSupplier(tx: LedgerExecutor, truckId: TruckId, partId: PartId): SupplierId | null {
  const row = tx
    .select({ supplierId: movements.supplierId })
    .from(movements)
    .where(
      and(
        eq(movements.kind, 'transfer'),
        eq(movements.partId, partId),
        eq(movements.toKind, 'truck'),
        eq(movements.toRef, truckId),
        eq(movements.transferStatus, 'received')
      )
    )
    .orderBy(desc(movements.completedAt), desc(movements.id))
    .limit(1)
    .get();
  return row?.supplierId != null ? toSupplierId(row.supplierId) : null;
}
