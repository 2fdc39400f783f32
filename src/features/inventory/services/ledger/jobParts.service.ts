/**
 * Job Parts
 * Per (job, part) aggregate of what has been consumed on a job.
 */

import { and, asc, eq, sql } from 'drizzle-orm';
import type { LedgerDatabase } from '@/lib/database';
import { jobParts, parts } from '../../db/schema';
import type { JobPartRow } from '../../db/schema';
import { toJobId, toOptionalId, toPartId, toSupplierId } from '../../types/ledger.types';
import type { JobId, JobPart, JobPartView, PartId, SupplierId } from '../../types/ledger.types';
import { requireJob } from './catalog.service';
import { runRead } from './unitOfWork';
import type { WriteContext } from './unitOfWork';

export const toJobPart = (row: JobPartRow): JobPart => ({
  id: row.id,
  jobId: toJobId(row.jobId),
  partId: toPartId(row.partId),
  quantityUsed: row.quantityUsed,
  unitCostAtUse: row.unitCostAtUse,
  supplierId: toOptionalId(row.supplierId, toSupplierId),
  assignedAt: row.assignedAt,
  updatedAt: row.updatedAt,
});

export interface JobPartUsage {
  jobId: JobId;
  partId: PartId;
  quantity: number;
  unitCost: number;
  supplierId: SupplierId | null;
}

/**
 * Add consumed quantity to the job's aggregate. The unit cost is captured on
 * first assignment only; the supplier binds once a known one arrives.
 */
export function recordJobPartUsage(ctx: WriteContext, usage: JobPartUsage): JobPart {
  const existing = ctx.tx
    .select()
    .from(jobParts)
    .where(and(eq(jobParts.jobId, usage.jobId), eq(jobParts.partId, usage.partId)))
    .get();

  if (existing) {
    const row = ctx.tx
      .update(jobParts)
      .set({
        quantityUsed: sql`${jobParts.quantityUsed} + ${usage.quantity}`,
        supplierId: existing.supplierId ?? usage.supplierId,
        updatedAt: ctx.timestamp,
      })
      .where(eq(jobParts.id, existing.id))
      .returning()
      .get();
    return toJobPart(row);
  }

  const row = ctx.tx
    .insert(jobParts)
    .values({
      jobId: usage.jobId,
      partId: usage.partId,
      quantityUsed: usage.quantity,
      unitCostAtUse: usage.unitCost,
      supplierId: usage.supplierId,
      assignedAt: ctx.timestamp,
      updatedAt: ctx.timestamp,
    })
    .returning()
    .get();
  return toJobPart(row);
}

export function getJobParts(db: LedgerDatabase, jobId: JobId): JobPartView[] {
  return runRead(db, (tx) => {
    requireJob(tx, jobId);
    return tx
      .select({ jobPart: jobParts, partNumber: parts.partNumber, partDescription: parts.description })
      .from(jobParts)
      .innerJoin(parts, eq(jobParts.partId, parts.id))
      .where(eq(jobParts.jobId, jobId))
      .orderBy(asc(parts.partNumber))
      .all()
      .map((row) => {
        const jobPart = toJobPart(row.jobPart);
        return {
          ...jobPart,
          partNumber: row.partNumber,
          partDescription: row.partDescription,
          totalCost: jobPart.quantityUsed * jobPart.unitCostAtUse,
        };
      });
  });
}

export function getJobTotalCost(db: LedgerDatabase, jobId: JobId): number {
  return getJobParts(db, jobId).reduce((sum, part) => sum + part.totalCost, 0);
}
