/**
 * Analytics
 * Read-only views derived from the movement log. Each query reads one snapshot.
 */

import { and, asc, desc, eq, inArray, isNotNull } from 'drizzle-orm';
import type { LedgerDatabase, LedgerExecutor } from '@/lib/database';
import { jobParts, movements } from '../../db/schema';
import { Locations, toMovementId, toOptionalId, toSupplierId } from '../../types/ledger.types';
import type {
  ChainEvent,
  ChainEventType,
  JobId,
  MovementKind,
  PartId,
  PartsListId,
  ShortfallRow,
  SupplierId,
} from '../../types/ledger.types';
import { requiredPartsSchema } from '../../types/schemas';
import type { RequiredPart, RequiredPartInput } from '../../types/schemas';
import { requirePart } from './catalog.service';
import { getAvailableStock, getLatestUnitCost } from './ledgerStore.service';
import { getPartsListItems, requirePartsList } from './partsList.service';
import { resolveLatestReceiveSupplier } from './supplierLineage.service';
import { parseInput } from './validation';
import { runRead } from './unitOfWork';

const CHAIN_KINDS: readonly MovementKind[] = ['receive', 'transfer', 'consumption', 'return'];

const CHAIN_EVENT_BY_KIND: Partial<Record<MovementKind, ChainEventType>> = {
  receive: 'received',
  transfer: 'transferred',
  consumption: 'consumed',
  return: 'returned',
};

/**
 * Time-ordered supplier attribution of a part from receipt to consumption or return.
 * Stock a truck sends back to the warehouse counts as returned.
 * Cancelled transfers and reversed returns are left out.
 */
export function getPartSupplierChain(db: LedgerDatabase, partId: PartId): ChainEvent[] {
  return runRead(db, (tx) => {
    requirePart(tx, partId);

    const reversed = new Set(
      tx
        .select({ returnId: movements.returnId })
        .from(movements)
        .where(and(eq(movements.partId, partId), eq(movements.kind, 'return_reversal')))
        .all()
        .map((row) => row.returnId)
    );

    const rows = tx
      .select()
      .from(movements)
      .where(and(eq(movements.partId, partId), inArray(movements.kind, [...CHAIN_KINDS])))
      .orderBy(asc(movements.createdAt), asc(movements.id))
      .all();

    const chain: ChainEvent[] = [];
    for (const row of rows) {
      const eventType =
        row.kind === 'transfer' && row.toKind === 'warehouse' ? 'returned' : CHAIN_EVENT_BY_KIND[row.kind];
      if (!eventType) continue;
      if (row.kind === 'transfer' && row.transferStatus === 'cancelled') continue;
      if (row.kind === 'return' && reversed.has(row.returnId)) continue;
      chain.push({
        movementId: toMovementId(row.id),
        supplierId: toOptionalId(row.supplierId, toSupplierId),
        eventType,
        quantity: row.quantity,
        timestamp: row.createdAt,
      });
    }
    return chain;
  });
}

function latestJobConsumptionSupplier(tx: LedgerExecutor, partId: PartId, jobId: JobId): SupplierId | null {
  const row = tx
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
    .orderBy(desc(movements.createdAt), desc(movements.id))
    .limit(1)
    .get();
  return row?.supplierId != null ? toSupplierId(row.supplierId) : null;
}

/**
 * Best guess at who to send a part back to: the supplier bound to the job,
 * then the latest consumption on the job, then the latest receipt of the part.
 */
export function getSuggestedReturnSupplier(db: LedgerDatabase, partId: PartId, jobId?: JobId): SupplierId | null {
  return runRead(db, (tx) => {
    requirePart(tx, partId);

    if (jobId !== undefined) {
      const jobPart = tx
        .select({ supplierId: jobParts.supplierId })
        .from(jobParts)
        .where(and(eq(jobParts.jobId, jobId), eq(jobParts.partId, partId)))
        .get();
      if (jobPart?.supplierId != null) return toSupplierId(jobPart.supplierId);

      const consumed = latestJobConsumptionSupplier(tx, partId, jobId);
      if (consumed !== null) return consumed;
    }

    return resolveLatestReceiveSupplier(tx, partId);
  });
}

function computeShortfall(tx: LedgerExecutor, required: readonly RequiredPart[]): ShortfallRow[] {
  // One row per short part, in order of first appearance
  const totals = new Map<PartId, number>();
  for (const line of required) {
    totals.set(line.partId, (totals.get(line.partId) ?? 0) + line.quantity);
  }

  const rows: ShortfallRow[] = [];
  for (const [partId, quantity] of totals) {
    const part = requirePart(tx, partId);
    const inStock = Math.max(getAvailableStock(tx, partId, Locations.warehouse), 0);
    const shortfall = Math.max(0, quantity - inStock);
    if (shortfall === 0) continue;
    const unitCost = getLatestUnitCost(tx, partId);
    rows.push({
      partId,
      partNumber: part.partNumber,
      required: quantity,
      inStock,
      shortfall,
      unitCost,
      estimatedCost: shortfall * unitCost,
    });
  }
  return rows;
}

export function checkShortfall(db: LedgerDatabase, listId: PartsListId): ShortfallRow[] {
  return runRead(db, (tx) => {
    requirePartsList(tx, listId);
    return computeShortfall(tx, getPartsListItems(tx, listId));
  });
}

export function checkShortfallForItems(db: LedgerDatabase, items: readonly RequiredPartInput[]): ShortfallRow[] {
  const required = parseInput(requiredPartsSchema, items, 'required parts');
  return runRead(db, (tx) => computeShortfall(tx, required));
}
