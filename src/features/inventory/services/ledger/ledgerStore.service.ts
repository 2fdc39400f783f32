/**
 * Ledger Store
 * Quantity per (part, location) plus the append-only movement log.
 * Stock rows are only changed through `adjustStock`, inside a unit of work.
 */

import { and, asc, desc, eq, isNotNull, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { LedgerDatabase, LedgerExecutor } from '@/lib/database';
import { locationStock, movements } from '../../db/schema';
import type { MovementRow } from '../../db/schema';
import {
  decodeLocation,
  encodeLocation,
  Locations,
  toMovementId,
  toOptionalId,
  toPartId,
  toPurchaseOrderId,
  toPurchaseOrderItemId,
  toReturnAuthorizationId,
  toSupplierId,
} from '../../types/ledger.types';
import type {
  ConservationReport,
  MovementKind,
  MovementRecord,
  PartId,
  PurchaseOrderId,
  PurchaseOrderItemId,
  ReturnAuthorizationId,
  StockLevel,
  StockLocation,
  SupplierId,
  TransferStatus,
} from '../../types/ledger.types';
import { movementFilterSchema } from '../../types/schemas';
import type { MovementFilterInput } from '../../types/schemas';
import { InsufficientStockError, NegativeStockError } from './errors';
import { requirePart } from './catalog.service';
import { parseInput } from './validation';
import { runRead } from './unitOfWork';
import type { WriteContext } from './unitOfWork';

const DEFAULT_MOVEMENT_LIMIT = 200;

export function toMovementRecord(row: MovementRow): MovementRecord {
  return {
    id: toMovementId(row.id),
    kind: row.kind,
    partId: toPartId(row.partId),
    quantity: row.quantity,
    from: decodeLocation(row.fromKind, row.fromRef),
    to: decodeLocation(row.toKind, row.toRef),
    supplierId: toOptionalId(row.supplierId, toSupplierId),
    sourceOrderId: toOptionalId(row.sourceOrderId, toPurchaseOrderId),
    orderItemId: toOptionalId(row.orderItemId, toPurchaseOrderItemId),
    returnId: toOptionalId(row.returnId, toReturnAuthorizationId),
    transferStatus: row.transferStatus,
    unitCost: row.unitCost,
    performedBy: row.performedBy,
    createdAt: row.createdAt,
    completedAt: row.completedAt,
  };
}

// ---------------------------------------------------------------------------
// Stock
// ---------------------------------------------------------------------------

export function getStock(tx: LedgerExecutor, partId: PartId, location: StockLocation): number {
  const { kind, ref } = encodeLocation(location);
  const row = tx
    .select({ quantity: locationStock.quantity })
    .from(locationStock)
    .where(
      and(eq(locationStock.partId, partId), eq(locationStock.locationKind, kind), eq(locationStock.locationRef, ref))
    )
    .get();
  return row?.quantity ?? 0;
}

/** Quantity held by pending transfers leaving the warehouse */
export function getPendingOutbound(tx: LedgerExecutor, partId: PartId): number {
  const row = tx
    .select({ total: sql<number>`coalesce(sum(${movements.quantity}), 0)` })
    .from(movements)
    .where(
      and(
        eq(movements.kind, 'transfer'),
        eq(movements.partId, partId),
        eq(movements.transferStatus, 'pending'),
        eq(movements.fromKind, 'warehouse')
      )
    )
    .get();
  return Number(row?.total ?? 0);
}

/**
 * Stock that may still be committed to a new outbound movement.
 * At the warehouse, pending transfers are already spoken for.
 */
export function getAvailableStock(tx: LedgerExecutor, partId: PartId, location: StockLocation): number {
  const onHand = getStock(tx, partId, location);
  return location.kind === 'warehouse' ? onHand - getPendingOutbound(tx, partId) : onHand;
}

export function requireAvailableStock(
  tx: LedgerExecutor,
  partId: PartId,
  location: StockLocation,
  quantity: number
): void {
  const available = getAvailableStock(tx, partId, location);
  if (quantity > available) {
    throw new InsufficientStockError(partId, location, quantity, Math.max(available, 0));
  }
}

/** Apply a signed delta; never lets a row go below zero */
export function adjustStock(ctx: WriteContext, partId: PartId, location: StockLocation, delta: number): number {
  const current = getStock(ctx.tx, partId, location);
  const next = current + delta;
  if (next < 0) {
    throw new NegativeStockError(partId, location, current, delta);
  }

  const { kind, ref } = encodeLocation(location);
  ctx.tx
    .insert(locationStock)
    .values({ partId, locationKind: kind, locationRef: ref, quantity: next, updatedAt: ctx.timestamp })
    .onConflictDoUpdate({
      target: [locationStock.partId, locationStock.locationKind, locationStock.locationRef],
      set: { quantity: next, updatedAt: ctx.timestamp },
    })
    .run();
  return next;
}

// ---------------------------------------------------------------------------
// Movement log
// ---------------------------------------------------------------------------

export interface NewMovement {
  kind: MovementKind;
  partId: PartId;
  quantity: number;
  from: StockLocation | null;
  to: StockLocation | null;
  supplierId?: SupplierId | null;
  sourceOrderId?: PurchaseOrderId | null;
  orderItemId?: PurchaseOrderItemId | null;
  returnId?: ReturnAuthorizationId | null;
  transferStatus?: TransferStatus | null;
  unitCost?: number | null;
  completedAt?: string | null;
}

export function appendMovement(ctx: WriteContext, movement: NewMovement): MovementRecord {
  const from = movement.from ? encodeLocation(movement.from) : null;
  const to = movement.to ? encodeLocation(movement.to) : null;

  const row = ctx.tx
    .insert(movements)
    .values({
      kind: movement.kind,
      partId: movement.partId,
      quantity: movement.quantity,
      fromKind: from?.kind ?? null,
      fromRef: from?.ref ?? null,
      toKind: to?.kind ?? null,
      toRef: to?.ref ?? null,
      supplierId: movement.supplierId ?? null,
      sourceOrderId: movement.sourceOrderId ?? null,
      orderItemId: movement.orderItemId ?? null,
      returnId: movement.returnId ?? null,
      transferStatus: movement.transferStatus ?? null,
      unitCost: movement.unitCost ?? null,
      performedBy: ctx.performedBy,
      createdAt: ctx.timestamp,
      completedAt: movement.completedAt ?? null,
    })
    .returning()
    .get();

  const record = toMovementRecord(row);
  ctx.events.push({
    type: 'movementRecorded',
    movementId: record.id,
    kind: record.kind,
    partId: record.partId,
    quantity: record.quantity,
  });
  return record;
}

/**
 * Latest known unit cost: the most recent receipt carrying a cost,
 * falling back to the catalog cost of the part.
 */
export function getLatestUnitCost(tx: LedgerExecutor, partId: PartId): number {
  const receipt = tx
    .select({ unitCost: movements.unitCost })
    .from(movements)
    .where(and(eq(movements.kind, 'receive'), eq(movements.partId, partId), isNotNull(movements.unitCost)))
    .orderBy(desc(movements.createdAt), desc(movements.id))
    .limit(1)
    .get();
  if (receipt?.unitCost != null) return receipt.unitCost;
  return requirePart(tx, partId).unitCost;
}

// ---------------------------------------------------------------------------
// Inspection
// ---------------------------------------------------------------------------

/** Every location holding a stock row for the part; the warehouse is always listed */
export function getStockLevels(db: LedgerDatabase, partId: PartId): StockLevel[] {
  return runRead(db, (tx) => {
    requirePart(tx, partId);
    const rows = tx
      .select()
      .from(locationStock)
      .where(eq(locationStock.partId, partId))
      .orderBy(asc(locationStock.locationKind), asc(locationStock.locationRef))
      .all();

    const levels: StockLevel[] = [];
    for (const row of rows) {
      const location = decodeLocation(row.locationKind, row.locationRef);
      if (location) levels.push({ location, quantity: row.quantity });
    }
    if (!levels.some((level) => level.location.kind === 'warehouse')) {
      levels.unshift({ location: Locations.warehouse, quantity: 0 });
    }
    return levels;
  });
}

export function getAvailableWarehouseStock(db: LedgerDatabase, partId: PartId): number {
  return runRead(db, (tx) => {
    requirePart(tx, partId);
    return getAvailableStock(tx, partId, Locations.warehouse);
  });
}

/** Movement log, newest first */
export function listMovements(db: LedgerDatabase, input: MovementFilterInput = {}): MovementRecord[] {
  const filter = parseInput(movementFilterSchema, input, 'movement filter');
  const conditions: SQL[] = [];
  if (filter.partId !== undefined) conditions.push(eq(movements.partId, filter.partId));
  if (filter.kind !== undefined) conditions.push(eq(movements.kind, filter.kind));
  if (filter.orderId !== undefined) conditions.push(eq(movements.sourceOrderId, filter.orderId));
  if (filter.returnId !== undefined) conditions.push(eq(movements.returnId, filter.returnId));

  return db.orm
    .select()
    .from(movements)
    .where(and(...conditions))
    .orderBy(desc(movements.createdAt), desc(movements.id))
    .limit(filter.limit ?? DEFAULT_MOVEMENT_LIMIT)
    .all()
    .map(toMovementRecord);
}

function sumMovements(tx: LedgerExecutor, partId: PartId, kind: MovementKind): number {
  const row = tx
    .select({ total: sql<number>`coalesce(sum(${movements.quantity}), 0)` })
    .from(movements)
    .where(and(eq(movements.partId, partId), eq(movements.kind, kind)))
    .get();
  return Number(row?.total ?? 0);
}

/** Σ on-hand (all locations) + active returned must equal Σ received */
export function getConservationReport(db: LedgerDatabase, partId: PartId): ConservationReport {
  return runRead(db, (tx) => {
    requirePart(tx, partId);
    const rows = tx.select().from(locationStock).where(eq(locationStock.partId, partId)).all();

    const onHand = { warehouse: 0, truck: 0, job: 0 };
    for (const row of rows) onHand[row.locationKind] += row.quantity;

    const totalReceived = sumMovements(tx, partId, 'receive');
    const activeReturned = sumMovements(tx, partId, 'return') - sumMovements(tx, partId, 'return_reversal');

    return {
      partId,
      totalReceived,
      warehouse: onHand.warehouse,
      trucks: onHand.truck,
      jobs: onHand.job,
      activeReturned,
      balanced: onHand.warehouse + onHand.truck + onHand.job + activeReturned === totalReceived,
    };
  });
}
