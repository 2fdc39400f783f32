/**
 * Movement Operations
 *
 * Each operation is one IMMEDIATE transaction: validate, consult the ledger store and
 * supplier lineage, write stock deltas and movement rows, then advance order state.
 * Any error rolls the whole operation back.
 */

import { and, asc, eq, gt } from 'drizzle-orm';
import type { LedgerDatabase, LedgerExecutor } from '@/lib/database';
import { locationStock, movements, parts, purchaseOrderItems, trucks } from '../../db/schema';
import { Locations, toMovementId, toOptionalId, toPartId, toPurchaseOrderId, toSupplierId, toTruckId } from '../../types/ledger.types';
import type {
  JobPart,
  MovementRecord,
  PendingTransferView,
  PurchaseOrderItem,
  PurchaseOrderItemId,
  PurchaseOrderStatus,
  TransferId,
  TruckId,
  TruckInventoryLine,
} from '../../types/ledger.types';
import {
  consumeFromTruckSchema,
  createTransferSchema,
  receiveOrderItemsSchema,
  returnToWarehouseSchema,
} from '../../types/schemas';
import type {
  ConsumeFromTruckInput,
  CreateTransferInput,
  ReceiveOrderItemsInput,
  ReturnToWarehouseInput,
} from '../../types/schemas';
import { InvalidStateError, NotFoundError, OverReceiveLimitError } from './errors';
import { requireJob, requirePart, requireSupplier, requireTruck } from './catalog.service';
import { recordJobPartUsage } from './jobParts.service';
import {
  adjustStock,
  appendMovement,
  getLatestUnitCost,
  requireAvailableStock,
  toMovementRecord,
} from './ledgerStore.service';
import { deriveReceiptStatus, getOrderItems, RECEIVABLE_ORDER_STATUSES, requireOrder, setOrderStatus } from './purchaseOrder.service';
import { assertNoSupplierConflict, resolveLatestReceiveSupplier, resolveTruckSupplier } from './supplierLineage.service';
import { parseInput } from './validation';
import { runRead, runWrite } from './unitOfWork';
import type { WriteContext, WriteOptions } from './unitOfWork';

export interface ReceiveOptions extends WriteOptions {
  /** Cap on receiving beyond the ordered quantity, in percent; null or omitted means no cap */
  maxOverReceivePercent?: number | null;
}

// ---------------------------------------------------------------------------
// Receiving against purchase orders
// ---------------------------------------------------------------------------

/**
 * Book goods received against an order. Everything lands in the warehouse first;
 * truck allocations leave a pending transfer, job allocations are consumed at once.
 * @returns the order status after the receipt
 */
export function receiveOrderItems(
  db: LedgerDatabase,
  input: ReceiveOrderItemsInput,
  options: ReceiveOptions = {}
): PurchaseOrderStatus {
  const payload = parseInput(receiveOrderItemsSchema, input, 'receipt');
  const maxPercent = options.maxOverReceivePercent ?? null;

  return runWrite(db, options, (ctx) => {
    const order = requireOrder(ctx.tx, payload.orderId);
    if (!RECEIVABLE_ORDER_STATUSES.includes(order.status)) {
      throw new InvalidStateError('purchase order', order.id, order.status, 'receive against');
    }

    const items = new Map<PurchaseOrderItemId, PurchaseOrderItem>(
      getOrderItems(ctx.tx, order.id).map((item) => [item.id, item])
    );

    for (const line of payload.items) {
      const item = items.get(line.orderItemId);
      if (!item) throw new NotFoundError(`Order item on ${order.orderNumber}`, line.orderItemId);

      const quantityReceived = item.quantityReceived + line.quantity;
      if (maxPercent !== null && quantityReceived > item.quantityOrdered * (1 + maxPercent / 100)) {
        throw new OverReceiveLimitError(item.id, item.quantityOrdered, quantityReceived, maxPercent);
      }

      const lineage = {
        supplierId: order.supplierId,
        sourceOrderId: order.id,
        orderItemId: item.id,
        unitCost: item.unitCost,
      };

      // Lineage is checked before any stock moves for a job-bound line
      if (line.allocation === 'job') {
        requireJob(ctx.tx, line.targetId);
        assertNoSupplierConflict(ctx.tx, item.partId, line.targetId, order.supplierId);
      }
      if (line.allocation === 'truck') {
        requireTruck(ctx.tx, line.targetId);
      }

      ctx.tx
        .update(purchaseOrderItems)
        .set({ quantityReceived })
        .where(eq(purchaseOrderItems.id, item.id))
        .run();
      items.set(item.id, { ...item, quantityReceived });

      adjustStock(ctx, item.partId, Locations.warehouse, line.quantity);
      appendMovement(ctx, {
        ...lineage,
        kind: 'receive',
        partId: item.partId,
        quantity: line.quantity,
        from: null,
        to: Locations.warehouse,
      });

      switch (line.allocation) {
        case 'warehouse':
          break;
        case 'truck':
          appendMovement(ctx, {
            ...lineage,
            kind: 'transfer',
            partId: item.partId,
            quantity: line.quantity,
            from: Locations.warehouse,
            to: Locations.truck(line.targetId),
            transferStatus: 'pending',
          });
          break;
        case 'job':
          adjustStock(ctx, item.partId, Locations.warehouse, -line.quantity);
          adjustStock(ctx, item.partId, Locations.job(line.targetId), line.quantity);
          appendMovement(ctx, {
            ...lineage,
            kind: 'consumption',
            partId: item.partId,
            quantity: line.quantity,
            from: Locations.warehouse,
            to: Locations.job(line.targetId),
          });
          recordJobPartUsage(ctx, {
            jobId: line.targetId,
            partId: item.partId,
            quantity: line.quantity,
            unitCost: item.unitCost,
            supplierId: order.supplierId,
          });
          break;
      }
    }

    const next = deriveReceiptStatus(order.status, [...items.values()]);
    return setOrderStatus(ctx, order, next).status;
  });
}

// ---------------------------------------------------------------------------
// Transfers
// ---------------------------------------------------------------------------

function requireTransfer(tx: LedgerExecutor, transferId: TransferId): MovementRecord {
  const row = tx
    .select()
    .from(movements)
    .where(and(eq(movements.id, transferId), eq(movements.kind, 'transfer')))
    .get();
  if (!row) throw new NotFoundError('Transfer', transferId);
  return toMovementRecord(row);
}

function completeTransfer(ctx: WriteContext, transfer: MovementRecord, status: 'received' | 'cancelled'): MovementRecord {
  const row = ctx.tx
    .update(movements)
    .set({ transferStatus: status, completedAt: ctx.timestamp })
    .where(eq(movements.id, transfer.id))
    .returning()
    .get();
  return toMovementRecord(row);
}

/**
 * Queue a warehouse-to-truck transfer. Nothing moves until it is received, but the
 * quantity is reserved and no longer available to other outbound movements.
 */
export function createTransfer(db: LedgerDatabase, input: CreateTransferInput, options: WriteOptions = {}): MovementRecord {
  const payload = parseInput(createTransferSchema, input, 'transfer');

  return runWrite(db, options, (ctx) => {
    requirePart(ctx.tx, payload.partId);
    requireTruck(ctx.tx, payload.truckId);
    const supplierId = payload.supplierId
      ? requireSupplier(ctx.tx, payload.supplierId).id
      : resolveLatestReceiveSupplier(ctx.tx, payload.partId);

    requireAvailableStock(ctx.tx, payload.partId, Locations.warehouse, payload.quantity);

    return appendMovement(ctx, {
      kind: 'transfer',
      partId: payload.partId,
      quantity: payload.quantity,
      from: Locations.warehouse,
      to: Locations.truck(payload.truckId),
      supplierId,
      transferStatus: 'pending',
      unitCost: getLatestUnitCost(ctx.tx, payload.partId),
    });
  });
}

export function receiveTransfer(db: LedgerDatabase, transferId: TransferId, options: WriteOptions = {}): MovementRecord {
  return runWrite(db, options, (ctx) => {
    const transfer = requireTransfer(ctx.tx, transferId);
    if (transfer.transferStatus !== 'pending' || transfer.to?.kind !== 'truck' || transfer.from === null) {
      throw new InvalidStateError('transfer', transferId, transfer.transferStatus ?? 'completed', 'receive');
    }

    adjustStock(ctx, transfer.partId, transfer.from, -transfer.quantity);
    adjustStock(ctx, transfer.partId, transfer.to, transfer.quantity);
    return completeTransfer(ctx, transfer, 'received');
  });
}

/** Drop a pending transfer; its reservation is released */
export function cancelTransfer(db: LedgerDatabase, transferId: TransferId, options: WriteOptions = {}): MovementRecord {
  return runWrite(db, options, (ctx) => {
    const transfer = requireTransfer(ctx.tx, transferId);
    if (transfer.transferStatus !== 'pending') {
      throw new InvalidStateError('transfer', transferId, transfer.transferStatus ?? 'completed', 'cancel');
    }
    return completeTransfer(ctx, transfer, 'cancelled');
  });
}

/** Bring unused truck stock back to the warehouse in one completed transfer */
export function returnToWarehouse(
  db: LedgerDatabase,
  input: ReturnToWarehouseInput,
  options: WriteOptions = {}
): MovementRecord {
  const payload = parseInput(returnToWarehouseSchema, input, 'return to warehouse');

  return runWrite(db, options, (ctx) => {
    requirePart(ctx.tx, payload.partId);
    requireTruck(ctx.tx, payload.truckId);
    const truck = Locations.truck(payload.truckId);
    requireAvailableStock(ctx.tx, payload.partId, truck, payload.quantity);

    adjustStock(ctx, payload.partId, truck, -payload.quantity);
    adjustStock(ctx, payload.partId, Locations.warehouse, payload.quantity);
    return appendMovement(ctx, {
      kind: 'transfer',
      partId: payload.partId,
      quantity: payload.quantity,
      from: truck,
      to: Locations.warehouse,
      supplierId: resolveTruckSupplier(ctx.tx, payload.truckId, payload.partId),
      transferStatus: 'received',
      completedAt: ctx.timestamp,
    });
  });
}

// ---------------------------------------------------------------------------
// Consumption
// ---------------------------------------------------------------------------

export function consumeFromTruck(db: LedgerDatabase, input: ConsumeFromTruckInput, options: WriteOptions = {}): JobPart {
  const payload = parseInput(consumeFromTruckSchema, input, 'consumption');

  return runWrite(db, options, (ctx) => {
    requirePart(ctx.tx, payload.partId);
    requireTruck(ctx.tx, payload.truckId);
    requireJob(ctx.tx, payload.jobId);

    const truck = Locations.truck(payload.truckId);
    const job = Locations.job(payload.jobId);
    requireAvailableStock(ctx.tx, payload.partId, truck, payload.quantity);

    const supplierId = resolveTruckSupplier(ctx.tx, payload.truckId, payload.partId);
    assertNoSupplierConflict(ctx.tx, payload.partId, payload.jobId, supplierId);

    const unitCost = getLatestUnitCost(ctx.tx, payload.partId);
    adjustStock(ctx, payload.partId, truck, -payload.quantity);
    adjustStock(ctx, payload.partId, job, payload.quantity);
    appendMovement(ctx, {
      kind: 'consumption',
      partId: payload.partId,
      quantity: payload.quantity,
      from: truck,
      to: job,
      supplierId,
      unitCost,
    });

    return recordJobPartUsage(ctx, {
      jobId: payload.jobId,
      partId: payload.partId,
      quantity: payload.quantity,
      unitCost,
      supplierId,
    });
  });
}

// ---------------------------------------------------------------------------
// Truck views
// ---------------------------------------------------------------------------

export function getTruckInventory(db: LedgerDatabase, truckId: TruckId): TruckInventoryLine[] {
  return runRead(db, (tx) => {
    requireTruck(tx, truckId);
    return tx
      .select({
        partId: locationStock.partId,
        partNumber: parts.partNumber,
        description: parts.description,
        quantity: locationStock.quantity,
      })
      .from(locationStock)
      .innerJoin(parts, eq(locationStock.partId, parts.id))
      .where(
        and(eq(locationStock.locationKind, 'truck'), eq(locationStock.locationRef, truckId), gt(locationStock.quantity, 0))
      )
      .orderBy(asc(parts.partNumber))
      .all()
      .map((row) => ({ ...row, partId: toPartId(row.partId) }));
  });
}

export function listPendingTransfers(db: LedgerDatabase, truckId?: TruckId): PendingTransferView[] {
  return db.orm
    .select({ movement: movements, partNumber: parts.partNumber, truckNumber: trucks.truckNumber })
    .from(movements)
    .innerJoin(parts, eq(movements.partId, parts.id))
    .innerJoin(trucks, eq(movements.toRef, trucks.id))
    .where(
      and(
        eq(movements.kind, 'transfer'),
        eq(movements.transferStatus, 'pending'),
        eq(movements.toKind, 'truck'),
        truckId === undefined ? undefined : eq(movements.toRef, truckId)
      )
    )
    .orderBy(asc(movements.createdAt), asc(movements.id))
    .all()
    .map(({ movement, partNumber, truckNumber }) => ({
      transferId: toMovementId(movement.id),
      partId: toPartId(movement.partId),
      partNumber,
      truckId: toTruckId(movement.toRef ?? 0),
      truckNumber,
      quantity: movement.quantity,
      supplierId: toOptionalId(movement.supplierId, toSupplierId),
      sourceOrderId: toOptionalId(movement.sourceOrderId, toPurchaseOrderId),
      createdAt: movement.createdAt,
    }));
}
