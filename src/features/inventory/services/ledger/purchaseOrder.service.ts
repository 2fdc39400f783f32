/**
 * Purchase Order Service
 * Order lifecycle: draft -> submitted -> partial -> received -> closed, with cancellation
 * from any open state. Receipt-driven transitions happen in movement.service.
 */

import { asc, desc, eq, like } from 'drizzle-orm';
import type { LedgerDatabase, LedgerExecutor } from '@/lib/database';
import { parts, purchaseOrderItems, purchaseOrders, suppliers } from '../../db/schema';
import type { PurchaseOrderItemRow, PurchaseOrderRow } from '../../db/schema';
import {
  toPartId,
  toPurchaseOrderId,
  toPurchaseOrderItemId,
  toSupplierId,
} from '../../types/ledger.types';
import type {
  OrderReceiveSummaryLine,
  PurchaseOrder,
  PurchaseOrderDetail,
  PurchaseOrderId,
  PurchaseOrderItem,
  PurchaseOrderItemId,
  PurchaseOrderStatus,
} from '../../types/ledger.types';
import { addOrderItemSchema, createPurchaseOrderSchema, purchaseOrderStatusSchema } from '../../types/schemas';
import type { AddOrderItemInput, CreatePurchaseOrderInput } from '../../types/schemas';
import { documentNumberPattern, nextDocumentNumber } from '../../utils/documentNumbers';
import { InvalidStateError, LedgerValidationError, NotFoundError } from './errors';
import { requirePart, requireSupplier } from './catalog.service';
import { parseInput } from './validation';
import { runRead, runWrite } from './unitOfWork';
import type { WriteContext, WriteOptions } from './unitOfWork';

export const ORDER_TRANSITIONS: Record<PurchaseOrderStatus, readonly PurchaseOrderStatus[]> = {
  draft: ['submitted', 'cancelled'],
  submitted: ['partial', 'received', 'cancelled'],
  partial: ['received', 'cancelled'],
  received: ['closed'],
  cancelled: [],
  closed: [],
};

/** States in which goods may be received against the order */
export const RECEIVABLE_ORDER_STATUSES: readonly PurchaseOrderStatus[] = ['submitted', 'partial', 'received'];

export function canTransitionOrder(from: PurchaseOrderStatus, to: PurchaseOrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

/**
 * Status after a receipt: `received` once every line is complete, `partial` while
 * any line has stock in, otherwise unchanged. `received` never regresses.
 */
export function deriveReceiptStatus(
  current: PurchaseOrderStatus,
  items: ReadonlyArray<Pick<PurchaseOrderItem, 'quantityOrdered' | 'quantityReceived'>>
): PurchaseOrderStatus {
  if (current === 'received') return current;
  if (items.length > 0 && items.every((item) => item.quantityReceived >= item.quantityOrdered)) return 'received';
  if (items.some((item) => item.quantityReceived > 0)) return 'partial';
  return current;
}

export const toPurchaseOrder = (row: PurchaseOrderRow): PurchaseOrder => ({
  id: toPurchaseOrderId(row.id),
  orderNumber: row.orderNumber,
  supplierId: toSupplierId(row.supplierId),
  status: row.status,
  notes: row.notes,
  submittedAt: row.submittedAt,
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
});

export const toPurchaseOrderItem = (row: PurchaseOrderItemRow): PurchaseOrderItem => ({
  id: toPurchaseOrderItemId(row.id),
  orderId: toPurchaseOrderId(row.orderId),
  partId: toPartId(row.partId),
  quantityOrdered: row.quantityOrdered,
  quantityReceived: row.quantityReceived,
  unitCost: row.unitCost,
});

export function requireOrder(tx: LedgerExecutor, orderId: PurchaseOrderId): PurchaseOrder {
  const row = tx.select().from(purchaseOrders).where(eq(purchaseOrders.id, orderId)).get();
  if (!row) throw new NotFoundError('Purchase order', orderId);
  return toPurchaseOrder(row);
}

export function getOrderItems(tx: LedgerExecutor, orderId: PurchaseOrderId): PurchaseOrderItem[] {
  return tx
    .select()
    .from(purchaseOrderItems)
    .where(eq(purchaseOrderItems.orderId, orderId))
    .orderBy(asc(purchaseOrderItems.id))
    .all()
    .map(toPurchaseOrderItem);
}

/** Persist a status change and queue the post-commit event */
export function setOrderStatus(
  ctx: WriteContext,
  order: PurchaseOrder,
  to: PurchaseOrderStatus,
  extra: { submittedAt?: string } = {}
): PurchaseOrder {
  if (order.status === to) return order;
  ctx.tx
    .update(purchaseOrders)
    .set({ status: to, updatedAt: ctx.timestamp, ...extra })
    .where(eq(purchaseOrders.id, order.id))
    .run();
  ctx.events.push({ type: 'orderStatusChanged', orderId: order.id, from: order.status, to });
  return { ...order, ...extra, status: to, updatedAt: ctx.timestamp };
}

function transitionOrder(ctx: WriteContext, orderId: PurchaseOrderId, to: PurchaseOrderStatus, action: string) {
  const order = requireOrder(ctx.tx, orderId);
  if (!canTransitionOrder(order.status, to)) {
    throw new InvalidStateError('purchase order', orderId, order.status, action);
  }
  return order;
}

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

export function createPurchaseOrder(
  db: LedgerDatabase,
  input: CreatePurchaseOrderInput,
  options: WriteOptions = {}
): PurchaseOrder {
  const payload = parseInput(createPurchaseOrderSchema, input, 'purchase order');
  return runWrite(db, options, ({ tx, timestamp }) => {
    requireSupplier(tx, payload.supplierId);

    let orderNumber = payload.orderNumber;
    if (orderNumber === undefined) {
      const year = Number(timestamp.slice(0, 4));
      const issued = tx
        .select({ orderNumber: purchaseOrders.orderNumber })
        .from(purchaseOrders)
        .where(like(purchaseOrders.orderNumber, documentNumberPattern('PO', year)))
        .all()
        .map((row) => row.orderNumber);
      orderNumber = nextDocumentNumber('PO', year, issued);
    }

    const duplicate = tx
      .select({ id: purchaseOrders.id })
      .from(purchaseOrders)
      .where(eq(purchaseOrders.orderNumber, orderNumber))
      .get();
    if (duplicate) throw new LedgerValidationError(`Order number ${orderNumber} already exists`);

    const row = tx
      .insert(purchaseOrders)
      .values({
        orderNumber,
        supplierId: payload.supplierId,
        status: 'draft',
        notes: payload.notes ?? null,
        createdAt: timestamp,
        updatedAt: timestamp,
      })
      .returning()
      .get();
    return toPurchaseOrder(row);
  });
}

export function addOrderItem(db: LedgerDatabase, input: AddOrderItemInput, options: WriteOptions = {}): PurchaseOrderItem {
  const payload = parseInput(addOrderItemSchema, input, 'order item');
  return runWrite(db, options, ({ tx, timestamp }) => {
    const order = requireOrder(tx, payload.orderId);
    if (order.status !== 'draft') {
      throw new InvalidStateError('purchase order', order.id, order.status, 'add items to');
    }
    requirePart(tx, payload.partId);

    const row = tx
      .insert(purchaseOrderItems)
      .values({
        orderId: payload.orderId,
        partId: payload.partId,
        quantityOrdered: payload.quantityOrdered,
        unitCost: payload.unitCost,
      })
      .returning()
      .get();
    tx.update(purchaseOrders).set({ updatedAt: timestamp }).where(eq(purchaseOrders.id, order.id)).run();
    return toPurchaseOrderItem(row);
  });
}

export function removeOrderItem(db: LedgerDatabase, orderItemId: PurchaseOrderItemId, options: WriteOptions = {}): void {
  runWrite(db, options, ({ tx, timestamp }) => {
    const item = tx.select().from(purchaseOrderItems).where(eq(purchaseOrderItems.id, orderItemId)).get();
    if (!item) throw new NotFoundError('Order item', orderItemId);

    const order = requireOrder(tx, toPurchaseOrderId(item.orderId));
    if (order.status !== 'draft') {
      throw new InvalidStateError('purchase order', order.id, order.status, 'remove items from');
    }
    tx.delete(purchaseOrderItems).where(eq(purchaseOrderItems.id, orderItemId)).run();
    tx.update(purchaseOrders).set({ updatedAt: timestamp }).where(eq(purchaseOrders.id, order.id)).run();
  });
}

export function submitPurchaseOrder(
  db: LedgerDatabase,
  orderId: PurchaseOrderId,
  options: WriteOptions = {}
): PurchaseOrder {
  return runWrite(db, options, (ctx) => {
    const order = transitionOrder(ctx, orderId, 'submitted', 'submit');
    if (getOrderItems(ctx.tx, orderId).length === 0) {
      throw new LedgerValidationError(`Purchase order ${order.orderNumber} has no items to submit`);
    }
    return setOrderStatus(ctx, order, 'submitted', { submittedAt: ctx.timestamp });
  });
}

export function cancelPurchaseOrder(
  db: LedgerDatabase,
  orderId: PurchaseOrderId,
  options: WriteOptions = {}
): PurchaseOrder {
  return runWrite(db, options, (ctx) => {
    const order = transitionOrder(ctx, orderId, 'cancelled', 'cancel');
    return setOrderStatus(ctx, order, 'cancelled');
  });
}

export function closePurchaseOrder(
  db: LedgerDatabase,
  orderId: PurchaseOrderId,
  options: WriteOptions = {}
): PurchaseOrder {
  return runWrite(db, options, (ctx) => {
    const order = transitionOrder(ctx, orderId, 'closed', 'close');
    return setOrderStatus(ctx, order, 'closed');
  });
}

/** Drafts only; items go with the header and the ledger is untouched */
export function deletePurchaseOrder(db: LedgerDatabase, orderId: PurchaseOrderId, options: WriteOptions = {}): void {
  runWrite(db, options, ({ tx }) => {
    const order = requireOrder(tx, orderId);
    if (order.status !== 'draft') {
      throw new InvalidStateError('purchase order', orderId, order.status, 'delete');
    }
    tx.delete(purchaseOrderItems).where(eq(purchaseOrderItems.orderId, orderId)).run();
    tx.delete(purchaseOrders).where(eq(purchaseOrders.id, orderId)).run();
  });
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export function getPurchaseOrder(db: LedgerDatabase, orderId: PurchaseOrderId): PurchaseOrderDetail {
  return runRead(db, (tx) => {
    const order = requireOrder(tx, orderId);
    const supplier = tx.select({ name: suppliers.name }).from(suppliers).where(eq(suppliers.id, order.supplierId)).get();

    const items = tx
      .select({ item: purchaseOrderItems, partNumber: parts.partNumber, partDescription: parts.description })
      .from(purchaseOrderItems)
      .innerJoin(parts, eq(purchaseOrderItems.partId, parts.id))
      .where(eq(purchaseOrderItems.orderId, orderId))
      .orderBy(asc(purchaseOrderItems.id))
      .all()
      .map((row) => ({
        ...toPurchaseOrderItem(row.item),
        partNumber: row.partNumber,
        partDescription: row.partDescription,
      }));

    return {
      ...order,
      supplierName: supplier?.name ?? '',
      items,
      totalCost: items.reduce((sum, item) => sum + item.quantityOrdered * item.unitCost, 0),
    };
  });
}

export function listPurchaseOrders(db: LedgerDatabase, status?: PurchaseOrderStatus): PurchaseOrder[] {
  const filter = status === undefined ? undefined : purchaseOrderStatusSchema.parse(status);
  return db.orm
    .select()
    .from(purchaseOrders)
    .where(filter === undefined ? undefined : eq(purchaseOrders.status, filter))
    .orderBy(desc(purchaseOrders.createdAt), desc(purchaseOrders.id))
    .all()
    .map(toPurchaseOrder);
}

export function getOrderReceiveSummary(db: LedgerDatabase, orderId: PurchaseOrderId): OrderReceiveSummaryLine[] {
  return runRead(db, (tx) => {
    requireOrder(tx, orderId);
    return tx
      .select({ item: purchaseOrderItems, partNumber: parts.partNumber })
      .from(purchaseOrderItems)
      .innerJoin(parts, eq(purchaseOrderItems.partId, parts.id))
      .where(eq(purchaseOrderItems.orderId, orderId))
      .orderBy(asc(purchaseOrderItems.id))
      .all()
      .map(({ item, partNumber }) => ({
        orderItemId: toPurchaseOrderItemId(item.id),
        partId: toPartId(item.partId),
        partNumber,
        quantityOrdered: item.quantityOrdered,
        quantityReceived: item.quantityReceived,
        outstanding: Math.max(item.quantityOrdered - item.quantityReceived, 0),
      }));
  });
}

