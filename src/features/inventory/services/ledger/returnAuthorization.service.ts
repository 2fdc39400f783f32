/**
 * Return Authorization Service
 *
 * Returning stock to a supplier takes it out of the warehouse as soon as the RA is
 * created. Until pickup the RA can be deleted or cancelled; either way the stock
 * comes back through a `return_reversal` movement, the original record stays.
 */

import { and, asc, countDistinct, desc, eq, like } from 'drizzle-orm';
import type { LedgerDatabase, LedgerExecutor } from '@/lib/database';
import { movements, parts, returnAuthorizationItems, returnAuthorizations, suppliers } from '../../db/schema';
import type { ReturnAuthorizationItemRow, ReturnAuthorizationRow } from '../../db/schema';
import {
  Locations,
  toOptionalId,
  toPartId,
  toPurchaseOrderId,
  toReturnAuthorizationId,
  toSupplierId,
} from '../../types/ledger.types';
import type {
  PartId,
  ReturnAuthorization,
  ReturnAuthorizationDetail,
  ReturnAuthorizationId,
  ReturnAuthorizationItem,
  ReturnStatus,
} from '../../types/ledger.types';
import { createReturnSchema, returnStatusUpdateSchema, unitCostSchema } from '../../types/schemas';
import type { CreateReturnInput } from '../../types/schemas';
import { documentNumberPattern, nextDocumentNumber } from '../../utils/documentNumbers';
import { InvalidStateError, LedgerValidationError, NotFoundError } from './errors';
import { requirePart, requireSupplier } from './catalog.service';
import { adjustStock, appendMovement, getLatestUnitCost, requireAvailableStock } from './ledgerStore.service';
import { requireOrder } from './purchaseOrder.service';
import { parseInput } from './validation';
import { runRead, runWrite } from './unitOfWork';
import type { WriteContext, WriteOptions } from './unitOfWork';

export const RETURN_TRANSITIONS: Record<ReturnStatus, readonly ReturnStatus[]> = {
  initiated: ['picked_up', 'cancelled'],
  picked_up: ['credit_received'],
  credit_received: [],
  cancelled: [],
};

export function canTransitionReturn(from: ReturnStatus, to: ReturnStatus): boolean {
  return RETURN_TRANSITIONS[from].includes(to);
}

export const toReturnAuthorization = (row: ReturnAuthorizationRow): ReturnAuthorization => ({
  id: toReturnAuthorizationId(row.id),
  raNumber: row.raNumber,
  supplierId: toSupplierId(row.supplierId),
  reason: row.reason,
  relatedOrderId: toOptionalId(row.relatedOrderId, toPurchaseOrderId),
  status: row.status,
  creditAmount: row.creditAmount,
  notes: row.notes,
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
  pickedUpAt: row.pickedUpAt,
  creditReceivedAt: row.creditReceivedAt,
});

export const toReturnAuthorizationItem = (row: ReturnAuthorizationItemRow): ReturnAuthorizationItem => ({
  id: row.id,
  returnId: toReturnAuthorizationId(row.returnId),
  partId: toPartId(row.partId),
  quantity: row.quantity,
  unitCost: row.unitCost,
});

export function requireReturn(tx: LedgerExecutor, returnId: ReturnAuthorizationId): ReturnAuthorization {
  const row = tx.select().from(returnAuthorizations).where(eq(returnAuthorizations.id, returnId)).get();
  if (!row) throw new NotFoundError('Return authorization', returnId);
  return toReturnAuthorization(row);
}

function getReturnItems(tx: LedgerExecutor, returnId: ReturnAuthorizationId): ReturnAuthorizationItem[] {
  return tx
    .select()
    .from(returnAuthorizationItems)
    .where(eq(returnAuthorizationItems.returnId, returnId))
    .orderBy(asc(returnAuthorizationItems.id))
    .all()
    .map(toReturnAuthorizationItem);
}

function setReturnStatus(
  ctx: WriteContext,
  ra: ReturnAuthorization,
  to: ReturnStatus,
  extra: { pickedUpAt?: string; creditReceivedAt?: string; creditAmount?: number } = {}
): ReturnAuthorization {
  ctx.tx
    .update(returnAuthorizations)
    .set({ status: to, updatedAt: ctx.timestamp, ...extra })
    .where(eq(returnAuthorizations.id, ra.id))
    .run();
  ctx.events.push({ type: 'returnStatusChanged', returnId: ra.id, from: ra.status, to });
  return { ...ra, ...extra, status: to, updatedAt: ctx.timestamp };
}

/** Put every item of an initiated RA back into the warehouse */
function reverseReturn(ctx: WriteContext, ra: ReturnAuthorization, action: string): void {
  if (ra.status !== 'initiated') {
    throw new InvalidStateError('return authorization', ra.id, ra.status, action);
  }
  for (const item of getReturnItems(ctx.tx, ra.id)) {
    adjustStock(ctx, item.partId, Locations.warehouse, item.quantity);
    appendMovement(ctx, {
      kind: 'return_reversal',
      partId: item.partId,
      quantity: item.quantity,
      from: null,
      to: Locations.warehouse,
      supplierId: ra.supplierId,
      returnId: ra.id,
      unitCost: item.unitCost,
    });
  }
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

export function createReturn(
  db: LedgerDatabase,
  input: CreateReturnInput,
  options: WriteOptions = {}
): ReturnAuthorization {
  const payload = parseInput(createReturnSchema, input, 'return authorization');

  return runWrite(db, options, (ctx) => {
    const { tx, timestamp } = ctx;
    requireSupplier(tx, payload.supplierId);
    const relatedOrderId = payload.relatedOrderId ? requireOrder(tx, payload.relatedOrderId).id : null;

    // Check the whole request first so a shortage on any line fails before any write
    const requested = new Map<PartId, number>();
    for (const item of payload.items) {
      requirePart(tx, item.partId);
      requested.set(item.partId, (requested.get(item.partId) ?? 0) + item.quantity);
    }
    for (const [partId, quantity] of requested) {
      requireAvailableStock(tx, partId, Locations.warehouse, quantity);
    }

    const year = Number(timestamp.slice(0, 4));
    const issued = tx
      .select({ raNumber: returnAuthorizations.raNumber })
      .from(returnAuthorizations)
      .where(like(returnAuthorizations.raNumber, documentNumberPattern('RA', year)))
      .all()
      .map((row) => row.raNumber);
    // Deleted RAs leave their return movements behind
    const issuedCount =
      tx
        .select({ value: countDistinct(movements.returnId) })
        .from(movements)
        .where(and(eq(movements.kind, 'return'), like(movements.createdAt, `${year}-%`)))
        .get()?.value ?? 0;

    const header = tx
      .insert(returnAuthorizations)
      .values({
        raNumber: nextDocumentNumber('RA', year, issued, issuedCount),
        supplierId: payload.supplierId,
        reason: payload.reason,
        relatedOrderId,
        status: 'initiated',
        notes: payload.notes ?? null,
        createdAt: timestamp,
        updatedAt: timestamp,
      })
      .returning()
      .get();
    const ra = toReturnAuthorization(header);

    for (const item of payload.items) {
      const unitCost = item.unitCost ?? getLatestUnitCost(tx, item.partId);
      adjustStock(ctx, item.partId, Locations.warehouse, -item.quantity);
      tx.insert(returnAuthorizationItems)
        .values({ returnId: ra.id, partId: item.partId, quantity: item.quantity, unitCost })
        .run();
      appendMovement(ctx, {
        kind: 'return',
        partId: item.partId,
        quantity: item.quantity,
        from: Locations.warehouse,
        to: null,
        supplierId: ra.supplierId,
        sourceOrderId: relatedOrderId,
        returnId: ra.id,
        unitCost,
      });
    }

    ctx.events.push({ type: 'returnStatusChanged', returnId: ra.id, from: null, to: 'initiated' });
    return ra;
  });
}

/** Initiated RAs only; stock is restored and the header and items are removed */
export function deleteReturn(db: LedgerDatabase, returnId: ReturnAuthorizationId, options: WriteOptions = {}): void {
  runWrite(db, options, (ctx) => {
    const ra = requireReturn(ctx.tx, returnId);
    reverseReturn(ctx, ra, 'delete');
    ctx.tx.delete(returnAuthorizationItems).where(eq(returnAuthorizationItems.returnId, returnId)).run();
    ctx.tx.delete(returnAuthorizations).where(eq(returnAuthorizations.id, returnId)).run();
    ctx.events.push({ type: 'returnStatusChanged', returnId, from: ra.status, to: 'deleted' });
  });
}

/** Like deletion, but the RA stays on file as `cancelled` */
export function cancelReturn(
  db: LedgerDatabase,
  returnId: ReturnAuthorizationId,
  options: WriteOptions = {}
): ReturnAuthorization {
  return runWrite(db, options, (ctx) => {
    const ra = requireReturn(ctx.tx, returnId);
    reverseReturn(ctx, ra, 'cancel');
    return setReturnStatus(ctx, ra, 'cancelled');
  });
}

export function markReturnPickedUp(
  db: LedgerDatabase,
  returnId: ReturnAuthorizationId,
  options: WriteOptions = {}
): ReturnAuthorization {
  return runWrite(db, options, (ctx) => {
    const ra = requireReturn(ctx.tx, returnId);
    if (!canTransitionReturn(ra.status, 'picked_up')) {
      throw new InvalidStateError('return authorization', returnId, ra.status, 'mark picked up');
    }
    return setReturnStatus(ctx, ra, 'picked_up', { pickedUpAt: ctx.timestamp });
  });
}

export function recordReturnCredit(
  db: LedgerDatabase,
  returnId: ReturnAuthorizationId,
  creditAmount: number,
  options: WriteOptions = {}
): ReturnAuthorization {
  const amount = parseInput(unitCostSchema, creditAmount, 'credit amount');
  return runWrite(db, options, (ctx) => {
    const ra = requireReturn(ctx.tx, returnId);
    if (!canTransitionReturn(ra.status, 'credit_received')) {
      throw new InvalidStateError('return authorization', returnId, ra.status, 'record credit for');
    }
    return setReturnStatus(ctx, ra, 'credit_received', { creditAmount: amount, creditReceivedAt: ctx.timestamp });
  });
}

/** Single entry point for user-driven status changes */
export function updateReturnStatus(
  db: LedgerDatabase,
  input: { returnId: number; status: ReturnStatus; creditAmount?: number },
  options: WriteOptions = {}
): ReturnAuthorization {
  const payload = parseInput(returnStatusUpdateSchema, input, 'return status update');
  switch (payload.status) {
    case 'picked_up':
      return markReturnPickedUp(db, payload.returnId, options);
    case 'credit_received':
      if (payload.creditAmount === undefined) {
        throw new LedgerValidationError('A credit amount is required to record a supplier credit');
      }
      return recordReturnCredit(db, payload.returnId, payload.creditAmount, options);
    case 'cancelled':
      return cancelReturn(db, payload.returnId, options);
    case 'initiated':
      throw new LedgerValidationError('Return authorizations cannot be moved back to initiated');
  }
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export function getReturnAuthorization(db: LedgerDatabase, returnId: ReturnAuthorizationId): ReturnAuthorizationDetail {
  return runRead(db, (tx) => {
    const ra = requireReturn(tx, returnId);
    const supplier = tx.select({ name: suppliers.name }).from(suppliers).where(eq(suppliers.id, ra.supplierId)).get();
    const items = tx
      .select({ item: returnAuthorizationItems, partNumber: parts.partNumber })
      .from(returnAuthorizationItems)
      .innerJoin(parts, eq(returnAuthorizationItems.partId, parts.id))
      .where(eq(returnAuthorizationItems.returnId, returnId))
      .orderBy(asc(returnAuthorizationItems.id))
      .all()
      .map((row) => ({ ...toReturnAuthorizationItem(row.item), partNumber: row.partNumber }));

    return {
      ...ra,
      supplierName: supplier?.name ?? '',
      items,
      totalValue: items.reduce((sum, item) => sum + item.quantity * item.unitCost, 0),
    };
  });
}

export function listReturnAuthorizations(db: LedgerDatabase, status?: ReturnStatus): ReturnAuthorization[] {
  return db.orm
    .select()
    .from(returnAuthorizations)
    .where(status === undefined ? undefined : eq(returnAuthorizations.status, status))
    .orderBy(desc(returnAuthorizations.createdAt), desc(returnAuthorizations.id))
    .all()
    .map(toReturnAuthorization);
}
