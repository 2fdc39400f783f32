import { describe, it, expect } from 'vitest';
import {
  adjustStock,
  checkConflict,
  consumeFromTruck,
  createTransfer,
  getBoundSupplier,
  getJobParts,
  receiveOrderItems,
  receiveTransfer,
  resolveLatestReceiveSupplier,
  resolveTruckSupplier,
  runWrite,
} from '..';
import { Locations } from '../../../types/ledger.types';
import type { JobId, SupplierId } from '../../../types/ledger.types';
import type { LedgerDatabase } from '@/lib/database';
import type { TestCatalog } from '@/__tests__/testUtils';
import { createTestLedger, frozenClock, quietOptions, seedCatalog, submittedOrder } from '@/__tests__/testUtils';

function receiveToJob(db: LedgerDatabase, catalog: TestCatalog, supplierId: SupplierId, jobId: JobId, quantity: number) {
  const { order, items } = submittedOrder(db, supplierId, [{ partId: catalog.part.id, quantity, unitCost: 2 }]);
  return receiveOrderItems(
    db,
    { orderId: order.id, items: [{ orderItemId: items[0].id, quantity, allocation: 'job', targetId: jobId }] },
    quietOptions()
  );
}

describe('checkConflict', () => {
  it('allows anything on a job with no attributed stock', () => {
    const db = createTestLedger();
    const { part, supplierA, job } = seedCatalog(db);

    expect(getBoundSupplier(db.orm, part.id, job.id)).toBeNull();
    expect(checkConflict(db.orm, part.id, job.id, supplierA.id)).toEqual({ ok: true });
  });

  it('only allows the bound supplier once one has reached the job', () => {
    const db = createTestLedger();
    const catalog = seedCatalog(db);
    const { part, supplierA, supplierB, job } = catalog;
    receiveToJob(db, catalog, supplierA.id, job.id, 2);

    expect(getBoundSupplier(db.orm, part.id, job.id)).toBe(supplierA.id);
    expect(checkConflict(db.orm, part.id, job.id, supplierA.id)).toEqual({ ok: true });
    expect(checkConflict(db.orm, part.id, job.id, supplierB.id)).toEqual({ ok: false, existingSupplierId: supplierA.id });
    expect(checkConflict(db.orm, part.id, job.id, null)).toEqual({ ok: true });
  });

  it('lets unattributed stock onto a job without binding it', () => {
    const db = createTestLedger();
    const catalog = seedCatalog(db);
    const { part, supplierB, truck, job } = catalog;

    // Opening balance with no supplier behind it
    runWrite(db, quietOptions(), (ctx) => adjustStock(ctx, part.id, Locations.warehouse, 3));
    const transfer = createTransfer(db, { partId: part.id, truckId: truck.id, quantity: 3 }, quietOptions());
    expect(transfer.supplierId).toBeNull();
    receiveTransfer(db, transfer.id, quietOptions());
    const unattributed = consumeFromTruck(db, { truckId: truck.id, jobId: job.id, partId: part.id, quantity: 1 }, quietOptions());
    expect(unattributed.supplierId).toBeNull();

    receiveToJob(db, catalog, supplierB.id, job.id, 1);

    expect(getBoundSupplier(db.orm, part.id, job.id)).toBe(supplierB.id);
    expect(getJobParts(db, job.id)).toMatchObject([{ quantityUsed: 2, supplierId: supplierB.id }]);
  });
});

describe('supplier attribution', () => {
  it('follows the most recent receipt of a part', () => {
    const db = createTestLedger();
    const catalog = seedCatalog(db);
    const { part, supplierA, supplierB } = catalog;
    expect(resolveLatestReceiveSupplier(db.orm, part.id)).toBeNull();

    const first = submittedOrder(db, supplierA.id, [{ partId: part.id, quantity: 1, unitCost: 1 }]);
    receiveOrderItems(
      db,
      { orderId: first.order.id, items: [{ orderItemId: first.items[0].id, quantity: 1, allocation: 'warehouse' }] },
      quietOptions()
    );
    expect(resolveLatestReceiveSupplier(db.orm, part.id)).toBe(supplierA.id);

    const second = submittedOrder(db, supplierB.id, [{ partId: part.id, quantity: 1, unitCost: 1 }]);
    receiveOrderItems(
      db,
      { orderId: second.order.id, items: [{ orderItemId: second.items[0].id, quantity: 1, allocation: 'warehouse' }] },
      quietOptions()
    );
    expect(resolveLatestReceiveSupplier(db.orm, part.id)).toBe(supplierB.id);
  });

  it('breaks a timestamp tie in favour of the later receipt', () => {
    const db = createTestLedger(frozenClock());
    const { part, supplierA, supplierB, truck } = seedCatalog(db);
    for (const supplierId of [supplierB.id, supplierA.id]) {
      const { order, items } = submittedOrder(db, supplierId, [{ partId: part.id, quantity: 2, unitCost: 1 }]);
      receiveOrderItems(
        db,
        { orderId: order.id, items: [{ orderItemId: items[0].id, quantity: 2, allocation: 'warehouse' }] },
        quietOptions()
      );
    }

    expect(resolveLatestReceiveSupplier(db.orm, part.id)).toBe(supplierA.id);
    const transfer = createTransfer(db, { partId: part.id, truckId: truck.id, quantity: 1 }, quietOptions());
    expect(transfer.supplierId).toBe(supplierA.id);
  });

  it('attributes truck stock to the last transfer the truck actually received', () => {
    const db = createTestLedger();
    const { part, supplierA, supplierB, truck } = seedCatalog(db);
    const { order, items } = submittedOrder(db, supplierA.id, [{ partId: part.id, quantity: 4, unitCost: 1 }]);
    receiveOrderItems(
      db,
      { orderId: order.id, items: [{ orderItemId: items[0].id, quantity: 4, allocation: 'warehouse' }] },
      quietOptions()
    );

    const fromA = createTransfer(db, { partId: part.id, truckId: truck.id, quantity: 2 }, quietOptions());
    expect(resolveTruckSupplier(db.orm, truck.id, part.id)).toBeNull();
    receiveTransfer(db, fromA.id, quietOptions());
    expect(resolveTruckSupplier(db.orm, truck.id, part.id)).toBe(supplierA.id);

    // Explicit supplier on a pending transfer does not count until it arrives
    createTransfer(db, { partId: part.id, truckId: truck.id, quantity: 1, supplierId: supplierB.id }, quietOptions());
    expect(resolveTruckSupplier(db.orm, truck.id, part.id)).toBe(supplierA.id);
  });
});
