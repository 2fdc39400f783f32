import { describe, it, expect, vi } from 'vitest';
import {
  adjustStock,
  appendMovement,
  createTransfer,
  getConservationReport,
  getLatestUnitCost,
  getStockLevels,
  listMovements,
  receiveOrderItems,
  receiveTransfer,
  runWrite,
} from '..';
import { Locations } from '../../../types/ledger.types';
import { LedgerEventBus } from '../../../utils/ledgerEvents';
import {
  captureError,
  createTestLedger,
  quietOptions,
  seedCatalog,
  submittedOrder,
  warehouseStock,
} from '@/__tests__/testUtils';

describe('getStockLevels', () => {
  it('always lists the warehouse, even before any stock arrives', () => {
    const db = createTestLedger();
    const { part } = seedCatalog(db);

    expect(getStockLevels(db, part.id)).toEqual([{ location: { kind: 'warehouse' }, quantity: 0 }]);
  });

  it('lists every location holding a row for the part', () => {
    const db = createTestLedger();
    const { part, supplierA, truck } = seedCatalog(db);
    const { order, items } = submittedOrder(db, supplierA.id, [{ partId: part.id, quantity: 10, unitCost: 2 }]);
    receiveOrderItems(
      db,
      { orderId: order.id, items: [{ orderItemId: items[0].id, quantity: 10, allocation: 'warehouse' }] },
      quietOptions()
    );
    const transfer = createTransfer(db, { partId: part.id, truckId: truck.id, quantity: 4 }, quietOptions());
    receiveTransfer(db, transfer.id, quietOptions());

    expect(getStockLevels(db, part.id)).toEqual([
      { location: { kind: 'truck', truckId: truck.id }, quantity: 4 },
      { location: { kind: 'warehouse' }, quantity: 6 },
    ]);
  });
});

describe('getLatestUnitCost', () => {
  it('uses the catalog cost until a receipt carries one', () => {
    const db = createTestLedger();
    const { part, supplierA, supplierB } = seedCatalog(db);
    expect(getLatestUnitCost(db.orm, part.id)).toBe(10);

    const first = submittedOrder(db, supplierA.id, [{ partId: part.id, quantity: 1, unitCost: 4.5 }]);
    receiveOrderItems(
      db,
      { orderId: first.order.id, items: [{ orderItemId: first.items[0].id, quantity: 1, allocation: 'warehouse' }] },
      quietOptions()
    );
    expect(getLatestUnitCost(db.orm, part.id)).toBe(4.5);

    const second = submittedOrder(db, supplierB.id, [{ partId: part.id, quantity: 1, unitCost: 6 }]);
    receiveOrderItems(
      db,
      { orderId: second.order.id, items: [{ orderItemId: second.items[0].id, quantity: 1, allocation: 'warehouse' }] },
      quietOptions()
    );
    expect(getLatestUnitCost(db.orm, part.id)).toBe(6);
  });
});

describe('listMovements', () => {
  it('returns the newest movements first and honours filters', () => {
    const db = createTestLedger();
    const { part, otherPart, supplierA, truck } = seedCatalog(db);
    const { order, items } = submittedOrder(db, supplierA.id, [
      { partId: part.id, quantity: 3, unitCost: 1 },
      { partId: otherPart.id, quantity: 2, unitCost: 1 },
    ]);
    receiveOrderItems(
      db,
      {
        orderId: order.id,
        items: [
          { orderItemId: items[0].id, quantity: 3, allocation: 'warehouse' },
          { orderItemId: items[1].id, quantity: 2, allocation: 'warehouse' },
        ],
      },
      quietOptions()
    );
    createTransfer(db, { partId: part.id, truckId: truck.id, quantity: 1 }, quietOptions());

    expect(listMovements(db).map((m) => `${m.kind}:${m.partId}`)).toEqual([
      `transfer:${part.id}`,
      `receive:${otherPart.id}`,
      `receive:${part.id}`,
    ]);
    expect(listMovements(db, { orderId: order.id })).toHaveLength(2);
    expect(listMovements(db, { partId: part.id, kind: 'receive' })).toHaveLength(1);
    expect(listMovements(db, { limit: 1 })).toHaveLength(1);
  });
});

describe('units of work', () => {
  it('publishes events only after the transaction commits', () => {
    const db = createTestLedger();
    const { part } = seedCatalog(db);
    const bus = new LedgerEventBus();
    const listener = vi.fn();
    bus.onMovementRecorded(listener);

    const record = runWrite(db, { events: bus, performedBy: 'tester' }, (ctx) => {
      adjustStock(ctx, part.id, Locations.warehouse, 2);
      const movement = appendMovement(ctx, {
        kind: 'receive',
        partId: part.id,
        quantity: 2,
        from: null,
        to: Locations.warehouse,
      });
      expect(listener).not.toHaveBeenCalled();
      return movement;
    });

    expect(record.performedBy).toBe('tester');
    expect(listener).toHaveBeenCalledWith({
      type: 'movementRecorded',
      movementId: record.id,
      kind: 'receive',
      partId: part.id,
      quantity: 2,
    });
  });

  it('rolls back every write and drops the events when the body throws', () => {
    const db = createTestLedger();
    const { part } = seedCatalog(db);
    const bus = new LedgerEventBus();
    const listener = vi.fn();
    bus.onMovementRecorded(listener);

    const error = captureError(() =>
      runWrite(db, { events: bus }, (ctx) => {
        adjustStock(ctx, part.id, Locations.warehouse, 5);
        appendMovement(ctx, { kind: 'receive', partId: part.id, quantity: 5, from: null, to: Locations.warehouse });
        throw new Error('abort');
      })
    );

    expect(error).toEqual(new Error('abort'));
    expect(warehouseStock(db, part.id)).toBe(0);
    expect(listMovements(db)).toEqual([]);
    expect(listener).not.toHaveBeenCalled();
  });
});

describe('getConservationReport', () => {
  it('balances trivially for a part that never moved', () => {
    const db = createTestLedger();
    const { part } = seedCatalog(db);

    expect(getConservationReport(db, part.id)).toEqual({
      partId: part.id,
      totalReceived: 0,
      warehouse: 0,
      trucks: 0,
      jobs: 0,
      activeReturned: 0,
      balanced: true,
    });
  });
});
