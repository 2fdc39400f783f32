import { openLedgerDatabase } from '@/lib/database';
import type { Clock, LedgerDatabase } from '@/lib/database';
import {
  addOrderItem,
  createJob,
  createPart,
  createPurchaseOrder,
  createSupplier,
  createTruck,
  getStock,
  submitPurchaseOrder,
} from '@/features/inventory/services/ledger';
import { Locations } from '@/features/inventory/types/ledger.types';
import type {
  Job,
  JobId,
  Part,
  PartId,
  PurchaseOrder,
  PurchaseOrderItem,
  Supplier,
  SupplierId,
  Truck,
  TruckId,
} from '@/features/inventory/types/ledger.types';
import { LedgerEventBus } from '@/features/inventory/utils/ledgerEvents';

export const TEST_START = '2026-03-02T08:00:00.000Z';

/** Clock that moves forward by `stepMs` on every reading */
export function steppingClock(start: string = TEST_START, stepMs = 1000): Clock {
  let current = Date.parse(start);
  return () => {
    const value = new Date(current).toISOString();
    current += stepMs;
    return value;
  };
}

/** Clock that always returns the same instant; every write shares one timestamp */
export function frozenClock(at: string = TEST_START): Clock {
  return () => at;
}

export function createTestLedger(now: Clock = steppingClock()): LedgerDatabase {
  return openLedgerDatabase({ path: ':memory:', now });
}

/** Private bus so assertions never see events from other tests */
export const quietOptions = () => ({ events: new LedgerEventBus() });

export interface TestCatalog {
  part: Part;
  otherPart: Part;
  supplierA: Supplier;
  supplierB: Supplier;
  truck: Truck;
  job: Job;
}

export function seedCatalog(db: LedgerDatabase): TestCatalog {
  const options = quietOptions();
  return {
    part: createPart(db, { partNumber: 'WP-100', description: '12 AWG wire spool', unitCost: 10 }, options),
    otherPart: createPart(db, { partNumber: 'WP-200', description: 'Junction box', unitCost: 3 }, options),
    supplierA: createSupplier(db, { name: 'Test Supplier A' }, options),
    supplierB: createSupplier(db, { name: 'Test Supplier B' }, options),
    truck: createTruck(db, { truckNumber: 'T-1', name: 'Van one' }, options),
    job: createJob(db, { name: 'Test job', jobNumber: 'JOB-TEST-1' }, options),
  };
}

export interface OrderLine {
  partId: PartId;
  quantity: number;
  unitCost: number;
}

/** Draft an order, add its lines and submit it */
export function submittedOrder(
  db: LedgerDatabase,
  supplierId: SupplierId,
  lines: OrderLine[]
): { order: PurchaseOrder; items: PurchaseOrderItem[] } {
  const options = quietOptions();
  const draft = createPurchaseOrder(db, { supplierId }, options);
  const items = lines.map((line) =>
    addOrderItem(
      db,
      { orderId: draft.id, partId: line.partId, quantityOrdered: line.quantity, unitCost: line.unitCost },
      options
    )
  );
  const order = submitPurchaseOrder(db, draft.id, options);
  return { order, items };
}

export const warehouseStock = (db: LedgerDatabase, partId: PartId) => getStock(db.orm, partId, Locations.warehouse);
export const truckStock = (db: LedgerDatabase, partId: PartId, truckId: TruckId) =>
  getStock(db.orm, partId, Locations.truck(truckId));
export const jobStock = (db: LedgerDatabase, partId: PartId, jobId: JobId) =>
  getStock(db.orm, partId, Locations.job(jobId));

/** Run `fn` and return what it threw */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}
