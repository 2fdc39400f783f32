import { afterEach, describe, it, expect, vi } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { LedgerEngine } from '../ledgerEngine';
import { allowAll, fromPermissionKeys } from '../capabilities';
import { configureTelemetry } from '../telemetry';
import { InsufficientStockError, OverReceiveLimitError, PermissionDeniedError } from '../ledger/errors';
import { LedgerEventBus } from '../../utils/ledgerEvents';
import type { MovementKind, PurchaseOrderStatus } from '../../types/ledger.types';
import { openLedgerDatabase } from '@/lib/database';
import { parseLedgerConfig } from '@/lib/config';
import { createTestLedger, seedCatalog, steppingClock, submittedOrder } from '@/__tests__/testUtils';

const tempDirs: string[] = [];

function tempLedgerPath(): string {
  const dir = mkdtempSync(join(tmpdir(), 'parts-ledger-'));
  tempDirs.push(dir);
  return join(dir, 'ledger.db');
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

function setup(options: { maxOverReceivePercent?: number } = {}) {
  const db = createTestLedger();
  const catalog = seedCatalog(db);
  const bus = new LedgerEventBus();
  const engine = new LedgerEngine(db, { events: bus, ...options });
  return { db, catalog, bus, engine };
}

describe('LedgerEngine capability checks', () => {
  it('rejects writes the policy does not grant and reports the denial', async () => {
    const { engine } = setup();
    const sink = { captureEvent: vi.fn(), captureError: vi.fn() };
    configureTelemetry({ enabled: true, sink });
    const restricted = engine.withPolicy(fromPermissionKeys(['trucks_receive'], 'tester'));

    await expect(
      restricted.createPart({ partNumber: 'WP-300', description: 'Breaker', unitCost: 12 })
    ).rejects.toThrow('tester lacks the parts_add capability');

    expect(restricted.getPartByNumber('WP-300')).toBeNull();
    expect(sink.captureError).toHaveBeenCalledWith('ledger.createPart.denied', expect.any(PermissionDeniedError), {
      partNumber: 'WP-300',
      actor: 'tester',
    });
  });

  it('records the acting user on movements', async () => {
    const { db, catalog, engine } = setup();
    const { order, items } = submittedOrder(db, catalog.supplierA.id, [{ partId: catalog.part.id, quantity: 2, unitCost: 1 }]);
    const clerk = engine.withPolicy(allowAll('clerk'));

    await clerk.receiveOrderItems(order.id, [{ orderItemId: items[0].id, quantity: 2, allocation: 'warehouse' }]);

    expect(clerk.listMovements({ kind: 'receive' }).map((movement) => movement.performedBy)).toEqual(['clerk']);
  });
});

describe('LedgerEngine events and telemetry', () => {
  it('announces committed changes on its bus', async () => {
    const { db, catalog, bus, engine } = setup();
    const { order, items } = submittedOrder(db, catalog.supplierA.id, [{ partId: catalog.part.id, quantity: 5, unitCost: 1 }]);
    const movements: MovementKind[] = [];
    const statuses: PurchaseOrderStatus[] = [];
    bus.onMovementRecorded((event) => movements.push(event.kind));
    bus.onOrderStatusChanged((event) => statuses.push(event.to));

    const status = await engine.receiveOrderItems(order.id, [
      { orderItemId: items[0].id, quantity: 5, allocation: 'truck', targetId: catalog.truck.id },
    ]);

    expect(status).toBe('received');
    expect(movements).toEqual(['receive', 'transfer']);
    expect(statuses).toEqual(['received']);
  });

  it('announces nothing when the write fails, and does not retry domain errors', async () => {
    const db = createTestLedger();
    const catalog = seedCatalog(db);
    const bus = new LedgerEventBus();
    const wait = vi.fn(async () => undefined);
    const engine = new LedgerEngine(db, { events: bus, wait });
    const sink = { captureEvent: vi.fn(), captureError: vi.fn() };
    configureTelemetry({ enabled: true, sink });
    const listener = vi.fn();
    bus.onMovementRecorded(listener);

    await expect(
      engine.createTransfer({ partId: catalog.part.id, truckId: catalog.truck.id, quantity: 1 })
    ).rejects.toBeInstanceOf(InsufficientStockError);

    expect(listener).not.toHaveBeenCalled();
    expect(wait).not.toHaveBeenCalled();
    expect(sink.captureError).toHaveBeenCalledTimes(1);
    expect(sink.captureError.mock.calls[0][0]).toBe('ledger.createTransfer.failed');
  });

  it('applies the configured over-receive cap', async () => {
    const { db, catalog, engine } = setup({ maxOverReceivePercent: 10 });
    const { order, items } = submittedOrder(db, catalog.supplierA.id, [{ partId: catalog.part.id, quantity: 10, unitCost: 1 }]);

    await expect(
      engine.receiveOrderItems(order.id, [{ orderItemId: items[0].id, quantity: 12, allocation: 'warehouse' }])
    ).rejects.toBeInstanceOf(OverReceiveLimitError);
    await expect(
      engine.receiveOrderItems(order.id, [{ orderItemId: items[0].id, quantity: 11, allocation: 'warehouse' }])
    ).resolves.toBe('received');
  });
});

describe('LedgerEngine write retries', () => {
  it('retries a write that found the file locked by another connection', async () => {
    const path = tempLedgerPath();
    const db = openLedgerDatabase({ path, busyTimeoutMs: 0, now: steppingClock() });
    const blocker = new Database(path);
    blocker.exec('BEGIN IMMEDIATE');
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const delays: number[] = [];
    const engine = new LedgerEngine(db, {
      events: new LedgerEventBus(),
      retry: { maxAttempts: 3, baseDelayMs: 10 },
      wait: async (ms) => {
        delays.push(ms);
        blocker.exec('COMMIT');
      },
    });

    const supplier = await engine.createSupplier({ name: 'Test Supplier C' });

    expect(delays).toEqual([10]);
    expect(engine.getSupplier(supplier.id).name).toBe('Test Supplier C');
    blocker.close();
    engine.close();
  });
});

describe('LedgerEngine.open', () => {
  it('creates and migrates the configured database file', () => {
    const path = tempLedgerPath();
    const engine = LedgerEngine.open(parseLedgerConfig({ LEDGER_DB_PATH: path, LEDGER_TELEMETRY: 'off' }), {
      events: new LedgerEventBus(),
    });

    expect(existsSync(path)).toBe(true);
    expect(engine.listParts()).toEqual([]);
    engine.close();
  });
});
