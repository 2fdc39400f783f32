import { describe, it, expect, vi } from 'vitest';
import { LedgerEventBus } from '../ledgerEvents';
import type { OrderStatusChangedEvent } from '../ledgerEvents';
import { toMovementId, toPartId, toPurchaseOrderId, toReturnAuthorizationId } from '../../types/ledger.types';

const orderEvent: OrderStatusChangedEvent = {
  type: 'orderStatusChanged',
  orderId: toPurchaseOrderId(1),
  from: 'submitted',
  to: 'partial',
};

describe('LedgerEventBus', () => {
  it('delivers each payload only to listeners of its type', () => {
    const bus = new LedgerEventBus();
    const onOrder = vi.fn();
    const onMovement = vi.fn();
    bus.onOrderStatusChanged(onOrder);
    bus.onMovementRecorded(onMovement);

    bus.emit(orderEvent);

    expect(onOrder).toHaveBeenCalledTimes(1);
    expect(onOrder).toHaveBeenCalledWith(orderEvent);
    expect(onMovement).not.toHaveBeenCalled();
  });

  it('emits a batch in order', () => {
    const bus = new LedgerEventBus();
    const seen: string[] = [];
    bus.onMovementRecorded((event) => seen.push(`movement:${event.movementId}`));
    bus.onReturnStatusChanged((event) => seen.push(`return:${event.to}`));

    bus.emitAll([
      { type: 'movementRecorded', movementId: toMovementId(1), kind: 'return', partId: toPartId(1), quantity: 2 },
      { type: 'returnStatusChanged', returnId: toReturnAuthorizationId(1), from: null, to: 'initiated' },
      { type: 'movementRecorded', movementId: toMovementId(2), kind: 'return_reversal', partId: toPartId(1), quantity: 2 },
    ]);

    expect(seen).toEqual(['movement:1', 'return:initiated', 'movement:2']);
  });

  it('stops delivering after unsubscribe', () => {
    const bus = new LedgerEventBus();
    const listener = vi.fn();
    const unsubscribe = bus.onOrderStatusChanged(listener);

    unsubscribe();
    bus.emit(orderEvent);

    expect(listener).not.toHaveBeenCalled();
  });

  it('keeps separate buses isolated', () => {
    const first = new LedgerEventBus();
    const second = new LedgerEventBus();
    const listener = vi.fn();
    second.onOrderStatusChanged(listener);

    first.emit(orderEvent);

    expect(listener).not.toHaveBeenCalled();
  });
});
