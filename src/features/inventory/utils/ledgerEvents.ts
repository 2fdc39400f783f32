/**
 * Ledger Event Bus
 * Notifies in-process listeners after a ledger write has committed
 */

import type {
  MovementId,
  MovementKind,
  PartId,
  PurchaseOrderId,
  PurchaseOrderStatus,
  ReturnAuthorizationId,
  ReturnStatus,
} from '../types/ledger.types';

export interface MovementRecordedEvent {
  type: 'movementRecorded';
  movementId: MovementId;
  kind: MovementKind;
  partId: PartId;
  quantity: number;
}

export interface OrderStatusChangedEvent {
  type: 'orderStatusChanged';
  orderId: PurchaseOrderId;
  from: PurchaseOrderStatus;
  to: PurchaseOrderStatus;
}

export interface ReturnStatusChangedEvent {
  type: 'returnStatusChanged';
  returnId: ReturnAuthorizationId;
  from: ReturnStatus | null;
  to: ReturnStatus | 'deleted';
}

export type LedgerEventPayload = MovementRecordedEvent | OrderStatusChangedEvent | ReturnStatusChangedEvent;
export type LedgerEventType = LedgerEventPayload['type'];

export class LedgerEvent extends Event {
  constructor(readonly payload: LedgerEventPayload) {
    super(payload.type);
  }
}

type Unsubscribe = () => void;

// Event bus
export class LedgerEventBus extends EventTarget {
  emit(payload: LedgerEventPayload) {
    this.dispatchEvent(new LedgerEvent(payload));
  }

  emitAll(payloads: readonly LedgerEventPayload[]) {
    for (const payload of payloads) this.emit(payload);
  }

  // Subscribe to movement records
  onMovementRecorded(callback: (event: MovementRecordedEvent) => void): Unsubscribe {
    const handler = (event: Event) => {
      if (event instanceof LedgerEvent && event.payload.type === 'movementRecorded') callback(event.payload);
    };
    this.addEventListener('movementRecorded', handler);
    return () => this.removeEventListener('movementRecorded', handler);
  }

  // Subscribe to purchase order status changes
  onOrderStatusChanged(callback: (event: OrderStatusChangedEvent) => void): Unsubscribe {
    const handler = (event: Event) => {
      if (event instanceof LedgerEvent && event.payload.type === 'orderStatusChanged') callback(event.payload);
    };
    this.addEventListener('orderStatusChanged', handler);
    return () => this.removeEventListener('orderStatusChanged', handler);
  }

  // Subscribe to return authorization status changes
  onReturnStatusChanged(callback: (event: ReturnStatusChangedEvent) => void): Unsubscribe {
    const handler = (event: Event) => {
      if (event instanceof LedgerEvent && event.payload.type === 'returnStatusChanged') callback(event.payload);
    };
    this.addEventListener('returnStatusChanged', handler);
    return () => this.removeEventListener('returnStatusChanged', handler);
  }
}

// Shared default instance
export const ledgerEvents = new LedgerEventBus();
