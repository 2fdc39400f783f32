/**
 * Ledger - Core types
 * Write-side entities (canonical ledger state) and read-side projections.
 */

// ---------------------------------------------------------------------------
// Enumerations (tuples double as drizzle column enums and zod enums)
// ---------------------------------------------------------------------------

export const LOCATION_KINDS = ['warehouse', 'truck', 'job'] as const;
export type LocationKind = (typeof LOCATION_KINDS)[number];

export const MOVEMENT_KINDS = ['receive', 'transfer', 'consumption', 'return', 'return_reversal'] as const;
export type MovementKind = (typeof MOVEMENT_KINDS)[number];

export const TRANSFER_STATUSES = ['pending', 'received', 'cancelled'] as const;
export type TransferStatus = (typeof TRANSFER_STATUSES)[number];

export const PURCHASE_ORDER_STATUSES = ['draft', 'submitted', 'partial', 'received', 'cancelled', 'closed'] as const;
export type PurchaseOrderStatus = (typeof PURCHASE_ORDER_STATUSES)[number];

export const RETURN_REASONS = ['wrong_part', 'damaged', 'overstock', 'defective', 'other'] as const;
export type ReturnReason = (typeof RETURN_REASONS)[number];

export const RETURN_STATUSES = ['initiated', 'picked_up', 'credit_received', 'cancelled'] as const;
export type ReturnStatus = (typeof RETURN_STATUSES)[number];

export const ALLOCATION_TARGETS = ['warehouse', 'truck', 'job'] as const;
export type AllocationTarget = (typeof ALLOCATION_TARGETS)[number];

export const CHAIN_EVENT_TYPES = ['received', 'transferred', 'consumed', 'returned'] as const;
export type ChainEventType = (typeof CHAIN_EVENT_TYPES)[number];

// ---------------------------------------------------------------------------
// Branded IDs
// ---------------------------------------------------------------------------
// Row ids are SQLite integers. The brand keeps a truck id from being passed
// where a job id is expected; the constructors validate external input.

export type PartId = number & { readonly __brand: 'PartId' };
export type SupplierId = number & { readonly __brand: 'SupplierId' };
export type TruckId = number & { readonly __brand: 'TruckId' };
export type JobId = number & { readonly __brand: 'JobId' };
export type MovementId = number & { readonly __brand: 'MovementId' };
export type PurchaseOrderId = number & { readonly __brand: 'PurchaseOrderId' };
export type PurchaseOrderItemId = number & { readonly __brand: 'PurchaseOrderItemId' };
export type ReturnAuthorizationId = number & { readonly __brand: 'ReturnAuthorizationId' };
export type PartsListId = number & { readonly __brand: 'PartsListId' };

/** A transfer is a movement record of kind `transfer` */
export type TransferId = MovementId;

const isPositiveInteger = (value: unknown): boolean =>
  typeof value === 'number' && Number.isInteger(value) && value > 0;

function brandedId<B extends number>(label: string) {
  const is = (value: unknown): value is B => isPositiveInteger(value);
  const to = (value: number): B => {
    if (!is(value)) {
      throw new Error(`Invalid ${label}: expected a positive integer, received ${String(value)}`);
    }
    return value;
  };
  return { is, to };
}

const partIds = brandedId<PartId>('PartId');
const supplierIds = brandedId<SupplierId>('SupplierId');
const truckIds = brandedId<TruckId>('TruckId');
const jobIds = brandedId<JobId>('JobId');
const movementIds = brandedId<MovementId>('MovementId');
const orderIds = brandedId<PurchaseOrderId>('PurchaseOrderId');
const orderItemIds = brandedId<PurchaseOrderItemId>('PurchaseOrderItemId');
const returnIds = brandedId<ReturnAuthorizationId>('ReturnAuthorizationId');
const partsListIds = brandedId<PartsListId>('PartsListId');

export const isPartId = partIds.is;
export const toPartId = partIds.to;
export const isSupplierId = supplierIds.is;
export const toSupplierId = supplierIds.to;
export const isTruckId = truckIds.is;
export const toTruckId = truckIds.to;
export const isJobId = jobIds.is;
export const toJobId = jobIds.to;
export const isMovementId = movementIds.is;
export const toMovementId = movementIds.to;
export const isPurchaseOrderId = orderIds.is;
export const toPurchaseOrderId = orderIds.to;
export const isPurchaseOrderItemId = orderItemIds.is;
export const toPurchaseOrderItemId = orderItemIds.to;
export const isReturnAuthorizationId = returnIds.is;
export const toReturnAuthorizationId = returnIds.to;
export const isPartsListId = partsListIds.is;
export const toPartsListId = partsListIds.to;

/** Nullable column helper: `null` stays `null`, anything else must be a valid id */
export const toOptionalId = <B extends number>(value: number | null, to: (value: number) => B): B | null =>
  value === null ? null : to(value);

// ---------------------------------------------------------------------------
// Locations
// ---------------------------------------------------------------------------

export type StockLocation =
  | { kind: 'warehouse' }
  | { kind: 'truck'; truckId: TruckId }
  | { kind: 'job'; jobId: JobId };

export const Locations = {
  warehouse: { kind: 'warehouse' } as const satisfies StockLocation,
  truck: (truckId: TruckId): StockLocation => ({ kind: 'truck', truckId }),
  job: (jobId: JobId): StockLocation => ({ kind: 'job', jobId }),
};

/** Stored form: (kind, ref) where ref is 0 for the warehouse */
export function encodeLocation(location: StockLocation): { kind: LocationKind; ref: number } {
  switch (location.kind) {
    case 'warehouse':
      return { kind: 'warehouse', ref: 0 };
    case 'truck':
      return { kind: 'truck', ref: location.truckId };
    case 'job':
      return { kind: 'job', ref: location.jobId };
  }
}

export function decodeLocation(kind: LocationKind | null, ref: number | null): StockLocation | null {
  if (kind === null) return null;
  switch (kind) {
    case 'warehouse':
      return Locations.warehouse;
    case 'truck':
      return Locations.truck(toTruckId(ref ?? 0));
    case 'job':
      return Locations.job(toJobId(ref ?? 0));
  }
}

export function describeLocation(location: StockLocation): string {
  switch (location.kind) {
    case 'warehouse':
      return 'Warehouse';
    case 'truck':
      return `Truck(${location.truckId})`;
    case 'job':
      return `Job(${location.jobId})`;
  }
}

// ---------------------------------------------------------------------------
// Write-side entities
// ---------------------------------------------------------------------------

export interface Part {
  readonly id: PartId;
  partNumber: string;
  description: string;
  /** Catalog list cost; receipts supersede it as the latest known cost */
  unitCost: number;
  createdAt: string;
}

export interface Supplier {
  readonly id: SupplierId;
  name: string;
  contact: string | null;
  createdAt: string;
}

export interface Truck {
  readonly id: TruckId;
  truckNumber: string;
  name: string | null;
  createdAt: string;
}

export interface Job {
  readonly id: JobId;
  jobNumber: string;
  name: string;
  customer: string | null;
  createdAt: string;
}

export interface LocationStock {
  partId: PartId;
  location: StockLocation;
  quantity: number;
}

export interface MovementRecord {
  readonly id: MovementId;
  kind: MovementKind;
  partId: PartId;
  quantity: number;
  from: StockLocation | null;
  to: StockLocation | null;
  supplierId: SupplierId | null;
  sourceOrderId: PurchaseOrderId | null;
  orderItemId: PurchaseOrderItemId | null;
  returnId: ReturnAuthorizationId | null;
  /** Only set on `transfer` movements */
  transferStatus: TransferStatus | null;
  unitCost: number | null;
  performedBy: string | null;
  createdAt: string;
  completedAt: string | null;
}

export interface PurchaseOrder {
  readonly id: PurchaseOrderId;
  orderNumber: string;
  supplierId: SupplierId;
  status: PurchaseOrderStatus;
  notes: string | null;
  submittedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface PurchaseOrderItem {
  readonly id: PurchaseOrderItemId;
  orderId: PurchaseOrderId;
  partId: PartId;
  quantityOrdered: number;
  quantityReceived: number;
  unitCost: number;
}

export interface ReturnAuthorization {
  readonly id: ReturnAuthorizationId;
  raNumber: string;
  supplierId: SupplierId;
  reason: ReturnReason;
  relatedOrderId: PurchaseOrderId | null;
  status: ReturnStatus;
  creditAmount: number;
  notes: string | null;
  createdAt: string;
  updatedAt: string;
  pickedUpAt: string | null;
  creditReceivedAt: string | null;
}

export interface ReturnAuthorizationItem {
  readonly id: number;
  returnId: ReturnAuthorizationId;
  partId: PartId;
  quantity: number;
  unitCost: number;
}

export interface JobPart {
  readonly id: number;
  jobId: JobId;
  partId: PartId;
  quantityUsed: number;
  unitCostAtUse: number;
  supplierId: SupplierId | null;
  assignedAt: string;
  updatedAt: string;
}

export interface PartsList {
  readonly id: PartsListId;
  name: string;
  jobId: JobId | null;
  createdAt: string;
}

export interface PartsListItem {
  readonly id: number;
  listId: PartsListId;
  partId: PartId;
  quantity: number;
}

// ---------------------------------------------------------------------------
// Read-side projections (joined display fields live only here)
// ---------------------------------------------------------------------------

export interface PurchaseOrderItemView extends PurchaseOrderItem {
  partNumber: string;
  partDescription: string;
}

export interface PurchaseOrderDetail extends PurchaseOrder {
  supplierName: string;
  items: PurchaseOrderItemView[];
  totalCost: number;
}

export interface OrderReceiveSummaryLine {
  orderItemId: PurchaseOrderItemId;
  partId: PartId;
  partNumber: string;
  quantityOrdered: number;
  quantityReceived: number;
  outstanding: number;
}

export interface PartsListItemView extends PartsListItem {
  partNumber: string;
}

export interface PartsListDetail extends PartsList {
  items: PartsListItemView[];
}

export interface ReturnAuthorizationItemView extends ReturnAuthorizationItem {
  partNumber: string;
}

export interface ReturnAuthorizationDetail extends ReturnAuthorization {
  supplierName: string;
  items: ReturnAuthorizationItemView[];
  totalValue: number;
}

export interface StockLevel {
  location: StockLocation;
  quantity: number;
}

export interface TruckInventoryLine {
  partId: PartId;
  partNumber: string;
  description: string;
  quantity: number;
}

export interface PendingTransferView {
  transferId: TransferId;
  partId: PartId;
  partNumber: string;
  truckId: TruckId;
  truckNumber: string;
  quantity: number;
  supplierId: SupplierId | null;
  sourceOrderId: PurchaseOrderId | null;
  createdAt: string;
}

export interface JobPartView extends JobPart {
  partNumber: string;
  partDescription: string;
  totalCost: number;
}

export interface ChainEvent {
  movementId: MovementId;
  supplierId: SupplierId | null;
  eventType: ChainEventType;
  quantity: number;
  timestamp: string;
}

export interface ShortfallRow {
  partId: PartId;
  partNumber: string;
  required: number;
  inStock: number;
  shortfall: number;
  unitCost: number;
  estimatedCost: number;
}

export interface ConservationReport {
  partId: PartId;
  totalReceived: number;
  warehouse: number;
  trucks: number;
  jobs: number;
  activeReturned: number;
  balanced: boolean;
}
