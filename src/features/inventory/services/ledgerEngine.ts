/**
 * Ledger Engine
 *
 * Boundary in front of the ledger core: one instance per open database. Writes are
 * gated by the capability policy, retried on transient lock contention, reported to
 * telemetry, and announced on the event bus once committed. Reads pass straight through.
 */

import { closeLedgerDatabase, openLedgerDatabase } from '@/lib/database';
import type { Clock, LedgerDatabase } from '@/lib/database';
import { loadLedgerConfig } from '@/lib/config';
import type { LedgerConfig } from '@/lib/config';
import type {
  ChainEvent,
  ConservationReport,
  Job,
  JobId,
  JobPart,
  JobPartView,
  MovementRecord,
  OrderReceiveSummaryLine,
  Part,
  PartId,
  PartsList,
  PartsListDetail,
  PartsListId,
  PartsListItem,
  PendingTransferView,
  PurchaseOrder,
  PurchaseOrderDetail,
  PurchaseOrderId,
  PurchaseOrderItem,
  PurchaseOrderItemId,
  PurchaseOrderStatus,
  ReturnAuthorization,
  ReturnAuthorizationDetail,
  ReturnAuthorizationId,
  ReturnStatus,
  ShortfallRow,
  StockLevel,
  Supplier,
  SupplierId,
  TransferId,
  Truck,
  TruckId,
  TruckInventoryLine,
} from '../types/ledger.types';
import type {
  AddOrderItemInput,
  ConsumeFromTruckInput,
  CreateJobInput,
  CreatePartInput,
  CreatePartsListInput,
  CreatePurchaseOrderInput,
  CreateReturnInput,
  CreateSupplierInput,
  CreateTransferInput,
  CreateTruckInput,
  MovementFilterInput,
  ReceiveItemInput,
  RequiredPartInput,
  ReturnToWarehouseInput,
} from '../types/schemas';
import { ledgerEvents } from '../utils/ledgerEvents';
import type { LedgerEventBus } from '../utils/ledgerEvents';
import * as ledger from './ledger';
import { PermissionDeniedError } from './ledger/errors';
import { DEFAULT_RETRY, sleep, withWriteRetry } from './ledger/retry';
import type { RetryOptions } from './ledger/retry';
import type { WriteOptions } from './ledger/unitOfWork';
import { allowAll } from './capabilities';
import type { Capability, CapabilityPolicy } from './capabilities';
import { configureTelemetry, telemetry } from './telemetry';
import type { TelemetryData } from './telemetry';

export interface LedgerEngineOptions {
  policy?: CapabilityPolicy;
  retry?: RetryOptions;
  /** null or omitted: over-receiving is not capped */
  maxOverReceivePercent?: number | null;
  events?: LedgerEventBus;
  /** Backoff wait between retries */
  wait?: (ms: number) => Promise<void>;
}

export class LedgerEngine {
  private readonly policy: CapabilityPolicy;
  private readonly retry: RetryOptions;
  private readonly maxOverReceivePercent: number | null;
  private readonly wait: (ms: number) => Promise<void>;
  readonly events: LedgerEventBus;

  constructor(
    readonly db: LedgerDatabase,
    options: LedgerEngineOptions = {}
  ) {
    this.policy = options.policy ?? allowAll();
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.maxOverReceivePercent = options.maxOverReceivePercent ?? null;
    this.events = options.events ?? ledgerEvents;
    this.wait = options.wait ?? sleep;
  }

  /** Open the configured database file and apply pending migrations */
  static open(
    config: LedgerConfig = loadLedgerConfig(),
    options: Omit<LedgerEngineOptions, 'retry' | 'maxOverReceivePercent'> & { now?: Clock } = {}
  ): LedgerEngine {
    configureTelemetry({ enabled: config.telemetryEnabled });
    const db = openLedgerDatabase({ path: config.databasePath, busyTimeoutMs: config.busyTimeoutMs, now: options.now });
    return new LedgerEngine(db, {
      ...options,
      retry: { maxAttempts: config.writeRetries, baseDelayMs: config.retryBaseDelayMs },
      maxOverReceivePercent: config.maxOverReceivePercent,
    });
  }

  /** Same database, different caller */
  withPolicy(policy: CapabilityPolicy): LedgerEngine {
    return new LedgerEngine(this.db, {
      policy,
      retry: this.retry,
      maxOverReceivePercent: this.maxOverReceivePercent,
      events: this.events,
      wait: this.wait,
    });
  }

  close(): void {
    closeLedgerDatabase(this.db);
  }

  private async write<T>(
    capability: Capability,
    operation: string,
    data: TelemetryData,
    run: (options: WriteOptions) => T
  ): Promise<T> {
    if (!this.policy.can(capability)) {
      const denied = new PermissionDeniedError(capability, this.policy.actor);
      telemetry.error(`ledger.${operation}.denied`, denied, { ...data, actor: this.policy.actor });
      throw denied;
    }

    const options: WriteOptions = { performedBy: this.policy.actor, events: this.events };
    try {
      const result = await withWriteRetry(() => run(options), this.retry, this.wait);
      telemetry.event(`ledger.${operation}`, data);
      return result;
    } catch (error) {
      telemetry.error(`ledger.${operation}.failed`, error, data);
      throw error;
    }
  }

  // ---------------------------------------------------------------------------
  // Movement operations
  // ---------------------------------------------------------------------------

  receiveOrderItems(orderId: PurchaseOrderId, items: ReceiveItemInput[]): Promise<PurchaseOrderStatus> {
    return this.write('orders_receive', 'receiveOrderItems', { orderId, lines: items.length }, (options) =>
      ledger.receiveOrderItems(
        this.db,
        { orderId, items },
        { ...options, maxOverReceivePercent: this.maxOverReceivePercent }
      )
    );
  }

  async createTransfer(input: CreateTransferInput): Promise<TransferId> {
    const transfer = await this.write('trucks_transfer', 'createTransfer', { ...input }, (options) =>
      ledger.createTransfer(this.db, input, options)
    );
    return transfer.id;
  }

  async receiveTransfer(transferId: TransferId): Promise<void> {
    await this.write('trucks_receive', 'receiveTransfer', { transferId }, (options) =>
      ledger.receiveTransfer(this.db, transferId, options)
    );
  }

  cancelTransfer(transferId: TransferId): Promise<MovementRecord> {
    return this.write('trucks_transfer', 'cancelTransfer', { transferId }, (options) =>
      ledger.cancelTransfer(this.db, transferId, options)
    );
  }

  returnToWarehouse(input: ReturnToWarehouseInput): Promise<MovementRecord> {
    return this.write('trucks_transfer', 'returnToWarehouse', { ...input }, (options) =>
      ledger.returnToWarehouse(this.db, input, options)
    );
  }

  consumeFromTruck(input: ConsumeFromTruckInput): Promise<JobPart> {
    return this.write('jobs_assign', 'consumeFromTruck', { ...input }, (options) =>
      ledger.consumeFromTruck(this.db, input, options)
    );
  }

  async createReturn(input: CreateReturnInput): Promise<ReturnAuthorizationId> {
    const ra = await this.write(
      'orders_return',
      'createReturn',
      { supplierId: input.supplierId, reason: input.reason, lines: input.items.length, notes: input.notes },
      (options) => ledger.createReturn(this.db, input, options)
    );
    return ra.id;
  }

  async deleteReturn(returnId: ReturnAuthorizationId): Promise<void> {
    await this.write('orders_return', 'deleteReturn', { returnId }, (options) =>
      ledger.deleteReturn(this.db, returnId, options)
    );
  }

  cancelReturn(returnId: ReturnAuthorizationId): Promise<ReturnAuthorization> {
    return this.write('orders_return', 'cancelReturn', { returnId }, (options) =>
      ledger.cancelReturn(this.db, returnId, options)
    );
  }

  updateReturnStatus(returnId: ReturnAuthorizationId, status: ReturnStatus, creditAmount?: number): Promise<ReturnAuthorization> {
    return this.write('orders_return', 'updateReturnStatus', { returnId, status, creditAmount }, (options) =>
      ledger.updateReturnStatus(this.db, { returnId, status, creditAmount }, options)
    );
  }

  // ---------------------------------------------------------------------------
  // Purchase orders
  // ---------------------------------------------------------------------------

  createPurchaseOrder(input: CreatePurchaseOrderInput): Promise<PurchaseOrder> {
    return this.write('orders_create', 'createPurchaseOrder', { ...input }, (options) =>
      ledger.createPurchaseOrder(this.db, input, options)
    );
  }

  addOrderItem(input: AddOrderItemInput): Promise<PurchaseOrderItem> {
    return this.write('orders_create', 'addOrderItem', { ...input }, (options) =>
      ledger.addOrderItem(this.db, input, options)
    );
  }

  async removeOrderItem(orderItemId: PurchaseOrderItemId): Promise<void> {
    await this.write('orders_create', 'removeOrderItem', { orderItemId }, (options) =>
      ledger.removeOrderItem(this.db, orderItemId, options)
    );
  }

  submitPurchaseOrder(orderId: PurchaseOrderId): Promise<PurchaseOrder> {
    return this.write('orders_submit', 'submitPurchaseOrder', { orderId }, (options) =>
      ledger.submitPurchaseOrder(this.db, orderId, options)
    );
  }

  cancelPurchaseOrder(orderId: PurchaseOrderId): Promise<PurchaseOrder> {
    return this.write('orders_edit', 'cancelPurchaseOrder', { orderId }, (options) =>
      ledger.cancelPurchaseOrder(this.db, orderId, options)
    );
  }

  closePurchaseOrder(orderId: PurchaseOrderId): Promise<PurchaseOrder> {
    return this.write('orders_edit', 'closePurchaseOrder', { orderId }, (options) =>
      ledger.closePurchaseOrder(this.db, orderId, options)
    );
  }

  async deletePurchaseOrder(orderId: PurchaseOrderId): Promise<void> {
    await this.write('orders_create', 'deletePurchaseOrder', { orderId }, (options) =>
      ledger.deletePurchaseOrder(this.db, orderId, options)
    );
  }

  getPurchaseOrder(orderId: PurchaseOrderId): PurchaseOrderDetail {
    return ledger.getPurchaseOrder(this.db, orderId);
  }

  listPurchaseOrders(status?: PurchaseOrderStatus): PurchaseOrder[] {
    return ledger.listPurchaseOrders(this.db, status);
  }

  getOrderReceiveSummary(orderId: PurchaseOrderId): OrderReceiveSummaryLine[] {
    return ledger.getOrderReceiveSummary(this.db, orderId);
  }

  getReturnAuthorization(returnId: ReturnAuthorizationId): ReturnAuthorizationDetail {
    return ledger.getReturnAuthorization(this.db, returnId);
  }

  listReturnAuthorizations(status?: ReturnStatus): ReturnAuthorization[] {
    return ledger.listReturnAuthorizations(this.db, status);
  }

  // ---------------------------------------------------------------------------
  // Catalog & planning
  // ---------------------------------------------------------------------------

  createPart(input: CreatePartInput): Promise<Part> {
    return this.write('parts_add', 'createPart', { partNumber: input.partNumber }, (options) =>
      ledger.createPart(this.db, input, options)
    );
  }

  createSupplier(input: CreateSupplierInput): Promise<Supplier> {
    return this.write('parts_add', 'createSupplier', { name: input.name }, (options) =>
      ledger.createSupplier(this.db, input, options)
    );
  }

  createTruck(input: CreateTruckInput): Promise<Truck> {
    return this.write('parts_add', 'createTruck', { truckNumber: input.truckNumber }, (options) =>
      ledger.createTruck(this.db, input, options)
    );
  }

  createJob(input: CreateJobInput): Promise<Job> {
    return this.write('jobs_add', 'createJob', { name: input.name, jobNumber: input.jobNumber }, (options) =>
      ledger.createJob(this.db, input, options)
    );
  }

  createPartsList(input: CreatePartsListInput): Promise<PartsList> {
    return this.write('parts_lists', 'createPartsList', { name: input.name }, (options) =>
      ledger.createPartsList(this.db, input, options)
    );
  }

  addPartsListItem(listId: PartsListId, input: RequiredPartInput): Promise<PartsListItem> {
    return this.write('parts_lists', 'addPartsListItem', { listId, ...input }, (options) =>
      ledger.addPartsListItem(this.db, listId, input, options)
    );
  }

  getPart(partId: PartId): Part {
    return ledger.getPart(this.db, partId);
  }

  getPartByNumber(partNumber: string): Part | null {
    return ledger.getPartByNumber(this.db, partNumber);
  }

  listParts(): Part[] {
    return ledger.listParts(this.db);
  }

  getSupplier(supplierId: SupplierId): Supplier {
    return ledger.getSupplier(this.db, supplierId);
  }

  listSuppliers(): Supplier[] {
    return ledger.listSuppliers(this.db);
  }

  getTruck(truckId: TruckId): Truck {
    return ledger.getTruck(this.db, truckId);
  }

  listTrucks(): Truck[] {
    return ledger.listTrucks(this.db);
  }

  getJob(jobId: JobId): Job {
    return ledger.getJob(this.db, jobId);
  }

  listJobs(): Job[] {
    return ledger.listJobs(this.db);
  }

  getPartsList(listId: PartsListId): PartsListDetail {
    return ledger.getPartsList(this.db, listId);
  }

  // ---------------------------------------------------------------------------
  // Ledger inspection & analytics
  // ---------------------------------------------------------------------------

  getStockLevels(partId: PartId): StockLevel[] {
    return ledger.getStockLevels(this.db, partId);
  }

  getAvailableWarehouseStock(partId: PartId): number {
    return ledger.getAvailableWarehouseStock(this.db, partId);
  }

  listMovements(filter?: MovementFilterInput): MovementRecord[] {
    return ledger.listMovements(this.db, filter);
  }

  getConservationReport(partId: PartId): ConservationReport {
    return ledger.getConservationReport(this.db, partId);
  }

  getTruckInventory(truckId: TruckId): TruckInventoryLine[] {
    return ledger.getTruckInventory(this.db, truckId);
  }

  listPendingTransfers(truckId?: TruckId): PendingTransferView[] {
    return ledger.listPendingTransfers(this.db, truckId);
  }

  getJobParts(jobId: JobId): JobPartView[] {
    return ledger.getJobParts(this.db, jobId);
  }

  getJobTotalCost(jobId: JobId): number {
    return ledger.getJobTotalCost(this.db, jobId);
  }

  getPartSupplierChain(partId: PartId): ChainEvent[] {
    return ledger.getPartSupplierChain(this.db, partId);
  }

  getSuggestedReturnSupplier(partId: PartId, jobId?: JobId): SupplierId | null {
    return ledger.getSuggestedReturnSupplier(this.db, partId, jobId);
  }

  checkShortfall(listId: PartsListId): ShortfallRow[] {
    return ledger.checkShortfall(this.db, listId);
  }

  checkShortfallForItems(items: RequiredPartInput[]): ShortfallRow[] {
    return ledger.checkShortfallForItems(this.db, items);
  }
}
