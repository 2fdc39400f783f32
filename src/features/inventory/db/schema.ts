/**
 * Ledger database tables (drizzle-orm, SQLite)
 * Mirrors the structure produced by ./migrations.ts; keep both in step.
 */

import { integer, primaryKey, real, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core';
import {
  LOCATION_KINDS,
  MOVEMENT_KINDS,
  PURCHASE_ORDER_STATUSES,
  RETURN_REASONS,
  RETURN_STATUSES,
  TRANSFER_STATUSES,
} from '../types/ledger.types';

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export const parts = sqliteTable('parts', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  partNumber: text('part_number').notNull().unique(),
  description: text('description').notNull(),
  unitCost: real('unit_cost').notNull().default(0),
  createdAt: text('created_at').notNull(),
});

export const suppliers = sqliteTable('suppliers', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
  contact: text('contact'),
  createdAt: text('created_at').notNull(),
});

export const trucks = sqliteTable('trucks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  truckNumber: text('truck_number').notNull().unique(),
  name: text('name'),
  createdAt: text('created_at').notNull(),
});

export const jobs = sqliteTable('jobs', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  jobNumber: text('job_number').notNull().unique(),
  name: text('name').notNull(),
  customer: text('customer'),
  createdAt: text('created_at').notNull(),
});

// ---------------------------------------------------------------------------
// Ledger
// ---------------------------------------------------------------------------

export const locationStock = sqliteTable(
  'location_stock',
  {
    partId: integer('part_id').notNull().references(() => parts.id),
    locationKind: text('location_kind', { enum: LOCATION_KINDS }).notNull(),
    // 0 for the warehouse, otherwise the truck or job id
    locationRef: integer('location_ref').notNull(),
    quantity: integer('quantity').notNull().default(0),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.partId, table.locationKind, table.locationRef] }),
  })
);

export const movements = sqliteTable('movements', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  kind: text('kind', { enum: MOVEMENT_KINDS }).notNull(),
  partId: integer('part_id').notNull().references(() => parts.id),
  quantity: integer('quantity').notNull(),
  fromKind: text('from_kind', { enum: LOCATION_KINDS }),
  fromRef: integer('from_ref'),
  toKind: text('to_kind', { enum: LOCATION_KINDS }),
  toRef: integer('to_ref'),
  supplierId: integer('supplier_id'),
  sourceOrderId: integer('source_order_id'),
  orderItemId: integer('order_item_id'),
  returnId: integer('return_id'),
  transferStatus: text('transfer_status', { enum: TRANSFER_STATUSES }),
  unitCost: real('unit_cost'),
  performedBy: text('performed_by'),
  createdAt: text('created_at').notNull(),
  completedAt: text('completed_at'),
});

export const jobParts = sqliteTable(
  'job_parts',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    jobId: integer('job_id').notNull().references(() => jobs.id),
    partId: integer('part_id').notNull().references(() => parts.id),
    quantityUsed: integer('quantity_used').notNull(),
    unitCostAtUse: real('unit_cost_at_use').notNull().default(0),
    supplierId: integer('supplier_id'),
    assignedAt: text('assigned_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    jobPartUnique: uniqueIndex('idx_job_parts_job_part').on(table.jobId, table.partId),
  })
);

// ---------------------------------------------------------------------------
// Purchasing
// ---------------------------------------------------------------------------

export const purchaseOrders = sqliteTable('purchase_orders', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  orderNumber: text('order_number').notNull().unique(),
  supplierId: integer('supplier_id').notNull().references(() => suppliers.id),
  status: text('status', { enum: PURCHASE_ORDER_STATUSES }).notNull().default('draft'),
  notes: text('notes'),
  submittedAt: text('submitted_at'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
});

export const purchaseOrderItems = sqliteTable('purchase_order_items', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  orderId: integer('order_id')
    .notNull()
    .references(() => purchaseOrders.id, { onDelete: 'cascade' }),
  partId: integer('part_id').notNull().references(() => parts.id),
  quantityOrdered: integer('quantity_ordered').notNull(),
  quantityReceived: integer('quantity_received').notNull().default(0),
  unitCost: real('unit_cost').notNull().default(0),
});

// ---------------------------------------------------------------------------
// Returns
// ---------------------------------------------------------------------------

export const returnAuthorizations = sqliteTable('return_authorizations', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  raNumber: text('ra_number').notNull().unique(),
  supplierId: integer('supplier_id').notNull().references(() => suppliers.id),
  reason: text('reason', { enum: RETURN_REASONS }).notNull(),
  relatedOrderId: integer('related_order_id'),
  status: text('status', { enum: RETURN_STATUSES }).notNull().default('initiated'),
  creditAmount: real('credit_amount').notNull().default(0),
  notes: text('notes'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
  pickedUpAt: text('picked_up_at'),
  creditReceivedAt: text('credit_received_at'),
});

export const returnAuthorizationItems = sqliteTable('return_authorization_items', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  returnId: integer('return_id')
    .notNull()
    .references(() => returnAuthorizations.id, { onDelete: 'cascade' }),
  partId: integer('part_id').notNull().references(() => parts.id),
  quantity: integer('quantity').notNull(),
  unitCost: real('unit_cost').notNull().default(0),
});

// ---------------------------------------------------------------------------
// Parts lists (shortfall planning)
// ---------------------------------------------------------------------------

export const partsLists = sqliteTable('parts_lists', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  jobId: integer('job_id').references(() => jobs.id),
  createdAt: text('created_at').notNull(),
});

export const partsListItems = sqliteTable('parts_list_items', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  listId: integer('list_id')
    .notNull()
    .references(() => partsLists.id, { onDelete: 'cascade' }),
  partId: integer('part_id').notNull().references(() => parts.id),
  quantity: integer('quantity').notNull(),
});

export const ledgerSchema = {
  parts,
  suppliers,
  trucks,
  jobs,
  locationStock,
  movements,
  jobParts,
  purchaseOrders,
  purchaseOrderItems,
  returnAuthorizations,
  returnAuthorizationItems,
  partsLists,
  partsListItems,
};

export type LedgerSchema = typeof ledgerSchema;

export type PartRow = typeof parts.$inferSelect;
export type SupplierRow = typeof suppliers.$inferSelect;
export type TruckRow = typeof trucks.$inferSelect;
export type JobRow = typeof jobs.$inferSelect;
export type MovementRow = typeof movements.$inferSelect;
export type MovementInsert = typeof movements.$inferInsert;
export type JobPartRow = typeof jobParts.$inferSelect;
export type PurchaseOrderRow = typeof purchaseOrders.$inferSelect;
export type PurchaseOrderItemRow = typeof purchaseOrderItems.$inferSelect;
export type ReturnAuthorizationRow = typeof returnAuthorizations.$inferSelect;
export type ReturnAuthorizationItemRow = typeof returnAuthorizationItems.$inferSelect;
export type PartsListRow = typeof partsLists.$inferSelect;
export type PartsListItemRow = typeof partsListItems.$inferSelect;
