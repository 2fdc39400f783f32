import { z } from 'zod';
import {
  PURCHASE_ORDER_STATUSES,
  RETURN_REASONS,
  RETURN_STATUSES,
  MOVEMENT_KINDS,
  toJobId,
  toMovementId,
  toPartId,
  toPartsListId,
  toPurchaseOrderId,
  toPurchaseOrderItemId,
  toReturnAuthorizationId,
  toSupplierId,
  toTruckId,
} from './ledger.types';

const idOf = <B extends number>(to: (value: number) => B, label: string) =>
  z
    .number({ invalid_type_error: `${label} must be a number` })
    .int({ message: `${label} must be an integer` })
    .positive({ message: `${label} must be > 0` })
    .transform((value) => to(value));

export const partIdSchema = idOf(toPartId, 'partId');
export const supplierIdSchema = idOf(toSupplierId, 'supplierId');
export const truckIdSchema = idOf(toTruckId, 'truckId');
export const jobIdSchema = idOf(toJobId, 'jobId');
export const transferIdSchema = idOf(toMovementId, 'transferId');
export const orderIdSchema = idOf(toPurchaseOrderId, 'orderId');
export const orderItemIdSchema = idOf(toPurchaseOrderItemId, 'orderItemId');
export const returnIdSchema = idOf(toReturnAuthorizationId, 'returnId');
export const partsListIdSchema = idOf(toPartsListId, 'listId');

export const quantitySchema = z
  .number()
  .int({ message: 'Quantity must be a whole number' })
  .positive({ message: 'Quantity must be > 0' });

export const unitCostSchema = z.number().finite().min(0, { message: 'Unit cost must be >= 0' });

const optionalText = z.string().trim().min(1).optional();

// ---------------------------------------------------------------------------
// Movement operations
// ---------------------------------------------------------------------------

const receiveItemBase = {
  orderItemId: orderItemIdSchema,
  quantity: quantitySchema,
};

export const receiveItemSchema = z.discriminatedUnion('allocation', [
  z.object({ ...receiveItemBase, allocation: z.literal('warehouse') }),
  z.object({ ...receiveItemBase, allocation: z.literal('truck'), targetId: truckIdSchema }),
  z.object({ ...receiveItemBase, allocation: z.literal('job'), targetId: jobIdSchema }),
]);

export const receiveOrderItemsSchema = z.object({
  orderId: orderIdSchema,
  items: z.array(receiveItemSchema).min(1, { message: 'At least one item is required' }),
});

export const createTransferSchema = z.object({
  partId: partIdSchema,
  truckId: truckIdSchema,
  quantity: quantitySchema,
  supplierId: supplierIdSchema.nullish(),
});

export const consumeFromTruckSchema = z.object({
  truckId: truckIdSchema,
  jobId: jobIdSchema,
  partId: partIdSchema,
  quantity: quantitySchema,
});

export const returnToWarehouseSchema = z.object({
  truckId: truckIdSchema,
  partId: partIdSchema,
  quantity: quantitySchema,
});

export const returnItemSchema = z.object({
  partId: partIdSchema,
  quantity: quantitySchema,
  // Omitted: the latest known unit cost of the part is used
  unitCost: unitCostSchema.optional(),
});

export const createReturnSchema = z.object({
  supplierId: supplierIdSchema,
  reason: z.enum(RETURN_REASONS),
  items: z.array(returnItemSchema).min(1, { message: 'At least one item is required' }),
  relatedOrderId: orderIdSchema.nullish(),
  notes: optionalText,
});

export const returnStatusUpdateSchema = z.object({
  returnId: returnIdSchema,
  status: z.enum(RETURN_STATUSES),
  creditAmount: unitCostSchema.optional(),
});

export const movementFilterSchema = z
  .object({
    partId: partIdSchema,
    kind: z.enum(MOVEMENT_KINDS),
    orderId: orderIdSchema,
    returnId: returnIdSchema,
    limit: z.number().int().positive().max(1000),
  })
  .partial();

// ---------------------------------------------------------------------------
// Purchasing
// ---------------------------------------------------------------------------

export const createPurchaseOrderSchema = z.object({
  supplierId: supplierIdSchema,
  orderNumber: optionalText,
  notes: optionalText,
});

export const addOrderItemSchema = z.object({
  orderId: orderIdSchema,
  partId: partIdSchema,
  quantityOrdered: quantitySchema,
  unitCost: unitCostSchema,
});

export const purchaseOrderStatusSchema = z.enum(PURCHASE_ORDER_STATUSES);

// ---------------------------------------------------------------------------
// Catalog & planning
// ---------------------------------------------------------------------------

export const createPartSchema = z.object({
  partNumber: z.string().trim().min(1, { message: 'Part number is required' }),
  description: z.string().trim().min(1, { message: 'Description is required' }),
  unitCost: unitCostSchema.default(0),
});

export const createSupplierSchema = z.object({
  name: z.string().trim().min(1, { message: 'Supplier name is required' }),
  contact: optionalText,
});

export const createTruckSchema = z.object({
  truckNumber: z.string().trim().min(1, { message: 'Truck number is required' }),
  name: optionalText,
});

export const createJobSchema = z.object({
  name: z.string().trim().min(1, { message: 'Job name is required' }),
  jobNumber: optionalText,
  customer: optionalText,
});

export const createPartsListSchema = z.object({
  name: z.string().trim().min(1, { message: 'List name is required' }),
  jobId: jobIdSchema.nullish(),
});

export const requiredPartSchema = z.object({
  partId: partIdSchema,
  quantity: quantitySchema,
});

export const requiredPartsSchema = z.array(requiredPartSchema);

export type ReceiveItemInput = z.input<typeof receiveItemSchema>;
export type ReceiveItem = z.output<typeof receiveItemSchema>;
export type ReceiveOrderItemsInput = z.input<typeof receiveOrderItemsSchema>;
export type ReceiveOrderItemsPayload = z.output<typeof receiveOrderItemsSchema>;
export type CreateTransferInput = z.input<typeof createTransferSchema>;
export type CreateTransferPayload = z.output<typeof createTransferSchema>;
export type ConsumeFromTruckInput = z.input<typeof consumeFromTruckSchema>;
export type ConsumeFromTruckPayload = z.output<typeof consumeFromTruckSchema>;
export type ReturnToWarehouseInput = z.input<typeof returnToWarehouseSchema>;
export type ReturnToWarehousePayload = z.output<typeof returnToWarehouseSchema>;
export type ReturnItemPayload = z.output<typeof returnItemSchema>;
export type CreateReturnInput = z.input<typeof createReturnSchema>;
export type CreateReturnPayload = z.output<typeof createReturnSchema>;
export type MovementFilterInput = z.input<typeof movementFilterSchema>;
export type MovementFilter = z.output<typeof movementFilterSchema>;
export type CreatePurchaseOrderInput = z.input<typeof createPurchaseOrderSchema>;
export type CreatePurchaseOrderPayload = z.output<typeof createPurchaseOrderSchema>;
export type AddOrderItemInput = z.input<typeof addOrderItemSchema>;
export type AddOrderItemPayload = z.output<typeof addOrderItemSchema>;
export type CreatePartInput = z.input<typeof createPartSchema>;
export type CreatePartPayload = z.output<typeof createPartSchema>;
export type CreateSupplierInput = z.input<typeof createSupplierSchema>;
export type CreateSupplierPayload = z.output<typeof createSupplierSchema>;
export type CreateTruckInput = z.input<typeof createTruckSchema>;
export type CreateTruckPayload = z.output<typeof createTruckSchema>;
export type CreateJobInput = z.input<typeof createJobSchema>;
export type CreateJobPayload = z.output<typeof createJobSchema>;
export type CreatePartsListInput = z.input<typeof createPartsListSchema>;
export type CreatePartsListPayload = z.output<typeof createPartsListSchema>;
export type RequiredPartInput = z.input<typeof requiredPartSchema>;
export type RequiredPart = z.output<typeof requiredPartSchema>;
