/**
 * Ledger Services - Main Export Index
 * Centralized exports for the ledger core
 */

// Errors
export * from './errors';

// Units of work
export * from './unitOfWork';

// Catalog (parts, suppliers, trucks, jobs)
export * from './catalog.service';

// Ledger Store
export * from './ledgerStore.service';

// Supplier Lineage
export * from './supplierLineage.service';

// Purchase Orders
export * from './purchaseOrder.service';

// Return Authorizations
export * from './returnAuthorization.service';

// Movement Operations
export * from './movement.service';

// Job Parts & Parts Lists
export * from './jobParts.service';
export * from './partsList.service';

// Analytics
export * from './analytics.service';

// Write retries
export * from './retry';

export { parseInput } from './validation';
