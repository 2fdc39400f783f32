/**
 * Ledger error hierarchy
 * Every failure raised by a ledger operation is a LedgerError with a stable `code`.
 * Domain errors abort the surrounding transaction; nothing is partially committed.
 */

import type { ZodError } from 'zod';
import type { StockLocation, SupplierId } from '../../types/ledger.types';
import { describeLocation } from '../../types/ledger.types';

export type LedgerErrorCode =
  | 'INSUFFICIENT_STOCK'
  | 'NEGATIVE_STOCK'
  | 'SUPPLIER_CONFLICT'
  | 'INVALID_STATE'
  | 'NOT_FOUND'
  | 'VALIDATION'
  | 'OVER_RECEIVE_LIMIT'
  | 'PERMISSION_DENIED';

export class LedgerError extends Error {
  constructor(
    message: string,
    public readonly code: LedgerErrorCode,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'LedgerError';
  }
}

export class InsufficientStockError extends LedgerError {
  constructor(
    public readonly partId: number,
    public readonly location: StockLocation,
    public readonly requested: number,
    public readonly available: number
  ) {
    super(
      `Insufficient stock for part ${partId} at ${describeLocation(location)}: requested ${requested}, available ${available}`,
      'INSUFFICIENT_STOCK',
      { partId, location, requested, available }
    );
    this.name = 'InsufficientStockError';
  }
}

/** Internal guard: an adjustment would have driven a stock row below zero */
export class NegativeStockError extends LedgerError {
  constructor(
    public readonly partId: number,
    public readonly location: StockLocation,
    public readonly current: number,
    public readonly delta: number
  ) {
    super(
      `Stock for part ${partId} at ${describeLocation(location)} would become negative (${current} ${delta < 0 ? '-' : '+'} ${Math.abs(delta)})`,
      'NEGATIVE_STOCK',
      { partId, location, current, delta }
    );
    this.name = 'NegativeStockError';
  }
}

export class SupplierConflictError extends LedgerError {
  constructor(
    public readonly partId: number,
    public readonly jobId: number,
    public readonly existingSupplierId: SupplierId,
    public readonly attemptedSupplierId: SupplierId
  ) {
    super(
      `Part ${partId} on job ${jobId} is already sourced from supplier ${existingSupplierId}; cannot add stock from supplier ${attemptedSupplierId}`,
      'SUPPLIER_CONFLICT',
      { partId, jobId, existingSupplierId, attemptedSupplierId }
    );
    this.name = 'SupplierConflictError';
  }
}

export class InvalidStateError extends LedgerError {
  constructor(
    public readonly entity: string,
    public readonly entityId: number,
    public readonly currentState: string,
    public readonly attempted: string
  ) {
    super(`Cannot ${attempted} ${entity} ${entityId} while it is ${currentState}`, 'INVALID_STATE', {
      entity,
      entityId,
      currentState,
      attempted,
    });
    this.name = 'InvalidStateError';
  }
}

export class NotFoundError extends LedgerError {
  constructor(
    public readonly entity: string,
    public readonly entityId: number | string
  ) {
    super(`${entity} ${entityId} not found`, 'NOT_FOUND', { entity, entityId });
    this.name = 'NotFoundError';
  }
}

export class LedgerValidationError extends LedgerError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'VALIDATION', { issues });
    this.name = 'LedgerValidationError';
  }

  static fromZod(error: ZodError, context: string): LedgerValidationError {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return new LedgerValidationError(`Invalid ${context}: ${issues.join('; ')}`, issues);
  }
}

export class OverReceiveLimitError extends LedgerError {
  constructor(
    public readonly orderItemId: number,
    public readonly quantityOrdered: number,
    public readonly wouldReceive: number,
    public readonly maxPercent: number
  ) {
    super(
      `Receiving order item ${orderItemId} up to ${wouldReceive} exceeds ${quantityOrdered} ordered by more than ${maxPercent}%`,
      'OVER_RECEIVE_LIMIT',
      { orderItemId, quantityOrdered, wouldReceive, maxPercent }
    );
    this.name = 'OverReceiveLimitError';
  }
}

export class PermissionDeniedError extends LedgerError {
  constructor(
    public readonly capability: string,
    public readonly actor: string | null
  ) {
    super(`${actor ?? 'Caller'} lacks the ${capability} capability`, 'PERMISSION_DENIED', { capability, actor });
    this.name = 'PermissionDeniedError';
  }
}

export const isLedgerError = (error: unknown): error is LedgerError => error instanceof LedgerError;

const RETRIABLE_SQLITE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_LOCKED']);

/**
 * Transient lock contention reported by better-sqlite3 (SqliteError carries `code`).
 * Domain errors are never retriable.
 */
export function isRetriableDatabaseError(error: unknown): boolean {
  if (isLedgerError(error)) return false;
  if (typeof error !== 'object' || error === null || !('code' in error)) return false;
  const { code } = error;
  return typeof code === 'string' && RETRIABLE_SQLITE_CODES.has(code);
}

/** SQLite unique-constraint violation (duplicate part number, order number...) */
export function isUniqueViolation(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) return false;
  const { code } = error;
  return code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}
