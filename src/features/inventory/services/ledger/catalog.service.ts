/**
 * Catalog Service
 * Parts, suppliers, trucks and jobs. Pure identity data; quantities live in the ledger store.
 */

import { asc, eq, like } from 'drizzle-orm';
import type { LedgerDatabase, LedgerExecutor } from '@/lib/database';
import { jobs, parts, suppliers, trucks } from '../../db/schema';
import type { JobRow, PartRow, SupplierRow, TruckRow } from '../../db/schema';
import {
  createJobSchema,
  createPartSchema,
  createSupplierSchema,
  createTruckSchema,
} from '../../types/schemas';
import type { CreateJobInput, CreatePartInput, CreateSupplierInput, CreateTruckInput } from '../../types/schemas';
import { toJobId, toPartId, toSupplierId, toTruckId } from '../../types/ledger.types';
import type { Job, JobId, Part, PartId, Supplier, SupplierId, Truck, TruckId } from '../../types/ledger.types';
import { documentNumberPattern, nextDocumentNumber } from '../../utils/documentNumbers';
import { LedgerValidationError, NotFoundError } from './errors';
import { parseInput } from './validation';
import { runRead, runWrite } from './unitOfWork';
import type { WriteOptions } from './unitOfWork';

// ---------------------------------------------------------------------------
// Row mappers
// ---------------------------------------------------------------------------

export const toPart = (row: PartRow): Part => ({
  id: toPartId(row.id),
  partNumber: row.partNumber,
  description: row.description,
  unitCost: row.unitCost,
  createdAt: row.createdAt,
});

export const toSupplier = (row: SupplierRow): Supplier => ({
  id: toSupplierId(row.id),
  name: row.name,
  contact: row.contact,
  createdAt: row.createdAt,
});

export const toTruck = (row: TruckRow): Truck => ({
  id: toTruckId(row.id),
  truckNumber: row.truckNumber,
  name: row.name,
  createdAt: row.createdAt,
});

export const toJob = (row: JobRow): Job => ({
  id: toJobId(row.id),
  jobNumber: row.jobNumber,
  name: row.name,
  customer: row.customer,
  createdAt: row.createdAt,
});

// ---------------------------------------------------------------------------
// Lookups used inside units of work
// ---------------------------------------------------------------------------

export function requirePart(tx: LedgerExecutor, partId: PartId): Part {
  const row = tx.select().from(parts).where(eq(parts.id, partId)).get();
  if (!row) throw new NotFoundError('Part', partId);
  return toPart(row);
}

export function requireSupplier(tx: LedgerExecutor, supplierId: SupplierId): Supplier {
  const row = tx.select().from(suppliers).where(eq(suppliers.id, supplierId)).get();
  if (!row) throw new NotFoundError('Supplier', supplierId);
  return toSupplier(row);
}

export function requireTruck(tx: LedgerExecutor, truckId: TruckId): Truck {
  const row = tx.select().from(trucks).where(eq(trucks.id, truckId)).get();
  if (!row) throw new NotFoundError('Truck', truckId);
  return toTruck(row);
}

export function requireJob(tx: LedgerExecutor, jobId: JobId): Job {
  const row = tx.select().from(jobs).where(eq(jobs.id, jobId)).get();
  if (!row) throw new NotFoundError('Job', jobId);
  return toJob(row);
}

// ---------------------------------------------------------------------------
// Parts
// ---------------------------------------------------------------------------

export function createPart(db: LedgerDatabase, input: CreatePartInput, options: WriteOptions = {}): Part {
  const payload = parseInput(createPartSchema, input, 'part');
  return runWrite(db, options, ({ tx, timestamp }) => {
    const existing = tx.select({ id: parts.id }).from(parts).where(eq(parts.partNumber, payload.partNumber)).get();
    if (existing) {
      throw new LedgerValidationError(`Part number ${payload.partNumber} already exists`);
    }
    const row = tx
      .insert(parts)
      .values({ ...payload, createdAt: timestamp })
      .returning()
      .get();
    return toPart(row);
  });
}

export function getPart(db: LedgerDatabase, partId: PartId): Part {
  return runRead(db, (tx) => requirePart(tx, partId));
}

export function getPartByNumber(db: LedgerDatabase, partNumber: string): Part | null {
  const row = db.orm.select().from(parts).where(eq(parts.partNumber, partNumber.trim())).get();
  return row ? toPart(row) : null;
}

export function listParts(db: LedgerDatabase): Part[] {
  return db.orm.select().from(parts).orderBy(asc(parts.partNumber)).all().map(toPart);
}

// ---------------------------------------------------------------------------
// Suppliers
// ---------------------------------------------------------------------------

export function createSupplier(db: LedgerDatabase, input: CreateSupplierInput, options: WriteOptions = {}): Supplier {
  const payload = parseInput(createSupplierSchema, input, 'supplier');
  return runWrite(db, options, ({ tx, timestamp }) => {
    const existing = tx.select({ id: suppliers.id }).from(suppliers).where(eq(suppliers.name, payload.name)).get();
    if (existing) {
      throw new LedgerValidationError(`Supplier ${payload.name} already exists`);
    }
    const row = tx
      .insert(suppliers)
      .values({ name: payload.name, contact: payload.contact ?? null, createdAt: timestamp })
      .returning()
      .get();
    return toSupplier(row);
  });
}

export function getSupplier(db: LedgerDatabase, supplierId: SupplierId): Supplier {
  return runRead(db, (tx) => requireSupplier(tx, supplierId));
}

export function listSuppliers(db: LedgerDatabase): Supplier[] {
  return db.orm.select().from(suppliers).orderBy(asc(suppliers.name)).all().map(toSupplier);
}

// ---------------------------------------------------------------------------
// Trucks
// ---------------------------------------------------------------------------

export function createTruck(db: LedgerDatabase, input: CreateTruckInput, options: WriteOptions = {}): Truck {
  const payload = parseInput(createTruckSchema, input, 'truck');
  return runWrite(db, options, ({ tx, timestamp }) => {
    const existing = tx
      .select({ id: trucks.id })
      .from(trucks)
      .where(eq(trucks.truckNumber, payload.truckNumber))
      .get();
    if (existing) {
      throw new LedgerValidationError(`Truck number ${payload.truckNumber} already exists`);
    }
    const row = tx
      .insert(trucks)
      .values({ truckNumber: payload.truckNumber, name: payload.name ?? null, createdAt: timestamp })
      .returning()
      .get();
    return toTruck(row);
  });
}

export function getTruck(db: LedgerDatabase, truckId: TruckId): Truck {
  return runRead(db, (tx) => requireTruck(tx, truckId));
}

export function listTrucks(db: LedgerDatabase): Truck[] {
  return db.orm.select().from(trucks).orderBy(asc(trucks.truckNumber)).all().map(toTruck);
}

// ---------------------------------------------------------------------------
// Jobs
// ---------------------------------------------------------------------------

export function createJob(db: LedgerDatabase, input: CreateJobInput, options: WriteOptions = {}): Job {
  const payload = parseInput(createJobSchema, input, 'job');
  return runWrite(db, options, ({ tx, timestamp }) => {
    let jobNumber = payload.jobNumber;
    if (jobNumber === undefined) {
      const year = Number(timestamp.slice(0, 4));
      const issued = tx
        .select({ jobNumber: jobs.jobNumber })
        .from(jobs)
        .where(like(jobs.jobNumber, documentNumberPattern('JOB', year)))
        .all()
        .map((row) => row.jobNumber);
      jobNumber = nextDocumentNumber('JOB', year, issued);
    }

    const existing = tx.select({ id: jobs.id }).from(jobs).where(eq(jobs.jobNumber, jobNumber)).get();
    if (existing) {
      throw new LedgerValidationError(`Job number ${jobNumber} already exists`);
    }

    const row = tx
      .insert(jobs)
      .values({ jobNumber, name: payload.name, customer: payload.customer ?? null, createdAt: timestamp })
      .returning()
      .get();
    return toJob(row);
  });
}

export function getJob(db: LedgerDatabase, jobId: JobId): Job {
  return runRead(db, (tx) => requireJob(tx, jobId));
}

export function listJobs(db: LedgerDatabase): Job[] {
  return db.orm.select().from(jobs).orderBy(asc(jobs.jobNumber)).all().map(toJob);
}
