/**
 * Parts Lists
 * Planned requirements for a job, checked against warehouse stock by analytics.
 */

import { asc, eq } from 'drizzle-orm';
import type { LedgerDatabase, LedgerExecutor } from '@/lib/database';
import { parts, partsListItems, partsLists } from '../../db/schema';
import type { PartsListRow } from '../../db/schema';
import { toJobId, toOptionalId, toPartId, toPartsListId } from '../../types/ledger.types';
import type { PartsList, PartsListDetail, PartsListId, PartsListItem, PartsListItemView } from '../../types/ledger.types';
import { createPartsListSchema, requiredPartSchema } from '../../types/schemas';
import type { CreatePartsListInput, RequiredPartInput } from '../../types/schemas';
import { NotFoundError } from './errors';
import { requireJob, requirePart } from './catalog.service';
import { parseInput } from './validation';
import { runRead, runWrite } from './unitOfWork';
import type { WriteOptions } from './unitOfWork';

const toPartsList = (row: PartsListRow): PartsList => ({
  id: toPartsListId(row.id),
  name: row.name,
  jobId: toOptionalId(row.jobId, toJobId),
  createdAt: row.createdAt,
});

export function requirePartsList(tx: LedgerExecutor, listId: PartsListId): PartsList {
  const row = tx.select().from(partsLists).where(eq(partsLists.id, listId)).get();
  if (!row) throw new NotFoundError('Parts list', listId);
  return toPartsList(row);
}

export function getPartsListItems(tx: LedgerExecutor, listId: PartsListId): PartsListItemView[] {
  return tx
    .select({ item: partsListItems, partNumber: parts.partNumber })
    .from(partsListItems)
    .innerJoin(parts, eq(partsListItems.partId, parts.id))
    .where(eq(partsListItems.listId, listId))
    .orderBy(asc(partsListItems.id))
    .all()
    .map(({ item, partNumber }) => ({
      id: item.id,
      listId: toPartsListId(item.listId),
      partId: toPartId(item.partId),
      quantity: item.quantity,
      partNumber,
    }));
}

export function createPartsList(db: LedgerDatabase, input: CreatePartsListInput, options: WriteOptions = {}): PartsList {
  const payload = parseInput(createPartsListSchema, input, 'parts list');
  return runWrite(db, options, ({ tx, timestamp }) => {
    const jobId = payload.jobId ? requireJob(tx, payload.jobId).id : null;
    const row = tx.insert(partsLists).values({ name: payload.name, jobId, createdAt: timestamp }).returning().get();
    return toPartsList(row);
  });
}

export function addPartsListItem(
  db: LedgerDatabase,
  listId: PartsListId,
  input: RequiredPartInput,
  options: WriteOptions = {}
): PartsListItem {
  const payload = parseInput(requiredPartSchema, input, 'parts list item');
  return runWrite(db, options, ({ tx }) => {
    requirePartsList(tx, listId);
    requirePart(tx, payload.partId);
    const row = tx
      .insert(partsListItems)
      .values({ listId, partId: payload.partId, quantity: payload.quantity })
      .returning()
      .get();
    return { id: row.id, listId, partId: payload.partId, quantity: row.quantity };
  });
}

export function getPartsList(db: LedgerDatabase, listId: PartsListId): PartsListDetail {
  return runRead(db, (tx) => ({ ...requirePartsList(tx, listId), items: getPartsListItems(tx, listId) }));
}
