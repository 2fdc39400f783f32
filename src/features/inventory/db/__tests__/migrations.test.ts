import { describe, it, expect } from 'vitest';
import Database from 'better-sqlite3';
import { columnExists, LEDGER_MIGRATIONS, runMigrations } from '../migrations';

const at = () => '2026-01-01T00:00:00.000Z';

const tableExists = (sqlite: Database.Database, name: string) =>
  sqlite.prepare("SELECT count(*) FROM sqlite_master WHERE type = 'table' AND name = ?").pluck().get(name) === 1;

describe('runMigrations', () => {
  it('applies every step once on a new database', () => {
    const sqlite = new Database(':memory:');

    const ran = runMigrations(sqlite, { now: at });

    expect(ran).toEqual(LEDGER_MIGRATIONS.map((migration) => migration.name));
    expect(tableExists(sqlite, 'movements')).toBe(true);
    expect(columnExists(sqlite, 'movements', 'unit_cost')).toBe(true);
    expect(columnExists(sqlite, 'job_parts', 'supplier_id')).toBe(true);
    expect(runMigrations(sqlite, { now: at })).toEqual([]);
    sqlite.close();
  });

  it('backfills lineage and receipt costs when upgrading an older file', () => {
    const sqlite = new Database(':memory:');
    runMigrations(sqlite, { migrations: LEDGER_MIGRATIONS.slice(0, 5), now: at });
    expect(columnExists(sqlite, 'job_parts', 'supplier_id')).toBe(false);

    sqlite.exec(`
      INSERT INTO parts (id, part_number, description, unit_cost, created_at) VALUES (1, 'WP-1', 'Wire', 1, 't');
      INSERT INTO suppliers (id, name, created_at) VALUES (1, 'Supplier one', 't'), (2, 'Supplier two', 't');
      INSERT INTO jobs (id, job_number, name, created_at) VALUES (1, 'JOB-1', 'Job', 't');
      INSERT INTO purchase_orders (id, order_number, supplier_id, status, created_at, updated_at)
        VALUES (1, 'PO-1', 1, 'received', 't', 't');
      INSERT INTO purchase_order_items (id, order_id, part_id, quantity_ordered, quantity_received, unit_cost)
        VALUES (1, 1, 1, 5, 5, 2.5);
      INSERT INTO movements (id, kind, part_id, quantity, to_kind, to_ref, supplier_id, source_order_id, order_item_id, created_at)
        VALUES (1, 'receive', 1, 5, 'warehouse', 0, 1, 1, 1, '2026-01-01T00:00:00.000Z');
      INSERT INTO movements (id, kind, part_id, quantity, to_kind, to_ref, supplier_id, created_at)
        VALUES (2, 'consumption', 1, 1, 'job', 1, 2, '2026-01-02T00:00:00.000Z'),
               (3, 'consumption', 1, 3, 'job', 1, 1, '2026-01-03T00:00:00.000Z');
      INSERT INTO job_parts (job_id, part_id, quantity_used, unit_cost_at_use, assigned_at, updated_at)
        VALUES (1, 1, 4, 2.5, 't', 't');
    `);

    const ran = runMigrations(sqlite, { now: at });

    expect(ran).toEqual(['job_parts_supplier_lineage', 'movement_unit_cost']);
    expect(sqlite.prepare('SELECT supplier_id FROM job_parts WHERE job_id = 1').pluck().get()).toBe(2);
    expect(sqlite.prepare('SELECT unit_cost FROM movements ORDER BY id').pluck().all()).toEqual([2.5, null, null]);
    sqlite.close();
  });

  it('rolls back and does not record a failing step', () => {
    const sqlite = new Database(':memory:');

    expect(() =>
      runMigrations(sqlite, {
        migrations: [
          {
            version: 1,
            name: 'broken_step',
            up: (db) => {
              db.exec('CREATE TABLE scratch (id INTEGER)');
              throw new Error('step failed');
            },
          },
        ],
        now: at,
      })
    ).toThrow('step failed');

    expect(tableExists(sqlite, 'scratch')).toBe(false);
    expect(sqlite.prepare('SELECT count(*) FROM schema_migrations').pluck().get()).toBe(0);
    sqlite.close();
  });
});
