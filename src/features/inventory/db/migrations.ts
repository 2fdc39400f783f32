/**
 * Ledger schema migrations
 * Append-only list of versioned steps. Each step runs inside its own transaction,
 * is recorded in `schema_migrations`, and is written to be safe to run twice.
 * Never edit a released step; add a new one.
 */

import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up: (sqlite: Database.Database) => void;
}

export function columnExists(sqlite: Database.Database, table: string, column: string): boolean {
  const names = sqlite.prepare('SELECT name FROM pragma_table_info(?)').pluck().all(table);
  return names.some((name) => name === column);
}

function addColumnIfMissing(sqlite: Database.Database, table: string, column: string, definition: string): void {
  if (!columnExists(sqlite, table, column)) {
    sqlite.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
  }
}

export const LEDGER_MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'create_catalog',
    up: (sqlite) => {
      sqlite.exec(`
        CREATE TABLE IF NOT EXISTS parts (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          part_number TEXT NOT NULL UNIQUE,
          description TEXT NOT NULL,
          unit_cost REAL NOT NULL DEFAULT 0,
          created_at TEXT NOT NULL
        );
        CREATE TABLE IF NOT EXISTS suppliers (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          name TEXT NOT NULL UNIQUE,
          contact TEXT,
          created_at TEXT NOT NULL
        );
        CREATE TABLE IF NOT EXISTS trucks (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          truck_number TEXT NOT NULL UNIQUE,
          name TEXT,
          created_at TEXT NOT NULL
        );
        CREATE TABLE IF NOT EXISTS jobs (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          job_number TEXT NOT NULL UNIQUE,
          name TEXT NOT NULL,
          customer TEXT,
          created_at TEXT NOT NULL
        );
      `);
    },
  },
  {
    version: 2,
    name: 'create_ledger',
    up: (sqlite) => {
      sqlite.exec(`
        CREATE TABLE IF NOT EXISTS location_stock (
          part_id INTEGER NOT NULL REFERENCES parts(id),
          location_kind TEXT NOT NULL CHECK (location_kind IN ('warehouse', 'truck', 'job')),
          location_ref INTEGER NOT NULL,
          quantity INTEGER NOT NULL DEFAULT 0 CHECK (quantity >= 0),
          updated_at TEXT NOT NULL,
          PRIMARY KEY (part_id, location_kind, location_ref)
        );
        CREATE TABLE IF NOT EXISTS movements (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          kind TEXT NOT NULL,
          part_id INTEGER NOT NULL REFERENCES parts(id),
          quantity INTEGER NOT NULL CHECK (quantity > 0),
          from_kind TEXT,
          from_ref INTEGER,
          to_kind TEXT,
          to_ref INTEGER,
          supplier_id INTEGER,
          source_order_id INTEGER,
          order_item_id INTEGER,
          return_id INTEGER,
          transfer_status TEXT,
          performed_by TEXT,
          created_at TEXT NOT NULL,
          completed_at TEXT
        );
        CREATE INDEX IF NOT EXISTS idx_movements_part_kind ON movements(part_id, kind);
        CREATE INDEX IF NOT EXISTS idx_movements_destination ON movements(to_kind, to_ref, part_id);
        CREATE INDEX IF NOT EXISTS idx_movements_order ON movements(source_order_id);
        CREATE INDEX IF NOT EXISTS idx_movements_return ON movements(return_id);
        CREATE TABLE IF NOT EXISTS job_parts (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          job_id INTEGER NOT NULL REFERENCES jobs(id),
          part_id INTEGER NOT NULL REFERENCES parts(id),
          quantity_used INTEGER NOT NULL,
          unit_cost_at_use REAL NOT NULL DEFAULT 0,
          assigned_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
        CREATE UNIQUE INDEX IF NOT EXISTS idx_job_parts_job_part ON job_parts(job_id, part_id);
      `);
    },
  },
  {
    version: 3,
    name: 'create_purchasing',
    up: (sqlite) => {
      sqlite.exec(`
        CREATE TABLE IF NOT EXISTS purchase_orders (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          order_number TEXT NOT NULL UNIQUE,
          supplier_id INTEGER NOT NULL REFERENCES suppliers(id),
          status TEXT NOT NULL DEFAULT 'draft',
          notes TEXT,
          submitted_at TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
        CREATE TABLE IF NOT EXISTS purchase_order_items (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          order_id INTEGER NOT NULL REFERENCES purchase_orders(id) ON DELETE CASCADE,
          part_id INTEGER NOT NULL REFERENCES parts(id),
          quantity_ordered INTEGER NOT NULL CHECK (quantity_ordered > 0),
          quantity_received INTEGER NOT NULL DEFAULT 0,
          unit_cost REAL NOT NULL DEFAULT 0
        );
        CREATE INDEX IF NOT EXISTS idx_order_items_order ON purchase_order_items(order_id);
      `);
    },
  },
  {
    version: 4,
    name: 'create_returns',
    up: (sqlite) => {
      sqlite.exec(`
        CREATE TABLE IF NOT EXISTS return_authorizations (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          ra_number TEXT NOT NULL UNIQUE,
          supplier_id INTEGER NOT NULL REFERENCES suppliers(id),
          reason TEXT NOT NULL,
          related_order_id INTEGER,
          status TEXT NOT NULL DEFAULT 'initiated',
          credit_amount REAL NOT NULL DEFAULT 0,
          notes TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL,
          picked_up_at TEXT,
          credit_received_at TEXT
        );
        CREATE TABLE IF NOT EXISTS return_authorization_items (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          return_id INTEGER NOT NULL REFERENCES return_authorizations(id) ON DELETE CASCADE,
          part_id INTEGER NOT NULL REFERENCES parts(id),
          quantity INTEGER NOT NULL CHECK (quantity > 0),
          unit_cost REAL NOT NULL DEFAULT 0
        );
      `);
    },
  },
  {
    version: 5,
    name: 'create_parts_lists',
    up: (sqlite) => {
      sqlite.exec(`
        CREATE TABLE IF NOT EXISTS parts_lists (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          name TEXT NOT NULL,
          job_id INTEGER REFERENCES jobs(id),
          created_at TEXT NOT NULL
        );
        CREATE TABLE IF NOT EXISTS parts_list_items (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          list_id INTEGER NOT NULL REFERENCES parts_lists(id) ON DELETE CASCADE,
          part_id INTEGER NOT NULL REFERENCES parts(id),
          quantity INTEGER NOT NULL CHECK (quantity > 0)
        );
      `);
    },
  },
  {
    version: 6,
    name: 'job_parts_supplier_lineage',
    up: (sqlite) => {
      addColumnIfMissing(sqlite, 'job_parts', 'supplier_id', 'INTEGER');
      // Bind existing job parts to the supplier of their earliest attributed consumption
      sqlite.exec(`
        UPDATE job_parts
        SET supplier_id = (
          SELECT m.supplier_id FROM movements m
          WHERE m.kind = 'consumption'
            AND m.to_kind = 'job'
            AND m.to_ref = job_parts.job_id
            AND m.part_id = job_parts.part_id
            AND m.supplier_id IS NOT NULL
          ORDER BY m.created_at ASC, m.id ASC
          LIMIT 1
        )
        WHERE supplier_id IS NULL;
      `);
    },
  },
  {
    version: 7,
    name: 'movement_unit_cost',
    up: (sqlite) => {
      addColumnIfMissing(sqlite, 'movements', 'unit_cost', 'REAL');
      sqlite.exec(`
        UPDATE movements
        SET unit_cost = (
          SELECT i.unit_cost FROM purchase_order_items i WHERE i.id = movements.order_item_id
        )
        WHERE kind = 'receive' AND unit_cost IS NULL AND order_item_id IS NOT NULL;
      `);
    },
  },
];

export interface MigrationOptions {
  migrations?: readonly Migration[];
  now?: () => string;
}

/**
 * Apply every pending migration in version order.
 * @returns names of the steps applied by this call
 */
export function runMigrations(sqlite: Database.Database, options: MigrationOptions = {}): string[] {
  const migrations = [...(options.migrations ?? LEDGER_MIGRATIONS)].sort((a, b) => a.version - b.version);
  const now = options.now ?? (() => new Date().toISOString());

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    );
  `);

  const applied = new Set(
    sqlite
      .prepare('SELECT version FROM schema_migrations')
      .pluck()
      .all()
      .filter((version): version is number => typeof version === 'number')
  );

  const record = sqlite.prepare('INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)');
  const ran: string[] = [];

  for (const migration of migrations) {
    if (applied.has(migration.version)) continue;
    const apply = sqlite.transaction(() => {
      migration.up(sqlite);
      record.run(migration.version, migration.name, now());
    });
    apply();
    ran.push(migration.name);
  }

  return ran;
}
