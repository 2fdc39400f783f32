export * from './features/inventory/types';
export * from './features/inventory/services/ledger';
export * from './features/inventory/services/capabilities';
export * from './features/inventory/services/ledgerEngine';
export { configureTelemetry, consoleSink, telemetry } from './features/inventory/services/telemetry';
export type { TelemetryData, TelemetrySink } from './features/inventory/services/telemetry';
export { LedgerEvent, LedgerEventBus, ledgerEvents } from './features/inventory/utils/ledgerEvents';
export type {
  LedgerEventPayload,
  LedgerEventType,
  MovementRecordedEvent,
  OrderStatusChangedEvent,
  ReturnStatusChangedEvent,
} from './features/inventory/utils/ledgerEvents';
export { formatDocumentNumber, nextDocumentNumber, parseDocumentNumber } from './features/inventory/utils/documentNumbers';
export { LEDGER_MIGRATIONS, runMigrations } from './features/inventory/db/migrations';
export type { Migration } from './features/inventory/db/migrations';
export { closeLedgerDatabase, openLedgerDatabase, systemClock } from './lib/database';
export type { Clock, LedgerDatabase, LedgerExecutor, OpenLedgerOptions } from './lib/database';
export { loadLedgerConfig, parseLedgerConfig, resetLedgerConfig } from './lib/config';
export type { LedgerConfig } from './lib/config';
