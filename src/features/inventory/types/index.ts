/**
 * Ponto central de exportação de tipos do ledger.
 *   import { PartId, StockLocation } from '@/features/inventory/types';
 */
export * from './ledger.types';
export * from './schemas';
