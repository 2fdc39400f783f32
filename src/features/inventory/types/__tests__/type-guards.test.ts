import { describe, it, expect } from 'vitest';
import {
  decodeLocation,
  describeLocation,
  encodeLocation,
  isJobId,
  isMovementId,
  isPartId,
  isSupplierId,
  isTruckId,
  Locations,
  toJobId,
  toOptionalId,
  toPartId,
  toSupplierId,
  toTruckId,
} from '../ledger.types';

/**
 * Testes unitários para type guards de Branded Types.
 * Regras resumidas:
 * - Todos os IDs são inteiros SQLite positivos
 * - toXxxId lança erro para valores inválidos
 * - Locais: warehouse usa ref 0, truck/job usam o próprio id
 */

describe('isPartId / isSupplierId / isTruckId / isJobId / isMovementId', () => {
  it('deve aceitar inteiros positivos', () => {
    expect(isPartId(1)).toBe(true);
    expect(isSupplierId(42)).toBe(true);
    expect(isTruckId(7)).toBe(true);
    expect(isJobId(1000)).toBe(true);
    expect(isMovementId(3)).toBe(true);
  });

  it('deve rejeitar zero, negativos e não inteiros', () => {
    expect(isPartId(0)).toBe(false);
    expect(isPartId(-1)).toBe(false);
    expect(isPartId(1.5)).toBe(false);
    expect(isPartId(Number.NaN)).toBe(false);
  });

  it('deve rejeitar valores que não são número', () => {
    expect(isPartId('1')).toBe(false);
    expect(isSupplierId(null)).toBe(false);
    expect(isTruckId(undefined)).toBe(false);
    expect(isJobId({})).toBe(false);
  });
});

describe('toPartId / toSupplierId', () => {
  it('deve devolver o mesmo número quando válido', () => {
    expect(toPartId(5)).toBe(5);
    expect(toSupplierId(12)).toBe(12);
  });

  it('deve lançar erro com o rótulo do tipo', () => {
    expect(() => toPartId(0)).toThrow('Invalid PartId: expected a positive integer, received 0');
    expect(() => toSupplierId(-3)).toThrow('Invalid SupplierId: expected a positive integer, received -3');
  });
});

describe('toOptionalId', () => {
  it('deve manter null', () => {
    expect(toOptionalId(null, toSupplierId)).toBeNull();
  });

  it('deve converter valores presentes', () => {
    expect(toOptionalId(9, toSupplierId)).toBe(9);
  });

  it('deve validar valores presentes', () => {
    expect(() => toOptionalId(0, toSupplierId)).toThrow('Invalid SupplierId');
  });
});

describe('encodeLocation / decodeLocation', () => {
  it('warehouse usa ref 0', () => {
    expect(encodeLocation(Locations.warehouse)).toEqual({ kind: 'warehouse', ref: 0 });
    expect(decodeLocation('warehouse', 0)).toEqual({ kind: 'warehouse' });
  });

  it('truck e job usam o próprio id', () => {
    expect(encodeLocation(Locations.truck(toTruckId(4)))).toEqual({ kind: 'truck', ref: 4 });
    expect(encodeLocation(Locations.job(toJobId(8)))).toEqual({ kind: 'job', ref: 8 });
    expect(decodeLocation('truck', 4)).toEqual({ kind: 'truck', truckId: 4 });
    expect(decodeLocation('job', 8)).toEqual({ kind: 'job', jobId: 8 });
  });

  it('deve devolver null quando não há local', () => {
    expect(decodeLocation(null, null)).toBeNull();
  });

  it('deve rejeitar truck sem referência', () => {
    expect(() => decodeLocation('truck', null)).toThrow('Invalid TruckId');
  });
});

describe('describeLocation', () => {
  it('deve gerar rótulos legíveis', () => {
    expect(describeLocation(Locations.warehouse)).toBe('Warehouse');
    expect(describeLocation(Locations.truck(toTruckId(2)))).toBe('Truck(2)');
    expect(describeLocation(Locations.job(toJobId(3)))).toBe('Job(3)');
  });
});
