/**
 * GeoTable builder tests
 */

import { describe, it, expect } from 'vitest';
import { buildAddressTable, buildBusStopTable, toNumeric } from '../../../export/geo-table.js';

describe('toNumeric', () => {
  it('parses numeric strings and passes finite numbers through', () => {
    expect(toNumeric('1.2897')).toBe(1.2897);
    expect(toNumeric(' 103.85 ')).toBe(103.85);
    expect(toNumeric(7)).toBe(7);
  });

  it('maps everything else to null', () => {
    expect(toNumeric('NIL')).toBeNull();
    expect(toNumeric('')).toBeNull();
    expect(toNumeric(Number.NaN)).toBeNull();
    expect(toNumeric(undefined)).toBeNull();
    expect(toNumeric({ lat: 1 })).toBeNull();
  });

  it('accepts decimal and scientific notation only', () => {
    expect(toNumeric('-1.5e2')).toBe(-150);
    expect(toNumeric('.5')).toBe(0.5);
    expect(toNumeric('0x1A')).toBeNull();
    expect(toNumeric('0b11')).toBeNull();
    expect(toNumeric('0o7')).toBeNull();
    expect(toNumeric('Infinity')).toBeNull();
  });
});

describe('buildAddressTable', () => {
  it('unions columns in first-seen order and types the coordinates', () => {
    const table = buildAddressTable([
      { POSTAL: '000001', LATITUDE: '1.30', LONGITUDE: '103.80' },
      { POSTAL: '000002', BUILDING: 'HALL', LATITUDE: '1.31', LONGITUDE: '103.81' },
    ]);

    expect(table.crs).toBe('EPSG:4326');
    expect(table.columns).toEqual([
      { name: 'POSTAL', type: 'string' },
      { name: 'LATITUDE', type: 'number' },
      { name: 'LONGITUDE', type: 'number' },
      { name: 'BUILDING', type: 'string' },
    ]);
    expect(table.rows[0]?.properties).toEqual({
      POSTAL: '000001',
      LATITUDE: 1.3,
      LONGITUDE: 103.8,
      BUILDING: null,
    });
    expect(table.rows[1]?.geometry).toEqual({ type: 'Point', coordinates: [103.81, 1.31] });
  });

  it('keeps a row with unparseable coordinates and gives it no geometry', () => {
    const table = buildAddressTable([{ POSTAL: '000003', LATITUDE: 'NIL', LONGITUDE: '103.9' }]);

    expect(table.rows).toHaveLength(1);
    expect(table.rows[0]?.geometry).toBeNull();
    expect(table.rows[0]?.properties.LATITUDE).toBeNull();
    expect(table.rows[0]?.properties.LONGITUDE).toBe(103.9);
  });

  it('serializes non-string values in text columns as JSON', () => {
    const table = buildAddressTable([{ POSTAL: 18956, TAGS: ['a', 'b'] }]);

    expect(table.rows[0]?.properties).toEqual({ POSTAL: '18956', TAGS: '["a","b"]' });
  });

  it('builds an empty table from no records', () => {
    expect(buildAddressTable([])).toEqual({ crs: 'EPSG:4326', columns: [], rows: [] });
  });
});

describe('buildBusStopTable', () => {
  it('maps each stop to a point row', () => {
    const table = buildBusStopTable([
      { name: '01012', wab: true, details: 'Hotel Test', latitude: 1.2967, longitude: 103.8523 },
    ]);

    expect(table.columns.map((column) => column.name)).toEqual(['name', 'wab', 'details']);
    expect(table.rows).toEqual([
      {
        type: 'Feature',
        geometry: { type: 'Point', coordinates: [103.8523, 1.2967] },
        properties: { name: '01012', wab: true, details: 'Hotel Test' },
      },
    ]);
  });
});
