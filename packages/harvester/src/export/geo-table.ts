/**
 * GeoTable builders
 *
 * Normalizes raw address records and bus stops into point tables. Coordinates
 * that are not numeric become null (missing), and a row without both
 * coordinates gets a null geometry.
 */

import { point } from '@turf/helpers';
import type { Point } from 'geojson';
import type { RawAddressRecord } from '../core/types.js';
import type { BusStop } from '../bus-stops/types.js';
import type { CellValue, ColumnSpec, GeoRow, GeoTable } from './types.js';

export const LATITUDE_COLUMN = 'LATITUDE';
export const LONGITUDE_COLUMN = 'LONGITUDE';

/** Decimal or scientific notation only; hex, binary and octal literals are not coordinates */
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Coerce a value to a finite number, or null
 */
export function toNumeric(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

function pointGeometry(longitude: number | null, latitude: number | null): Point | null {
  if (longitude === null || latitude === null) return null;
  return point([longitude, latitude]).geometry;
}

/**
 * Build a table from address records
 *
 * Columns are the union of record keys in first-seen order. LATITUDE and
 * LONGITUDE are numeric; every other column is text.
 */
export function buildAddressTable(records: readonly RawAddressRecord[]): GeoTable {
  const columnNames: string[] = [];
  const seen = new Set<string>();

  for (const record of records) {
    for (const name of Object.keys(record)) {
      if (!seen.has(name)) {
        seen.add(name);
        columnNames.push(name);
      }
    }
  }

  const numericColumns = new Set([LATITUDE_COLUMN, LONGITUDE_COLUMN]);
  const columns: ColumnSpec[] = columnNames.map((name) => ({
    name,
    type: numericColumns.has(name) ? 'number' : 'string',
  }));

  const rows: GeoRow[] = records.map((record) => {
    const properties: Record<string, CellValue> = {};
    for (const name of columnNames) {
      properties[name] = numericColumns.has(name) ? toNumeric(record[name]) : toText(record[name]);
    }

    const latitude = toNumeric(record[LATITUDE_COLUMN]);
    const longitude = toNumeric(record[LONGITUDE_COLUMN]);

    return {
      type: 'Feature',
      geometry: pointGeometry(longitude, latitude),
      properties,
    };
  });

  return { crs: 'EPSG:4326', columns, rows };
}

const BUS_STOP_COLUMNS: readonly ColumnSpec[] = [
  { name: 'name', type: 'string' },
  { name: 'wab', type: 'boolean' },
  { name: 'details', type: 'string' },
];

export function buildBusStopTable(stops: readonly BusStop[]): GeoTable {
  const rows: GeoRow[] = stops.map((stop) => ({
    type: 'Feature',
    geometry: pointGeometry(stop.longitude, stop.latitude),
    properties: {
      name: stop.name,
      wab: stop.wab,
      details: stop.details,
    },
  }));

  return { crs: 'EPSG:4326', columns: BUS_STOP_COLUMNS, rows };
}
