/**
 * GeoParquet Writer
 *
 * Persists a GeoTable as a GeoParquet 1.0 file: one optional Parquet column
 * per table column, a WKB-encoded `geometry` column, and the `geo` file
 * metadata declaring the primary geometry column and its CRS (EPSG:4326).
 */

import { mkdir, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import wkx from 'wkx';
import type { Point } from 'geojson';
import { EPSG_4326_PROJJSON } from './crs.js';
import type { CellValue, ColumnType, GeoTable, TableWriter, WrittenFile } from './types.js';

export const GEOMETRY_COLUMN = 'geometry';

type ParquetPrimitive = 'UTF8' | 'DOUBLE' | 'BOOLEAN' | 'BYTE_ARRAY';

const PARQUET_TYPES: Record<ColumnType, ParquetPrimitive> = {
  string: 'UTF8',
  number: 'DOUBLE',
  boolean: 'BOOLEAN',
};

/**
 * GeoParquet `geo` metadata document
 */
export interface GeoParquetMetadata {
  readonly version: '1.0.0';
  readonly primary_column: string;
  readonly columns: Record<
    string,
    {
      readonly encoding: 'WKB';
      readonly geometry_types: readonly string[];
      readonly crs: typeof EPSG_4326_PROJJSON;
      readonly bbox?: readonly [number, number, number, number];
    }
  >;
}

/**
 * [minLon, minLat, maxLon, maxLat] over non-null points, or undefined
 */
export function computeBounds(
  geometries: ReadonlyArray<Point | null>
): [number, number, number, number] | undefined {
  let bounds: [number, number, number, number] | undefined;

  for (const geometry of geometries) {
    if (!geometry) continue;
    const [x, y] = geometry.coordinates;
    if (!bounds) {
      bounds = [x, y, x, y];
      continue;
    }
    bounds = [
      Math.min(bounds[0], x),
      Math.min(bounds[1], y),
      Math.max(bounds[2], x),
      Math.max(bounds[3], y),
    ];
  }

  return bounds;
}

export function buildGeoMetadata(table: GeoTable): GeoParquetMetadata {
  const bbox = computeBounds(table.rows.map((row) => row.geometry));

  return {
    version: '1.0.0',
    primary_column: GEOMETRY_COLUMN,
    columns: {
      [GEOMETRY_COLUMN]: {
        encoding: 'WKB',
        geometry_types: ['Point'],
        crs: EPSG_4326_PROJJSON,
        ...(bbox ? { bbox } : {}),
      },
    },
  };
}

/**
 * Encode a GeoJSON point as ISO WKB
 */
export function encodePointWkb(geometry: Point): Buffer {
  const [x, y] = geometry.coordinates;
  return new wkx.Point(x, y).toWkb();
}

export class GeoParquetWriter implements TableWriter {
  async write(table: GeoTable, filePath: string): Promise<WrittenFile> {
    if (table.columns.some((column) => column.name === GEOMETRY_COLUMN)) {
      throw new Error(`Column name '${GEOMETRY_COLUMN}' is reserved for the point geometry`);
    }

    const fields: Record<string, { type: ParquetPrimitive; optional: true }> = {};
    for (const column of table.columns) {
      fields[column.name] = { type: PARQUET_TYPES[column.type], optional: true };
    }
    fields[GEOMETRY_COLUMN] = { type: 'BYTE_ARRAY', optional: true };

    await mkdir(dirname(filePath), { recursive: true });

    const writer = await ParquetWriter.openFile(new ParquetSchema(fields), filePath);
    writer.setMetadata('geo', JSON.stringify(buildGeoMetadata(table)));

    try {
      for (const row of table.rows) {
        // Missing values are left out of the row; every column is optional
        const record: Record<string, Exclude<CellValue, null> | Buffer> = {};
        for (const column of table.columns) {
          const value = row.properties[column.name];
          if (value !== null && value !== undefined) {
            record[column.name] = value;
          }
        }
        if (row.geometry) {
          record[GEOMETRY_COLUMN] = encodePointWkb(row.geometry);
        }
        await writer.appendRow(record);
      }
    } finally {
      await writer.close();
    }

    const { size } = await stat(filePath);
    return { path: filePath, rows: table.rows.length, bytes: size };
  }
}
