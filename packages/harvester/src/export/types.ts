/**
 * Export Types
 *
 * A GeoTable is an in-memory table of point features in EPSG:4326 with a
 * declared column schema. Writers persist it; uploaders hand the file to the
 * remote dataset store.
 */

import type { Feature, Point } from 'geojson';

export type ColumnType = 'string' | 'number' | 'boolean';

export type CellValue = string | number | boolean | null;

export interface ColumnSpec {
  readonly name: string;
  readonly type: ColumnType;
}

export type GeoRow = Feature<Point | null, Readonly<Record<string, CellValue>>>;

export interface GeoTable {
  readonly crs: 'EPSG:4326';
  readonly columns: readonly ColumnSpec[];
  readonly rows: readonly GeoRow[];
}

export interface WrittenFile {
  readonly path: string;
  readonly rows: number;
  readonly bytes: number;
}

export interface TableWriter {
  write(table: GeoTable, filePath: string): Promise<WrittenFile>;
}

export interface UploadReceipt {
  readonly repoId: string;
  readonly pathInRepo: string;
  readonly commitUrl?: string;
}

export interface DatasetUploader {
  upload(localPath: string, pathInRepo: string): Promise<UploadReceipt>;
}

/**
 * Where an export lands, locally and remotely
 */
export interface ExportTarget {
  readonly fileName: string;
  readonly pathInRepo: string;
}

export interface ExportReceipt {
  readonly file: WrittenFile;
  /** null when uploads are disabled */
  readonly upload: UploadReceipt | null;
}

/**
 * Narrow collaborator interface used by the harvest drivers
 */
export interface DatasetExporter {
  export(table: GeoTable, target: ExportTarget): Promise<ExportReceipt>;
}
