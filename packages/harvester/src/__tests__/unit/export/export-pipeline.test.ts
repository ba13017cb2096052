/**
 * Export pipeline tests
 */

import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { ExportPipeline } from '../../../export/export-pipeline.js';
import { ExportError, MissingCredentialError } from '../../../core/errors.js';
import { buildBusStopTable } from '../../../export/geo-table.js';
import { FakeTableWriter, FakeUploader, RecordingLog } from '../../utils/fakes.js';

const TABLE = buildBusStopTable([
  { name: '01012', wab: true, details: 'Test Stop', latitude: 1.3, longitude: 103.8 },
]);

const TARGET = { fileName: 'bus_stops.parquet', pathInRepo: 'bus_stops.parquet' };

describe('ExportPipeline', () => {
  it('writes into the output directory and uploads the written file', async () => {
    const writer = new FakeTableWriter();
    const uploader = new FakeUploader();
    const pipeline = new ExportPipeline({ outputDir: 'out', upload: true }, writer, uploader, new RecordingLog());

    const receipt = await pipeline.export(TABLE, TARGET);

    expect(writer.writes.map((write) => write.filePath)).toEqual([join('out', 'bus_stops.parquet')]);
    expect(uploader.uploads).toEqual([
      { localPath: join('out', 'bus_stops.parquet'), pathInRepo: 'bus_stops.parquet' },
    ]);
    expect(receipt).toEqual({
      file: { path: join('out', 'bus_stops.parquet'), rows: 1, bytes: 1024 },
      upload: { repoId: 'test-org/test-dataset', pathInRepo: 'bus_stops.parquet' },
    });
  });

  it('skips the upload when disabled', async () => {
    const uploader = new FakeUploader();
    const pipeline = new ExportPipeline(
      { outputDir: 'out', upload: false },
      new FakeTableWriter(),
      uploader,
      new RecordingLog()
    );

    const receipt = await pipeline.export(TABLE, TARGET);

    expect(receipt.upload).toBeNull();
    expect(uploader.uploads).toHaveLength(0);
  });

  it('wraps a write failure and does not upload', async () => {
    const uploader = new FakeUploader();
    const pipeline = new ExportPipeline(
      { outputDir: 'out', upload: true },
      new FakeTableWriter(new Error('disk full')),
      uploader,
      new RecordingLog()
    );

    const error = await pipeline.export(TABLE, TARGET).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExportError);
    if (error instanceof ExportError) {
      expect(error.stage).toBe('write');
      expect(error.message).toBe(`Export write failed for ${join('out', 'bus_stops.parquet')}: disk full`);
      expect(error.cause.message).toBe('disk full');
    }
    expect(uploader.uploads).toHaveLength(0);
  });

  it('wraps an upload failure, including a missing token', async () => {
    const pipeline = new ExportPipeline(
      { outputDir: 'out', upload: true },
      new FakeTableWriter(),
      new FakeUploader(new MissingCredentialError('HF_TOKEN')),
      new RecordingLog()
    );

    const error = await pipeline.export(TABLE, TARGET).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExportError);
    if (error instanceof ExportError) {
      expect(error.stage).toBe('upload');
      expect(error.cause).toBeInstanceOf(MissingCredentialError);
    }
  });
});
