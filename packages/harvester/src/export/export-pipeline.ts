/**
 * Export pipeline: write a GeoTable into the output directory, then hand the
 * file to the dataset uploader. Both failures are fatal and surface as
 * ExportError.
 */

import { join } from 'node:path';
import { ExportError, toError } from '../core/errors.js';
import { createLogger, type LogSink } from '../core/utils/logger.js';
import type {
  DatasetExporter,
  DatasetUploader,
  ExportReceipt,
  ExportTarget,
  GeoTable,
  TableWriter,
  WrittenFile,
} from './types.js';

export interface ExportPipelineConfig {
  readonly outputDir: string;
  /** false writes the file and skips the upload */
  readonly upload: boolean;
}

export class ExportPipeline implements DatasetExporter {
  private readonly config: ExportPipelineConfig;
  private readonly writer: TableWriter;
  private readonly uploader: DatasetUploader;
  private readonly log: LogSink;

  constructor(
    config: ExportPipelineConfig,
    writer: TableWriter,
    uploader: DatasetUploader,
    log: LogSink = createLogger({ module: 'export' })
  ) {
    this.config = config;
    this.writer = writer;
    this.uploader = uploader;
    this.log = log;
  }

  async export(table: GeoTable, target: ExportTarget): Promise<ExportReceipt> {
    const filePath = join(this.config.outputDir, target.fileName);

    let file: WrittenFile;
    try {
      file = await this.writer.write(table, filePath);
    } catch (error) {
      throw new ExportError('write', filePath, toError(error));
    }
    this.log.info('Wrote GeoParquet file', { path: file.path, rows: file.rows, bytes: file.bytes });

    if (!this.config.upload) {
      this.log.info('Upload disabled, keeping local file only', { path: file.path });
      return { file, upload: null };
    }

    try {
      const upload = await this.uploader.upload(file.path, target.pathInRepo);
      this.log.info('Uploaded dataset file', { repoId: upload.repoId, pathInRepo: upload.pathInRepo });
      return { file, upload };
    } catch (error) {
      throw new ExportError('upload', file.path, toError(error));
    }
  }
}
