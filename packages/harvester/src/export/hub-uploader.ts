/**
 * Dataset uploader for the Hugging Face Hub
 *
 * Uploads one local file into a dataset repository under a deterministic
 * path. The access token comes from the environment and is only required
 * when an upload is actually attempted.
 */

import { readFile } from 'node:fs/promises';
import { uploadFile } from '@huggingface/hub';
import { MissingCredentialError } from '../core/errors.js';
import { createLogger, type LogSink } from '../core/utils/logger.js';
import type { DatasetUploader, UploadReceipt } from './types.js';

export const UPLOAD_TOKEN_ENV = 'HF_TOKEN';

/**
 * Subset of `uploadFile` parameters this module sends
 */
export interface HubUploadParams {
  readonly repo: { readonly type: 'dataset'; readonly name: string };
  readonly file: { readonly path: string; readonly content: Blob };
  readonly accessToken: string;
  readonly commitTitle: string;
}

export type HubUploadFn = (params: HubUploadParams) => Promise<unknown>;

export interface HubUploaderConfig {
  /** "owner/name" of the dataset repository */
  readonly repoId: string;
  readonly accessToken?: string;
}

export class HubDatasetUploader implements DatasetUploader {
  private readonly config: HubUploaderConfig;
  private readonly uploadFn: HubUploadFn;
  private readonly log: LogSink;

  constructor(
    config: HubUploaderConfig,
    uploadFn: HubUploadFn = uploadFile,
    log: LogSink = createLogger({ module: 'hub-uploader' })
  ) {
    this.config = config;
    this.uploadFn = uploadFn;
    this.log = log;
  }

  async upload(localPath: string, pathInRepo: string): Promise<UploadReceipt> {
    const accessToken = this.config.accessToken;
    if (!accessToken) {
      throw new MissingCredentialError(UPLOAD_TOKEN_ENV);
    }

    const content = await readFile(localPath);
    this.log.info('Uploading dataset file', {
      repoId: this.config.repoId,
      pathInRepo,
      bytes: content.byteLength,
    });

    const result = await this.uploadFn({
      repo: { type: 'dataset', name: this.config.repoId },
      file: { path: pathInRepo, content: new Blob([content]) },
      accessToken,
      commitTitle: `Upload ${pathInRepo}`,
    });

    return {
      repoId: this.config.repoId,
      pathInRepo,
      commitUrl: extractCommitUrl(result),
    };
  }
}

function extractCommitUrl(result: unknown): string | undefined {
  if (typeof result !== 'object' || result === null || !('commit' in result)) {
    return undefined;
  }
  const commit = result.commit;
  if (typeof commit !== 'object' || commit === null || !('url' in commit)) {
    return undefined;
  }
  return typeof commit.url === 'string' ? commit.url : undefined;
}
