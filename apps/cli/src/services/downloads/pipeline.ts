/**
 * Download pipeline: resolve the PDF URL, pick a deterministic path under the
 * hub, stream the body to disk, then write the JSON sidecar.
 *
 * The hub directory itself must already exist; only the category folder
 * beneath it is created.
 */

import fs, { promises as fsp } from 'fs';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import type { ReadableStream } from 'stream/web';
import { DownloadError, PaperHubError } from '@paperhub/shared';
import type { PaperRecord } from '@paperhub/shared';
import { createLogger, type Logger } from '../logger';
import { describeError, type HttpTransport } from '../paper-search/http';
import { resolvePdfUrl } from '../paper-search/pdf-url';
import { categoryFolder, pdfFileName, sidecarPath } from './naming';

export const DEFAULT_CHUNK_SIZE = 8192;
export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 20_000;

export interface DownloadDeps {
  transport: Pick<HttpTransport, 'read'>;
  logger?: Logger;
}

export interface PipelineOptions {
  overwrite?: boolean;
  timeoutMs?: number;
  chunkSize?: number;
}

function isDirectory(dir: string): boolean {
  return fs.existsSync(dir) && fs.statSync(dir).isDirectory();
}

async function removeFile(filePath: string, logger: Logger): Promise<void> {
  await fsp.rm(filePath, { force: true }).catch((error: unknown) => {
    logger.warn(`Could not remove partial file ${filePath}: ${describeError(error)}`);
  });
}

/**
 * Copy a response body into a file in chunkSize writes. Returns bytes written.
 * The body is cancelled when the copy stops early.
 */
async function streamToFile(
  body: ReadableStream<unknown> | null,
  filePath: string,
  chunkSize: number,
  logger: Logger
): Promise<number> {
  if (!body) {
    return 0;
  }
  const reader = body.getReader();
  let written = 0;
  let handle: FileHandle | undefined;
  try {
    handle = await fsp.open(filePath, 'w');
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      if (!(value instanceof Uint8Array)) {
        throw new DownloadError('Response body produced a non-binary chunk');
      }
      for (let offset = 0; offset < value.byteLength; offset += chunkSize) {
        const slice = value.subarray(offset, offset + chunkSize);
        await handle.write(slice);
        written += slice.byteLength;
      }
    }
  } catch (error) {
    await reader.cancel(error).catch((cancelError: unknown) => {
      logger.debug(`Could not cancel response body: ${describeError(cancelError)}`);
    });
    throw error;
  } finally {
    await handle?.close();
  }
  return written;
}

async function writeSidecar(record: PaperRecord, pdfPath: string, logger: Logger): Promise<void> {
  const jsonPath = sidecarPath(pdfPath);
  try {
    await fsp.writeFile(jsonPath, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
  } catch (error) {
    logger.warn(`Failed to write metadata sidecar ${jsonPath}: ${describeError(error)}`);
  }
}

/**
 * Download a record's PDF into <destDir>/<CATEGORY>/. Returns the PDF path.
 * An existing file is returned untouched unless overwrite is set.
 */
export async function downloadPaper(
  record: PaperRecord,
  destDir: string,
  options: PipelineOptions,
  deps: DownloadDeps
): Promise<string> {
  const logger = deps.logger ?? createLogger('Downloads');
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new DownloadError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  if (!isDirectory(destDir)) {
    throw new DownloadError(`Destination directory does not exist: ${destDir}`);
  }

  const url = resolvePdfUrl(record);
  if (!url) {
    throw new DownloadError(`No PDF URL could be resolved for ${record.id}`);
  }

  const folder = path.join(destDir, categoryFolder(record));
  const target = path.join(folder, pdfFileName(record));

  if (!options.overwrite && fs.existsSync(target)) {
    logger.info(`Already downloaded: ${target}`);
    return target;
  }

  try {
    await fsp.mkdir(folder, { recursive: true });
  } catch (error) {
    throw new DownloadError(`Could not create ${folder}: ${describeError(error)}`, error);
  }

  logger.info(`Downloading ${url} -> ${target}`);
  // Stream into a side file so a failed overwrite keeps the previous copy.
  // A transport failure mid-body restarts the request and truncates the side file.
  const partPath = `${target}.part`;
  let written: number;
  try {
    written = await deps.transport.read(
      url,
      { timeoutMs: options.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS, label: 'PDF download' },
      (response) => streamToFile(response.body, partPath, chunkSize, logger)
    );
  } catch (error) {
    await removeFile(partPath, logger);
    if (error instanceof PaperHubError) throw error;
    throw new DownloadError(`Failed to write ${target}: ${describeError(error)}`, error);
  }

  if (written === 0) {
    await removeFile(partPath, logger);
    throw new DownloadError(`Empty response body from ${url}`);
  }

  try {
    await fsp.rename(partPath, target);
  } catch (error) {
    await removeFile(partPath, logger);
    throw new DownloadError(`Failed to write ${target}: ${describeError(error)}`, error);
  }

  logger.info(`Saved ${written} bytes to ${target}`);
  await writeSidecar(record, target, logger);
  return target;
}
