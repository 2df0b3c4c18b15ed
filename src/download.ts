/**
 * File Downloader
 * Layer: infra
 *
 * Provided ports:
 *   - download.file
 *
 * Streams an HTTP response body to disk.
 */

import * as fs from 'fs';
import * as core from '@actions/core';
import { DOWNLOAD_CHUNK_SIZE } from './types';
import { getConfig } from './config';

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

export class DownloadError extends Error {
  constructor(
    message: string,
    readonly url: string,
    /** HTTP status, when the server answered */
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'DownloadError';
  }
}

// -----------------------------------------------------------------------------
// Port: download.file
// -----------------------------------------------------------------------------

export interface DownloadOptions {
  /** Request timeout (default: STAGE_CONSOLE_DOWNLOAD_TIMEOUT_MS) */
  timeoutMs?: number;
}

/**
 * Downloads `url` to `destination`.
 *
 * @returns the destination path
 * @throws DownloadError on a non-2xx status, a missing body or a timeout
 *   (before or during the body). Filesystem errors propagate as-is.
 */
export async function downloadFile(
  url: string,
  destination: string,
  options: DownloadOptions = {},
): Promise<string> {
  const timeoutMs = options.timeoutMs ?? getConfig().download_timeout_ms;

  // The timeout covers the whole transfer, body included
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { signal: controller.signal, method: 'GET' });

    if (!response.ok) {
      await response.body?.cancel();
      const statusText = response.statusText || 'Unknown error';
      throw new DownloadError(`HTTP ${response.status}: ${statusText}`, url, response.status);
    }
    if (!response.body) {
      throw new DownloadError('Response has no body', url, response.status);
    }

    const bytes = await writeStream(response.body.getReader(), destination);
    core.info(`Downloaded ${url} to ${destination} (${bytes} bytes)`);
    return destination;
  } catch (err: unknown) {
    if (controller.signal.aborted && !(err instanceof DownloadError)) {
      throw new DownloadError(
        `Request timeout: ${url} did not complete within ${timeoutMs}ms`,
        url,
      );
    }
    throw err;
  } finally {
    clearTimeout(timeoutId);
  }
}

interface ChunkReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
}

/**
 * Writes every chunk from the reader in slices of at most
 * DOWNLOAD_CHUNK_SIZE bytes, skipping empty chunks.
 * A transfer that fails part way removes the partial file.
 * Returns the number of bytes written.
 */
async function writeStream(reader: ChunkReader, destination: string): Promise<number> {
  const handle = await fs.promises.open(destination, 'w');
  let total = 0;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      if (!value) continue;
      for (let offset = 0; offset < value.byteLength; offset += DOWNLOAD_CHUNK_SIZE) {
        const slice = value.subarray(offset, offset + DOWNLOAD_CHUNK_SIZE);
        await handle.write(slice);
        total += slice.byteLength;
      }
    }
  } catch (err: unknown) {
    await handle.close();
    await fs.promises.rm(destination, { force: true });
    throw err;
  }
  await handle.close();
  return total;
}
