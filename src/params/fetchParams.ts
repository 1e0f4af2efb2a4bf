/**
 * Parameter Files
 * Download and SHA-256 verification of large setup files for the shielded provers
 */

import { open, rm } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { basename } from 'path';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex } from '../utils/bytes';

/**
 * Progress in percent, clamped to [1, 99] while work is in flight
 */
export type ProgressCallback = (percent: number, file: string) => void;

export interface VerifyOptions {
  onProgress?: ProgressCallback;
}

export interface FetchOptions {
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

const READ_CHUNK_SIZE = 1 << 20;

export class ParamsError extends Error {
  constructor(message: string, public readonly url?: string) {
    super(message);
    this.name = 'ParamsError';
  }
}

/**
 * Tracks progress for one file and logs every 10% step
 */
class ProgressReporter {
  private reportedStep = 0;

  constructor(
    private readonly action: string,
    private readonly file: string,
    private readonly onProgress?: ProgressCallback
  ) {
    console.log(`[Params] ${action} ${file}...`);
  }

  update(done: number, total: number): void {
    if (done <= 0 || total <= 0) {
      return;
    }
    const percent = Math.max(1, Math.min(99, Math.floor((done / total) * 100)));
    const step = Math.floor(percent / 10);
    if (step > this.reportedStep) {
      console.log(`[Params] ${this.action} ${this.file}: ${percent}%`);
      this.reportedStep = step;
    }
    this.onProgress?.(percent, this.file);
  }

  finish(): void {
    console.log(`[Params] ${this.action} ${this.file}: done`);
  }
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Hash the file at `path` and compare with the expected hex digest.
 * A mismatching file is deleted. A file that cannot be opened or read resolves false.
 */
export async function verifyParams(
  path: string,
  expectedSha256: string,
  options: VerifyOptions = {}
): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    console.warn(`[Params] Could not open ${path}: ${errorMessage(error)}`);
    return false;
  }

  const file = basename(path);
  const hash = sha256.create();
  try {
    const totalBytes = (await handle.stat()).size;
    const progress = new ProgressReporter('Verifying', file, options.onProgress);
    const buffer = new Uint8Array(READ_CHUNK_SIZE);
    let soFar = 0;
    for (;;) {
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, null);
      if (bytesRead === 0) {
        break;
      }
      hash.update(buffer.subarray(0, bytesRead));
      soFar += bytesRead;
      progress.update(soFar, totalBytes);
    }
    progress.finish();
  } catch (error) {
    console.warn(`[Params] Could not read ${path}: ${errorMessage(error)}`);
    return false;
  } finally {
    await handle.close();
  }

  const actual = bytesToHex(hash.digest());
  if (actual !== expectedSha256.toLowerCase()) {
    console.error(`[Params] sha256 checksum mismatch for ${file}: ${actual}`);
    await rm(path, { force: true });
    return false;
  }
  return true;
}

/**
 * Download `url` to `path`, reporting progress from content-length when the server sends it.
 * A download that fails part way cancels the response stream and removes the partial file.
 */
export async function fetchParams(url: string, path: string, options: FetchOptions = {}): Promise<void> {
  const file = basename(path);
  const progress = new ProgressReporter('Downloading', file, options.onProgress);

  const response = await fetch(url, { redirect: 'follow', signal: options.signal });
  if (!response.ok) {
    throw new ParamsError(`HTTP ${response.status} downloading ${url}`, url);
  }
  if (response.body === null) {
    throw new ParamsError(`Empty response body from ${url}`, url);
  }

  const total = Number(response.headers.get('content-length') ?? 0);
  const reader = response.body.getReader();
  const handle = await open(path, 'w');
  try {
    try {
      let received = 0;
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        await handle.write(value);
        received += value.length;
        progress.update(received, total);
      }
    } finally {
      await handle.close();
    }
  } catch (error) {
    console.error(`[Params] Download of ${file} failed: ${errorMessage(error)}`);
    await reader.cancel(error).catch((cancelError: unknown) => {
      console.warn(`[Params] Could not cancel download of ${file}: ${errorMessage(cancelError)}`);
    });
    await rm(path, { force: true });
    throw error;
  }
  progress.finish();
}
