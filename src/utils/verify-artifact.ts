import { stat } from 'fs/promises';
import type { Logger } from 'pino';
import { VerificationError } from './errors.js';

export const MIN_ARTIFACT_BYTES = 100 * 1024;

/**
 * Check that a stage produced a usable file before the next stage consumes it.
 * Missing or empty files fail; suspiciously small ones are only logged.
 * Resolves with the file size in bytes.
 */
export async function verifyArtifact(
  filePath: string,
  label: string,
  logger: Logger,
  minBytes: number = MIN_ARTIFACT_BYTES
): Promise<number> {
  if (!filePath) {
    throw new VerificationError(filePath, `${label}: no file path returned`);
  }

  let size: number;
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new VerificationError(filePath, `${label}: not a regular file: ${filePath}`);
    }
    size = info.size;
  } catch (error) {
    if (error instanceof VerificationError) throw error;
    throw new VerificationError(filePath, `${label}: file not found: ${filePath}`);
  }

  if (size === 0) {
    throw new VerificationError(filePath, `${label}: file is empty: ${filePath}`);
  }

  if (size < minBytes) {
    logger.warn(
      { path: filePath, sizeKB: (size / 1024).toFixed(1), minKB: Math.round(minBytes / 1024) },
      `${label}: file is unusually small`
    );
  } else {
    logger.debug({ path: filePath, sizeMB: (size / 1024 / 1024).toFixed(2) }, `${label}: verified`);
  }

  return size;
}
