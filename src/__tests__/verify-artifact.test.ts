import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { VerificationError } from '../utils/errors.js';
import { verifyArtifact } from '../utils/verify-artifact.js';
import { LOG_LEVEL_WARN, createCaptureLogger, makeTempDir, removeDir, writeVideoFile } from './test-helpers.js';

describe('verifyArtifact', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('verify-');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('returns the size of a usable file without warning', async () => {
    const { logger, entries } = createCaptureLogger();
    const file = await writeVideoFile(path.join(dir, 'ok.mp4'), 200 * 1024);

    expect(await verifyArtifact(file, 'Generated video', logger)).toBe(200 * 1024);
    expect(entries.filter((e) => e.level >= LOG_LEVEL_WARN)).toEqual([]);
  });

  it('warns about a small file but accepts it', async () => {
    const { logger, entries } = createCaptureLogger();
    const file = await writeVideoFile(path.join(dir, 'small.mp4'), 10 * 1024);

    expect(await verifyArtifact(file, 'Generated video', logger)).toBe(10 * 1024);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: LOG_LEVEL_WARN,
      msg: 'Generated video: file is unusually small',
      sizeKB: '10.0',
      minKB: 100
    });
  });

  it('honours a custom threshold', async () => {
    const { logger, entries } = createCaptureLogger();
    const file = await writeVideoFile(path.join(dir, 'small.mp4'), 10 * 1024);

    await verifyArtifact(file, 'Generated video', logger, 1024);
    expect(entries.filter((e) => e.level >= LOG_LEVEL_WARN)).toEqual([]);
  });

  it('rejects an empty file', async () => {
    const { logger } = createCaptureLogger();
    const file = await writeVideoFile(path.join(dir, 'empty.mp4'), 0);

    await expect(verifyArtifact(file, 'Generated video', logger)).rejects.toThrow(
      new VerificationError(file, `Generated video: file is empty: ${file}`)
    );
  });

  it('rejects a missing file', async () => {
    const { logger } = createCaptureLogger();
    const file = path.join(dir, 'missing.mp4');

    const error = await verifyArtifact(file, 'Processed video', logger).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(VerificationError);
    expect(error).toMatchObject({
      code: 'VERIFICATION',
      artifactPath: file,
      message: `Processed video: file not found: ${file}`
    });
  });

  it('rejects a directory', async () => {
    const { logger } = createCaptureLogger();
    await expect(verifyArtifact(dir, 'Processed video', logger)).rejects.toThrow(`Processed video: not a regular file: ${dir}`);
  });

  it('rejects an empty path', async () => {
    const { logger } = createCaptureLogger();
    await expect(verifyArtifact('', 'Generated video', logger)).rejects.toThrow('Generated video: no file path returned');
  });
});
