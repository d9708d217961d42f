import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import express from 'express';
import { writeFile } from 'fs/promises';
import { createServer } from 'http';
import path from 'path';
import { UploadRequest } from '../types/pipeline.js';
import { ConfigError, ProviderError, QuotaError, UploadError } from '../utils/errors.js';
import {
  MAX_STALLED_CHUNKS,
  YouTubeUploader,
  buildVideoResource,
  countStalledChunks,
  parseCommittedBytes,
  resolveChunkSize,
  toUploadError
} from '../services/youtube-uploader.js';
import { createCaptureLogger, listen, makeTempDir, removeDir, writeVideoFile } from './test-helpers.js';

const baseRequest: UploadRequest = {
  videoPath: '/tmp/video.mp4',
  title: 'Waves at Dusk',
  description: 'Slow waves rolling in.',
  tags: ['ocean', 'waves'],
  privacy: 'public',
  asShort: false
};

describe('buildVideoResource', () => {
  it('builds the snippet and status for a channel upload', () => {
    expect(buildVideoResource(baseRequest)).toEqual({
      snippet: {
        title: 'Waves at Dusk',
        description: 'Slow waves rolling in.',
        tags: ['ocean', 'waves'],
        categoryId: '22'
      },
      status: { privacyStatus: 'public', selfDeclaredMadeForKids: false }
    });
  });

  it('strips angle brackets and drops blank or duplicate tags', () => {
    const resource = buildVideoResource({
      ...baseRequest,
      title: 'Cats <3',
      description: '<script>',
      tags: ['a', 'A', ' ', 'b c']
    });

    expect(resource.snippet.title).toBe('Cats 3');
    expect(resource.snippet.description).toBe('script');
    expect(resource.snippet.tags).toEqual(['a', 'b c']);
  });

  it('uses a generic title when none survives cleaning', () => {
    expect(buildVideoResource({ ...baseRequest, title: ' <> ' }).snippet.title).toBe('AI Generated Video');
  });

  it('marks a short in title, description and tags', () => {
    const resource = buildVideoResource({ ...baseRequest, description: '', asShort: true, privacy: 'unlisted' });

    expect(resource.snippet.title).toBe('Waves at Dusk #Shorts');
    expect(resource.snippet.description).toBe('#Shorts');
    expect(resource.snippet.tags).toEqual(['ocean', 'waves', 'Shorts']);
    expect(resource.status.privacyStatus).toBe('unlisted');
  });

  it('appends the short marker after an existing description', () => {
    const resource = buildVideoResource({ ...baseRequest, asShort: true });
    expect(resource.snippet.description).toBe('Slow waves rolling in.\n\n#Shorts');
  });

  it('does not repeat a short marker that is already present', () => {
    const resource = buildVideoResource({
      ...baseRequest,
      title: 'Waves #shorts',
      description: 'Watch #Shorts',
      asShort: true
    });

    expect(resource.snippet.title).toBe('Waves #shorts');
    expect(resource.snippet.description).toBe('Watch #Shorts');
  });

  it('skips the title marker when it would overflow the title', () => {
    const title = 't'.repeat(95);
    expect(buildVideoResource({ ...baseRequest, title, asShort: true }).snippet.title).toBe(title);
  });

  it('enforces title and description limits', () => {
    const resource = buildVideoResource({
      ...baseRequest,
      title: 'x'.repeat(120),
      description: 'd'.repeat(6000)
    });

    expect(resource.snippet.title).toBe(`${'x'.repeat(97)}...`);
    expect(resource.snippet.description).toHaveLength(5000);
  });

  it('keeps tags within the combined length budget', () => {
    const tags = Array.from({ length: 60 }, (_, i) => `tag-${String(i).padStart(5, '0')}`);
    const resource = buildVideoResource({ ...baseRequest, tags });

    expect(resource.snippet.tags).toEqual(tags.slice(0, 50));
  });
});

describe('toUploadError', () => {
  it('recognises a quota reason in the API error body', () => {
    const error = toUploadError(
      { response: { status: 403, data: { error: { message: 'Quota used up', errors: [{ reason: 'quotaExceeded' }] } } } },
      'uploading'
    );

    expect(error).toBeInstanceOf(QuotaError);
    expect(error.message).toBe('YouTube quota exceeded while uploading: Quota used up');
  });

  it('treats HTTP 429 as quota', () => {
    const error = toUploadError(Object.assign(new Error('Too many requests'), { status: 429 }), 'uploading');

    expect(error).toBeInstanceOf(QuotaError);
    expect(error.message).toBe('YouTube quota exceeded while uploading: Too many requests');
  });

  it('asks for a reconnect on HTTP 401', () => {
    const error = toUploadError(Object.assign(new Error('Unauthorized'), { status: 401 }), 'refreshing the access token');

    expect(error).toBeInstanceOf(ConfigError);
    expect(error.message).toBe(
      'YouTube authorization rejected while refreshing the access token, reconnect the account: Unauthorized'
    );
  });

  it('reports other failures as upload errors with the status', () => {
    const error = toUploadError(
      Object.assign(new Error('Request failed with status code 500'), { response: { status: 500, data: 'oops' } }),
      'uploading'
    );

    expect(error).toBeInstanceOf(UploadError);
    expect(error.message).toBe('YouTube uploading failed (HTTP 500): Request failed with status code 500');
  });

  it('omits the status when there is none', () => {
    expect(toUploadError(new Error('socket hang up'), 'uploading').message).toBe('YouTube uploading failed: socket hang up');
  });

  it('passes pipeline errors through', () => {
    const original = new ProviderError('youtube', 'already classified');
    expect(toUploadError(original, 'uploading')).toBe(original);
  });
});

describe('parseCommittedBytes', () => {
  it('reads the committed range', () => {
    expect(parseCommittedBytes('bytes=0-1048575')).toBe(1048576);
  });

  it('treats a missing or odd header as nothing committed', () => {
    expect(parseCommittedBytes(undefined)).toBe(0);
    expect(parseCommittedBytes('garbage')).toBe(0);
  });
});

describe('countStalledChunks', () => {
  it('resets once the committed offset moves', () => {
    expect(countStalledChunks(0, 10, 2)).toBe(0);
  });

  it('counts responses that commit nothing new', () => {
    expect(countStalledChunks(10, 10, 0)).toBe(1);
    expect(countStalledChunks(10, 4, 1)).toBe(2);
  });

  it('gives up after the limit', () => {
    expect(() => countStalledChunks(10, 10, MAX_STALLED_CHUNKS - 1)).toThrow(
      new UploadError(`Upload stalled at byte 10 after ${MAX_STALLED_CHUNKS} chunks without progress`)
    );
  });
});

describe('resolveChunkSize', () => {
  const MB = 1024 * 1024;

  it('defaults to 8MB', () => {
    expect(resolveChunkSize(undefined)).toBe(8 * MB);
    expect(resolveChunkSize('abc')).toBe(8 * MB);
  });

  it('clamps to 1..64MB', () => {
    expect(resolveChunkSize('0')).toBe(MB);
    expect(resolveChunkSize('100')).toBe(64 * MB);
    expect(resolveChunkSize('16')).toBe(16 * MB);
  });
});

describe('YouTubeUploader', () => {
  let dir: string;
  let credentialsPath: string;
  let tokensPath: string;

  const clientFile = { installed: { client_id: 'test-client-id', client_secret: 'test-secret' } };

  const createUploader = (env: NodeJS.ProcessEnv = {}) =>
    new YouTubeUploader({
      credentialsPath,
      tokensPath,
      redirectUri: 'http://localhost:3000/api/youtube/oauth/callback',
      env,
      logger: createCaptureLogger().logger
    });

  beforeEach(async () => {
    dir = await makeTempDir('youtube-');
    credentialsPath = path.join(dir, 'client.json');
    tokensPath = path.join(dir, 'tokens.json');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('reports an unconfigured account', async () => {
    expect(await createUploader().getAuthStatus()).toEqual({ hasCredentials: false, connected: false, tokensPath });
  });

  it('reports a connected account', async () => {
    await writeFile(credentialsPath, JSON.stringify(clientFile));
    await writeFile(tokensPath, JSON.stringify({ refresh_token: 'test-refresh-token' }));

    expect(await createUploader().getAuthStatus()).toEqual({ hasCredentials: true, connected: true, tokensPath });
  });

  it('takes client credentials from the environment', async () => {
    const uploader = createUploader({ YOUTUBE_CLIENT_ID: 'test-client-id', YOUTUBE_CLIENT_SECRET: 'test-secret' });
    expect((await uploader.getAuthStatus()).hasCredentials).toBe(true);
  });

  it('treats an unreadable tokens file as disconnected', async () => {
    await writeFile(credentialsPath, JSON.stringify(clientFile));
    await writeFile(tokensPath, JSON.stringify([1, 2, 3]));

    expect((await createUploader().getAuthStatus()).connected).toBe(false);
  });

  it('builds a consent URL for offline access', async () => {
    await writeFile(credentialsPath, JSON.stringify({ web: clientFile.installed }));

    const url = new URL(await createUploader().getAuthUrl('test-state'));

    expect(url.searchParams.get('client_id')).toBe('test-client-id');
    expect(url.searchParams.get('access_type')).toBe('offline');
    expect(url.searchParams.get('prompt')).toBe('consent');
    expect(url.searchParams.get('state')).toBe('test-state');
    expect(url.searchParams.get('redirect_uri')).toBe('http://localhost:3000/api/youtube/oauth/callback');
  });

  it('rejects an OAuth client file of the wrong shape', async () => {
    await writeFile(credentialsPath, JSON.stringify({ other: true }));

    await expect(createUploader().getAuthUrl()).rejects.toThrow(
      `Invalid OAuth client file (expected installed/web.client_id/client_secret): ${credentialsPath}`
    );
  });

  it('refuses to upload without an OAuth client', async () => {
    const video = await writeVideoFile(path.join(dir, 'video.mp4'));

    const error = await createUploader()
      .upload({ ...baseRequest, videoPath: video })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ message: `YouTube OAuth client not configured: ${credentialsPath}` });
  });

  it('refuses to upload before the account is connected', async () => {
    await writeFile(credentialsPath, JSON.stringify(clientFile));
    const video = await writeVideoFile(path.join(dir, 'video.mp4'));

    await expect(createUploader().upload({ ...baseRequest, videoPath: video })).rejects.toThrow(
      new ConfigError('YouTube account not connected (AUTH_REQUIRED)')
    );
  });
});

describe('YouTubeUploader resumable upload', () => {
  let dir: string;
  let baseUrl: string;
  let closeServer: () => Promise<void>;
  /** Range headers answered with 308, one per chunk; then the upload completes. */
  let pendingRanges: string[];
  let completeAfterRanges: boolean;
  let contentRanges: string[];

  beforeEach(async () => {
    dir = await makeTempDir('youtube-upload-');
    pendingRanges = [];
    completeAfterRanges = true;
    contentRanges = [];

    const app = express();
    app.use(express.json());
    app.post('/upload', (req, res) => {
      res.set('Location', `http://${req.headers.host}/session`).status(200).end();
    });
    app.put('/session', (req, res) => {
      contentRanges.push(String(req.headers['content-range']));
      req.on('end', () => {
        const range = pendingRanges.shift();
        if (range !== undefined || !completeAfterRanges) {
          res.status(308).set('Range', range ?? 'bytes=0-9').end();
          return;
        }
        res.json({ id: 'vid-resumed' });
      });
      req.resume();
    });

    ({ baseUrl, close: closeServer } = await listen(createServer(app)));

    await writeFile(
      path.join(dir, 'client.json'),
      JSON.stringify({ installed: { client_id: 'test-client-id', client_secret: 'test-secret' } })
    );
    await writeFile(
      path.join(dir, 'tokens.json'),
      JSON.stringify({
        refresh_token: 'test-refresh-token',
        access_token: 'test-access-token',
        expiry_date: Date.now() + 60 * 60 * 1000
      })
    );
  });

  afterEach(async () => {
    await closeServer();
    await removeDir(dir);
  });

  const createUploader = () =>
    new YouTubeUploader({
      credentialsPath: path.join(dir, 'client.json'),
      tokensPath: path.join(dir, 'tokens.json'),
      redirectUri: 'http://localhost:3000/api/youtube/oauth/callback',
      uploadUrl: `${baseUrl}/upload`,
      env: {},
      logger: createCaptureLogger().logger
    });

  it('resumes from the committed offset until the video id arrives', async () => {
    pendingRanges = ['bytes=0-9'];
    const video = await writeVideoFile(path.join(dir, 'video.mp4'), 20);

    expect(await createUploader().upload({ ...baseRequest, videoPath: video })).toBe('vid-resumed');
    expect(contentRanges).toEqual(['bytes 0-19/20', 'bytes 10-19/20']);
  });

  it('fails when the committed offset stops moving', async () => {
    completeAfterRanges = false;
    const video = await writeVideoFile(path.join(dir, 'video.mp4'), 20);

    const error = await createUploader()
      .upload({ ...baseRequest, videoPath: video })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UploadError);
    expect(error).toMatchObject({
      message: `Upload stalled at byte 10 after ${MAX_STALLED_CHUNKS} chunks without progress`
    });
    expect(contentRanges).toEqual(['bytes 0-19/20', ...Array<string>(MAX_STALLED_CHUNKS).fill('bytes 10-19/20')]);
  });
});
