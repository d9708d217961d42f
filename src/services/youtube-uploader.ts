import axios from 'axios';
import { Auth, google } from 'googleapis';
import { createReadStream } from 'fs';
import { chmod, readFile, stat } from 'fs/promises';
import crypto from 'crypto';
import type { Logger } from 'pino';
import { z } from 'zod';
import { UploadAdapter, UploadRequest } from '../types/pipeline.js';
import {
  ConfigError,
  PipelineError,
  QuotaError,
  UploadError,
  describeError,
  httpStatusOf,
  isPipelineError
} from '../utils/errors.js';
import { atomicWriteJson, isRecord, readJsonFile } from '../utils/json-file.js';
import { createComponentLogger } from '../utils/logger.js';

const YT_UPLOAD_SCOPE = 'https://www.googleapis.com/auth/youtube.upload';
const YT_UPLOAD_URL = 'https://www.googleapis.com/upload/youtube/v3/videos';
const PEOPLE_AND_BLOGS_CATEGORY = '22';

const MAX_TITLE_LENGTH = 100;
const MAX_DESCRIPTION_LENGTH = 5000;
const MAX_TAGS_LENGTH = 500;

const QUOTA_REASONS = new Set([
  'quotaExceeded',
  'dailyLimitExceeded',
  'rateLimitExceeded',
  'userRateLimitExceeded',
  'uploadLimitExceeded'
]);

const RETRYABLE_STATUS = new Set([408, 429, 500, 502, 503, 504]);
const RETRYABLE_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND']);

const clientNodeSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional()
});

const clientFileSchema = z.union([
  z.object({ installed: clientNodeSchema }).transform((file) => file.installed),
  z.object({ web: clientNodeSchema }).transform((file) => file.web)
]);

const storedTokensSchema = z.object({
  refresh_token: z.string().nullish(),
  access_token: z.string().nullish(),
  scope: z.string().optional(),
  token_type: z.string().nullish(),
  expiry_date: z.number().nullish()
});

const uploadedVideoSchema = z.object({ id: z.string().min(1) });

const apiErrorSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional() })).optional()
  })
});

type OAuthClientCredentials = z.infer<typeof clientNodeSchema>;
type StoredTokens = z.infer<typeof storedTokensSchema>;

export type YouTubeAuthStatus = {
  hasCredentials: boolean;
  connected: boolean;
  tokensPath: string;
};

export interface VideoResource {
  snippet: {
    title: string;
    description: string;
    tags: string[];
    categoryId: string;
  };
  status: {
    privacyStatus: UploadRequest['privacy'];
    selfDeclaredMadeForKids: boolean;
  };
}

/**
 * Shape pipeline metadata into the resource YouTube accepts: length limits, no angle
 * brackets, and the `#Shorts` marker for short-form uploads.
 */
export function buildVideoResource(request: UploadRequest): VideoResource {
  const stripBrackets = (text: string) => text.replace(/[<>]/g, '');

  let title = stripBrackets(request.title).trim() || 'AI Generated Video';
  let description = stripBrackets(request.description).trim();
  const tags: string[] = [];

  const candidateTags = request.asShort ? [...request.tags, 'Shorts'] : request.tags;
  let tagsLength = 0;
  for (const raw of candidateTags) {
    const tag = stripBrackets(raw).trim();
    if (!tag || tags.some((t) => t.toLowerCase() === tag.toLowerCase())) continue;
    // Tags containing spaces are counted with surrounding quotes.
    const cost = tag.length + (tag.includes(' ') ? 2 : 0) + (tags.length ? 1 : 0);
    if (tagsLength + cost > MAX_TAGS_LENGTH) break;
    tags.push(tag);
    tagsLength += cost;
  }

  if (request.asShort) {
    if (!/#shorts\b/i.test(title) && title.length + ' #Shorts'.length <= MAX_TITLE_LENGTH) {
      title = `${title} #Shorts`;
    }
    if (!/#shorts\b/i.test(description)) {
      description = description ? `${description}\n\n#Shorts` : '#Shorts';
    }
  }

  if (title.length > MAX_TITLE_LENGTH) {
    title = title.slice(0, MAX_TITLE_LENGTH - 3).trimEnd() + '...';
  }
  if (description.length > MAX_DESCRIPTION_LENGTH) {
    description = description.slice(0, MAX_DESCRIPTION_LENGTH);
  }

  return {
    snippet: { title, description, tags, categoryId: PEOPLE_AND_BLOGS_CATEGORY },
    status: { privacyStatus: request.privacy, selfDeclaredMadeForKids: false }
  };
}

function responseDataOf(error: unknown): unknown {
  if (!isRecord(error)) return undefined;
  const response = error.response;
  return isRecord(response) ? response.data : undefined;
}

/** Translate a failed YouTube API call into the pipeline's error taxonomy. */
export function toUploadError(error: unknown, action: string): PipelineError {
  if (isPipelineError(error)) return error;

  const status = httpStatusOf(error);
  const body = apiErrorSchema.safeParse(responseDataOf(error));
  const reasons = body.success ? (body.data.error.errors ?? []).map((e) => e.reason ?? '') : [];
  const detail = (body.success && body.data.error.message) || describeError(error);

  if (reasons.some((reason) => QUOTA_REASONS.has(reason)) || status === 429) {
    return new QuotaError('youtube', `YouTube quota exceeded while ${action}: ${detail}`, { cause: error });
  }
  if (status === 401) {
    return new ConfigError(`YouTube authorization rejected while ${action}, reconnect the account: ${detail}`, {
      cause: error
    });
  }
  return new UploadError(`YouTube ${action} failed${status ? ` (HTTP ${status})` : ''}: ${detail}`, { cause: error });
}

/** `Range: bytes=0-1048575` → 1048576 bytes committed. */
export function parseCommittedBytes(rangeHeader: unknown): number {
  if (typeof rangeHeader !== 'string') return 0;
  const match = rangeHeader.match(/(\d+)-(\d+)/);
  if (!match) return 0;
  const end = parseInt(match[2], 10);
  return Number.isFinite(end) ? end + 1 : 0;
}

/** YouTube wants chunk sizes in multiples of 256KB. */
export function resolveChunkSize(megabytes: string | undefined): number {
  const mb = parseInt(megabytes || '8', 10);
  const raw = Math.max(1, Math.min(64, Number.isFinite(mb) ? mb : 8)) * 1024 * 1024;
  const unit = 256 * 1024;
  return Math.floor(raw / unit) * unit;
}

export const MAX_STALLED_CHUNKS = 3;

/**
 * Consecutive chunk responses that committed no new bytes. Throws once the server has
 * refused to move its committed offset `MAX_STALLED_CHUNKS` times in a row.
 */
export function countStalledChunks(previousCommitted: number, committed: number, stalled: number): number {
  if (committed > previousCommitted) return 0;
  if (stalled + 1 >= MAX_STALLED_CHUNKS) {
    throw new UploadError(`Upload stalled at byte ${committed} after ${MAX_STALLED_CHUNKS} chunks without progress`);
  }
  return stalled + 1;
}

function isRetryableError(error: unknown): boolean {
  const status = httpStatusOf(error);
  if (status !== undefined && RETRYABLE_STATUS.has(status)) {
    // A 429 that carries a quota reason will not clear by retrying.
    const body = apiErrorSchema.safeParse(responseDataOf(error));
    const reasons = body.success ? (body.data.error.errors ?? []).map((e) => e.reason ?? '') : [];
    return !reasons.some((reason) => QUOTA_REASONS.has(reason));
  }
  return isRecord(error) && typeof error.code === 'string' && RETRYABLE_CODES.has(error.code);
}

export interface YouTubeUploaderOptions {
  credentialsPath: string;
  tokensPath: string;
  redirectUri: string;
  /** Resumable upload endpoint; defaults to the YouTube Data API. */
  uploadUrl?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export class YouTubeUploader implements UploadAdapter {
  private readonly credentialsPath: string;
  private readonly tokensPath: string;
  private readonly redirectUri: string;
  private readonly uploadUrl: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;

  constructor(options: YouTubeUploaderOptions) {
    this.credentialsPath = options.credentialsPath;
    this.tokensPath = options.tokensPath;
    this.redirectUri = options.redirectUri;
    this.uploadUrl = options.uploadUrl ?? YT_UPLOAD_URL;
    this.env = options.env ?? process.env;
    this.logger = createComponentLogger('youtube-uploader', options.logger);
  }

  async getAuthStatus(): Promise<YouTubeAuthStatus> {
    const hasCredentials = await this.loadClientCredentials().then(
      () => true,
      () => false
    );
    const tokens = await this.loadTokens().catch((error: unknown) => {
      this.logger.warn({ error: describeError(error) }, 'Stored YouTube tokens are unreadable');
      return null;
    });
    return { hasCredentials, connected: Boolean(tokens?.refresh_token), tokensPath: this.tokensPath };
  }

  async getAuthUrl(state?: string): Promise<string> {
    const client = this.createOAuthClient(await this.loadClientCredentials());
    return client.generateAuthUrl({
      access_type: 'offline',
      // Forces a refresh_token on repeat consent.
      prompt: 'consent',
      scope: [YT_UPLOAD_SCOPE],
      state
    });
  }

  async handleOAuthCallback(code: string): Promise<void> {
    const client = this.createOAuthClient(await this.loadClientCredentials());
    const { tokens } = await client.getToken(code);
    await this.saveTokens(storedTokensSchema.parse(tokens));
    this.logger.info('YouTube account connected');
  }

  async upload(request: UploadRequest): Promise<string> {
    const client = await this.ensureAuth();

    const { size: totalBytes } = await stat(request.videoPath);
    if (totalBytes <= 0) {
      throw new UploadError(`Video file is empty: ${request.videoPath}`);
    }

    const resource = buildVideoResource(request);
    this.logger.info(
      { title: resource.snippet.title, privacy: resource.status.privacyStatus, asShort: request.asShort, totalBytes },
      'Starting YouTube resumable upload'
    );

    const accessToken = await this.getFreshAccessToken(client);
    const uploadUrl = await this.startResumableSession(accessToken, resource);

    let lastLogged = -1;
    const videoId = await this.uploadChunks(uploadUrl, request.videoPath, totalBytes, (sent) => {
      const pct = Math.floor((sent / totalBytes) * 100);
      if (pct >= lastLogged + 25) {
        lastLogged = pct;
        this.logger.debug({ pct }, 'Upload progress');
      }
    });

    this.logger.info({ videoId, url: `https://www.youtube.com/watch?v=${videoId}` }, 'YouTube upload complete');
    return videoId;
  }

  private async ensureAuth(): Promise<Auth.OAuth2Client> {
    const client = this.createOAuthClient(await this.loadClientCredentials());

    let tokens: StoredTokens | null;
    try {
      tokens = await this.loadTokens();
    } catch (error) {
      throw new ConfigError(`Stored YouTube tokens are unreadable: ${describeError(error)}`, { cause: error });
    }
    if (!tokens?.refresh_token) {
      throw new ConfigError('YouTube account not connected (AUTH_REQUIRED)');
    }

    client.setCredentials(tokens);
    return client;
  }

  private async loadClientCredentials(): Promise<OAuthClientCredentials> {
    if (this.env.YOUTUBE_CLIENT_ID && this.env.YOUTUBE_CLIENT_SECRET) {
      return {
        client_id: this.env.YOUTUBE_CLIENT_ID,
        client_secret: this.env.YOUTUBE_CLIENT_SECRET,
        redirect_uris: this.env.YOUTUBE_REDIRECT_URIS ? this.env.YOUTUBE_REDIRECT_URIS.split(',') : undefined
      };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.credentialsPath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`YouTube OAuth client not configured: ${this.credentialsPath}`, { cause: error });
    }

    const parsed = clientFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid OAuth client file (expected installed/web.client_id/client_secret): ${this.credentialsPath}`
      );
    }
    return parsed.data;
  }

  private createOAuthClient(creds: OAuthClientCredentials): Auth.OAuth2Client {
    return new google.auth.OAuth2(creds.client_id, creds.client_secret, this.redirectUri);
  }

  private async loadTokens(): Promise<StoredTokens | null> {
    const raw = await readJsonFile(this.tokensPath);
    return raw === null ? null : storedTokensSchema.parse(raw);
  }

  private async saveTokens(tokens: StoredTokens): Promise<void> {
    await atomicWriteJson(this.tokensPath, tokens);
    await chmod(this.tokensPath, 0o600).catch((error: unknown) => {
      this.logger.warn({ error: describeError(error) }, 'Could not restrict permissions on the tokens file');
    });
  }

  private async getFreshAccessToken(client: Auth.OAuth2Client): Promise<string> {
    try {
      const { token } = await client.getAccessToken();
      if (!token) throw new ConfigError('Unable to obtain a YouTube access token');
      return token;
    } catch (error) {
      throw toUploadError(error, 'refreshing the access token');
    }
  }

  private async startResumableSession(accessToken: string, resource: VideoResource): Promise<string> {
    try {
      const response = await axios.post(this.uploadUrl, resource, {
        params: { uploadType: 'resumable', part: 'snippet,status' },
        headers: {
          Authorization: `Bearer ${accessToken}`,
          'Content-Type': 'application/json; charset=UTF-8',
          'X-Upload-Content-Type': 'video/*'
        },
        validateStatus: (s) => s >= 200 && s < 400
      });

      const location = response.headers['location'];
      if (typeof location !== 'string' || !location) {
        throw new UploadError('YouTube resumable session did not return an upload URL');
      }
      return location;
    } catch (error) {
      throw toUploadError(error, 'starting the upload session');
    }
  }

  private async uploadChunks(
    uploadUrl: string,
    filePath: string,
    totalBytes: number,
    onBytesSent: (bytesSent: number) => void
  ): Promise<string> {
    const chunkSize = resolveChunkSize(this.env.YOUTUBE_UPLOAD_CHUNK_MB);
    let bytesSent = 0;
    let stalled = 0;
    let videoId: string | null = null;

    while (videoId === null) {
      if (bytesSent >= totalBytes) {
        // Every byte is committed but the final response was lost: ask for the resource.
        videoId = await this.fetchFinalVideoId(uploadUrl, totalBytes);
        break;
      }

      const start = bytesSent;
      const end = Math.min(totalBytes - 1, start + chunkSize - 1);
      const label = `chunk-${start}-${end}:${crypto.randomUUID()}`;

      const outcome = await this.retry(async () => {
        const res = await axios.put(uploadUrl, createReadStream(filePath, { start, end }), {
          headers: {
            'Content-Length': end - start + 1,
            'Content-Range': `bytes ${start}-${end}/${totalBytes}`
          },
          maxBodyLength: Infinity,
          maxContentLength: Infinity,
          validateStatus: (s) => (s >= 200 && s < 300) || s === 308
        });

        if (res.status === 308) {
          return { committed: parseCommittedBytes(res.headers['range']), id: null };
        }
        const video = uploadedVideoSchema.safeParse(res.data);
        if (!video.success) {
          throw new UploadError('Upload completed but no video ID returned');
        }
        return { committed: totalBytes, id: video.data.id };
      }, label);

      videoId = outcome.id;
      if (videoId === null) {
        stalled = countStalledChunks(bytesSent, outcome.committed, stalled);
      }
      bytesSent = outcome.committed;
      onBytesSent(bytesSent);
    }

    return videoId;
  }

  private async fetchFinalVideoId(uploadUrl: string, totalBytes: number): Promise<string> {
    try {
      const res = await axios.put(uploadUrl, null, {
        headers: { 'Content-Length': 0, 'Content-Range': `bytes */${totalBytes}` },
        validateStatus: (s) => s >= 200 && s < 300
      });
      const video = uploadedVideoSchema.safeParse(res.data);
      if (!video.success) {
        throw new UploadError('Upload completed but no video ID returned');
      }
      return video.data.id;
    } catch (error) {
      throw toUploadError(error, 'finalizing the upload');
    }
  }

  private async retry<T>(fn: () => Promise<T>, label: string): Promise<T> {
    const maxAttempts = parseInt(this.env.YOUTUBE_UPLOAD_RETRIES || '6', 10);
    let attempt = 0;
    let delayMs = 500;

    while (true) {
      try {
        return await fn();
      } catch (error) {
        attempt++;
        if (attempt >= maxAttempts || !isRetryableError(error)) {
          throw toUploadError(error, 'uploading video data');
        }

        this.logger.warn({ label, attempt, error: describeError(error) }, 'Upload chunk failed, retrying');
        const jitter = Math.floor(Math.random() * 200);
        await new Promise((resolve) => setTimeout(resolve, delayMs + jitter));
        delayMs = Math.min(8000, Math.floor(delayMs * 1.8));
      }
    }
  }
}
