/**
 * Gemini API client: Files API uploads and generateContent
 */

import ky, { type KyInstance, type Options as KyOptions } from 'ky';
import fs from 'fs-extra';
import path from 'path';
import type {
  ClientOptions,
  FileState,
  GenerateOptions,
  RemoteFile,
  TranscriptionService,
  UploadOptions,
  WaitOptions,
} from './types';
import {
  ConfigurationError,
  NetworkError,
  RemoteProcessingError,
  ResponseShapeError,
  TimeoutError,
  handleErrorResponse,
} from '../errors';
import { sleep, withRetry, DEFAULT_RETRY_CONFIG, type RetryConfig } from './retry';
import { debug, info, warn } from '../pipeline/log';

export const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com';
export const DEFAULT_MODEL = 'gemini-3-pro-preview';

const RAW_PREVIEW_CHARS = 2000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function truncate(raw: string): string {
  return raw.length > RAW_PREVIEW_CHARS ? raw.slice(0, RAW_PREVIEW_CHARS) : raw;
}

export function toFileState(value: unknown): FileState {
  return value === 'ACTIVE' || value === 'FAILED' ? value : 'PROCESSING';
}

/**
 * Read a File resource; null when required fields are missing
 */
export function parseRemoteFile(value: unknown): RemoteFile | null {
  if (!isRecord(value)) return null;
  const name = str(value.name);
  const uri = str(value.uri);
  if (!name || !uri) return null;

  const file: RemoteFile = {
    name,
    uri,
    displayName: str(value.displayName) ?? '',
    state: toFileState(value.state),
    mimeType: str(value.mimeType),
    createTime: str(value.createTime),
    sizeBytes: str(value.sizeBytes),
  };
  if (isRecord(value.error)) {
    file.error = {
      code: typeof value.error.code === 'number' ? value.error.code : undefined,
      message: str(value.error.message),
    };
  }
  return file;
}

function createdAt(file: RemoteFile): number {
  const parsed = file.createTime ? Date.parse(file.createTime) : NaN;
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
}

/**
 * Most recently created file; listing order breaks ties
 */
export function pickLatest(files: RemoteFile[]): RemoteFile | null {
  let best: RemoteFile | null = null;
  for (const file of files) {
    if (!best || createdAt(file) > createdAt(best)) {
      best = file;
    }
  }
  return best;
}

/**
 * Concatenate the non-thought text parts of the first candidate
 */
export function extractText(body: unknown): string {
  const raw = truncate(JSON.stringify(body, null, 2) ?? String(body));
  if (!isRecord(body)) {
    throw new ResponseShapeError('Failed to extract response: body is not an object', raw);
  }

  const candidates = Array.isArray(body.candidates) ? body.candidates : [];
  const first: unknown = candidates[0];
  if (!isRecord(first)) {
    const blockReason = isRecord(body.promptFeedback) ? str(body.promptFeedback.blockReason) : undefined;
    throw new ResponseShapeError(
      `Failed to extract response: no candidates${blockReason ? ` (blockReason: ${blockReason})` : ''}`,
      raw
    );
  }

  const content = first.content;
  const parts = isRecord(content) && Array.isArray(content.parts) ? content.parts : [];
  const texts: string[] = [];
  for (const part of parts) {
    if (!isRecord(part) || part.thought === true) continue;
    const text = str(part.text);
    if (text !== undefined) texts.push(text);
  }

  if (texts.length === 0) {
    const finishReason = str(first.finishReason);
    throw new ResponseShapeError(
      `Failed to extract response: candidate has no text${finishReason ? ` (finishReason: ${finishReason})` : ''}`,
      raw
    );
  }
  return texts.join('');
}

async function readJson(response: Response, action: string): Promise<unknown> {
  const text = await response.text();
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new ResponseShapeError(`${action} returned a non-JSON body`, truncate(text));
  }
}

function toClientError(error: unknown, action: string): unknown {
  if (!(error instanceof Error)) return error;
  // Convert fetch errors to our error types; aborts pass through untouched
  if (error.name === 'TimeoutError') {
    return new TimeoutError(`${action} timed out: ${error.message}`);
  } else if (error.name === 'TypeError') {
    return new NetworkError(`${action} network error: ${error.message}`);
  }
  return error;
}

/**
 * Gemini API client
 */
export class GeminiClient implements TranscriptionService {
  readonly model: string;
  private http: KyInstance;
  private uploader: KyInstance;
  private apiVersion: string;
  private retryConfig: RetryConfig;

  constructor(options: ClientOptions) {
    const {
      apiKey,
      model = DEFAULT_MODEL,
      baseUrl = DEFAULT_BASE_URL,
      apiVersion = 'v1beta',
      timeout = 60000,
      uploadTimeout = 600000,
      maxRetries = 0,
      retryDelay = 1000,
      fetch: customFetch,
    } = options;

    if (!apiKey) {
      throw new ConfigurationError(
        'API key required. Provide via --api-key or the GEMINI_API_KEY environment variable.'
      );
    }

    this.model = model.replace(/^models\//, '');
    this.apiVersion = apiVersion;

    const kyOptions: KyOptions = {
      timeout,
      retry: 0, // We handle retries ourselves
      throwHttpErrors: false,
      headers: { 'x-goog-api-key': apiKey },
    };
    if (customFetch) {
      kyOptions.fetch = customFetch;
    }

    this.http = ky.create({ ...kyOptions, prefixUrl: baseUrl });
    // The transfer step posts to an absolute session URL handed out by the service
    this.uploader = ky.create({ ...kyOptions, timeout: uploadTimeout });

    this.retryConfig = {
      ...DEFAULT_RETRY_CONFIG,
      maxRetries,
      initialDelay: retryDelay,
    };
  }

  /**
   * Make HTTP request with error mapping and (opt-in) retry
   */
  private async request(
    action: string,
    input: string,
    options: KyOptions = {},
    http: KyInstance = this.http
  ): Promise<Response> {
    return withRetry(
      async () => {
        let response: Response;
        try {
          response = await http(input, options);
        } catch (error) {
          throw toClientError(error, action);
        }
        if (!response.ok) {
          handleErrorResponse(response, await response.text(), action);
        }
        return response;
      },
      this.retryConfig,
      (attempt, error, delayMs) => {
        warn('gemini.retry', {
          action,
          attempt,
          delayMs: Math.round(delayMs),
          error: error instanceof Error ? error.message : String(error),
        });
      },
      options.signal ?? undefined
    );
  }

  // Files API

  /**
   * List every uploaded file, following pagination
   */
  async listFiles(signal?: AbortSignal): Promise<RemoteFile[]> {
    const files: RemoteFile[] = [];
    let pageToken: string | undefined;

    do {
      const searchParams: Record<string, string> = { pageSize: '100' };
      if (pageToken) {
        searchParams.pageToken = pageToken;
      }
      const response = await this.request('List files', `${this.apiVersion}/files`, {
        searchParams,
        signal,
      });
      const body = await readJson(response, 'List files');
      if (!isRecord(body)) {
        throw new ResponseShapeError('List files returned an unexpected body', truncate(JSON.stringify(body)));
      }
      // An empty listing omits the "files" field entirely
      const entries = Array.isArray(body.files) ? body.files : [];
      for (const entry of entries) {
        const file = parseRemoteFile(entry);
        if (file) files.push(file);
      }
      pageToken = str(body.nextPageToken) || undefined;
    } while (pageToken);

    return files;
  }

  /**
   * Find an ACTIVE upload with the given display name
   */
  async findExistingFile(displayName: string, signal?: AbortSignal): Promise<RemoteFile | null> {
    const files = await this.listFiles(signal);
    const matches = files.filter((f) => f.state === 'ACTIVE' && f.displayName === displayName);
    if (matches.length > 1) {
      debug('gemini.upload.duplicates', { displayName, count: matches.length });
    }
    return pickLatest(matches);
  }

  /**
   * Get file status
   */
  async getFile(name: string, signal?: AbortSignal): Promise<RemoteFile> {
    const resource = name.startsWith('files/') ? name : `files/${name}`;
    const response = await this.request('Check file status', `${this.apiVersion}/${resource}`, { signal });
    const body = await readJson(response, 'Check file status');
    const file = parseRemoteFile(body);
    if (!file) {
      throw new ResponseShapeError(`File status for ${resource} is missing name/uri`, truncate(JSON.stringify(body)));
    }
    return file;
  }

  /**
   * Upload a file with the resumable protocol (start, then upload+finalize)
   */
  async uploadFile(filePath: string, options: UploadOptions): Promise<RemoteFile> {
    const { displayName, mimeType, reuseExisting = true, signal } = options;

    if (reuseExisting) {
      const existing = await this.findExistingFile(displayName, signal);
      if (existing) {
        info('gemini.upload.reuse', { displayName, name: existing.name });
        return existing;
      }
    }

    const bytes = await fs.readFile(filePath);
    info('gemini.upload.start', {
      file: path.basename(filePath),
      displayName,
      mb: Number((bytes.length / (1024 * 1024)).toFixed(1)),
    });

    const start = await this.request('Initialize upload', `upload/${this.apiVersion}/files`, {
      method: 'post',
      headers: {
        'X-Goog-Upload-Protocol': 'resumable',
        'X-Goog-Upload-Command': 'start',
        'X-Goog-Upload-Header-Content-Length': String(bytes.length),
        'X-Goog-Upload-Header-Content-Type': mimeType,
      },
      json: { file: { display_name: displayName } },
      signal,
    });

    const uploadUrl = start.headers.get('x-goog-upload-url');
    if (!uploadUrl) {
      throw new ResponseShapeError('No upload URL returned', truncate(await start.text()));
    }

    const finished = await this.request(
      'Upload file',
      uploadUrl,
      {
        method: 'post',
        headers: {
          'X-Goog-Upload-Command': 'upload, finalize',
          'X-Goog-Upload-Offset': '0',
        },
        body: new Uint8Array(bytes),
        signal,
      },
      this.uploader
    );

    const body = await readJson(finished, 'Upload file');
    const file = parseRemoteFile(isRecord(body) ? body.file : undefined);
    if (!file) {
      throw new ResponseShapeError('Upload response is missing file metadata', truncate(JSON.stringify(body)));
    }
    info('gemini.upload.done', { displayName, name: file.name, state: file.state });
    return file;
  }

  /**
   * Poll until the file is ACTIVE
   */
  async waitForFile(file: RemoteFile, options: WaitOptions = {}): Promise<RemoteFile> {
    const { pollIntervalMs = 3000, timeoutMs = 0, signal } = options;
    const startTime = Date.now();
    let current = file;

    while (true) {
      if (current.state === 'ACTIVE') {
        return current;
      }
      if (current.state === 'FAILED') {
        const reason = current.error?.message ? `: ${current.error.message}` : '';
        throw new RemoteProcessingError(`File processing failed for ${current.name}${reason}`, current.name);
      }

      // Check timeout
      const elapsed = Date.now() - startTime;
      if (timeoutMs > 0 && elapsed >= timeoutMs) {
        throw new TimeoutError(`File ${current.name} did not become ACTIVE within ${timeoutMs}ms`);
      }

      debug('gemini.file.processing', { name: current.name, state: current.state, elapsedMs: elapsed });
      await sleep(pollIntervalMs, signal);
      current = await this.getFile(current.name, signal);
    }
  }

  // Generation API

  /**
   * Generate text from a prompt and an optional uploaded file
   */
  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const { file, temperature, maxOutputTokens, timeoutMs, signal } = options;

    const parts: Array<Record<string, unknown>> = [];
    if (file) {
      parts.push({ fileData: { mimeType: file.mimeType ?? 'audio/wav', fileUri: file.uri } });
    }
    parts.push({ text: prompt });

    const payload = {
      contents: [{ role: 'user', parts }],
      generationConfig: { temperature, maxOutputTokens },
    };

    const response = await this.request(
      'Generation',
      `${this.apiVersion}/models/${this.model}:generateContent`,
      {
        method: 'post',
        json: payload,
        timeout: timeoutMs,
        signal,
      }
    );
    return extractText(await readJson(response, 'Generation'));
  }
}
