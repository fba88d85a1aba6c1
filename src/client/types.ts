/**
 * Type definitions for the Gemini Files and generateContent APIs
 */

/**
 * Processing state of an uploaded file. Anything the service reports besides
 * ACTIVE or FAILED is treated as still processing.
 */
export type FileState = 'PROCESSING' | 'ACTIVE' | 'FAILED';

/**
 * Uploaded file as reported by the Files API
 */
export interface RemoteFile {
  /** Resource name, e.g. `files/abc123` */
  name: string;
  /** URI used to reference the file in generation requests */
  uri: string;
  displayName: string;
  state: FileState;
  mimeType?: string;
  /** RFC 3339 timestamp */
  createTime?: string;
  sizeBytes?: string;
  /** Populated by the service when state is FAILED */
  error?: { code?: number; message?: string };
}

/**
 * Sampling and limits for one generation call
 */
export interface GenerationSettings {
  /** 0 = (near) deterministic */
  temperature: number;
  maxOutputTokens: number;
  /** Wall-clock timeout of the HTTP request */
  timeoutMs: number;
}

export interface UploadOptions {
  displayName: string;
  mimeType: string;
  /** Return an ACTIVE file with the same display name instead of uploading */
  reuseExisting?: boolean;
  signal?: AbortSignal;
}

export interface WaitOptions {
  /** Delay between polls in milliseconds */
  pollIntervalMs?: number;
  /** Maximum wait in milliseconds; 0 waits forever */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface GenerateOptions extends GenerationSettings {
  /** Optional uploaded file to send alongside the prompt */
  file?: Pick<RemoteFile, 'uri' | 'mimeType'>;
  signal?: AbortSignal;
}

/**
 * The remote operations the transcription pipeline depends on
 */
export interface TranscriptionService {
  uploadFile(filePath: string, options: UploadOptions): Promise<RemoteFile>;
  waitForFile(file: RemoteFile, options?: WaitOptions): Promise<RemoteFile>;
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

/**
 * Client configuration options
 */
export interface ClientOptions {
  /** API key; sent in the x-goog-api-key header */
  apiKey: string;
  /** Model identifier, with or without the `models/` prefix */
  model?: string;
  /** Base URL of the API */
  baseUrl?: string;
  /** API version path segment */
  apiVersion?: string;
  /** Timeout for list/status/upload requests in milliseconds */
  timeout?: number;
  /** Timeout for the byte transfer of an upload in milliseconds */
  uploadTimeout?: number;
  /** Maximum number of retries for transient failures (default 0) */
  maxRetries?: number;
  /** Initial retry delay in milliseconds */
  retryDelay?: number;
  /** Custom fetch implementation (used by tests) */
  fetch?: typeof fetch;
}
