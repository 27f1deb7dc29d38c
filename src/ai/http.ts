/**
 * Shared HTTP plumbing for the external AI services: axios instances and the
 * mapping of remote error responses onto ExternalServiceError.
 */
import axios, { type AxiosInstance } from 'axios';
import { Readable } from 'stream';
import { config, type AppConfig } from '../config';
import { logger } from '../config/logger';
import { AppError, ExternalServiceError, errorMessage } from '../utils/errors';

/** The slice of axios the providers use; tests pass stubs of this shape. */
export type HttpClient = Pick<AxiosInstance, 'get' | 'post' | 'delete'>;

export function createElevenLabsHttp(cfg: AppConfig = config): HttpClient | null {
  if (!cfg.elevenLabs.apiKey) return null;
  return axios.create({
    baseURL: cfg.elevenLabs.baseUrl,
    timeout: cfg.requestTimeoutMs,
    headers: { 'xi-api-key': cfg.elevenLabs.apiKey },
  });
}

export function createTranslateHttp(cfg: AppConfig = config): HttpClient {
  return axios.create({
    baseURL: cfg.translation.baseUrl,
    timeout: cfg.requestTimeoutMs,
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeBody(data: unknown): unknown {
  let raw: string | null = null;
  if (Buffer.isBuffer(data)) raw = data.toString('utf8');
  else if (data instanceof ArrayBuffer) raw = Buffer.from(data).toString('utf8');
  else if (typeof data === 'string') raw = data;
  if (raw === null) return data;
  try {
    return JSON.parse(raw);
  } catch {
    return raw.trim();
  }
}

interface RemoteDetail {
  message?: string;
  status?: string;
}

/**
 * Pull the human message out of the shapes the services answer with:
 * { detail: { status, message } }, { detail: "..." }, { detail: [{ msg }] },
 * { error: { message } }, { message }, or plain text.
 */
export function extractRemoteDetail(data: unknown): RemoteDetail {
  const body = decodeBody(data);
  if (typeof body === 'string') return body ? { message: body.slice(0, 500) } : {};
  if (!isRecord(body)) return {};

  const detail = body.detail;
  if (typeof detail === 'string') return { message: detail };
  if (isRecord(detail)) {
    const { message, status } = detail;
    return {
      message: typeof message === 'string' ? message : undefined,
      status: typeof status === 'string' ? status : undefined,
    };
  }
  if (Array.isArray(detail)) {
    const msgs = detail
      .map((d) => (isRecord(d) && typeof d['msg'] === 'string' ? String(d['msg']) : null))
      .filter((m): m is string => m !== null);
    if (msgs.length) return { message: msgs.join('; ') };
  }
  const { error, message } = body;
  if (isRecord(error) && typeof error.message === 'string') return { message: error.message };
  if (typeof error === 'string') return { message: error };
  if (typeof message === 'string') return { message };
  return {};
}

/**
 * With `responseType: 'stream'` an error body arrives as a stream. Read it into
 * a Buffer on the error so the remote message can be decoded.
 */
export async function readStreamedErrorBody(e: unknown): Promise<unknown> {
  if (!axios.isAxiosError(e) || !e.response) return e;
  const body = e.response.data;
  if (!(body instanceof Readable)) return e;

  const chunks: Buffer[] = [];
  try {
    for await (const chunk of body) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    e.response.data = Buffer.concat(chunks);
  } catch (readError) {
    logger.debug('Could not read streamed error body', { error: errorMessage(readError) });
    e.response.data = null;
  }
  return e;
}

/**
 * Convert whatever a provider call threw into an error the HTTP layer can
 * answer with. AppErrors pass through unchanged.
 */
export function toServiceError(service: string, action: string, e: unknown): AppError {
  if (e instanceof AppError) return e;

  if (axios.isAxiosError(e)) {
    const remoteStatus = e.response?.status;
    if (remoteStatus === undefined) {
      const timedOut = e.code === 'ECONNABORTED' || e.code === 'ETIMEDOUT';
      return new ExternalServiceError(
        service,
        timedOut ? `${service} ${action} timed out` : `${service} ${action} failed: ${e.message}`,
        { status: timedOut ? 504 : 502, code: timedOut ? 'UPSTREAM_TIMEOUT' : 'UPSTREAM_UNREACHABLE' }
      );
    }

    const detail = extractRemoteDetail(e.response?.data);
    const message = `${service} ${action} failed: ${detail.message || e.response?.statusText || `HTTP ${remoteStatus}`}`;

    if (detail.status === 'quota_exceeded' || remoteStatus === 429) {
      return new ExternalServiceError(service, message, { status: 429, code: 'QUOTA_EXCEEDED', remoteStatus });
    }
    if (remoteStatus === 401 || detail.status === 'invalid_api_key') {
      return new ExternalServiceError(service, message, { status: 401, code: 'INVALID_API_KEY', remoteStatus });
    }
    if (remoteStatus >= 400 && remoteStatus < 500) {
      return new ExternalServiceError(service, message, { status: remoteStatus, code: 'UPSTREAM_REJECTED', remoteStatus });
    }
    return new ExternalServiceError(service, message, { status: 502, remoteStatus });
  }

  return new ExternalServiceError(service, `${service} ${action} failed: ${errorMessage(e)}`);
}
