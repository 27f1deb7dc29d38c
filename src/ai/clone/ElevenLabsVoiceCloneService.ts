import axios from 'axios';
import { logger } from '../../config/logger';
import { ConfigurationError, ExternalServiceError } from '../../utils/errors';
import { createElevenLabsHttp, isRecord, toServiceError, type HttpClient } from '../http';
import type { CloneRequest, CloneResult, IVoiceCloneService, RemoteVoice } from './types';

function toStringRecord(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isRecord(value)) return out;
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === 'string') out[k] = v;
  }
  return out;
}

function parseVoice(value: unknown): RemoteVoice | null {
  if (!isRecord(value)) return null;
  const { voice_id, name, category, description, labels } = value;
  if (typeof voice_id !== 'string' || !voice_id) return null;
  return {
    voiceId: voice_id,
    name: typeof name === 'string' ? name : '',
    category: typeof category === 'string' ? category : 'unknown',
    description: typeof description === 'string' ? description : null,
    labels: toStringRecord(labels),
  };
}

/** Instant voice cloning through the ElevenLabs voices API. */
export class ElevenLabsVoiceCloneService implements IVoiceCloneService {
  constructor(private readonly http: HttpClient | null = createElevenLabsHttp()) {}

  private client(): HttpClient {
    if (!this.http) {
      throw new ConfigurationError('ElevenLabs API key missing for voice cloning');
    }
    return this.http;
  }

  async clone(request: CloneRequest): Promise<CloneResult> {
    const http = this.client();

    const form = new FormData();
    form.append('name', request.name);
    if (request.description) form.append('description', request.description);
    if (request.labels && Object.keys(request.labels).length) {
      form.append('labels', JSON.stringify(request.labels));
    }
    if (request.removeBackgroundNoise) form.append('remove_background_noise', 'true');
    for (const file of request.files) {
      form.append(
        'files',
        new Blob([new Uint8Array(file.data)], { type: file.mimeType || 'application/octet-stream' }),
        file.fileName
      );
    }

    let data: unknown;
    try {
      const res = await http.post<unknown>('/v1/voices/add', form);
      data = res.data;
    } catch (e) {
      logger.error('ElevenLabs voice clone request failed', { name: request.name, files: request.files.length });
      throw toServiceError('ElevenLabs', 'voice cloning', e);
    }

    if (!isRecord(data) || typeof data.voice_id !== 'string' || !data.voice_id) {
      throw new ExternalServiceError('ElevenLabs', 'ElevenLabs voice cloning returned no voice id');
    }
    return { voiceId: data.voice_id, requiresVerification: data.requires_verification === true };
  }

  async getVoice(voiceId: string): Promise<RemoteVoice | null> {
    const http = this.client();
    try {
      const res = await http.get<unknown>(`/v1/voices/${encodeURIComponent(voiceId)}`);
      return parseVoice(res.data);
    } catch (e) {
      if (axios.isAxiosError(e) && (e.response?.status === 404 || e.response?.status === 400)) {
        return null;
      }
      throw toServiceError('ElevenLabs', 'voice lookup', e);
    }
  }

  async listVoices(): Promise<RemoteVoice[]> {
    const http = this.client();
    let data: unknown;
    try {
      const res = await http.get<unknown>('/v1/voices');
      data = res.data;
    } catch (e) {
      throw toServiceError('ElevenLabs', 'voice listing', e);
    }
    if (!isRecord(data) || !Array.isArray(data.voices)) return [];
    return data.voices.map(parseVoice).filter((v): v is RemoteVoice => v !== null);
  }

  async deleteVoice(voiceId: string): Promise<void> {
    const http = this.client();
    try {
      await http.delete(`/v1/voices/${encodeURIComponent(voiceId)}`);
    } catch (e) {
      throw toServiceError('ElevenLabs', 'voice deletion', e);
    }
  }
}
