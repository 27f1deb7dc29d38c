import { config } from '../../config';
import { logger } from '../../config/logger';
import { ConfigurationError, ExternalServiceError } from '../../utils/errors';
import { createElevenLabsHttp, isRecord, toServiceError, type HttpClient } from '../http';
import type { ISTTService, TranscriptionOptions, TranscriptionResult, TranscriptWord } from './types';

function parseWords(value: unknown): TranscriptWord[] {
  if (!Array.isArray(value)) return [];
  const words: TranscriptWord[] = [];
  for (const w of value) {
    if (!isRecord(w) || w.type !== 'word') continue;
    const { text, start, end } = w;
    if (typeof text === 'string' && typeof start === 'number' && typeof end === 'number') {
      words.push({ text, start, end });
    }
  }
  return words;
}

export class ElevenLabsSTTService implements ISTTService {
  constructor(
    private readonly http: HttpClient | null = createElevenLabsHttp(),
    private readonly model: string = config.elevenLabs.sttModel
  ) {}

  async transcribe(audio: Buffer, options: TranscriptionOptions = {}): Promise<TranscriptionResult> {
    if (!this.http) {
      throw new ConfigurationError('ElevenLabs API key missing for STT');
    }

    const form = new FormData();
    form.append('model_id', this.model);
    form.append(
      'file',
      new Blob([new Uint8Array(audio)], { type: options.mimeType || 'application/octet-stream' }),
      options.fileName || 'audio.wav'
    );
    if (options.languageCode) form.append('language_code', options.languageCode);
    form.append('timestamps_granularity', options.timestamps ? 'word' : 'none');

    let data: unknown;
    try {
      const res = await this.http.post<unknown>('/v1/speech-to-text', form);
      data = res.data;
    } catch (e) {
      logger.error('ElevenLabs STT request failed', { fileName: options.fileName });
      throw toServiceError('ElevenLabs', 'speech-to-text', e);
    }

    if (!isRecord(data) || typeof data.text !== 'string') {
      throw new ExternalServiceError('ElevenLabs', 'ElevenLabs speech-to-text returned no text');
    }

    const result: TranscriptionResult = { text: data.text.trim() };
    if (typeof data.language_code === 'string') result.languageCode = data.language_code;
    if (typeof data.language_probability === 'number') result.languageProbability = data.language_probability;
    if (options.timestamps) result.words = parseWords(data.words);
    return result;
  }
}
