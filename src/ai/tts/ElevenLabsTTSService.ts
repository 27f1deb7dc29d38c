import type { Readable } from 'stream';
import { config } from '../../config';
import { ConfigurationError } from '../../utils/errors';
import { createElevenLabsHttp, readStreamedErrorBody, toServiceError, type HttpClient } from '../http';
import type { ITTSService, SynthesisOptions } from './types';

export class ElevenLabsTTSService implements ITTSService {
  constructor(
    private readonly http: HttpClient | null = createElevenLabsHttp(),
    private readonly outputFormat: string = config.elevenLabs.outputFormat,
    private readonly defaultModel: string = config.elevenLabs.defaultModel
  ) {}

  private client(): HttpClient {
    if (!this.http) {
      throw new ConfigurationError('ElevenLabs API key missing for TTS');
    }
    return this.http;
  }

  private body(text: string, options: SynthesisOptions) {
    return {
      text,
      model_id: options.modelId || this.defaultModel,
      voice_settings: {
        stability: options.stability ?? config.voice.stability,
        similarity_boost: options.similarity ?? config.voice.similarity,
      },
    };
  }

  async synthesize(text: string, voiceId: string, options: SynthesisOptions = {}): Promise<Buffer> {
    const http = this.client();
    try {
      const res = await http.post<ArrayBuffer>(
        `/v1/text-to-speech/${encodeURIComponent(voiceId)}`,
        this.body(text, options),
        {
          params: { output_format: this.outputFormat },
          responseType: 'arraybuffer',
          headers: { Accept: 'audio/mpeg' },
        }
      );
      return Buffer.from(res.data);
    } catch (e) {
      throw toServiceError('ElevenLabs', 'text-to-speech', e);
    }
  }

  async stream(text: string, voiceId: string, options: SynthesisOptions = {}): Promise<Readable> {
    const http = this.client();
    try {
      const res = await http.post<Readable>(
        `/v1/text-to-speech/${encodeURIComponent(voiceId)}/stream`,
        this.body(text, options),
        {
          params: { output_format: this.outputFormat },
          responseType: 'stream',
          headers: { Accept: 'audio/mpeg' },
        }
      );
      return res.data;
    } catch (e) {
      throw toServiceError('ElevenLabs', 'text-to-speech stream', await readStreamedErrorBody(e));
    }
  }
}
