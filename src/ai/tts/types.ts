/**
 * Text-to-Speech abstraction for speaking in a cloned voice. Implementations
 * return encoded audio (mp3 unless the backend is configured otherwise).
 */
import type { Readable } from 'stream';

export interface VoiceSettings {
  /** 0..1 */
  stability: number;
  /** 0..1, sent as similarity_boost */
  similarity: number;
}

export interface SynthesisOptions extends Partial<VoiceSettings> {
  modelId?: string;
}

export interface ITTSService {
  synthesize(text: string, voiceId: string, options?: SynthesisOptions): Promise<Buffer>;
  stream(text: string, voiceId: string, options?: SynthesisOptions): Promise<Readable>;
}
