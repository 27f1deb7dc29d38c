/**
 * Speech synthesis in a cloned voice. Generated audio lands in the output
 * directory as mp3 and is served from there.
 */
import type { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { getTTSService, type ITTSService, type VoiceSettings } from '../ai/tts';
import { config, TTS_MODELS } from '../config';
import { logger } from '../config/logger';
import { timestampSlug, type AudioInfo } from '../utils/audio';
import { ExternalServiceError, errorMessage, ValidationError } from '../utils/errors';
import {
  MAX_TEXT_LENGTH,
  validateSimilarity,
  validateStability,
  validateTextLength,
  type ValidationResult,
} from '../utils/validators';
import { FileStore, type StoredFile } from './file-store';

export const VOICE_PRESETS = {
  stable: { stability: 0.75, similarity: 0.75 },
  balanced: { stability: 0.5, similarity: 0.75 },
  expressive: { stability: 0.3, similarity: 0.8 },
} as const satisfies Record<string, VoiceSettings>;

export type VoicePreset = keyof typeof VOICE_PRESETS;

export function isVoicePreset(value: string): value is VoicePreset {
  return Object.prototype.hasOwnProperty.call(VOICE_PRESETS, value);
}

/** Every model id a client may ask for, including the legacy multilingual one. */
export const AVAILABLE_MODELS: readonly string[] = [
  TTS_MODELS.monolingual,
  'eleven_multilingual_v1',
  TTS_MODELS.multilingual,
  TTS_MODELS.turbo,
];

export const DEFAULT_WORDS_PER_MINUTE = 150;

export interface SynthesizeInput extends Partial<VoiceSettings> {
  text: string;
  voiceId: string;
  modelId?: string;
  /** First part of the generated file name; "output" when omitted. */
  filePrefix?: string;
}

export interface SynthesizedAudio {
  fileName: string;
  path: string;
  bytes: number;
  modelId: string;
}

export class TextToSpeechService {
  constructor(
    private readonly provider: ITTSService = getTTSService(),
    private readonly outputs: FileStore = new FileStore(config.paths.outputDir, 'Output'),
    private readonly defaultModel: string = config.elevenLabs.defaultModel
  ) {}

  validateText(text: string, maxLength: number = MAX_TEXT_LENGTH): ValidationResult {
    return validateTextLength(text, maxLength);
  }

  private prepare(input: SynthesizeInput): { settings: VoiceSettings; modelId: string } {
    const text = this.validateText(input.text);
    if (!text.valid) throw new ValidationError(text.message);
    if (!input.voiceId || !input.voiceId.trim()) throw new ValidationError('Voice id is required');

    const stability = input.stability ?? config.voice.stability;
    const similarity = input.similarity ?? config.voice.similarity;
    const s = validateStability(stability);
    if (!s.valid) throw new ValidationError(s.message);
    const m = validateSimilarity(similarity);
    if (!m.valid) throw new ValidationError(m.message);

    const modelId = input.modelId || this.defaultModel;
    if (!AVAILABLE_MODELS.includes(modelId)) {
      throw new ValidationError(`Unknown model: ${modelId}. Available: ${AVAILABLE_MODELS.join(', ')}`);
    }
    return { settings: { stability, similarity }, modelId };
  }

  async synthesize(input: SynthesizeInput): Promise<SynthesizedAudio> {
    const { settings, modelId } = this.prepare(input);
    logger.info('Synthesizing speech', { voiceId: input.voiceId, modelId, chars: input.text.length });

    const audio = await this.provider.synthesize(input.text, input.voiceId, { ...settings, modelId });
    if (!audio.length) {
      throw new ExternalServiceError('ElevenLabs', 'ElevenLabs text-to-speech returned empty audio');
    }

    const fileName = `${input.filePrefix || 'output'}_${timestampSlug()}_${uuidv4().slice(0, 8)}.mp3`;
    const filePath = await this.outputs.write(fileName, audio);
    logger.info('Speech saved', { fileName, bytes: audio.length });
    return { fileName, path: filePath, bytes: audio.length, modelId };
  }

  synthesizeMultilingual(input: Omit<SynthesizeInput, 'modelId'>): Promise<SynthesizedAudio> {
    return this.synthesize({ ...input, modelId: TTS_MODELS.multilingual, filePrefix: input.filePrefix || 'multilingual' });
  }

  /** Audio as it is generated; nothing is written to disk. */
  synthesizeStream(input: SynthesizeInput): Promise<Readable> {
    const { settings, modelId } = this.prepare(input);
    logger.info('Streaming speech', { voiceId: input.voiceId, modelId });
    return this.provider.stream(input.text, input.voiceId, { ...settings, modelId });
  }

  /** Synthesize each text in turn. Failed items are logged and left out of the result. */
  async batchSynthesize(texts: string[], voiceId: string, settings: Partial<VoiceSettings> = {}): Promise<SynthesizedAudio[]> {
    const results: SynthesizedAudio[] = [];
    for (const [i, text] of texts.entries()) {
      try {
        results.push(await this.synthesize({ ...settings, text, voiceId, filePrefix: `batch_${i + 1}` }));
      } catch (e) {
        logger.warn('Batch synthesis item failed', { item: i + 1, error: errorMessage(e) });
      }
    }
    return results;
  }

  /** Settings for a preset name; unknown names get "balanced". */
  getVoiceSettingsPreset(preset: string): VoiceSettings {
    const settings = isVoicePreset(preset) ? VOICE_PRESETS[preset] : VOICE_PRESETS.balanced;
    return { ...settings };
  }

  synthesizeWithPreset(text: string, voiceId: string, preset: string): Promise<SynthesizedAudio> {
    return this.synthesize({ text, voiceId, ...this.getVoiceSettingsPreset(preset) });
  }

  getAvailableModels(): string[] {
    return [...AVAILABLE_MODELS];
  }

  /** Rough spoken length in seconds at the given speaking rate. */
  estimateAudioDuration(text: string, wordsPerMinute: number = DEFAULT_WORDS_PER_MINUTE): number {
    const words = text.split(/\s+/).filter(Boolean).length;
    return (words / wordsPerMinute) * 60;
  }

  listOutputs(): Promise<StoredFile[]> {
    return this.outputs.list();
  }

  getOutputPath(fileName: string): string {
    return this.outputs.resolve(fileName);
  }

  getOutputInfo(fileName: string): Promise<AudioInfo> {
    return this.outputs.info(fileName);
  }

  async deleteOutput(fileName: string): Promise<void> {
    await this.outputs.remove(fileName);
    logger.info('Output deleted', { fileName });
  }
}
