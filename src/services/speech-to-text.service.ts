import * as path from 'path';
import { getSTTService, type ISTTService, type TranscriptionResult } from '../ai/stt';
import { normalizeLanguageCode } from '../config/languages';
import { logger } from '../config/logger';
import { getAudioInfo } from '../utils/audio';
import { errorMessage, ValidationError } from '../utils/errors';
import { validateAudioFile, type ValidationResult } from '../utils/validators';
import { RecorderService } from './recorder.service';
import type { TranslatorService } from './translator.service';

export const MIN_STT_SECONDS = 0.5;
export const MAX_STT_SECONDS = 300;
export const MIN_STT_SAMPLE_RATE = 8000;

const MIME_BY_EXTENSION: Readonly<Record<string, string>> = {
  '.wav': 'audio/wav',
  '.mp3': 'audio/mpeg',
  '.ogg': 'audio/ogg',
  '.flac': 'audio/flac',
  '.m4a': 'audio/mp4',
  '.webm': 'audio/webm',
};

export type BatchTranscription = { text: string } | { error: string };

export class SpeechToTextService {
  constructor(
    private readonly provider: ISTTService = getSTTService(),
    private readonly recorder: RecorderService = new RecorderService(),
    private readonly translator: TranslatorService | null = null
  ) {}

  async validateAudio(filePath: string): Promise<ValidationResult> {
    const file = validateAudioFile(filePath);
    if (!file.valid) return file;

    const info = await getAudioInfo(filePath);
    if (info.duration === undefined) {
      return { valid: true, message: `Audio accepted: ${info.format}, ${info.fileSizeMb.toFixed(2)}MB` };
    }
    const sampleRate = info.sampleRate ?? 0;
    if (info.duration < MIN_STT_SECONDS) {
      return { valid: false, message: `Audio too short (${info.duration.toFixed(1)}s)` };
    }
    if (info.duration > MAX_STT_SECONDS) {
      return { valid: false, message: `Audio too long (${info.duration.toFixed(1)}s). Maximum: ${MAX_STT_SECONDS}s` };
    }
    if (sampleRate < MIN_STT_SAMPLE_RATE) {
      return { valid: false, message: `Sample rate too low (${sampleRate} Hz)` };
    }
    return { valid: true, message: `Audio valid: ${info.duration.toFixed(1)}s, ${sampleRate} Hz` };
  }

  private async run(recording: string, languageCode: string | undefined, timestamps: boolean): Promise<TranscriptionResult> {
    const filePath = this.recorder.getRecordingPath(recording);
    const check = await this.validateAudio(filePath);
    if (!check.valid) throw new ValidationError(check.message);

    const audio = await this.recorder.readRecording(recording);
    logger.info('Transcribing recording', { recording, language: languageCode ?? 'auto' });
    const result = await this.provider.transcribe(audio, {
      fileName: recording,
      mimeType: MIME_BY_EXTENSION[path.extname(recording).toLowerCase()],
      languageCode: languageCode && languageCode !== 'auto' ? languageCode : undefined,
      timestamps,
    });
    logger.info('Transcription done', { recording, chars: result.text.length, language: result.languageCode });
    return result;
  }

  /** Transcribe a stored recording. An omitted language means auto-detect. */
  transcribe(recording: string, languageCode?: string): Promise<TranscriptionResult> {
    return this.run(recording, languageCode, false);
  }

  transcribeWithTimestamps(recording: string, languageCode?: string): Promise<TranscriptionResult> {
    return this.run(recording, languageCode, true);
  }

  /**
   * Spoken language of a recording: the code reported by the transcriber,
   * else detection on the transcript text. Null when neither gives one.
   */
  async detectLanguage(recording: string): Promise<string | null> {
    const result = await this.transcribe(recording);
    if (result.languageCode) return normalizeLanguageCode(result.languageCode);
    if (result.text && this.translator) return this.translator.detectLanguage(result.text);
    return null;
  }

  /** Transcribe each recording in turn; a failure is recorded and the batch continues. */
  async batchTranscribe(recordings: string[], languageCode?: string): Promise<Record<string, BatchTranscription>> {
    const results: Record<string, BatchTranscription> = {};
    for (const [i, recording] of recordings.entries()) {
      logger.debug('Batch transcription', { item: i + 1, of: recordings.length, recording });
      try {
        const { text } = await this.transcribe(recording, languageCode);
        results[recording] = { text };
      } catch (e) {
        logger.warn('Batch transcription item failed', { recording, error: errorMessage(e) });
        results[recording] = { error: errorMessage(e) };
      }
    }
    return results;
  }
}
