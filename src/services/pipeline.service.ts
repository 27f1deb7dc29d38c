/**
 * Full translate-and-speak run on one recording:
 *   1. transcribe the speech
 *   2. translate the transcript
 *   3. speak the translation in the cloned voice
 */
import { config } from '../config';
import { isSupportedLanguage, normalizeLanguageCode } from '../config/languages';
import { logger } from '../config/logger';
import { ValidationError } from '../utils/errors';
import { MAX_TEXT_LENGTH, sanitizeFilename } from '../utils/validators';
import type { SpeechToTextService } from './speech-to-text.service';
import type { TextToSpeechService } from './text-to-speech.service';
import type { TranslatorService } from './translator.service';

export interface TranslateAndSpeakInput {
  recording: string;
  voiceId: string;
  targetLanguage: string;
  /** Spoken language of the recording; omitted or "auto" to detect. */
  sourceLanguage?: string;
  stability?: number;
  similarity?: number;
  modelId?: string;
}

export interface TranslateAndSpeakResult {
  transcribedText: string;
  translatedText: string;
  sourceLanguage: string;
  targetLanguage: string;
  voiceId: string;
  output: {
    fileName: string;
    path: string;
    bytes: number;
    /** Name suggested to the client when downloading. */
    downloadName: string;
  };
}

function ensureSpeakable(text: string, what: string): void {
  if (text.length > MAX_TEXT_LENGTH) {
    throw new ValidationError(
      `Recording is too long to speak back: ${what} has ${text.length} characters, maximum is ${MAX_TEXT_LENGTH}`
    );
  }
}

export function downloadNameFor(targetLanguage: string, appName: string = config.app.name): string {
  return sanitizeFilename(`${appName.toLowerCase()}_output_${targetLanguage}.mp3`);
}

export class PipelineService {
  constructor(
    private readonly stt: SpeechToTextService,
    private readonly translator: TranslatorService,
    private readonly tts: TextToSpeechService
  ) {}

  async translateAndSpeak(input: TranslateAndSpeakInput): Promise<TranslateAndSpeakResult> {
    const { recording, voiceId, targetLanguage } = input;
    if (!isSupportedLanguage(targetLanguage)) {
      throw new ValidationError(`Language '${targetLanguage}' not supported`);
    }
    const requested = input.sourceLanguage && input.sourceLanguage !== 'auto' ? input.sourceLanguage : undefined;

    logger.info('Step 1/3: transcribing', { recording });
    const transcription = await this.stt.transcribe(recording, requested);
    if (!transcription.text) {
      throw new ValidationError('No speech recognized in recording');
    }
    ensureSpeakable(transcription.text, 'transcript');

    logger.info('Step 2/3: translating', { to: targetLanguage });
    const heard = requested ?? (transcription.languageCode ? normalizeLanguageCode(transcription.languageCode) : 'auto');
    const translation = await this.translator.translate(transcription.text, targetLanguage, heard);

    ensureSpeakable(translation.text, 'translation');

    logger.info('Step 3/3: speaking', { voiceId });
    const audio = await this.tts.synthesize({
      text: translation.text,
      voiceId,
      stability: input.stability,
      similarity: input.similarity,
      modelId: input.modelId,
    });

    logger.info('Pipeline complete', { recording, output: audio.fileName });
    return {
      transcribedText: transcription.text,
      translatedText: translation.text,
      sourceLanguage: translation.sourceLanguage,
      targetLanguage,
      voiceId,
      output: {
        fileName: audio.fileName,
        path: audio.path,
        bytes: audio.bytes,
        downloadName: downloadNameFor(targetLanguage),
      },
    };
  }
}
