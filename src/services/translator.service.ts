/**
 * Text translation between the supported languages. The source language is
 * detected when not given; text already in the target language is returned
 * as-is without a round trip.
 */
import { getTranslationService, type ITranslationService } from '../ai/translate';
import { isSupportedLanguage, normalizeLanguageCode, SUPPORTED_LANGUAGES } from '../config/languages';
import { logger } from '../config/logger';
import { errorMessage, ValidationError } from '../utils/errors';
import { MAX_TEXT_LENGTH, validateTextLength, type ValidationResult } from '../utils/validators';

export interface TranslationOutcome {
  text: string;
  sourceLanguage: string;
  targetLanguage: string;
  /** False when source and target matched and the input came back unchanged. */
  translated: boolean;
}

export const DEFAULT_CHUNK_SIZE = 1000;
const FALLBACK_SOURCE_LANGUAGE = 'en';

/**
 * Split text into chunks of at most `maxChunkSize` characters on sentence
 * boundaries (. ! ?). Every sentence ends with a period in the output.
 * Sentences longer than a chunk are broken between words.
 */
export function splitLongText(text: string, maxChunkSize: number = DEFAULT_CHUNK_SIZE): string[] {
  const units: string[] = [];
  for (const raw of text.split(/[.!?]+/)) {
    const sentence = raw.trim().replace(/\s+/g, ' ');
    if (!sentence) continue;

    const full = `${sentence}.`;
    if (full.length <= maxChunkSize) {
      units.push(full);
      continue;
    }
    let piece = '';
    for (const word of full.split(' ')) {
      if (piece && piece.length + 1 + word.length > maxChunkSize) {
        units.push(piece);
        piece = word;
      } else {
        piece = piece ? `${piece} ${word}` : word;
      }
    }
    if (piece) units.push(piece);
  }

  const chunks: string[] = [];
  let current = '';
  for (const unit of units) {
    if (current && current.length + 1 + unit.length > maxChunkSize) {
      chunks.push(current);
      current = unit;
    } else {
      current = current ? `${current} ${unit}` : unit;
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

export class TranslatorService {
  constructor(private readonly provider: ITranslationService = getTranslationService()) {}

  async translate(text: string, targetLanguage: string, sourceLanguage = 'auto'): Promise<TranslationOutcome> {
    if (!text || text.trim() === '') {
      throw new ValidationError('Text is empty');
    }
    if (!isSupportedLanguage(targetLanguage)) {
      throw new ValidationError(`Language '${targetLanguage}' not supported`);
    }

    let source = sourceLanguage;
    if (source === 'auto') {
      const detected = await this.detectLanguage(text);
      if (detected) {
        logger.debug('Detected source language', { language: detected });
        source = detected;
      } else {
        logger.warn('Could not detect source language, assuming English');
        source = FALLBACK_SOURCE_LANGUAGE;
      }
    }

    if (source === targetLanguage) {
      return { text, sourceLanguage: source, targetLanguage, translated: false };
    }

    logger.info('Translating text', { from: source, to: targetLanguage, chars: text.length });
    const result = await this.provider.translate(text, targetLanguage, source);
    return { text: result.text, sourceLanguage: source, targetLanguage, translated: true };
  }

  async translateBatch(texts: string[], targetLanguage: string, sourceLanguage = 'auto'): Promise<TranslationOutcome[]> {
    const results: TranslationOutcome[] = [];
    for (const text of texts) {
      results.push(await this.translate(text, targetLanguage, sourceLanguage));
    }
    return results;
  }

  /** Detected language code, or null when detection fails. */
  async detectLanguage(text: string): Promise<string | null> {
    if (!text.trim()) return null;
    try {
      return normalizeLanguageCode(await this.provider.detect(text));
    } catch (e) {
      logger.warn('Language detection failed', { error: errorMessage(e) });
      return null;
    }
  }

  getLanguageName(code: string): string {
    return SUPPORTED_LANGUAGES[code]?.name ?? code.toUpperCase();
  }

  isLanguageSupported(code: string): boolean {
    return isSupportedLanguage(code);
  }

  validateText(text: string, maxLength: number = MAX_TEXT_LENGTH): ValidationResult {
    return validateTextLength(text, maxLength);
  }

  splitLongText(text: string, maxChunkSize: number = DEFAULT_CHUNK_SIZE): string[] {
    return splitLongText(text, maxChunkSize);
  }

  /** Translate chunk by chunk and join the results with spaces. */
  async translateLongText(
    text: string,
    targetLanguage: string,
    sourceLanguage = 'auto',
    maxChunkSize: number = DEFAULT_CHUNK_SIZE
  ): Promise<TranslationOutcome> {
    const chunks = splitLongText(text, maxChunkSize);
    if (!chunks.length) throw new ValidationError('Text is empty');

    // Detect once on the whole text so every chunk shares the same source.
    let source = sourceLanguage;
    if (source === 'auto') source = (await this.detectLanguage(text)) ?? FALLBACK_SOURCE_LANGUAGE;

    const parts: string[] = [];
    let translated = false;
    for (const [i, chunk] of chunks.entries()) {
      logger.debug('Translating chunk', { chunk: i + 1, of: chunks.length });
      const result = await this.translate(chunk, targetLanguage, source);
      translated = translated || result.translated;
      parts.push(result.text);
    }
    return { text: parts.join(' '), sourceLanguage: source, targetLanguage, translated };
  }

  /** Main translation plus alternatives; only one engine is wired, so alternatives stay empty. */
  async translateWithAlternatives(
    text: string,
    targetLanguage: string,
    sourceLanguage = 'auto'
  ): Promise<{ main: TranslationOutcome; alternatives: TranslationOutcome[] }> {
    const main = await this.translate(text, targetLanguage, sourceLanguage);
    return { main, alternatives: [] };
  }
}
