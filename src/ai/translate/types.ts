/**
 * Machine translation abstraction.
 */

export interface TranslationResult {
  text: string;
  /** Language the backend translated from (detected when the source was 'auto'). */
  sourceLanguage: string;
}

export interface ITranslationService {
  translate(text: string, targetLanguage: string, sourceLanguage?: string): Promise<TranslationResult>;
  /** Detected language code of the text. */
  detect(text: string): Promise<string>;
}
