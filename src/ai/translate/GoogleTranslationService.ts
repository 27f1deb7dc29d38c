import { normalizeLanguageCode } from '../../config/languages';
import { ExternalServiceError } from '../../utils/errors';
import { createTranslateHttp, toServiceError, type HttpClient } from '../http';
import type { ITranslationService, TranslationResult } from './types';

/**
 * Google Translate web endpoint (client=gtx). The response is a nested array:
 * [0] holds [translated, original, ...] segments and [2] the source language.
 */
export function parseGtxResponse(data: unknown): TranslationResult {
  if (!Array.isArray(data) || !Array.isArray(data[0])) {
    throw new ExternalServiceError('Google Translate', 'Google Translate returned an unexpected response');
  }

  const segments: unknown[] = data[0];
  const text = segments
    .map((seg) => (Array.isArray(seg) && typeof seg[0] === 'string' ? seg[0] : ''))
    .join('');
  const source = typeof data[2] === 'string' ? normalizeLanguageCode(data[2]) : '';

  return { text, sourceLanguage: source };
}

export class GoogleTranslationService implements ITranslationService {
  constructor(private readonly http: HttpClient = createTranslateHttp()) {}

  async translate(text: string, targetLanguage: string, sourceLanguage = 'auto'): Promise<TranslationResult> {
    let data: unknown;
    try {
      const res = await this.http.get<unknown>('/translate_a/single', {
        params: { client: 'gtx', sl: sourceLanguage, tl: targetLanguage, dt: 't', q: text },
      });
      data = res.data;
    } catch (e) {
      throw toServiceError('Google Translate', 'translation', e);
    }

    const result = parseGtxResponse(data);
    return {
      text: result.text,
      sourceLanguage: result.sourceLanguage || (sourceLanguage === 'auto' ? '' : sourceLanguage),
    };
  }

  async detect(text: string): Promise<string> {
    const { sourceLanguage } = await this.translate(text, 'en', 'auto');
    if (!sourceLanguage) {
      throw new ExternalServiceError('Google Translate', 'Google Translate could not detect the language');
    }
    return sourceLanguage;
  }
}
