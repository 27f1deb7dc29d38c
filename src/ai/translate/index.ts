import type { ITranslationService } from './types';
import { GoogleTranslationService } from './GoogleTranslationService';

let instance: ITranslationService | null = null;

export function getTranslationService(): ITranslationService {
  if (!instance) {
    instance = new GoogleTranslationService();
  }
  return instance;
}

export type { ITranslationService, TranslationResult } from './types';
