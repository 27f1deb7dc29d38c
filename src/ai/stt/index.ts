/**
 * Speech-to-text is handled by ElevenLabs Scribe.
 */
import type { ISTTService } from './types';
import { ElevenLabsSTTService } from './ElevenLabsSTTService';

let instance: ISTTService | null = null;

export function getSTTService(): ISTTService {
  if (!instance) {
    instance = new ElevenLabsSTTService();
  }
  return instance;
}

export type { ISTTService, TranscriptionOptions, TranscriptionResult, TranscriptWord } from './types';
