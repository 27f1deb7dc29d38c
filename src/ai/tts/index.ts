/**
 * Speech synthesis in cloned voices goes through ElevenLabs.
 */
import type { ITTSService } from './types';
import { ElevenLabsTTSService } from './ElevenLabsTTSService';

let instance: ITTSService | null = null;

export function getTTSService(): ITTSService {
  if (!instance) {
    instance = new ElevenLabsTTSService();
  }
  return instance;
}

export type { ITTSService, SynthesisOptions, VoiceSettings } from './types';
