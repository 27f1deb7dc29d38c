import type { IVoiceCloneService } from './types';
import { ElevenLabsVoiceCloneService } from './ElevenLabsVoiceCloneService';

let instance: IVoiceCloneService | null = null;

export function getVoiceCloneService(): IVoiceCloneService {
  if (!instance) {
    instance = new ElevenLabsVoiceCloneService();
  }
  return instance;
}

export type { AudioSample, CloneRequest, CloneResult, IVoiceCloneService, RemoteVoice } from './types';
