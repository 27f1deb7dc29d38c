/**
 * Voice cloning abstraction: derive a synthetic voice from audio samples and
 * manage the voices held by the backend account.
 */

export interface AudioSample {
  data: Buffer;
  fileName: string;
  mimeType?: string;
}

export interface CloneRequest {
  name: string;
  description?: string;
  labels?: Record<string, string>;
  files: AudioSample[];
  removeBackgroundNoise?: boolean;
}

export interface CloneResult {
  voiceId: string;
  requiresVerification: boolean;
}

export interface RemoteVoice {
  voiceId: string;
  name: string;
  category: string;
  description: string | null;
  labels: Record<string, string>;
}

export interface IVoiceCloneService {
  clone(request: CloneRequest): Promise<CloneResult>;
  /** Null when the backend does not know the voice. */
  getVoice(voiceId: string): Promise<RemoteVoice | null>;
  listVoices(): Promise<RemoteVoice[]>;
  deleteVoice(voiceId: string): Promise<void>;
}
