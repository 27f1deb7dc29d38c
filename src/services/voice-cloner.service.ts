/**
 * Voice cloning: checks a recording is usable as a sample, sends it to the
 * cloning backend, and keeps a JSON record per cloned voice in the cloned
 * voices directory.
 */
import * as fs from 'fs';
import * as path from 'path';
import { getVoiceCloneService, type AudioSample, type IVoiceCloneService, type RemoteVoice } from '../ai/clone';
import { isRecord } from '../ai/http';
import type { VoiceSettings } from '../ai/tts';
import { config } from '../config';
import { logger } from '../config/logger';
import { getAudioInfo } from '../utils/audio';
import { AppError, errorMessage, isErrnoCode, NotFoundError, ValidationError } from '../utils/errors';
import {
  validateAudioFile,
  validateSimilarity,
  validateStability,
  validateVoiceName,
  type ValidationResult,
} from '../utils/validators';
import { RecorderService } from './recorder.service';

export interface VoiceRecord {
  voiceId: string;
  name: string;
  description: string;
  sourceAudio: string[];
  labels: Record<string, string>;
  requiresVerification: boolean;
  createdAt: string;
}

export interface CloneVoiceInput {
  recording: string;
  name: string;
  description?: string;
  labels?: Record<string, string>;
  removeBackgroundNoise?: boolean;
}

export interface CloneVoiceProfessionalInput {
  recordings: string[];
  name: string;
  description?: string;
  labels?: Record<string, string>;
}

const VOICE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

function isVoiceRecord(value: unknown): value is VoiceRecord {
  return (
    isRecord(value) &&
    typeof value.voiceId === 'string' &&
    value.voiceId.length > 0 &&
    typeof value.name === 'string' &&
    Array.isArray(value.sourceAudio) &&
    typeof value.createdAt === 'string'
  );
}

export class VoiceClonerService {
  constructor(
    private readonly provider: IVoiceCloneService = getVoiceCloneService(),
    private readonly recorder: RecorderService = new RecorderService(),
    private readonly recordsDir: string = config.paths.clonedVoicesDir,
    private readonly limits: { minSeconds: number; maxSeconds: number } = config.recording
  ) {}

  /** Is the file a usable cloning sample? Duration bounds apply where the container exposes it (WAV). */
  async validateAudioForCloning(
    filePath: string,
    minSeconds: number = this.limits.minSeconds,
    maxSeconds: number = this.limits.maxSeconds
  ): Promise<ValidationResult> {
    const file = validateAudioFile(filePath);
    if (!file.valid) return file;

    const info = await getAudioInfo(filePath);
    if (info.duration === undefined) {
      return {
        valid: true,
        message: `Audio accepted: ${info.format}, ${info.fileSizeMb.toFixed(2)}MB (duration not checked)`,
      };
    }

    const duration = info.duration;
    const sampleRate = info.sampleRate ?? 0;
    const channels = info.channels ?? 0;
    if (duration < minSeconds) {
      return { valid: false, message: `Audio too short (${duration.toFixed(1)}s). Minimum: ${minSeconds}s` };
    }
    if (duration > maxSeconds) {
      return { valid: false, message: `Audio too long (${duration.toFixed(1)}s). Maximum: ${maxSeconds}s` };
    }
    if (sampleRate < 16000) {
      return { valid: false, message: `Sample rate too low (${sampleRate} Hz). Recommended: 44100 Hz` };
    }
    if (channels > 2) {
      return { valid: false, message: `Too many channels (${channels}). Use mono or stereo.` };
    }
    return {
      valid: true,
      message: `Audio valid: ${duration.toFixed(1)}s, ${sampleRate} Hz, ${channels} channel(s)`,
    };
  }

  async validateRecordingForCloning(recording: string): Promise<ValidationResult> {
    return this.validateAudioForCloning(this.recorder.getRecordingPath(recording));
  }

  private async loadSample(recording: string): Promise<AudioSample> {
    const filePath = this.recorder.getRecordingPath(recording);
    const check = await this.validateAudioForCloning(filePath);
    if (!check.valid) throw new ValidationError(`${recording}: ${check.message}`);
    return { data: await this.recorder.readRecording(recording), fileName: recording };
  }

  async cloneVoice(input: CloneVoiceInput): Promise<VoiceRecord> {
    const name = validateVoiceName(input.name);
    if (!name.valid) throw new ValidationError(name.message);

    const sample = await this.loadSample(input.recording);
    logger.info('Cloning voice', { name: input.name, recording: input.recording });

    const description = input.description || 'Cloned voice';
    const result = await this.provider.clone({
      name: input.name,
      description,
      labels: input.labels,
      files: [sample],
      removeBackgroundNoise: input.removeBackgroundNoise,
    });
    logger.info('Voice cloned', { voiceId: result.voiceId, name: input.name });

    return this.saveRecord({
      voiceId: result.voiceId,
      name: input.name,
      description,
      sourceAudio: [input.recording],
      labels: input.labels ?? {},
      requiresVerification: result.requiresVerification,
      createdAt: new Date().toISOString(),
    });
  }

  /** Clone from several samples for a closer match. */
  async cloneVoiceProfessional(input: CloneVoiceProfessionalInput): Promise<VoiceRecord> {
    const name = validateVoiceName(input.name);
    if (!name.valid) throw new ValidationError(name.message);
    if (!input.recordings.length) throw new ValidationError('At least one recording is required');

    const samples: AudioSample[] = [];
    for (const recording of input.recordings) {
      samples.push(await this.loadSample(recording));
    }
    logger.info('Professional voice cloning started', { name: input.name, files: samples.length });

    const description = input.description || 'Professional cloned voice';
    const result = await this.provider.clone({
      name: input.name,
      description,
      labels: input.labels,
      files: samples,
    });

    return this.saveRecord({
      voiceId: result.voiceId,
      name: input.name,
      description,
      sourceAudio: [...input.recordings],
      labels: input.labels ?? {},
      requiresVerification: result.requiresVerification,
      createdAt: new Date().toISOString(),
    });
  }

  private recordPath(voiceId: string): string {
    if (!VOICE_ID_PATTERN.test(voiceId)) {
      throw new ValidationError(`Invalid voice id: ${voiceId}`);
    }
    return path.join(this.recordsDir, `${voiceId}.json`);
  }

  private async saveRecord(record: VoiceRecord): Promise<VoiceRecord> {
    try {
      await fs.promises.mkdir(this.recordsDir, { recursive: true });
      await fs.promises.writeFile(this.recordPath(record.voiceId), JSON.stringify(record, null, 2), 'utf8');
      logger.debug('Voice record saved', { voiceId: record.voiceId });
    } catch (e) {
      // The voice exists remotely either way; a missing local record only hides it from /voices/local.
      logger.warn('Could not save voice record', { voiceId: record.voiceId, error: errorMessage(e) });
    }
    return record;
  }

  async getLocalVoice(voiceId: string): Promise<VoiceRecord | null> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.recordPath(voiceId), 'utf8');
    } catch (e) {
      if (isErrnoCode(e, 'ENOENT')) return null;
      throw e;
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      return isVoiceRecord(parsed) ? parsed : null;
    } catch (e) {
      logger.warn('Skipping unreadable voice record', { voiceId, error: errorMessage(e) });
      return null;
    }
  }

  async listLocalVoices(): Promise<VoiceRecord[]> {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.recordsDir);
    } catch (e) {
      if (isErrnoCode(e, 'ENOENT')) return [];
      throw e;
    }

    const records: VoiceRecord[] = [];
    for (const name of names.filter((n) => n.endsWith('.json'))) {
      try {
        const parsed: unknown = JSON.parse(await fs.promises.readFile(path.join(this.recordsDir, name), 'utf8'));
        if (isVoiceRecord(parsed)) records.push(parsed);
      } catch (e) {
        logger.warn('Skipping unreadable voice record', { file: name, error: errorMessage(e) });
      }
    }
    return records.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async getVoiceInfo(voiceId: string): Promise<RemoteVoice> {
    const voice = await this.provider.getVoice(voiceId);
    if (!voice) throw new NotFoundError(`Voice not found: ${voiceId}`);
    return voice;
  }

  /** Voices on the account that were cloned (category "cloned"), not the premade ones. */
  async listClonedVoices(): Promise<RemoteVoice[]> {
    const voices = await this.provider.listVoices();
    return voices.filter((v) => v.category.toLowerCase().includes('clone'));
  }

  async deleteVoice(voiceId: string): Promise<void> {
    const recordPath = this.recordPath(voiceId);
    try {
      await this.provider.deleteVoice(voiceId);
    } catch (e) {
      if (!(e instanceof AppError && e.status === 404)) throw e;
      logger.warn('Voice already gone from the account, removing local record', { voiceId });
    }
    try {
      await fs.promises.unlink(recordPath);
    } catch (e) {
      if (!isErrnoCode(e, 'ENOENT')) throw e;
    }
    logger.info('Voice deleted', { voiceId });
  }

  getVoiceSettings(stability: number = config.voice.stability, similarity: number = config.voice.similarity): VoiceSettings {
    const s = validateStability(stability);
    if (!s.valid) throw new ValidationError(s.message);
    const m = validateSimilarity(similarity);
    if (!m.valid) throw new ValidationError(m.message);
    return { stability, similarity };
  }
}
