/**
 * Capture side of the pipeline. The browser records the microphone; this
 * service stores what it uploads as recording files in the temp directory and
 * answers questions about them (info, level, microphone check).
 */
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import { logger } from '../config/logger';
import {
  audioInfoFromBuffer,
  encodeWav,
  measureLevel,
  measureLevelMeter,
  parseWavHeader,
  timestampSlug,
  type AudioInfo,
  type AudioLevel,
} from '../utils/audio';
import { ValidationError } from '../utils/errors';
import { validateAudioFileName, validateChannels, validateSampleRate } from '../utils/validators';
import { FileStore, type StoredFile } from './file-store';

export interface SaveRecordingOptions {
  originalName?: string;
  mimeType?: string;
}

export interface SavedRecording {
  fileName: string;
  path: string;
  info: AudioInfo;
}

export interface MicrophoneCheck extends AudioLevel {
  working: boolean;
  message: string;
}

/** Peak amplitude above which a recording counts as containing signal. */
export const SIGNAL_THRESHOLD = 0.001;

const MIME_EXTENSIONS: Readonly<Record<string, string>> = {
  'audio/wav': '.wav',
  'audio/wave': '.wav',
  'audio/x-wav': '.wav',
  'audio/mpeg': '.mp3',
  'audio/mp3': '.mp3',
  'audio/ogg': '.ogg',
  'audio/webm': '.webm',
  'audio/flac': '.flac',
  'audio/x-flac': '.flac',
  'audio/mp4': '.m4a',
  'audio/x-m4a': '.m4a',
};

function pickExtension(audio: Buffer, options: SaveRecordingOptions): string {
  if (parseWavHeader(audio)) return '.wav';

  if (options.originalName && validateAudioFileName(options.originalName).valid) {
    return path.extname(options.originalName).toLowerCase();
  }
  const mime = (options.mimeType || '').split(';')[0].trim().toLowerCase();
  const fromMime = MIME_EXTENSIONS[mime];
  if (fromMime) return fromMime;

  throw new ValidationError(
    `Unsupported audio format (name: ${options.originalName || '-'}, type: ${options.mimeType || '-'})`
  );
}

export class RecorderService {
  constructor(
    private readonly store: FileStore = new FileStore(config.paths.tempDir, 'Recording'),
    private readonly maxSeconds: number = config.recording.maxSeconds
  ) {}

  async saveRecording(audio: Buffer, options: SaveRecordingOptions = {}): Promise<SavedRecording> {
    if (!audio.length) {
      throw new ValidationError('No audio data recorded');
    }

    const ext = pickExtension(audio, options);
    const fileName = `recording_${timestampSlug()}_${uuidv4().slice(0, 8)}${ext}`;
    const info = audioInfoFromBuffer(audio, fileName);

    if (info.duration !== undefined) {
      if (info.duration <= 0) {
        throw new ValidationError('No audio data recorded');
      }
      if (info.duration > this.maxSeconds) {
        throw new ValidationError(
          `Recording too long (${info.duration.toFixed(1)}s). Maximum: ${this.maxSeconds}s`
        );
      }
    }

    const filePath = await this.store.write(fileName, audio);
    logger.info('Recording saved', { fileName, bytes: audio.length, duration: info.duration });
    return { fileName, path: filePath, info };
  }

  /** Store raw 16-bit little-endian PCM as a WAV recording. */
  async savePcmRecording(pcm: Buffer, format: { sampleRate: number; channels: number }): Promise<SavedRecording> {
    const rate = validateSampleRate(format.sampleRate);
    if (!rate.valid) throw new ValidationError(rate.message);
    const channels = validateChannels(format.channels);
    if (!channels.valid) throw new ValidationError(channels.message);

    const frameBytes = format.channels * 2;
    if (pcm.length % frameBytes !== 0) {
      throw new ValidationError(`PCM length ${pcm.length} is not a multiple of the frame size (${frameBytes} bytes)`);
    }

    return this.saveRecording(encodeWav(pcm, format), { originalName: 'recording.wav' });
  }

  listRecordings(): Promise<StoredFile[]> {
    return this.store.list();
  }

  getRecordingPath(fileName: string): string {
    return this.store.resolve(fileName);
  }

  readRecording(fileName: string): Promise<Buffer> {
    return this.store.read(fileName);
  }

  getRecordingInfo(fileName: string): Promise<AudioInfo> {
    return this.store.info(fileName);
  }

  async deleteRecording(fileName: string): Promise<void> {
    await this.store.remove(fileName);
    logger.info('Recording deleted', { fileName });
  }

  async measureRecordingLevel(fileName: string): Promise<AudioLevel> {
    return measureLevel(await this.store.read(fileName));
  }

  /** RMS per `chunkSeconds` over the recording, for drawing a level meter. */
  async measureRecordingMeter(fileName: string, chunkSeconds?: number): Promise<number[]> {
    return measureLevelMeter(await this.store.read(fileName), chunkSeconds);
  }

  /** Microphone check on a short test recording: is there any signal in it? */
  async testMicrophone(fileName: string): Promise<MicrophoneCheck> {
    const level = await this.measureRecordingLevel(fileName);
    const working = level.peak > SIGNAL_THRESHOLD;
    return {
      ...level,
      working,
      message: working
        ? `Microphone working. Max amplitude: ${level.peak.toFixed(4)}`
        : 'Microphone not detecting audio',
    };
  }
}
