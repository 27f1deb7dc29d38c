/**
 * Central configuration. All env vars are read here so the rest of the app
 * stays env-agnostic and testable.
 */
import dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { SUPPORTED_LANGUAGES } from './languages';

dotenv.config();

export type Env = Record<string, string | undefined>;

function int(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function float(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value ?? '');
  return Number.isFinite(parsed) ? parsed : fallback;
}

function bool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return value.toLowerCase() === 'true';
}

/** ElevenLabs text-to-speech models offered to clients. */
export const TTS_MODELS = {
  monolingual: 'eleven_monolingual_v1',
  multilingual: 'eleven_multilingual_v2',
  turbo: 'eleven_turbo_v2',
} as const;

export type TTSModelKey = keyof typeof TTS_MODELS;

export function loadConfig(env: Env = process.env) {
  const assetsDir = path.resolve(process.cwd(), env.ASSETS_DIR || 'assets');
  const resolveDir = (value: string | undefined, name: string): string =>
    value ? path.resolve(process.cwd(), value) : path.join(assetsDir, name);

  return {
    env: env.NODE_ENV || 'development',
    port: int(env.PORT, 4000),
    apiPrefix: env.API_PREFIX || '/api/v1',

    app: {
      name: env.APP_NAME || 'PolyVoice',
      version: '1.0.0',
      debug: bool(env.DEBUG_MODE, false),
    },

    elevenLabs: {
      apiKey: env.ELEVENLABS_API_KEY || '',
      baseUrl: env.ELEVENLABS_BASE_URL || 'https://api.elevenlabs.io',
      sttModel: env.ELEVENLABS_STT_MODEL || 'scribe_v1',
      outputFormat: env.ELEVENLABS_OUTPUT_FORMAT || 'mp3_44100_128',
      defaultModel: env.ELEVENLABS_TTS_MODEL || TTS_MODELS.multilingual,
    },

    translation: {
      baseUrl: env.TRANSLATE_BASE_URL || 'https://translate.googleapis.com',
      defaultSource: env.DEFAULT_SOURCE_LANG || 'auto',
      defaultTarget: env.DEFAULT_TARGET_LANG || 'en',
    },

    audio: {
      sampleRate: int(env.SAMPLE_RATE, 44100),
      channels: int(env.CHANNELS, 1),
      format: env.AUDIO_FORMAT || 'wav',
      maxUploadMb: int(env.MAX_UPLOAD_MB, 50),
    },

    paths: {
      assetsDir,
      tempDir: resolveDir(env.TEMP_DIR, 'temp'),
      clonedVoicesDir: resolveDir(env.CLONED_VOICES_DIR, 'cloned_voices'),
      outputDir: resolveDir(env.OUTPUT_DIR, 'outputs'),
    },

    recording: {
      minSeconds: int(env.MIN_RECORDING_DURATION, 3),
      maxSeconds: int(env.MAX_RECORDING_DURATION, 600),
      defaultSeconds: int(env.DEFAULT_RECORDING_DURATION, 30),
    },

    /** Per-request timeout for outbound API calls. */
    requestTimeoutMs: int(env.REQUEST_TIMEOUT, 30) * 1000,

    voice: {
      cloneType: env.VOICE_CLONE_TYPE || 'instant',
      stability: float(env.DEFAULT_VOICE_STABILITY, 0.5),
      similarity: float(env.DEFAULT_VOICE_SIMILARITY, 0.75),
      speechRate: float(env.DEFAULT_SPEECH_RATE, 1.0),
    },

    cleanup: {
      tempMaxAgeHours: int(env.TEMP_MAX_AGE_HOURS, 24),
      intervalMinutes: int(env.CLEANUP_INTERVAL_MINUTES, 60),
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config = loadConfig();

/** Returns the list of problems with the given configuration; empty when usable. */
export function validateConfig(cfg: AppConfig = config): string[] {
  const errors: string[] = [];

  if (!cfg.elevenLabs.apiKey) {
    errors.push('ELEVENLABS_API_KEY is not set');
  }
  if (cfg.audio.sampleRate < 8000 || cfg.audio.sampleRate > 48000) {
    errors.push(`Invalid SAMPLE_RATE: ${cfg.audio.sampleRate}`);
  }
  if (cfg.audio.channels !== 1 && cfg.audio.channels !== 2) {
    errors.push(`Invalid CHANNELS: ${cfg.audio.channels}`);
  }
  if (cfg.recording.minSeconds < 1) {
    errors.push(`MIN_RECORDING_DURATION too small: ${cfg.recording.minSeconds}`);
  }
  if (cfg.recording.maxSeconds < cfg.recording.minSeconds) {
    errors.push('MAX_RECORDING_DURATION must be >= MIN_RECORDING_DURATION');
  }

  return errors;
}

export function getConfigSummary(cfg: AppConfig = config) {
  return {
    appName: cfg.app.name,
    version: cfg.app.version,
    debugMode: cfg.app.debug,
    sampleRate: cfg.audio.sampleRate,
    channels: cfg.audio.channels,
    minRecording: cfg.recording.minSeconds,
    maxRecording: cfg.recording.maxSeconds,
    voiceCloneType: cfg.voice.cloneType,
    supportedLanguages: Object.keys(SUPPORTED_LANGUAGES).length,
    apiKeyConfigured: cfg.elevenLabs.apiKey.length > 0,
  };
}

export function ensureDirectories(cfg: AppConfig = config): void {
  for (const dir of [cfg.paths.tempDir, cfg.paths.clonedVoicesDir, cfg.paths.outputDir]) {
    fs.mkdirSync(dir, { recursive: true });
  }
}
