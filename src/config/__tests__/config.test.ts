import * as fs from 'fs';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { makeTempDir, removeDir } from '../../__tests__/helpers';
import { ensureDirectories, getConfigSummary, loadConfig, validateConfig } from '..';
import { isSupportedLanguage, normalizeLanguageCode, SUPPORTED_LANGUAGES } from '../languages';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    const cfg = loadConfig({});
    expect(cfg.port).toBe(4000);
    expect(cfg.apiPrefix).toBe('/api/v1');
    expect(cfg.app.name).toBe('PolyVoice');
    expect(cfg.elevenLabs.sttModel).toBe('scribe_v1');
    expect(cfg.elevenLabs.defaultModel).toBe('eleven_multilingual_v2');
    expect(cfg.elevenLabs.outputFormat).toBe('mp3_44100_128');
    expect(cfg.audio.sampleRate).toBe(44100);
    expect(cfg.recording).toEqual({ minSeconds: 3, maxSeconds: 600, defaultSeconds: 30 });
    expect(cfg.requestTimeoutMs).toBe(30000);
    expect(cfg.voice.stability).toBe(0.5);
    expect(cfg.voice.similarity).toBe(0.75);
    expect(cfg.paths.tempDir).toBe(path.resolve(process.cwd(), 'assets', 'temp'));
  });

  it('parses env overrides', () => {
    const cfg = loadConfig({
      PORT: '5050',
      SAMPLE_RATE: '16000',
      REQUEST_TIMEOUT: '5',
      DEFAULT_VOICE_STABILITY: '0.3',
      DEBUG_MODE: 'true',
      TEMP_DIR: '/tmp/polyvoice-temp',
    });
    expect(cfg.port).toBe(5050);
    expect(cfg.audio.sampleRate).toBe(16000);
    expect(cfg.requestTimeoutMs).toBe(5000);
    expect(cfg.voice.stability).toBe(0.3);
    expect(cfg.app.debug).toBe(true);
    expect(cfg.paths.tempDir).toBe('/tmp/polyvoice-temp');
  });
});

describe('validateConfig', () => {
  it('flags a missing API key', () => {
    expect(validateConfig(loadConfig({}))).toEqual(['ELEVENLABS_API_KEY is not set']);
  });

  it('lists every invalid setting', () => {
    const cfg = loadConfig({
      ELEVENLABS_API_KEY: 'test-secret',
      SAMPLE_RATE: '96000',
      CHANNELS: '3',
      MIN_RECORDING_DURATION: '0',
      MAX_RECORDING_DURATION: '-1',
    });
    expect(validateConfig(cfg)).toEqual([
      'Invalid SAMPLE_RATE: 96000',
      'Invalid CHANNELS: 3',
      'MIN_RECORDING_DURATION too small: 0',
      'MAX_RECORDING_DURATION must be >= MIN_RECORDING_DURATION',
    ]);
  });
});

describe('getConfigSummary', () => {
  it('reports whether a key is set without exposing it', () => {
    const summary = getConfigSummary(loadConfig({ ELEVENLABS_API_KEY: 'test-secret' }));
    expect(summary).toEqual({
      appName: 'PolyVoice',
      version: '1.0.0',
      debugMode: false,
      sampleRate: 44100,
      channels: 1,
      minRecording: 3,
      maxRecording: 600,
      voiceCloneType: 'instant',
      supportedLanguages: 29,
      apiKeyConfigured: true,
    });
    expect(JSON.stringify(summary)).not.toContain('test-secret');
  });
});

describe('ensureDirectories', () => {
  it('creates the asset directories', () => {
    const dir = makeTempDir();
    try {
      const cfg = loadConfig({ ASSETS_DIR: dir });
      ensureDirectories(cfg);
      expect(fs.readdirSync(dir).sort()).toEqual(['cloned_voices', 'outputs', 'temp']);
    } finally {
      removeDir(dir);
    }
  });
});

describe('languages', () => {
  it('has 29 supported languages', () => {
    expect(Object.keys(SUPPORTED_LANGUAGES)).toHaveLength(29);
  });

  it('normalizes service language tags', () => {
    expect(normalizeLanguageCode('zh-CN')).toBe('zh');
    expect(normalizeLanguageCode('ENG')).toBe('en');
    expect(normalizeLanguageCode('cmn')).toBe('zh');
    expect(normalizeLanguageCode('pt_BR')).toBe('pt');
  });

  it('does not treat object keys as languages', () => {
    expect(isSupportedLanguage('toString')).toBe(false);
    expect(isSupportedLanguage('uk')).toBe(true);
  });
});
