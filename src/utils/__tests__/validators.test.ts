import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeTempDir, removeDir, wav } from '../../__tests__/helpers';
import {
  sanitizeFilename,
  validateApiKey,
  validateAudioFile,
  validateAudioFileName,
  validateChannels,
  validateLanguageCode,
  validateRecordingDuration,
  validateSampleRate,
  validateSimilarity,
  validateStability,
  validateTextLength,
  validateVoiceName,
} from '../validators';

describe('validateApiKey', () => {
  it('rejects empty, short and malformed keys', () => {
    expect(validateApiKey('')).toEqual({ valid: false, message: 'API key is empty' });
    expect(validateApiKey('short')).toEqual({ valid: false, message: 'API key too short' });
    expect(validateApiKey('abcdefghijklmnopqrst-uv')).toEqual({
      valid: false,
      message: 'API key contains invalid characters',
    });
  });

  it('accepts keys with or without the sk_ prefix', () => {
    expect(validateApiKey(`sk_${'a1'.repeat(15)}`).valid).toBe(true);
    expect(validateApiKey('a1'.repeat(12)).valid).toBe(true);
  });
});

describe('audio file checks', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('checks the extension case-insensitively', () => {
    expect(validateAudioFileName('voice.MP3').valid).toBe(true);
    expect(validateAudioFileName('notes.txt')).toEqual({
      valid: false,
      message: 'Invalid file format. Supported: .wav, .mp3, .ogg, .flac, .m4a, .webm',
    });
  });

  it('reports missing paths, directories and bad formats', () => {
    fs.mkdirSync(path.join(dir, 'folder.wav'));
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'hello');

    expect(validateAudioFile(path.join(dir, 'missing.wav')).message).toBe('File does not exist');
    expect(validateAudioFile(path.join(dir, 'folder.wav')).message).toBe('Path is not a file');
    expect(validateAudioFile(path.join(dir, 'notes.txt')).valid).toBe(false);
  });

  it('accepts a real audio file', () => {
    const file = path.join(dir, 'clip.wav');
    fs.writeFileSync(file, wav(0.1));
    expect(validateAudioFile(file)).toEqual({ valid: true, message: 'Audio file valid' });
  });
});

describe('validateTextLength', () => {
  it('rejects blank and overlong text', () => {
    expect(validateTextLength('   ').message).toBe('Text is empty');
    expect(validateTextLength(undefined).message).toBe('Text is empty');
    expect(validateTextLength('abcdef', 5).message).toBe('Text too long (6 chars). Maximum: 5');
  });

  it('reports the length of valid text', () => {
    expect(validateTextLength('hello')).toEqual({ valid: true, message: 'Text valid (5 chars)' });
  });
});

describe('validateLanguageCode', () => {
  it('knows the supported set', () => {
    expect(validateLanguageCode('tr').valid).toBe(true);
    expect(validateLanguageCode('xx').message).toBe("Language 'xx' not supported");
    expect(validateLanguageCode('').message).toBe('Language code is empty');
  });
});

describe('validateVoiceName', () => {
  it('enforces length and characters', () => {
    expect(validateVoiceName('ab').message).toBe('Voice name too short (minimum 3 characters)');
    expect(validateVoiceName('x'.repeat(51)).message).toBe('Voice name too long (maximum 50 characters)');
    expect(validateVoiceName('bad$name').message).toBe('Voice name contains invalid characters');
    expect(validateVoiceName('My Voice_1-b').valid).toBe(true);
  });
});

describe('numeric validators', () => {
  it('bounds recording duration', () => {
    expect(validateRecordingDuration(2).message).toBe('Duration too short (2s). Minimum: 3s');
    expect(validateRecordingDuration(601).message).toBe('Duration too long (601s). Maximum: 600s');
    expect(validateRecordingDuration('abc').message).toBe('Invalid duration value');
    expect(validateRecordingDuration('30')).toEqual({ valid: true, message: 'Duration valid (30s)' });
  });

  it('keeps stability and similarity in 0..1', () => {
    expect(validateStability(1.5).message).toBe('Stability must be between 0.0 and 1.0 (got 1.5)');
    expect(validateStability(0).valid).toBe(true);
    expect(validateSimilarity('0.8')).toEqual({ valid: true, message: 'Similarity valid (0.8)' });
    expect(validateSimilarity(-0.1).valid).toBe(false);
  });

  it('accepts only standard sample rates and mono or stereo', () => {
    expect(validateSampleRate(44100).valid).toBe(true);
    expect(validateSampleRate(12345).message).toBe('Sample rate must be one of: 8000, 16000, 22050, 44100, 48000');
    expect(validateChannels(2).valid).toBe(true);
    expect(validateChannels(3).message).toBe('Channels must be 1 (mono) or 2 (stereo)');
  });
});

describe('sanitizeFilename', () => {
  it('strips reserved characters and replaces spaces', () => {
    expect(sanitizeFilename('my voice?.mp3')).toBe('my_voice.mp3');
    expect(sanitizeFilename('a<b>c:d|e.wav')).toBe('abcde.wav');
  });

  it('caps long names and keeps the extension', () => {
    expect(sanitizeFilename(`${'a'.repeat(120)}.mp3`)).toBe(`${'a'.repeat(95)}.mp3`);
  });
});
