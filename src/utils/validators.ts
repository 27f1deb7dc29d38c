/**
 * Input checks shared by the services and the HTTP layer. Each returns a
 * { valid, message } pair so callers can surface the message as-is.
 */
import * as fs from 'fs';
import * as path from 'path';
import { isSupportedLanguage } from '../config/languages';

export interface ValidationResult {
  valid: boolean;
  message: string;
}

export const AUDIO_EXTENSIONS = ['.wav', '.mp3', '.ogg', '.flac', '.m4a', '.webm'] as const;
export const VALID_SAMPLE_RATES = [8000, 16000, 22050, 44100, 48000] as const;
export const MAX_AUDIO_FILE_MB = 50;
export const MAX_TEXT_LENGTH = 5000;

const ok = (message: string): ValidationResult => ({ valid: true, message });
const fail = (message: string): ValidationResult => ({ valid: false, message });

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return Number.NaN;
}

export function validateApiKey(apiKey: string | undefined): ValidationResult {
  if (!apiKey) return fail('API key is empty');
  if (apiKey.length < 20) return fail('API key too short');
  if (!/^(sk_)?[a-zA-Z0-9]+$/.test(apiKey)) return fail('API key contains invalid characters');
  return ok('API key valid');
}

export function validateAudioFileName(fileName: string): ValidationResult {
  const ext = path.extname(fileName).toLowerCase();
  if (!AUDIO_EXTENSIONS.some((allowed) => allowed === ext)) {
    return fail(`Invalid file format. Supported: ${AUDIO_EXTENSIONS.join(', ')}`);
  }
  return ok('Audio file name valid');
}

export function validateAudioFile(filePath: string): ValidationResult {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(filePath);
  } catch {
    return fail('File does not exist');
  }
  if (!stat.isFile()) return fail('Path is not a file');

  const name = validateAudioFileName(filePath);
  if (!name.valid) return name;

  const sizeMb = stat.size / (1024 * 1024);
  if (sizeMb > MAX_AUDIO_FILE_MB) {
    return fail(`File too large (${sizeMb.toFixed(1)}MB). Maximum: ${MAX_AUDIO_FILE_MB}MB`);
  }
  return ok('Audio file valid');
}

export function validateTextLength(text: string | undefined, maxLength: number = MAX_TEXT_LENGTH): ValidationResult {
  if (!text || text.trim() === '') return fail('Text is empty');
  if (text.length > maxLength) return fail(`Text too long (${text.length} chars). Maximum: ${maxLength}`);
  return ok(`Text valid (${text.length} chars)`);
}

export function validateLanguageCode(code: string | undefined): ValidationResult {
  if (!code) return fail('Language code is empty');
  if (!isSupportedLanguage(code)) return fail(`Language '${code}' not supported`);
  return ok(`Language '${code}' is supported`);
}

export function validateVoiceName(name: string | undefined): ValidationResult {
  if (!name || name.trim() === '') return fail('Voice name is empty');
  if (name.length < 3) return fail('Voice name too short (minimum 3 characters)');
  if (name.length > 50) return fail('Voice name too long (maximum 50 characters)');
  if (!/^[a-zA-Z0-9_\-\s]+$/.test(name)) return fail('Voice name contains invalid characters');
  return ok('Voice name valid');
}

export function validateRecordingDuration(duration: unknown, minSeconds = 3, maxSeconds = 600): ValidationResult {
  const value = toNumber(duration);
  if (Number.isNaN(value)) return fail('Invalid duration value');
  if (value < minSeconds) return fail(`Duration too short (${value}s). Minimum: ${minSeconds}s`);
  if (value > maxSeconds) return fail(`Duration too long (${value}s). Maximum: ${maxSeconds}s`);
  return ok(`Duration valid (${value}s)`);
}

function validateUnitInterval(label: string, input: unknown): ValidationResult {
  const value = toNumber(input);
  if (Number.isNaN(value)) return fail(`Invalid ${label.toLowerCase()} value`);
  if (value < 0 || value > 1) return fail(`${label} must be between 0.0 and 1.0 (got ${value})`);
  return ok(`${label} valid (${value})`);
}

export function validateStability(stability: unknown): ValidationResult {
  return validateUnitInterval('Stability', stability);
}

export function validateSimilarity(similarity: unknown): ValidationResult {
  return validateUnitInterval('Similarity', similarity);
}

export function validateSampleRate(sampleRate: unknown): ValidationResult {
  const value = toNumber(sampleRate);
  if (!Number.isInteger(value)) return fail('Invalid sample rate value');
  if (!VALID_SAMPLE_RATES.some((rate) => rate === value)) {
    return fail(`Sample rate must be one of: ${VALID_SAMPLE_RATES.join(', ')}`);
  }
  return ok(`Sample rate valid (${value} Hz)`);
}

export function validateChannels(channels: unknown): ValidationResult {
  const value = toNumber(channels);
  if (!Number.isInteger(value)) return fail('Invalid channels value');
  if (value !== 1 && value !== 2) return fail('Channels must be 1 (mono) or 2 (stereo)');
  return ok(`Channels valid (${value})`);
}

/** Strip characters that are invalid in file names, spaces to underscores, cap at 100 chars. */
export function sanitizeFilename(fileName: string): string {
  let sanitized = fileName.replace(/[<>:"/\\|?*]/g, '').replace(/ /g, '_');
  if (sanitized.length > 100) {
    const dot = sanitized.lastIndexOf('.');
    const ext = dot > 0 ? sanitized.slice(dot + 1) : '';
    const name = dot > 0 ? sanitized.slice(0, dot) : sanitized;
    sanitized = name.slice(0, 95) + (ext ? `.${ext}` : '');
  }
  return sanitized;
}
