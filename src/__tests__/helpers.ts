/** Shared fixtures for the test suites: temp dirs, WAV buffers, stub HTTP and fake providers. */
import axios, { AxiosError, type InternalAxiosRequestConfig } from 'axios';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import type { CloneRequest, CloneResult, IVoiceCloneService, RemoteVoice } from '../ai/clone';
import type { ISTTService, TranscriptionOptions, TranscriptionResult } from '../ai/stt';
import type { ITranslationService, TranslationResult } from '../ai/translate';
import type { ITTSService, SynthesisOptions } from '../ai/tts';
import { loadConfig } from '../config';
import { encodeWav } from '../utils/audio';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'polyvoice-test-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testConfig(dir: string) {
  return loadConfig({ ASSETS_DIR: dir, ELEVENLABS_API_KEY: 'test-secret' });
}

/** 16-bit PCM WAV of the given length; every sample set to `amplitude`. */
export function wav(
  seconds: number,
  { sampleRate = 16000, channels = 1, amplitude = 0 }: { sampleRate?: number; channels?: number; amplitude?: number } = {}
): Buffer {
  const frames = Math.round(seconds * sampleRate);
  const pcm = Buffer.alloc(frames * channels * 2);
  if (amplitude) {
    for (let i = 0; i < frames * channels; i++) pcm.writeInt16LE(amplitude, i * 2);
  }
  return encodeWav(pcm, { sampleRate, channels });
}

/** A real axios instance whose adapter answers from `handler` and records every request. */
export function stubHttp(handler: (req: InternalAxiosRequestConfig) => unknown) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    baseURL: 'https://api.test',
    adapter: async (req) => {
      requests.push(req);
      const data = await handler(req);
      return { data, status: 200, statusText: 'OK', headers: {}, config: req };
    },
  });
  return { http, requests };
}

export function httpError(req: InternalAxiosRequestConfig, status: number, data: unknown, statusText = 'Error'): AxiosError {
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', req, null, {
    data,
    status,
    statusText,
    headers: {},
    config: req,
  });
}

export class FakeSTT implements ISTTService {
  result: TranscriptionResult = { text: 'hello world', languageCode: 'eng' };
  calls: Array<{ bytes: number; options: TranscriptionOptions }> = [];

  async transcribe(audio: Buffer, options: TranscriptionOptions = {}): Promise<TranscriptionResult> {
    this.calls.push({ bytes: audio.length, options });
    return { ...this.result };
  }
}

export class FakeTTS implements ITTSService {
  audio: Buffer = Buffer.from('fake-mp3');
  error: Error | null = null;
  failOn = new Set<string>();
  calls: Array<{ text: string; voiceId: string; options: SynthesisOptions }> = [];

  async synthesize(text: string, voiceId: string, options: SynthesisOptions = {}): Promise<Buffer> {
    this.calls.push({ text, voiceId, options });
    if (this.error) throw this.error;
    if (this.failOn.has(text)) throw new Error(`cannot say ${text}`);
    return this.audio;
  }

  async stream(text: string, voiceId: string, options: SynthesisOptions = {}): Promise<Readable> {
    this.calls.push({ text, voiceId, options });
    if (this.error) throw this.error;
    return Readable.from([this.audio]);
  }
}

export class FakeClone implements IVoiceCloneService {
  voices: RemoteVoice[] = [];
  requests: CloneRequest[] = [];
  deleted: string[] = [];
  nextId = 'voice_test_1';
  deleteError: Error | null = null;

  async clone(request: CloneRequest): Promise<CloneResult> {
    this.requests.push(request);
    this.voices.push({
      voiceId: this.nextId,
      name: request.name,
      category: 'cloned',
      description: request.description ?? null,
      labels: request.labels ?? {},
    });
    return { voiceId: this.nextId, requiresVerification: false };
  }

  async getVoice(voiceId: string): Promise<RemoteVoice | null> {
    return this.voices.find((v) => v.voiceId === voiceId) ?? null;
  }

  async listVoices(): Promise<RemoteVoice[]> {
    return [...this.voices];
  }

  async deleteVoice(voiceId: string): Promise<void> {
    if (this.deleteError) throw this.deleteError;
    this.deleted.push(voiceId);
    this.voices = this.voices.filter((v) => v.voiceId !== voiceId);
  }
}

/** Prefixes the target code instead of translating: "Hello" to es is "[es] Hello". */
export class FakeTranslation implements ITranslationService {
  detected: string | Error = 'en';
  calls: Array<{ text: string; target: string; source: string }> = [];

  async translate(text: string, targetLanguage: string, sourceLanguage = 'auto'): Promise<TranslationResult> {
    this.calls.push({ text, target: targetLanguage, source: sourceLanguage });
    return { text: `[${targetLanguage}] ${text}`, sourceLanguage };
  }

  async detect(_text: string): Promise<string> {
    if (this.detected instanceof Error) throw this.detected;
    return this.detected;
  }
}
