import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FakeSTT, FakeTranslation, FakeTTS, makeTempDir, removeDir, wav } from '../../__tests__/helpers';
import { encodeWav } from '../../utils/audio';
import { FileStore } from '../file-store';
import { RecorderService } from '../recorder.service';
import { SpeechToTextService } from '../speech-to-text.service';
import { TextToSpeechService } from '../text-to-speech.service';
import { TranslatorService } from '../translator.service';

describe('SpeechToTextService', () => {
  let dir: string;
  let recorder: RecorderService;
  let provider: FakeSTT;
  let translation: FakeTranslation;
  let stt: SpeechToTextService;

  beforeEach(() => {
    dir = makeTempDir();
    recorder = new RecorderService(new FileStore(path.join(dir, 'temp'), 'Recording'), 600);
    provider = new FakeSTT();
    translation = new FakeTranslation();
    stt = new SpeechToTextService(provider, recorder, new TranslatorService(translation));
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('sends the stored recording with its name and type', async () => {
    const { fileName } = await recorder.saveRecording(wav(1));
    const result = await stt.transcribe(fileName, 'es');

    expect(result.text).toBe('hello world');
    expect(provider.calls[0]).toEqual({
      bytes: wav(1).length,
      options: { fileName, mimeType: 'audio/wav', languageCode: 'es', timestamps: false },
    });
  });

  it('treats "auto" as no language hint', async () => {
    const { fileName } = await recorder.saveRecording(wav(1));
    await stt.transcribeWithTimestamps(fileName, 'auto');
    expect(provider.calls[0].options.languageCode).toBeUndefined();
    expect(provider.calls[0].options.timestamps).toBe(true);
  });

  it('refuses audio that is too short or too coarse', async () => {
    const short = await recorder.saveRecording(wav(0.2));
    await expect(stt.transcribe(short.fileName)).rejects.toThrow('Audio too short (0.2s)');

    const coarse = await recorder.saveRecording(encodeWav(Buffer.alloc(8000), { sampleRate: 4000, channels: 1 }));
    await expect(stt.transcribe(coarse.fileName)).rejects.toThrow('Sample rate too low (4000 Hz)');
    expect(provider.calls).toHaveLength(0);
  });

  it('detects the spoken language from the transcriber, then from the text', async () => {
    const { fileName } = await recorder.saveRecording(wav(1));

    provider.result = { text: 'hola', languageCode: 'spa' };
    expect(await stt.detectLanguage(fileName)).toBe('es');

    provider.result = { text: 'bonjour' };
    translation.detected = 'fr';
    expect(await stt.detectLanguage(fileName)).toBe('fr');

    provider.result = { text: '' };
    expect(await stt.detectLanguage(fileName)).toBeNull();
  });

  it('keeps going when one file in a batch fails', async () => {
    const { fileName } = await recorder.saveRecording(wav(1));
    expect(await stt.batchTranscribe([fileName, 'missing.wav'])).toEqual({
      [fileName]: { text: 'hello world' },
      'missing.wav': { error: 'Recording not found: missing.wav' },
    });
  });
});

describe('TextToSpeechService', () => {
  let dir: string;
  let provider: FakeTTS;
  let tts: TextToSpeechService;

  beforeEach(() => {
    dir = makeTempDir();
    provider = new FakeTTS();
    tts = new TextToSpeechService(provider, new FileStore(path.join(dir, 'outputs'), 'Output'), 'eleven_multilingual_v2');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('writes the synthesized audio to the output directory', async () => {
    const out = await tts.synthesize({ text: 'Hola', voiceId: 'v1' });

    expect(out.fileName).toMatch(/^output_\d{8}_\d{6}_[0-9a-f]{8}\.mp3$/);
    expect(out.bytes).toBe(8);
    expect(out.modelId).toBe('eleven_multilingual_v2');
    expect(fs.readFileSync(out.path, 'utf8')).toBe('fake-mp3');
    expect(provider.calls[0]).toEqual({
      text: 'Hola',
      voiceId: 'v1',
      options: { stability: 0.5, similarity: 0.75, modelId: 'eleven_multilingual_v2' },
    });
  });

  it('validates text, voice, settings and model', async () => {
    await expect(tts.synthesize({ text: '', voiceId: 'v1' })).rejects.toThrow('Text is empty');
    await expect(tts.synthesize({ text: 'Hi', voiceId: ' ' })).rejects.toThrow('Voice id is required');
    await expect(tts.synthesize({ text: 'Hi', voiceId: 'v1', stability: 1.2 })).rejects.toThrow(
      'Stability must be between 0.0 and 1.0 (got 1.2)'
    );
    await expect(tts.synthesize({ text: 'Hi', voiceId: 'v1', modelId: 'bogus' })).rejects.toThrow(
      'Unknown model: bogus. Available: eleven_monolingual_v1, eleven_multilingual_v1, eleven_multilingual_v2, eleven_turbo_v2'
    );
    expect(provider.calls).toHaveLength(0);
  });

  it('fails on empty audio from the service', async () => {
    provider.audio = Buffer.alloc(0);
    await expect(tts.synthesize({ text: 'Hi', voiceId: 'v1' })).rejects.toMatchObject({
      status: 502,
      message: 'ElevenLabs text-to-speech returned empty audio',
    });
  });

  it('forces the multilingual model', async () => {
    const out = await tts.synthesizeMultilingual({ text: 'Hi', voiceId: 'v1' });
    expect(out.fileName.startsWith('multilingual_')).toBe(true);
    expect(provider.calls[0].options.modelId).toBe('eleven_multilingual_v2');
  });

  it('skips failed items in a batch', async () => {
    provider.failOn.add('bad');
    const outs = await tts.batchSynthesize(['one', 'bad', 'three'], 'v1');
    expect(outs).toHaveLength(2);
    expect(outs[0].fileName.startsWith('batch_1_')).toBe(true);
    expect(outs[1].fileName.startsWith('batch_3_')).toBe(true);
  });

  it('resolves presets, defaulting to balanced', async () => {
    expect(tts.getVoiceSettingsPreset('expressive')).toEqual({ stability: 0.3, similarity: 0.8 });
    expect(tts.getVoiceSettingsPreset('whisper')).toEqual({ stability: 0.5, similarity: 0.75 });

    await tts.synthesizeWithPreset('Hi', 'v1', 'stable');
    expect(provider.calls[0].options).toMatchObject({ stability: 0.75, similarity: 0.75 });
  });

  it('lists models and estimates duration', () => {
    expect(tts.getAvailableModels()).toEqual([
      'eleven_monolingual_v1',
      'eleven_multilingual_v1',
      'eleven_multilingual_v2',
      'eleven_turbo_v2',
    ]);
    expect(tts.estimateAudioDuration('one two three')).toBeCloseTo(1.2, 10);
    expect(tts.estimateAudioDuration('one two three', 60)).toBeCloseTo(3, 10);
    expect(tts.estimateAudioDuration('   ')).toBe(0);
  });

  it('manages output files', async () => {
    const out = await tts.synthesize({ text: 'Hi', voiceId: 'v1' });
    expect(await tts.getOutputInfo(out.fileName)).toMatchObject({ format: 'mp3', fileSize: 8 });
    expect((await tts.listOutputs()).map((o) => o.fileName)).toEqual([out.fileName]);

    await tts.deleteOutput(out.fileName);
    expect(await tts.listOutputs()).toEqual([]);
  });

  it('streams without writing a file', async () => {
    const stream = await tts.synthesizeStream({ text: 'Hi', voiceId: 'v1' });
    const chunks: Buffer[] = [];
    for await (const chunk of stream) chunks.push(Buffer.from(chunk));
    expect(Buffer.concat(chunks).toString()).toBe('fake-mp3');
    expect(await tts.listOutputs()).toEqual([]);
  });
});
