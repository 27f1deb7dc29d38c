import { getVoiceCloneService, type IVoiceCloneService } from '../ai/clone';
import { getSTTService, type ISTTService } from '../ai/stt';
import { getTranslationService, type ITranslationService } from '../ai/translate';
import { getTTSService, type ITTSService } from '../ai/tts';
import { config, type AppConfig } from '../config';
import { FileStore } from './file-store';
import { PipelineService } from './pipeline.service';
import { RecorderService } from './recorder.service';
import { SpeechToTextService } from './speech-to-text.service';
import { TextToSpeechService } from './text-to-speech.service';
import { TranslatorService } from './translator.service';
import { VoiceClonerService } from './voice-cloner.service';

export interface Providers {
  stt: ISTTService;
  tts: ITTSService;
  clone: IVoiceCloneService;
  translation: ITranslationService;
}

export interface AppServices {
  recorder: RecorderService;
  voices: VoiceClonerService;
  stt: SpeechToTextService;
  translator: TranslatorService;
  tts: TextToSpeechService;
  pipeline: PipelineService;
}

/** Wire the services over the configured directories and providers. */
export function createServices(options: { cfg?: AppConfig; providers?: Partial<Providers> } = {}): AppServices {
  const cfg = options.cfg ?? config;
  const providers = options.providers ?? {};

  const recorder = new RecorderService(new FileStore(cfg.paths.tempDir, 'Recording'), cfg.recording.maxSeconds);
  const translator = new TranslatorService(providers.translation ?? getTranslationService());
  const voices = new VoiceClonerService(
    providers.clone ?? getVoiceCloneService(),
    recorder,
    cfg.paths.clonedVoicesDir,
    cfg.recording
  );
  const stt = new SpeechToTextService(providers.stt ?? getSTTService(), recorder, translator);
  const tts = new TextToSpeechService(
    providers.tts ?? getTTSService(),
    new FileStore(cfg.paths.outputDir, 'Output'),
    cfg.elevenLabs.defaultModel
  );
  const pipeline = new PipelineService(stt, translator, tts);

  return { recorder, voices, stt, translator, tts, pipeline };
}

export { FileStore } from './file-store';
export { PipelineService } from './pipeline.service';
export { RecorderService } from './recorder.service';
export { SpeechToTextService } from './speech-to-text.service';
export { TextToSpeechService } from './text-to-speech.service';
export { TranslatorService } from './translator.service';
export { VoiceClonerService } from './voice-cloner.service';
