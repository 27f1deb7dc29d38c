/** Read-only information for clients: configuration summary, languages, models, presets. */
import { Router, Request, Response } from 'express';
import { getConfigSummary, validateConfig, type AppConfig } from '../../config';
import { SUPPORTED_LANGUAGES } from '../../config/languages';
import { VOICE_PRESETS, type TextToSpeechService } from '../../services/text-to-speech.service';

export function metaRoutes(cfg: AppConfig, tts: TextToSpeechService): Router {
  const router = Router();

  router.get('/config', (_req: Request, res: Response) => {
    res.json({ ...getConfigSummary(cfg), problems: validateConfig(cfg) });
  });

  router.get('/languages', (_req: Request, res: Response) => {
    const languages = Object.entries(SUPPORTED_LANGUAGES).map(([code, info]) => ({ code, ...info }));
    res.json({ languages });
  });

  router.get('/models', (_req: Request, res: Response) => {
    res.json({ models: tts.getAvailableModels(), default: cfg.elevenLabs.defaultModel });
  });

  router.get('/presets', (_req: Request, res: Response) => {
    res.json({ presets: VOICE_PRESETS });
  });

  return router;
}
