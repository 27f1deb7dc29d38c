/**
 * Express app: CORS, JSON body, mount recording, voice, speech, translation,
 * pipeline and output routes under the API prefix.
 */

import express, { type Express } from 'express';
import cors from 'cors';
import { config, type AppConfig } from '../config';
import { createServices, type AppServices } from '../services';
import { errorHandler } from './errors';
import { metaRoutes } from './routes/meta.routes';
import { outputRoutes } from './routes/outputs.routes';
import { pipelineRoutes } from './routes/pipeline.routes';
import { recordingRoutes } from './routes/recordings.routes';
import { speechRoutes } from './routes/speech.routes';
import { translateRoutes } from './routes/translate.routes';
import { voiceRoutes } from './routes/voices.routes';

export function createApp(services: AppServices = createServices(), cfg: AppConfig = config): Express {
  const app = express();

  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', app: cfg.app.name, version: cfg.app.version, ts: new Date().toISOString() });
  });

  app.use(cfg.apiPrefix, metaRoutes(cfg, services.tts));
  app.use(`${cfg.apiPrefix}/recordings`, recordingRoutes(services.recorder));
  app.use(`${cfg.apiPrefix}/voices`, voiceRoutes(services.voices));
  app.use(`${cfg.apiPrefix}/speech`, speechRoutes(services.stt, services.tts));
  app.use(`${cfg.apiPrefix}/translate`, translateRoutes(services.translator));
  app.use(`${cfg.apiPrefix}/pipeline`, pipelineRoutes(services.pipeline));
  app.use(`${cfg.apiPrefix}/outputs`, outputRoutes(services.tts));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Route not found', code: 'NOT_FOUND' });
  });
  app.use(errorHandler);

  return app;
}
