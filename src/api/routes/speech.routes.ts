import { Router, Request, Response } from 'express';
import { body } from 'express-validator';
import type { VoiceSettings } from '../../ai/tts';
import { logger } from '../../config/logger';
import type { SpeechToTextService } from '../../services/speech-to-text.service';
import type { SynthesizeInput, TextToSpeechService } from '../../services/text-to-speech.service';
import { errorMessage } from '../../utils/errors';
import { MAX_TEXT_LENGTH } from '../../utils/validators';
import { sendError } from '../errors';
import { validate } from '../middleware/validate';
import { bodyOf, bool, optNum, optStr, str, strList } from '../params';

const synthesisRules = () => [
  body('text')
    .isString()
    .trim()
    .isLength({ min: 1, max: MAX_TEXT_LENGTH })
    .withMessage(`text is required (max ${MAX_TEXT_LENGTH} characters)`),
  body('voiceId').isString().notEmpty().withMessage('voiceId is required'),
  body('stability').optional().isFloat({ min: 0, max: 1 }).withMessage('stability must be between 0 and 1').toFloat(),
  body('similarity').optional().isFloat({ min: 0, max: 1 }).withMessage('similarity must be between 0 and 1').toFloat(),
  body('modelId').optional().isString(),
  body('preset').optional().isString(),
];

export function speechRoutes(stt: SpeechToTextService, tts: TextToSpeechService): Router {
  const router = Router();

  /** Voice settings from the body: a named preset first, explicit values override it. */
  function synthesisInput(req: Request): SynthesizeInput {
    const b = bodyOf(req);
    const preset = optStr(b.preset);
    const base: Partial<VoiceSettings> = preset ? tts.getVoiceSettingsPreset(preset) : {};
    return {
      text: str(b.text),
      voiceId: str(b.voiceId),
      modelId: optStr(b.modelId),
      stability: optNum(b.stability) ?? base.stability,
      similarity: optNum(b.similarity) ?? base.similarity,
    };
  }

  router.post(
    '/transcribe',
    validate([
      body('recording').isString().notEmpty().withMessage('recording is required'),
      body('language').optional().isString(),
      body('timestamps').optional().isBoolean(),
    ]),
    async (req: Request, res: Response) => {
      try {
        const b = bodyOf(req);
        const recording = str(b.recording);
        const language = optStr(b.language);
        const result = bool(b.timestamps)
          ? await stt.transcribeWithTimestamps(recording, language)
          : await stt.transcribe(recording, language);
        res.json({ recording, ...result });
      } catch (e) {
        sendError(res, e, 'Transcribe');
      }
    }
  );

  router.post(
    '/detect-language',
    validate([body('recording').isString().notEmpty().withMessage('recording is required')]),
    async (req: Request, res: Response) => {
      try {
        const recording = str(bodyOf(req).recording);
        res.json({ recording, language: await stt.detectLanguage(recording) });
      } catch (e) {
        sendError(res, e, 'Detect spoken language');
      }
    }
  );

  router.post(
    '/transcribe-batch',
    validate([
      body('recordings').isArray({ min: 1 }).withMessage('recordings must be a non-empty array'),
      body('recordings.*').isString().notEmpty(),
      body('language').optional().isString(),
    ]),
    async (req: Request, res: Response) => {
      try {
        const b = bodyOf(req);
        res.json({ results: await stt.batchTranscribe(strList(b.recordings), optStr(b.language)) });
      } catch (e) {
        sendError(res, e, 'Batch transcribe');
      }
    }
  );

  router.post('/synthesize', validate(synthesisRules()), async (req: Request, res: Response) => {
    try {
      res.status(201).json(await tts.synthesize(synthesisInput(req)));
    } catch (e) {
      sendError(res, e, 'Synthesize');
    }
  });

  /** POST /speech/synthesize/stream - audio/mpeg sent as it is generated */
  router.post('/synthesize/stream', validate(synthesisRules()), async (req: Request, res: Response) => {
    try {
      const audio = await tts.synthesizeStream(synthesisInput(req));
      res.status(200).set({ 'Content-Type': 'audio/mpeg', 'Cache-Control': 'no-cache' });
      audio.on('error', (e) => {
        logger.error('Speech stream failed', { error: errorMessage(e) });
        res.destroy(e);
      });
      audio.pipe(res);
    } catch (e) {
      sendError(res, e, 'Synthesize stream');
    }
  });

  router.post(
    '/estimate-duration',
    validate([
      body('text').isString().withMessage('text is required'),
      body('wordsPerMinute').optional().isFloat({ gt: 0 }).toFloat(),
    ]),
    (req: Request, res: Response) => {
      const b = bodyOf(req);
      const seconds = tts.estimateAudioDuration(str(b.text), optNum(b.wordsPerMinute));
      res.json({ seconds: Math.round(seconds * 10) / 10 });
    }
  );

  return router;
}
