import { Router, Request, Response } from 'express';
import { body } from 'express-validator';
import type { VoiceClonerService } from '../../services/voice-cloner.service';
import { sendError } from '../errors';
import { validate } from '../middleware/validate';
import { bodyOf, bool, optStr, str, strList, strMap } from '../params';

const nameRule = () =>
  body('name')
    .isString()
    .trim()
    .isLength({ min: 3, max: 50 })
    .withMessage('Voice name must be 3-50 characters');

export function voiceRoutes(voices: VoiceClonerService): Router {
  const router = Router();

  /** POST /voices - clone a voice from one recording */
  router.post(
    '/',
    validate([
      body('recording').isString().notEmpty().withMessage('recording is required'),
      nameRule(),
      body('description').optional().isString(),
      body('labels').optional().isObject(),
      body('removeBackgroundNoise').optional().isBoolean(),
    ]),
    async (req: Request, res: Response) => {
      try {
        const b = bodyOf(req);
        const voice = await voices.cloneVoice({
          recording: str(b.recording),
          name: str(b.name),
          description: optStr(b.description),
          labels: strMap(b.labels),
          removeBackgroundNoise: bool(b.removeBackgroundNoise),
        });
        res.status(201).json(voice);
      } catch (e) {
        sendError(res, e, 'Clone voice');
      }
    }
  );

  /** POST /voices/professional - clone from several recordings */
  router.post(
    '/professional',
    validate([
      body('recordings').isArray({ min: 1 }).withMessage('recordings must be a non-empty array'),
      body('recordings.*').isString().notEmpty(),
      nameRule(),
      body('description').optional().isString(),
      body('labels').optional().isObject(),
    ]),
    async (req: Request, res: Response) => {
      try {
        const b = bodyOf(req);
        const voice = await voices.cloneVoiceProfessional({
          recordings: strList(b.recordings),
          name: str(b.name),
          description: optStr(b.description),
          labels: strMap(b.labels),
        });
        res.status(201).json(voice);
      } catch (e) {
        sendError(res, e, 'Clone voice (professional)');
      }
    }
  );

  router.post(
    '/validate-sample',
    validate([body('recording').isString().notEmpty().withMessage('recording is required')]),
    async (req: Request, res: Response) => {
      try {
        res.json(await voices.validateRecordingForCloning(str(bodyOf(req).recording)));
      } catch (e) {
        sendError(res, e, 'Validate sample');
      }
    }
  );

  /** GET /voices - cloned voices on the account */
  router.get('/', async (_req: Request, res: Response) => {
    try {
      res.json({ voices: await voices.listClonedVoices() });
    } catch (e) {
      sendError(res, e, 'List voices');
    }
  });

  /** GET /voices/local - voices cloned through this server */
  router.get('/local', async (_req: Request, res: Response) => {
    try {
      res.json({ voices: await voices.listLocalVoices() });
    } catch (e) {
      sendError(res, e, 'List local voices');
    }
  });

  router.get('/:voiceId', async (req: Request, res: Response) => {
    try {
      const [remote, local] = await Promise.all([
        voices.getVoiceInfo(req.params.voiceId),
        voices.getLocalVoice(req.params.voiceId),
      ]);
      res.json({ ...remote, local });
    } catch (e) {
      sendError(res, e, 'Get voice');
    }
  });

  router.delete('/:voiceId', async (req: Request, res: Response) => {
    try {
      await voices.deleteVoice(req.params.voiceId);
      res.status(204).end();
    } catch (e) {
      sendError(res, e, 'Delete voice');
    }
  });

  return router;
}
