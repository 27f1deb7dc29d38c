/**
 * Recording uploads from the browser, plus the file operations on them.
 * POST /recordings takes multipart field `audio`; POST /recordings/pcm takes
 * raw 16-bit little-endian PCM with the format in the query string.
 */
import express, { Router, Request, Response } from 'express';
import { query } from 'express-validator';
import multer from 'multer';
import { config } from '../../config';
import { logger } from '../../config/logger';
import type { RecorderService } from '../../services/recorder.service';
import { ValidationError } from '../../utils/errors';
import { VALID_SAMPLE_RATES } from '../../utils/validators';
import { sendError } from '../errors';
import { validate } from '../middleware/validate';
import { optNum, queryParam } from '../params';

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: config.audio.maxUploadMb * 1024 * 1024 },
  fileFilter: (_req, file, cb) => {
    const ok = /^(audio|video)\/(wav|wave|x-wav|mpeg|mp3|ogg|webm|flac|x-flac|mp4|x-m4a)/i.test(file.mimetype) ||
      file.mimetype === 'application/octet-stream' ||
      file.mimetype === '';
    if (ok) cb(null, true);
    else cb(new ValidationError(`Invalid content-type: ${file.mimetype}`));
  },
});

const rawPcm = express.raw({ type: () => true, limit: `${config.audio.maxUploadMb}mb` });

export function recordingRoutes(recorder: RecorderService): Router {
  const router = Router();

  router.post('/', upload.single('audio'), async (req: Request, res: Response) => {
    try {
      const file = req.file;
      if (!file) {
        return res.status(400).json({ error: 'Audio file is required (field: audio)', code: 'VALIDATION_ERROR' });
      }
      logger.debug('Recording upload received', { originalname: file.originalname, mimetype: file.mimetype, size: file.size });
      const saved = await recorder.saveRecording(file.buffer, { originalName: file.originalname, mimeType: file.mimetype });
      res.status(201).json(saved);
    } catch (e) {
      sendError(res, e, 'Save recording');
    }
  });

  router.post(
    '/pcm',
    validate([
      query('sampleRate')
        .optional()
        .isIn(VALID_SAMPLE_RATES.map(String))
        .withMessage(`sampleRate must be one of ${VALID_SAMPLE_RATES.join(', ')}`),
      query('channels').optional().isIn(['1', '2']).withMessage('channels must be 1 or 2'),
    ]),
    rawPcm,
    async (req: Request, res: Response) => {
      try {
        const pcm: unknown = req.body;
        if (!Buffer.isBuffer(pcm) || !pcm.length) {
          return res.status(400).json({ error: 'No audio data recorded', code: 'VALIDATION_ERROR' });
        }
        const saved = await recorder.savePcmRecording(pcm, {
          sampleRate: optNum(queryParam(req, 'sampleRate')) ?? config.audio.sampleRate,
          channels: optNum(queryParam(req, 'channels')) ?? config.audio.channels,
        });
        res.status(201).json(saved);
      } catch (e) {
        sendError(res, e, 'Save PCM recording');
      }
    }
  );

  router.get('/', async (_req: Request, res: Response) => {
    try {
      res.json({ recordings: await recorder.listRecordings() });
    } catch (e) {
      sendError(res, e, 'List recordings');
    }
  });

  router.get('/:fileName/info', async (req: Request, res: Response) => {
    try {
      res.json({ fileName: req.params.fileName, ...(await recorder.getRecordingInfo(req.params.fileName)) });
    } catch (e) {
      sendError(res, e, 'Recording info');
    }
  });

  /** Microphone check: peak/RMS level, whether any signal was captured, and RMS per `chunk` seconds. */
  router.get(
    '/:fileName/level',
    validate([query('chunk').optional().isFloat({ min: 0.01, max: 10 }).withMessage('chunk must be between 0.01 and 10 seconds')]),
    async (req: Request, res: Response) => {
      try {
        const { fileName } = req.params;
        const check = await recorder.testMicrophone(fileName);
        const meter = await recorder.measureRecordingMeter(fileName, optNum(queryParam(req, 'chunk')));
        res.json({ fileName, ...check, meter });
      } catch (e) {
        sendError(res, e, 'Recording level');
      }
    }
  );

  router.get('/:fileName', (req: Request, res: Response) => {
    try {
      res.sendFile(recorder.getRecordingPath(req.params.fileName));
    } catch (e) {
      sendError(res, e, 'Get recording');
    }
  });

  router.delete('/:fileName', async (req: Request, res: Response) => {
    try {
      await recorder.deleteRecording(req.params.fileName);
      res.status(204).end();
    } catch (e) {
      sendError(res, e, 'Delete recording');
    }
  });

  return router;
}
