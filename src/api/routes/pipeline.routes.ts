/**
 * One call for the whole flow: recorded speech in, translated speech in the
 * cloned voice out.
 */
import { Router, Request, Response } from 'express';
import { body } from 'express-validator';
import { config } from '../../config';
import { SUPPORTED_LANGUAGES } from '../../config/languages';
import type { PipelineService } from '../../services/pipeline.service';
import { sendError } from '../errors';
import { validate } from '../middleware/validate';
import { bodyOf, optNum, optStr, str } from '../params';

export function pipelineRoutes(pipeline: PipelineService): Router {
  const router = Router();

  router.post(
    '/translate-speak',
    validate([
      body('recording').isString().notEmpty().withMessage('recording is required'),
      body('voiceId').isString().notEmpty().withMessage('voiceId is required'),
      body('targetLanguage')
        .isString()
        .isIn(Object.keys(SUPPORTED_LANGUAGES))
        .withMessage('targetLanguage must be a supported language code'),
      body('sourceLanguage').optional().isString(),
      body('stability').optional().isFloat({ min: 0, max: 1 }).toFloat(),
      body('similarity').optional().isFloat({ min: 0, max: 1 }).toFloat(),
      body('modelId').optional().isString(),
    ]),
    async (req: Request, res: Response) => {
      try {
        const b = bodyOf(req);
        const result = await pipeline.translateAndSpeak({
          recording: str(b.recording),
          voiceId: str(b.voiceId),
          targetLanguage: str(b.targetLanguage),
          sourceLanguage: optStr(b.sourceLanguage),
          stability: optNum(b.stability),
          similarity: optNum(b.similarity),
          modelId: optStr(b.modelId),
        });
        res.status(201).json({
          ...result,
          downloadUrl: `${config.apiPrefix}/outputs/${encodeURIComponent(result.output.fileName)}?as=${encodeURIComponent(result.output.downloadName)}`,
        });
      } catch (e) {
        sendError(res, e, 'Translate and speak');
      }
    }
  );

  return router;
}
