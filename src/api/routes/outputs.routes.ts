import { Router, Request, Response } from 'express';
import { logger } from '../../config/logger';
import type { TextToSpeechService } from '../../services/text-to-speech.service';
import { errorMessage } from '../../utils/errors';
import { sanitizeFilename } from '../../utils/validators';
import { sendError } from '../errors';
import { queryParam } from '../params';

export function outputRoutes(tts: TextToSpeechService): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response) => {
    try {
      res.json({ outputs: await tts.listOutputs() });
    } catch (e) {
      sendError(res, e, 'List outputs');
    }
  });

  router.get('/:fileName/info', async (req: Request, res: Response) => {
    try {
      res.json({ fileName: req.params.fileName, ...(await tts.getOutputInfo(req.params.fileName)) });
    } catch (e) {
      sendError(res, e, 'Output info');
    }
  });

  /** GET /outputs/:fileName?as=name.mp3 - download as an attachment */
  router.get('/:fileName', (req: Request, res: Response) => {
    try {
      const filePath = tts.getOutputPath(req.params.fileName);
      const as = queryParam(req, 'as');
      const downloadName = as ? sanitizeFilename(as) : req.params.fileName;
      res.download(filePath, downloadName, (err) => {
        if (err) logger.error('Output download failed', { fileName: req.params.fileName, error: errorMessage(err) });
      });
    } catch (e) {
      sendError(res, e, 'Download output');
    }
  });

  router.delete('/:fileName', async (req: Request, res: Response) => {
    try {
      await tts.deleteOutput(req.params.fileName);
      res.status(204).end();
    } catch (e) {
      sendError(res, e, 'Delete output');
    }
  });

  return router;
}
