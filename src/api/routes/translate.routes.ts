import { Router, Request, Response } from 'express';
import { body } from 'express-validator';
import { SUPPORTED_LANGUAGES } from '../../config/languages';
import type { TranslatorService } from '../../services/translator.service';
import { sendError } from '../errors';
import { validate } from '../middleware/validate';
import { bodyOf, bool, optStr, str, strList } from '../params';

const targetRule = () =>
  body('targetLanguage')
    .isString()
    .isIn(Object.keys(SUPPORTED_LANGUAGES))
    .withMessage('targetLanguage must be a supported language code');

export function translateRoutes(translator: TranslatorService): Router {
  const router = Router();

  /** POST /translate - `long: true` splits on sentences and translates chunk by chunk */
  router.post(
    '/',
    validate([
      body('text').isString().trim().notEmpty().withMessage('text is required'),
      targetRule(),
      body('sourceLanguage').optional().isString(),
      body('long').optional().isBoolean(),
    ]),
    async (req: Request, res: Response) => {
      try {
        const b = bodyOf(req);
        const text = str(b.text);
        const target = str(b.targetLanguage);
        const source = optStr(b.sourceLanguage) ?? 'auto';
        const result = bool(b.long)
          ? await translator.translateLongText(text, target, source)
          : await translator.translate(text, target, source);
        res.json({
          ...result,
          sourceLanguageName: translator.getLanguageName(result.sourceLanguage),
          targetLanguageName: translator.getLanguageName(result.targetLanguage),
        });
      } catch (e) {
        sendError(res, e, 'Translate');
      }
    }
  );

  router.post(
    '/detect',
    validate([body('text').isString().trim().notEmpty().withMessage('text is required')]),
    async (req: Request, res: Response) => {
      try {
        const language = await translator.detectLanguage(str(bodyOf(req).text));
        res.json({
          language,
          name: language ? translator.getLanguageName(language) : null,
          supported: language ? translator.isLanguageSupported(language) : false,
        });
      } catch (e) {
        sendError(res, e, 'Detect language');
      }
    }
  );

  router.post(
    '/batch',
    validate([
      body('texts').isArray({ min: 1 }).withMessage('texts must be a non-empty array'),
      body('texts.*').isString().trim().notEmpty(),
      targetRule(),
      body('sourceLanguage').optional().isString(),
    ]),
    async (req: Request, res: Response) => {
      try {
        const b = bodyOf(req);
        const results = await translator.translateBatch(
          strList(b.texts),
          str(b.targetLanguage),
          optStr(b.sourceLanguage) ?? 'auto'
        );
        res.json({ results });
      } catch (e) {
        sendError(res, e, 'Batch translate');
      }
    }
  );

  return router;
}
