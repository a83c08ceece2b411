import express from 'express';
import multer from 'multer';
import { body, param, query, validationResult } from 'express-validator';
import { analyzeFile, analyzeStats, analyzeText, lookupGrade } from '../controllers/readabilityController';
import { FORMULA_IDS, LANGUAGES } from '../../utils/readability';
import { getServerConfig } from '../config';

// Validation error handler
const handleValidationErrors = (req: express.Request, res: express.Response, next: express.NextFunction) => {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    res.status(400).json({
      error: 'Validation failed',
      details: errors.array().map((err) => ({
        field: err.type === 'field' ? err.path : err.type,
        message: err.msg,
        value: err.type === 'field' ? err.value : undefined,
      })),
    });
    return;
  }
  next();
};

// Multer rejects oversized uploads before the controller runs
const handleUploadErrors = (
  err: unknown,
  req: express.Request,
  res: express.Response,
  next: express.NextFunction,
) => {
  if (err instanceof multer.MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') {
      res.status(413).json({
        error: 'File too large',
        code: 'FILE_TOO_LARGE',
        message: `File size must be at most ${getServerConfig().maxUploadBytes} bytes`,
      });
      return;
    }
    res.status(400).json({
      error: 'Upload failed',
      code: 'UPLOAD_ERROR',
      message: err.message,
    });
    return;
  }
  next(err);
};

export function createReadabilityRouter(): express.Router {
  const { maxTextLength, maxUploadBytes } = getServerConfig();
  const router = express.Router();

  // Keep uploads in memory; they are decoded as UTF-8 text
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadBytes,
    },
  });

  const validateTextBody = [
    body('text')
      .isString()
      .withMessage('text must be a string')
      .bail()
      .isLength({ max: maxTextLength })
      .withMessage(`text must be at most ${maxTextLength} characters`),
  ];

  const validateReportBody = [
    ...validateTextBody,
    body('language')
      .optional()
      .isIn([...LANGUAGES])
      .withMessage(`language must be one of: ${LANGUAGES.join(', ')}`),
    body('formulas')
      .optional()
      .isArray()
      .withMessage('formulas must be an array'),
    body('formulas.*')
      .isIn([...FORMULA_IDS])
      .withMessage(`formulas must only contain: ${FORMULA_IDS.join(', ')}`),
  ];

  const validateLanguageQuery = [
    query('language')
      .optional()
      .isIn([...LANGUAGES])
      .withMessage(`language must be one of: ${LANGUAGES.join(', ')}`),
  ];

  const validateScoreParam = [
    param('score').isInt().withMessage('score must be an integer'),
  ];

  /**
   * POST /api/readability
   *
   * Request: JSON { text, language?, formulas? }
   * Response: aggregate stats and one entry per readability formula
   */
  router.post('/readability', validateReportBody, handleValidationErrors, analyzeText);

  /**
   * POST /api/readability/file
   *
   * Query Parameters:
   * - language ('en' | 'it', optional): formula set to apply (default: en)
   *
   * Request: multipart/form-data with 'file' field (plain text or Markdown)
   */
  router.post(
    '/readability/file',
    validateLanguageQuery,
    handleValidationErrors,
    upload.single('file'),
    handleUploadErrors,
    analyzeFile,
  );

  router.post('/stats', validateTextBody, handleValidationErrors, analyzeStats);

  router.get('/grades/:score', validateScoreParam, handleValidationErrors, lookupGrade);

  return router;
}

export default createReadabilityRouter;
