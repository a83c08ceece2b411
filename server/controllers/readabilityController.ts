import { Request, Response } from 'express';
import crypto from 'crypto';
import path from 'path';
import { buildReadabilityReport, ReadabilityReport, ReportOptions } from '../services/readabilityReport';
import { buildAggregateStats, formatStats } from '../../utils/textStatistics';
import { convertAriToGrades } from '../../utils/gradeLevels';
import { FormulaId, isFormulaId, isLanguage, Language } from '../../utils/readability';
import { getServerConfig, isDevelopment } from '../config';
import logger from '../utils/logger';

interface CachedReport {
  report: ReadabilityReport;
  timestamp: number;
}

// In-memory report cache keyed by text hash and options
const reportCache = new Map<string, CachedReport>();

const TEXT_MIME_TYPES = ['text/plain', 'text/markdown'];
const TEXT_EXTENSIONS = ['.txt', '.md'];
const BYTE_ORDER_MARK = '\uFEFF';

export function isPlainTextUpload(file: { mimetype: string; originalname: string }): boolean {
  return (
    TEXT_MIME_TYPES.includes(file.mimetype) ||
    TEXT_EXTENSIONS.includes(path.extname(file.originalname).toLowerCase())
  );
}

export function clearReportCache(): void {
  reportCache.clear();
}

function parseLanguage(value: unknown): Language | undefined {
  return typeof value === 'string' && isLanguage(value) ? value : undefined;
}

function parseFormulas(value: unknown): FormulaId[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((id): id is FormulaId => typeof id === 'string' && isFormulaId(id));
}

function evictExpired(now: number, ttl: number): void {
  for (const [key, value] of reportCache.entries()) {
    if (now - value.timestamp > ttl) {
      reportCache.delete(key);
    }
  }
}

function sendReport(req: Request, res: Response, text: string, options: ReportOptions, startTime: number): void {
  const { reportCacheTtlMs } = getServerConfig();
  const textHash = crypto.createHash('md5').update(text).digest('hex');
  const cacheKey = `${textHash}_${options.language ?? 'en'}_${(options.formulas ?? []).join(',')}`;
  const now = Date.now();

  const cached = reportCache.get(cacheKey);
  if (cached && now - cached.timestamp < reportCacheTtlMs) {
    logger.debug('Returning cached readability report', { requestId: res.locals.requestId });
    res.json({
      ...cached.report,
      cached: true,
      cacheAge: Math.round((now - cached.timestamp) / 1000 / 60), // minutes
    });
    return;
  }

  const report = buildReadabilityReport(text, options);
  reportCache.set(cacheKey, { report, timestamp: now });
  evictExpired(now, reportCacheTtlMs);

  logger.info('Readability report computed', {
    requestId: res.locals.requestId,
    path: req.path,
    textLength: text.length,
    words: report.stats.words,
  });

  res.json({
    ...report,
    cached: false,
    processedAt: new Date().toISOString(),
    processingTime: `${((Date.now() - startTime) / 1000).toFixed(3)}s`,
  });
}

function sendInternalError(res: Response, error: unknown): void {
  logger.error('Unexpected error computing readability', {
    requestId: res.locals.requestId,
    error: error instanceof Error ? error.message : String(error),
  });

  res.status(500).json({
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred while processing your request',
    ...(isDevelopment() && error instanceof Error && { details: { message: error.message, stack: error.stack } }),
  });
}

/**
 * POST /api/readability with a JSON body.
 */
export function analyzeText(req: Request, res: Response): void {
  const startTime = Date.now();
  try {
    const body: Record<string, unknown> = req.body ?? {};
    const text = typeof body.text === 'string' ? body.text : '';
    sendReport(
      req,
      res,
      text,
      { language: parseLanguage(body.language), formulas: parseFormulas(body.formulas) },
      startTime,
    );
  } catch (error: unknown) {
    sendInternalError(res, error);
  }
}

/**
 * POST /api/readability/file with a multipart plain text upload.
 */
export function analyzeFile(req: Request, res: Response): void {
  const startTime = Date.now();
  try {
    if (!req.file) {
      res.status(400).json({
        error: 'No file uploaded',
        code: 'FILE_REQUIRED',
        message: 'Please upload a plain text or Markdown file',
      });
      return;
    }

    const file = req.file;

    if (file.size === 0) {
      res.status(400).json({
        error: 'Empty file uploaded',
        code: 'FILE_EMPTY',
        message: 'The uploaded file appears to be empty',
      });
      return;
    }

    if (!isPlainTextUpload(file)) {
      res.status(400).json({
        error: `Invalid file type: ${file.mimetype}`,
        code: 'INVALID_FILE_TYPE',
        message: 'Only plain text and Markdown files are supported',
        supportedTypes: TEXT_MIME_TYPES,
      });
      return;
    }

    logger.info('Text file received', {
      requestId: res.locals.requestId,
      name: file.originalname,
      size: file.size,
      mimeType: file.mimetype,
    });

    const decoded = file.buffer.toString('utf8');
    const text = decoded.startsWith(BYTE_ORDER_MARK) ? decoded.slice(BYTE_ORDER_MARK.length) : decoded;
    sendReport(req, res, text, { language: parseLanguage(req.query.language) }, startTime);
  } catch (error: unknown) {
    sendInternalError(res, error);
  }
}

/**
 * POST /api/stats: the aggregate stats alone, with their printable form.
 */
export function analyzeStats(req: Request, res: Response): void {
  const body: Record<string, unknown> = req.body ?? {};
  const text = typeof body.text === 'string' ? body.text : '';
  const stats = buildAggregateStats(text);
  res.json({ stats, formatted: formatStats(stats) });
}

/**
 * GET /api/grades/:score
 */
export function lookupGrade(req: Request, res: Response): void {
  const score = parseInt(String(req.params.score), 10);
  res.json({ score, ...convertAriToGrades(score) });
}
