/**
 * Resume routes - text extraction from uploaded resume files.
 */

import { Router, Request, Response } from 'express';
import { FileExtractor } from '../../main/fileExtractor';
import { ExtractRequestSchema } from '../../tailor/validation/schemas';
import { loggers } from '../../shared/logging/logger';
import { ApiError, asyncHandler } from '../middleware/errorHandler';

const resumeLogger = loggers.documents;

const SUPPORTED_FORMATS = ['pdf', 'docx', 'txt', 'md'];

export function createResumeRouter(fileExtractor: FileExtractor = new FileExtractor()): Router {
  const router = Router();

  /**
   * POST /api/resume/extract
   * Body: { fileName, fileContent (base64) }
   * Returns: { success, content, metadata?, pageCount? }
   */
  router.post('/extract', asyncHandler(async (req: Request, res: Response) => {
    const { fileName, fileContent } = ExtractRequestSchema.parse(req.body);

    const ext = fileName.split('.').pop()?.toLowerCase();
    if (!ext || !SUPPORTED_FORMATS.includes(ext)) {
      throw new ApiError(
        400,
        `Unsupported file format. Supported formats: ${SUPPORTED_FORMATS.join(', ')}`,
        'UNSUPPORTED_FORMAT'
      );
    }

    const fileBuffer = Buffer.from(fileContent, 'base64');
    resumeLogger.info({ fileName, fileSize: fileBuffer.length }, 'Extracting text from file');

    const extractionResult = await fileExtractor.extractFromBuffer(fileBuffer, ext);
    if (!extractionResult.text.trim()) {
      throw new ApiError(400, 'No text content could be extracted from the file', 'NO_CONTENT');
    }

    resumeLogger.info(
      { fileName, contentLength: extractionResult.text.length },
      'Successfully extracted text'
    );

    res.json({
      success: true,
      content: extractionResult.text,
      metadata: extractionResult.metadata,
      pageCount: extractionResult.pageCount
    });
  }));

  return router;
}
