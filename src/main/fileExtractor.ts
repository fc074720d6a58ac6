/**
 * File Extractor
 *
 * Extracts text content from resume files.
 * Supports PDF, DOCX, TXT and Markdown.
 */

import * as fs from 'fs';
import * as path from 'path';
import mammoth from 'mammoth';
import { PipelineErrorFactory, SourceFileRole } from '../tailor/errors/types';
import { loggers } from '../shared/logging/logger';
import type { TextExtractor } from '../tailor/types';

export enum FileFormat {
  PDF = 'pdf',
  DOCX = 'docx',
  TXT = 'txt'
}

export interface ExtractionResult {
  text: string;
  pageCount?: number;
  metadata?: {
    title?: string;
    author?: string;
    creationDate?: Date;
  };
}

const log = loggers.documents;

/**
 * Reads resume files from disk
 */
export class FileExtractor implements TextExtractor {
  /**
   * Extract plain text from a file, choosing the format by extension.
   * `role` names the file in error messages.
   */
  async extract(filePath: string, role: SourceFileRole = 'resume'): Promise<string> {
    const format = this.detectFormat(filePath);
    if (!format) {
      throw PipelineErrorFactory.fileExtractionFailed(
        filePath,
        `Unsupported file format: ${path.extname(filePath) || '(none)'}`,
        role
      );
    }
    const result = await this.extractText(filePath, format, role);
    return result.text;
  }

  /**
   * Extracts text content from a file based on its format
   */
  async extractText(
    filePath: string,
    format: FileFormat,
    role: SourceFileRole = 'resume'
  ): Promise<ExtractionResult> {
    if (!fs.existsSync(filePath)) {
      throw PipelineErrorFactory.fileExtractionFailed(filePath, 'File not found', role);
    }

    const buffer = await fs.promises.readFile(filePath);
    const result = await this.extractFromBuffer(buffer, format);
    log.debug({ filePath, format, role, length: result.text.length }, 'Extracted text');
    return result;
  }

  /**
   * Extracts text content from a buffer based on file extension
   * @param ext - pdf, docx, txt or md, with or without the leading dot
   */
  async extractFromBuffer(buffer: Buffer, ext: string): Promise<ExtractionResult> {
    const extension = ext.toLowerCase().replace('.', '');

    switch (extension) {
      case 'pdf':
        return this.extractPDFFromBuffer(buffer);

      case 'docx':
        return this.extractDOCXFromBuffer(buffer);

      case 'txt':
      case 'md':
        return { text: this.cleanExtractedText(buffer.toString('utf-8')) };

      default:
        throw new Error(`Unsupported file format: ${ext}`);
    }
  }

  /**
   * Detects file format from file extension
   */
  detectFormat(fileName: string): FileFormat | null {
    const ext = path.extname(fileName).toLowerCase();
    switch (ext) {
      case '.pdf':
        return FileFormat.PDF;
      case '.docx':
        return FileFormat.DOCX;
      case '.txt':
      case '.md':
        return FileFormat.TXT;
      default:
        return null;
    }
  }

  private async extractPDFFromBuffer(buffer: Buffer): Promise<ExtractionResult> {
    // Loaded on first PDF only
    const { default: pdfParse } = await import('pdf-parse');
    const data = await pdfParse(buffer);
    const info: unknown = data.info;

    return {
      text: this.cleanExtractedText(data.text),
      pageCount: data.numpages,
      metadata: {
        title: readInfoString(info, 'Title'),
        author: readInfoString(info, 'Author'),
        creationDate: this.parsePDFDate(readInfoString(info, 'CreationDate'))
      }
    };
  }

  private async extractDOCXFromBuffer(buffer: Buffer): Promise<ExtractionResult> {
    const result = await mammoth.extractRawText({ buffer });

    if (result.messages.length > 0) {
      log.warn({ messages: result.messages.map(m => m.message) }, 'DOCX conversion warnings');
    }

    return {
      text: this.cleanExtractedText(result.value)
    };
  }

  /**
   * Normalize line endings, trim lines, collapse runs of blank lines and
   * drop control characters
   */
  cleanExtractedText(text: string): string {
    return text
      .replace(/\r\n/g, '\n')
      .replace(/\r/g, '\n')
      // eslint-disable-next-line no-control-regex
      .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '')
      .split('\n')
      .map(line => line.trim())
      .join('\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }

  /**
   * Parses PDF date strings (D:YYYYMMDDHHmmSS format)
   */
  private parsePDFDate(pdfDate: string | undefined): Date | undefined {
    if (!pdfDate) return undefined;
    const match = pdfDate.match(/D:(\d{4})(\d{2})(\d{2})(\d{2})?(\d{2})?(\d{2})?/);
    if (!match) return undefined;

    const [, year, month, day, hour = '00', minute = '00', second = '00'] = match;
    return new Date(
      parseInt(year),
      parseInt(month) - 1,
      parseInt(day),
      parseInt(hour),
      parseInt(minute),
      parseInt(second)
    );
  }
}

function readInfoString(info: unknown, key: string): string | undefined {
  if (typeof info !== 'object' || info === null) return undefined;
  const value: unknown = Reflect.get(info, key);
  return typeof value === 'string' && value ? value : undefined;
}

export const fileExtractor = new FileExtractor();
