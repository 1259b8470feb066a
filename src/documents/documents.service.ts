import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import * as mammoth from 'mammoth';
import pdf from 'pdf-parse';
import { ExtractionError } from '../common/errors/screening.errors';
import { AppConfig } from '../config/configuration';

export type DocumentType = 'PDF' | 'DOCX' | 'TEXT';

/** The parts of an uploaded file the extractor needs. */
export interface UploadedDocument {
  buffer: Buffer;
  originalname: string;
  mimetype: string;
}

const MIME_TYPES: Record<string, DocumentType> = {
  'application/pdf': 'PDF',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document':
    'DOCX',
  'text/plain': 'TEXT',
  'text/markdown': 'TEXT',
};

const EXTENSIONS: Record<string, DocumentType> = {
  '.pdf': 'PDF',
  '.docx': 'DOCX',
  '.txt': 'TEXT',
  '.md': 'TEXT',
};

@Injectable()
export class DocumentsService {
  private readonly logger = new Logger(DocumentsService.name);
  private readonly maxFileSize: number;

  constructor(private readonly configService: ConfigService) {
    const config = this.configService.get<AppConfig>('app');
    this.maxFileSize = config?.upload.maxFileSize || 10485760; // 10MB
  }

  /**
   * Extracts plain text from an uploaded resume.
   *
   * @throws ExtractionError (415) for unsupported types, (413) for files
   * over the size limit, (422) for empty, corrupt or textless documents
   */
  async extractText(file: UploadedDocument): Promise<string> {
    const type = this.detectType(file);

    if (!type) {
      throw ExtractionError.unsupportedType(
        `${file.originalname || 'unnamed file'} (${file.mimetype || 'unknown MIME type'})`,
      );
    }

    this.validateBuffer(file.buffer);
    this.logger.log(
      `Extracting ${type} text from ${file.originalname} (${(file.buffer.length / 1024).toFixed(2)}KB)`,
    );

    let text: string;
    switch (type) {
      case 'PDF':
        text = await this.parsePdf(file.buffer);
        break;
      case 'DOCX':
        text = await this.parseDocx(file.buffer);
        break;
      case 'TEXT':
        text = file.buffer.toString('utf8');
        break;
    }

    const cleaned = this.cleanText(text);
    if (!cleaned) {
      throw new ExtractionError(
        `No text could be extracted from ${file.originalname}`,
      );
    }

    this.logger.log(`Extracted ${cleaned.length} characters from ${type}`);
    return cleaned;
  }

  /** MIME type first, file extension as fallback. */
  detectType(
    file: Pick<UploadedDocument, 'originalname' | 'mimetype'>,
  ): DocumentType | null {
    const mimeType = (file.mimetype || '').split(';')[0].trim().toLowerCase();
    if (MIME_TYPES[mimeType]) {
      return MIME_TYPES[mimeType];
    }

    const extension = path.extname(file.originalname || '').toLowerCase();
    return EXTENSIONS[extension] ?? null;
  }

  /**
   * Normalizes line endings and strips invisible characters that PDF and
   * DOCX extraction leave behind.
   */
  cleanText(text: string): string {
    if (!text) return '';

    return text
      .replace(/\r\n?/g, '\n')
      .replace(/[\uFEFF\u200B-\u200F\u202A-\u202E\u2060-\u206F]/g, '')
      .split('\n')
      .map((line) => line.trimEnd())
      .join('\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }

  private validateBuffer(buffer: Buffer): void {
    if (buffer.length === 0) {
      throw new ExtractionError('Uploaded file is empty');
    }

    if (buffer.length > this.maxFileSize) {
      throw new ExtractionError(
        `File size exceeds maximum allowed size of ${this.maxFileSize / 1024 / 1024}MB`,
        HttpStatus.PAYLOAD_TOO_LARGE,
      );
    }
  }

  private async parsePdf(buffer: Buffer): Promise<string> {
    // Check PDF magic number
    if (buffer.subarray(0, 4).toString() !== '%PDF') {
      throw new ExtractionError('Invalid PDF file format');
    }

    try {
      const data = await pdf(buffer);
      this.logger.log(
        `PDF parsed: pages=${data.numpages}, length=${data.text.length}`,
      );
      return data.text;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`PDF parsing failed: ${message}`);
      throw new ExtractionError(
        `Failed to parse PDF: ${message}. Please ensure the file is not encrypted or corrupted`,
      );
    }
  }

  private async parseDocx(buffer: Buffer): Promise<string> {
    try {
      const result = await mammoth.extractRawText({ buffer });

      if (result.messages.length > 0) {
        this.logger.warn(
          `DOCX parsing warnings: ${result.messages.map((m) => m.message).join(', ')}`,
        );
      }

      return result.value;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`DOCX parsing failed: ${message}`);
      throw new ExtractionError(
        `Failed to parse DOCX: ${message}. Please ensure the file is a valid Word document`,
      );
    }
  }
}
