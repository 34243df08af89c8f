import path from 'path';
import { ConfigError } from '../errors.js';
import { DocumentFormat, TranslationDocument } from './base.js';
import { JsonDocument } from './json.js';
import { PoDocument } from './po.js';

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = ['po', 'json'];

export function isDocumentFormat(value: string): value is DocumentFormat {
  return DOCUMENT_FORMATS.some(format => format === value);
}

export interface DocumentOptions {
  targetLang: string;
  sortKeys?: boolean;
}

export function detectFormat(filePath: string): DocumentFormat {
  switch (path.extname(filePath).toLowerCase()) {
    case '.po':
    case '.pot':
      return 'po';
    case '.json':
      return 'json';
    default:
      throw new ConfigError(`Cannot tell the format of ${filePath}; pass --format po or --format json`);
  }
}

export function createDocument(format: DocumentFormat, options: DocumentOptions): TranslationDocument {
  switch (format) {
    case 'po':
      return new PoDocument({ targetLang: options.targetLang });
    case 'json':
      return new JsonDocument({ sortKeys: options.sortKeys });
  }
}
