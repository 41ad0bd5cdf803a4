import type { FileExtraction } from '../types';

export interface EntityExtractor {
  getLanguageId(): string;
  getSupportedFileExtensions(): string[];
  extract(file: string, content: string): FileExtraction;
}
