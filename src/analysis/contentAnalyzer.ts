import type { AnalysisConfig } from '../runtime/botConfig.js';
import { serializeError, type RuntimeLogger } from '../utils/runtimeLogger.js';
import type { GenerationClient } from './generation.js';
import { extractPdfText } from './pdfText.js';

export const IMAGE_ANALYSIS_FAILED = "Sorry, I couldn't analyze this image. Please try again.";
export const PDF_ANALYSIS_FAILED = "Sorry, I couldn't analyze this PDF. Please try again.";
export const UNSUPPORTED_DOCUMENT = 'Sorry, I can only analyze PDF documents at the moment.';

export type DocumentKind = 'pdf' | 'unsupported';

export type ContentAnalyzerOptions = {
  generation: GenerationClient;
  logger: RuntimeLogger;
  analysis: Pick<AnalysisConfig, 'maxDocumentChars'>;
  extractPdfText?: (bytes: Uint8Array) => Promise<string>;
};

/**
 * Image and document summarization. Neither method throws: every failure
 * becomes a fixed apology string.
 */
export interface ContentAnalyzer {
  analyzeImage(bytes: Uint8Array): Promise<string>;
  analyzeDocument(bytes: Uint8Array, kind: DocumentKind): Promise<string>;
}

function getFileExtension(filename: string): string | null {
  const normalized = filename.trim();
  const dotIndex = normalized.lastIndexOf('.');
  if (dotIndex < 0 || dotIndex === normalized.length - 1) return null;
  return normalized.slice(dotIndex + 1).toLowerCase();
}

export function resolveDocumentKind(input: { filename?: string; mimeType?: string }): DocumentKind {
  if (input.mimeType?.toLowerCase() === 'application/pdf') return 'pdf';
  if (getFileExtension(input.filename ?? '') === 'pdf') return 'pdf';
  return 'unsupported';
}

export function detectImageMimeType(bytes: Uint8Array): string | null {
  if (bytes.byteLength >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return 'image/jpeg';
  }

  if (
    bytes.byteLength >= 8 &&
    bytes[0] === 0x89 &&
    bytes[1] === 0x50 &&
    bytes[2] === 0x4e &&
    bytes[3] === 0x47 &&
    bytes[4] === 0x0d &&
    bytes[5] === 0x0a &&
    bytes[6] === 0x1a &&
    bytes[7] === 0x0a
  ) {
    return 'image/png';
  }

  if (
    bytes.byteLength >= 12 &&
    bytes[0] === 0x52 &&
    bytes[1] === 0x49 &&
    bytes[2] === 0x46 &&
    bytes[3] === 0x46 &&
    bytes[8] === 0x57 &&
    bytes[9] === 0x45 &&
    bytes[10] === 0x42 &&
    bytes[11] === 0x50
  ) {
    return 'image/webp';
  }

  if (
    bytes.byteLength >= 6 &&
    bytes[0] === 0x47 &&
    bytes[1] === 0x49 &&
    bytes[2] === 0x46 &&
    bytes[3] === 0x38 &&
    (bytes[4] === 0x37 || bytes[4] === 0x39) &&
    bytes[5] === 0x61
  ) {
    return 'image/gif';
  }

  return null;
}

export function buildDocumentPrompt(text: string, maxChars: number): string {
  return `Analyze this PDF content: ${text.slice(0, maxChars)}`;
}

export function createContentAnalyzer(options: ContentAnalyzerOptions): ContentAnalyzer {
  const { generation, logger, analysis } = options;
  const extractText = options.extractPdfText ?? extractPdfText;

  return {
    async analyzeImage(bytes) {
      try {
        if (bytes.byteLength === 0) {
          throw new Error('Image is empty');
        }
        // Telegram photos are JPEG; the sniffed type wins for documents sent as images.
        const mimeType = detectImageMimeType(bytes) ?? 'image/jpeg';
        return await generation.generateFromImage({ bytes, mimeType });
      } catch (err) {
        logger.error('image analysis failed', { error: serializeError(err) });
        return IMAGE_ANALYSIS_FAILED;
      }
    },

    async analyzeDocument(bytes, kind) {
      if (kind !== 'pdf') {
        return UNSUPPORTED_DOCUMENT;
      }

      try {
        const text = await extractText(bytes);
        return await generation.generateText(buildDocumentPrompt(text, analysis.maxDocumentChars));
      } catch (err) {
        logger.error('pdf analysis failed', { error: serializeError(err) });
        return PDF_ANALYSIS_FAILED;
      }
    },
  };
}
