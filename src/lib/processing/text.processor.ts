/**
 * Text Processor
 * Deterministic text normalization: Unicode, control characters and whitespace
 */

export type UnicodeNormalizationForm = 'NFC' | 'NFD' | 'NFKC' | 'NFKD';

export interface TextProcessorConfig {
  normalizeUnicode?: boolean;
  normalizeForm?: UnicodeNormalizationForm;
  removeControlChars?: boolean;
  normalizeLineBreaks?: boolean;
  trimLines?: boolean;
  preserveParagraphs?: boolean;
}

export class TextProcessor {
  private config: Required<TextProcessorConfig>;

  constructor(config?: TextProcessorConfig) {
    this.config = {
      normalizeUnicode: config?.normalizeUnicode !== false,
      normalizeForm: config?.normalizeForm || 'NFC',
      removeControlChars: config?.removeControlChars !== false,
      normalizeLineBreaks: config?.normalizeLineBreaks !== false,
      trimLines: config?.trimLines !== false,
      preserveParagraphs: config?.preserveParagraphs !== false,
    };
  }

  /**
   * Main processing method. Same input always yields the same output.
   */
  process(text: string): string {
    if (!text || text.trim().length === 0) {
      return '';
    }

    let processed = text;

    if (this.config.normalizeUnicode) {
      processed = processed.normalize(this.config.normalizeForm);
    }

    if (this.config.normalizeLineBreaks) {
      processed = this.normalizeLineBreaks(processed);
    }

    if (this.config.removeControlChars) {
      processed = this.removeControlCharacters(processed);
    }

    if (this.config.preserveParagraphs) {
      processed = this.cleanWhitespacePreserveParagraphs(processed);
    } else {
      processed = this.cleanWhitespace(processed);
    }

    if (this.config.trimLines) {
      processed = this.trimLines(processed);
    }

    return processed.trim();
  }

  /**
   * Clean whitespace (aggressive)
   */
  cleanWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
  }

  /**
   * Clean whitespace while preserving paragraphs
   */
  cleanWhitespacePreserveParagraphs(text: string): string {
    return text
      .replace(/[ \t\f\v\u00A0]+/g, ' ') // Spaces/tabs/nbsp → single space
      .replace(/[ \t]+\n/g, '\n') // Remove trailing spaces before newlines
      .replace(/\n[ \t]+/g, '\n') // Remove leading spaces after newlines
      .replace(/\n{3,}/g, '\n\n') // Max 2 consecutive newlines
      .trim();
  }

  normalizeLineBreaks(text: string): string {
    return text
      .replace(/\r\n/g, '\n') // CRLF → LF
      .replace(/\r/g, '\n'); // CR → LF
  }

  /**
   * Remove control characters (tab and newline are kept)
   */
  removeControlCharacters(text: string): string {
    return text
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
      .replace(/[\u200B-\u200D\uFEFF]/g, '');
  }

  /**
   * Trim whitespace from each line
   */
  trimLines(text: string): string {
    return text
      .split('\n')
      .map((line) => line.trim())
      .join('\n')
      .replace(/\n{3,}/g, '\n\n');
  }
}

export const textProcessor = new TextProcessor();

export function normalizeText(text: string): string {
  return textProcessor.process(text);
}

/**
 * Length in Unicode code points
 */
export function countChars(text: string): number {
  let count = 0;
  for (const _ of text) {
    count++;
  }
  return count;
}
