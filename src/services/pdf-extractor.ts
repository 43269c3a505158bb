//unstructured adapter: PDF text layer (or OCR) → model-assisted structuring → shared sanitization
import type { DocumentSource, PayloadCandidate } from '../models/index.js';
import { CLASSIFICATION_CONFIG } from '../models/index.js';
import { ExtractionError } from '../errors.js';
import { createLogger } from '../logger.js';
import { attempt, readDocument, type ExtractionAdapter } from './extraction.js';
import { isRecord, sanitizeCandidate } from './sanitize.js';

const log = createLogger('pdf-extractor');

export interface TextLayerReader {
  read(pdf: Uint8Array): Promise<string>;
}

//OCR internals live outside this project; any engine that turns a scanned PDF into text fits
export interface OcrEngine {
  recognize(pdf: Uint8Array): Promise<string>;
}

//turns free document text into a JSON object shaped like a payload candidate
export interface PayloadStructurer {
  structure(text: string): Promise<unknown>;
}

export interface PdfExtractorOptions {
  reader?: TextLayerReader;
  ocr?: OcrEngine;
  structurer?: PayloadStructurer;
}

export class PdfTextLayerReader implements TextLayerReader {
  async read(pdf: Uint8Array): Promise<string> {
    //loaded on first use so XML-only runs never pull in the PDF engine
    const { PDFParse } = await import('pdf-parse');
    const parser = new PDFParse({ data: pdf });
    try {
      const result = await parser.getText();
      return result.text;
    } finally {
      await parser.destroy();
    }
  }
}

export class PdfExtractor implements ExtractionAdapter {
  readonly kind = 'unstructured' as const;
  private reader: TextLayerReader;
  private ocr?: OcrEngine;
  private structurer?: PayloadStructurer;

  constructor(options: PdfExtractorOptions = {}) {
    this.reader = options.reader ?? new PdfTextLayerReader();
    this.ocr = options.ocr;
    this.structurer = options.structurer;
  }

  async extract(document: DocumentSource): Promise<PayloadCandidate> {
    const { minTextLength, maxStructuringTextLength } = CLASSIFICATION_CONFIG;
    const pdf = await readDocument(document);

    let text = await attempt('Could not read the PDF text layer', () => this.reader.read(pdf));
    let usedOcr = false;
    if (text.trim().length < minTextLength) {
      const ocr = this.ocr;
      if (!ocr) throw new ExtractionError('PDF has no text layer and no OCR engine is configured');
      log.info('PDF without text layer, falling back to OCR');
      text = await attempt('OCR failed', () => ocr.recognize(pdf));
      usedOcr = true;
    }

    if (text.trim().length < minTextLength) {
      throw new ExtractionError(`Insufficient text for structured extraction (${text.trim().length} characters)`);
    }

    const structurer = this.structurer;
    if (!structurer) throw new ExtractionError('No structuring model configured (set OPENAI_API_KEY)');

    log.info(`PDF text ready | used_ocr=${usedOcr} | text_len=${text.length}`);
    const raw = await attempt('Structuring pass failed', () => structurer.structure(text.slice(0, maxStructuringTextLength)));
    return sanitizeCandidate(toCandidate(raw));
  }
}

function toCandidate(raw: unknown): PayloadCandidate {
  if (!isRecord(raw)) throw new ExtractionError('Structuring pass did not return a JSON object');
  return {
    operationCode: raw['operationCode'],
    origin: raw['origin'],
    destination: raw['destination'],
    totalValue: raw['totalValue'],
    items: raw['items'],
    documentKey: raw['documentKey'],
    issuer: raw['issuer'],
    recipient: raw['recipient'],
    taxTotals: raw['taxTotals'],
  };
}
