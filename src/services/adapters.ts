import type { AdapterRegistry } from './extraction.js';
import { XmlExtractor } from './xml-extractor.js';
import { PdfExtractor, type PdfExtractorOptions } from './pdf-extractor.js';
import { createOpenAiStructurer } from './llm.js';

//adapter per document kind; the PDF side gets the OpenAI structurer when a key is configured
export function createDefaultAdapters(pdf: PdfExtractorOptions = {}): AdapterRegistry {
  return {
    structured: new XmlExtractor(),
    unstructured: new PdfExtractor({ structurer: createOpenAiStructurer(), ...pdf }),
  };
}
