//public API for the fiscal classification workflow
//the single controlled entry point into extraction, validation, classification and review

export { type ExtractionAdapter, type AdapterRegistry, describeDocument, readDocument } from './extraction.js';
export { XmlExtractor, safeGet } from './xml-extractor.js';
export { PdfExtractor, PdfTextLayerReader, type TextLayerReader, type OcrEngine, type PayloadStructurer, type PdfExtractorOptions } from './pdf-extractor.js';
export { OpenAiStructurer, createOpenAiStructurer, type StructurerOptions } from './llm.js';
export { createDefaultAdapters } from './adapters.js';
export { sanitizeCandidate, sanitizeOperationCode, sanitizeProductCode, parseDecimal } from './sanitize.js';
export { validatePayload, toJurisdiction, type ValidationResult } from './validator.js';
export { ClassificationEngine, operationNature, type IClassificationEngine } from './classifier.js';
export { parseReviewInput, resolveRegime, resolveReview } from './review.js';
export { WorkflowEngine, type IWorkflowEngine, type RunOptions, type WorkflowOptions } from './workflow.js';
export { toRunOutput, exitCodeFor } from './output.js';
export { parseMappings, importMappingsFile, exportMappingsFile } from './mappings.js';
