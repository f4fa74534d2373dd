export {
  classifyAcquisitionFailure,
  type TextAcquirer,
  type AcquisitionOptions,
  type AcquisitionFailure,
} from './acquisition';
export { ExtractionPipeline, type PipelineConfig, type AcquisitionOutcome } from './pipeline';
export { extractInvoiceBatch, type BatchDocument, type BatchOptions } from './batch';
