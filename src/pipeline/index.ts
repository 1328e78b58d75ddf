export { IesFilePipeline, defaultOutputPath } from './file-pipeline.js';
export type { RescaleFileOptions, PipelineOptions, PipelineResult } from './file-pipeline.js';
