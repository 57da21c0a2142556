export type {
  FileLister,
  ImageLoader,
  LoadOptions,
  OcrEngine,
  OutputWriter,
  PathKind,
  Preprocessor,
  WriteOptions,
} from './collaborators';
export {
  createPipelineContext,
  createDefaultConfig,
  type PipelineContext,
  type PipelineDeps,
  type PipelineSettings,
} from './pipeline-context';
export { PageStateMachine, pageStateMachine, terminalStates, type PageState } from './state-machine';
export { withLimit } from './limit';
export { processSingleImage, STAGE_LABELS } from './page-processor';
export { processFile } from './file-processor';
export { processDirectory } from './directory-processor';
export { processPath } from './process-path';
