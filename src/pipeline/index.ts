export { createPipeline, type PipelineOverrides, type PipelineRuntime } from './factory';
export { RankingPipeline, type RankingPipelineDependencies } from './ranking-pipeline';
export { parseRunRequest, RequestValidationError, type RunRequest } from './request';
