// Re-export public API
export { AppModule } from './app.module';
export type { AppModuleOptions } from './app.module';
export { PipelineModule } from './pipeline/pipeline.module';
export { CheckpointedPipeline } from './pipeline/checkpointed-pipeline.service';
export { CheckpointStore, CheckpointState } from './pipeline/checkpoint.store';
export type { CheckpointSnapshot } from './pipeline/checkpoint.store';
export { formatPlan, formatSummary } from './pipeline/migration-summary';
export type { MigrationSummary, PlanSummary } from './pipeline/migration-summary';
export type { ProgressEvent, ProgressListener } from './pipeline/progress.reporter';
export { RunContextFactory } from './config/run-context.factory';
export { buildRunContext } from './config/run-context';
export type { RunContext, RunOptions } from './config/run-context';
export { validateEnvironment } from './config/environment';
export type { Environment } from './config/environment';
export { classifyEntity, EntityClassifier } from './classification/entity-classifier';
export type {
  ClassificationResult,
  ClassificationRules,
  ClassificationSummary,
} from './classification/entity-classifier';
export { QualityGate } from './quality/quality-gate';
export type { QualityOutcome } from './quality/quality-gate';
export { POINT_SINK } from './sink/interfaces/point-sink.interface';
export type { PointSink } from './sink/interfaces/point-sink.interface';
export type { SinkPoint } from './sink/point.builder';
export { RECORDER_SOURCE } from './source/interfaces/recorder-source.interface';
export type { RecorderSource } from './source/interfaces/recorder-source.interface';
export * from './common/errors';
