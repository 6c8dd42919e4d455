import { Module } from '@nestjs/common';
import { EntityClassifier } from '../classification/entity-classifier';
import { RunContextFactory } from '../config/run-context.factory';
import { QualityGate } from '../quality/quality-gate';
import { SinkModule } from '../sink/sink.module';
import { SourceModule } from '../source/source.module';
import { MetadataStream } from '../streams/metadata.stream';
import { RecordStream } from '../streams/record.stream';
import { CheckpointStore } from './checkpoint.store';
import { CheckpointedPipeline } from './checkpointed-pipeline.service';
import { ProgressReporter } from './progress.reporter';

/**
 * PipelineModule
 *
 * Wires the migration stages between the recorder source and the sink.
 *
 * Components:
 * - MetadataStream: paginated entity metadata
 * - EntityClassifier: accept/reject and category per entity
 * - RecordStream: keyset-paginated statistics rows
 * - QualityGate: per-record pass/correct/drop
 * - CheckpointStore: checkpoint file persistence
 * - CheckpointedPipeline: drives a run and owns the checkpoint
 * - RunContextFactory: environment plus CLI switches into a RunContext
 */
@Module({
  imports: [SourceModule, SinkModule],
  providers: [
    MetadataStream,
    EntityClassifier,
    RecordStream,
    QualityGate,
    CheckpointStore,
    ProgressReporter,
    CheckpointedPipeline,
    RunContextFactory,
  ],
  exports: [CheckpointedPipeline, RunContextFactory],
})
export class PipelineModule {}
