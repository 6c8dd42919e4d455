import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Environment } from '../config/environment';
import { RECORDER_SOURCE } from './interfaces/recorder-source.interface';
import { RecorderRepository } from './recorder.repository';

/**
 * SourceModule
 *
 * Opens the recorder database read-only for the lifetime of the
 * application context and exposes it as RECORDER_SOURCE.
 *
 * Components:
 * - TypeORM DataSource on the better-sqlite3 driver, no entities
 * - RecorderRepository: raw SQL over the recorder statistics tables
 */
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<Environment, true>) => ({
        type: 'better-sqlite3',
        database: configService.get('RECORDER_DB_PATH', { infer: true }),
        readonly: true,
        fileMustExist: true,
        entities: [],
        synchronize: false,
        logging: false,
        // A missing or locked file will not appear by waiting
        retryAttempts: 0,
      }),
    }),
  ],
  providers: [
    RecorderRepository,
    { provide: RECORDER_SOURCE, useExisting: RecorderRepository },
  ],
  exports: [RECORDER_SOURCE],
})
export class SourceModule {}
