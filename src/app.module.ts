import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnvironment } from './config/environment';
import { PipelineModule } from './pipeline/pipeline.module';

export interface AppModuleOptions {
  /** Defaults to `.env` in the working directory */
  envFilePath?: string;
}

@Module({})
export class AppModule {
  static register(options: AppModuleOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          envFilePath: options.envFilePath ?? '.env',
          validate: validateEnvironment,
        }),
        PipelineModule,
      ],
    };
  }
}
