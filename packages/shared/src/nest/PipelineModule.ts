import {
  Controller,
  DynamicModule,
  Get,
  Global,
  Header,
  Injectable,
  Module,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { loadPipelineConfig, PipelineConfig, ServiceDefaults } from '../config';
import { dataSourceOptions, EntityClass, LOCAL_PIPELINE_ENTITIES } from '../database';
import { typeOrmLocalStores } from '../runtime/scope';
import { PipelineHost } from '../service/PipelineHost';
import type { HealthCheckResponse } from '../types';

export const PIPELINE_CONFIG = 'PIPELINE_CONFIG';

export interface PipelineModuleOptions extends ServiceDefaults {
  /** Domain entities of the service database. Omit for services without one. */
  entities?: EntityClass[];
  version?: string;
}

@Controller()
export class HealthController {
  constructor(private readonly host: PipelineHost) {}

  @Get('/health')
  health(): Promise<HealthCheckResponse> {
    return this.host.health();
  }

  @Get('/metrics')
  @Header('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
  metrics(): Promise<string> {
    return this.host.metrics.render();
  }
}

@Injectable()
export class PipelineLifecycle implements OnApplicationBootstrap, OnApplicationShutdown {
  constructor(private readonly host: PipelineHost) {}

  onApplicationBootstrap(): void {
    this.host.start();
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    this.host.logger.info('Shutting down', { signal });
    await this.host.stop();
  }
}

/**
 * Wires the pipeline into a Nest app: configuration, the service database,
 * the host with its consumers and relay, and the health and metrics routes.
 */
@Global()
@Module({})
export class PipelineModule {
  static forService(options: PipelineModuleOptions): DynamicModule {
    const load = (): PipelineConfig => loadPipelineConfig(process.env, options);
    const entities = options.entities;

    return {
      module: PipelineModule,
      imports: entities
        ? [
            TypeOrmModule.forRootAsync({
              useFactory: () => {
                const config = load();
                return dataSourceOptions(
                  { ...config.database, synchronize: config.nodeEnv === 'development' },
                  [...LOCAL_PIPELINE_ENTITIES, ...entities]
                );
              },
            }),
          ]
        : [],
      controllers: [HealthController],
      providers: [
        { provide: PIPELINE_CONFIG, useFactory: load },
        {
          provide: PipelineHost,
          inject: [PIPELINE_CONFIG, { token: DataSource, optional: true }],
          useFactory: async (config: PipelineConfig, dataSource?: DataSource) => {
            const host = new PipelineHost({
              config,
              local: dataSource ? typeOrmLocalStores(dataSource) : undefined,
              version: options.version,
            });
            await host.initialize();
            return host;
          },
        },
        PipelineLifecycle,
      ],
      exports: [PIPELINE_CONFIG, PipelineHost],
    };
  }
}
