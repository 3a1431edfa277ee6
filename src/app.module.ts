import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { envSchema } from './config/env.schema';
import appConfig from './config/app.config';
import kafkaConfig from './config/kafka.config';
import retrievalConfig from './config/retrieval.config';
import { ApiModule } from './modules/api/api.module';
import { KafkaModule } from './modules/kafka/kafka.module';
import { RetrievalModule } from './modules/retrieval/retrieval.module';
import { EvaluationModule } from './modules/evaluation/evaluation.module';
import { HealthModule } from './modules/health/health.module';

/**
 * App Module - Main application module
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: `.env`,
      load: [appConfig, kafkaConfig, retrievalConfig],
      validate: (config) => {
        const result = envSchema.safeParse(config);
        if (!result.success) {
          throw new Error(
            `Environment validation failed: ${result.error.message}`,
          );
        }
        return result.data;
      },
    }),
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        pinoHttp: {
          level: configService.get<string>('app.logLevel', 'info'),
          autoLogging: {
            ignore: (req) => req.url === '/health',
          },
        },
      }),
    }),
    ApiModule,
    KafkaModule,
    RetrievalModule,
    EvaluationModule,
    HealthModule,
  ],
})
export class AppModule { }
