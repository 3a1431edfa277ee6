import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger as PinoLogger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { RetrievalExceptionFilter } from './common/filters/retrieval-exception.filter';
import { KafkaService } from './modules/kafka/kafka.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(PinoLogger));
  app.useGlobalFilters(new RetrievalExceptionFilter());

  const kafkaService = app.get(KafkaService);
  if (kafkaService.isEnabled) {
    app.connectMicroservice(kafkaService.getOptions());
  }

  // Enable graceful shutdown
  app.enableShutdownHooks();

  await app.startAllMicroservices();
  const configService = app.get(ConfigService);
  const port = configService.get<number>('app.port') ?? 3000;
  const host = configService.get<string>('app.host', '0.0.0.0');

  const config = new DocumentBuilder()
    .setTitle('Paper Retrieval API')
    .setDescription('Passage retrieval over academic papers: chunking, embedding, vector search')
    .setVersion('1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  await app.listen(port, host);

  const url = await app.getUrl();
  const logger = new Logger('Bootstrap');

  logger.log(`🚀 Application is running on: ${url}`);
  logger.log(`📚 Swagger UI available at: ${url}/api`);
  if (kafkaService.isEnabled) {
    logger.log(`✅ Kafka consumer listening on '${kafkaService.getTopic()}'.`);
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
