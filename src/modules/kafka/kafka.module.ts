import { Module } from '@nestjs/common';
import { KafkaService } from './kafka.service';
import { ConsumerController } from './consumer.controller';
import { ConsumerService } from './consumer.service';
import { RetrievalModule } from '../retrieval/retrieval.module';

/**
 * Kafka Module - Document ingestion via Kafka
 */
@Module({
  imports: [RetrievalModule],
  controllers: [ConsumerController],
  providers: [KafkaService, ConsumerService],
  exports: [KafkaService],
})
export class KafkaModule { }
