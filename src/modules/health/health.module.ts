import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { IndexHealthIndicator } from './index.health';
import { KafkaModule } from '../kafka/kafka.module';
import { KafkaHealthIndicator } from './kafka.health';

@Module({
  imports: [TerminusModule, RetrievalModule, KafkaModule],
  controllers: [HealthController],
  providers: [IndexHealthIndicator, KafkaHealthIndicator],
})
export class HealthModule { }
