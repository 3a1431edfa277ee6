import { Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult, HealthCheckError } from '@nestjs/terminus';
import { getErrorMessage } from '../../common/errors';
import { KafkaService } from '../kafka/kafka.service';

@Injectable()
export class KafkaHealthIndicator extends HealthIndicator {
  constructor(private readonly kafkaService: KafkaService) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const admin = this.kafkaService.getAdmin();
    if (!admin) {
      return this.getStatus(key, true, { enabled: false });
    }
    try {
      await admin.listTopics();
      return this.getStatus(key, true, { enabled: true });
    } catch (e) {
      throw new HealthCheckError('Kafka check failed', this.getStatus(key, false, { message: getErrorMessage(e) }));
    }
  }
}
