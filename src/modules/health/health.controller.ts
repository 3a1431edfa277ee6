import { Controller, Get, Logger } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import { IndexHealthIndicator } from './index.health';
import { KafkaHealthIndicator } from './kafka.health';

@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly health: HealthCheckService,
    private readonly indexHealth: IndexHealthIndicator,
    private readonly kafkaHealth: KafkaHealthIndicator,
  ) { }

  @Get()
  @HealthCheck()
  check() {
    this.logger.debug('Health check endpoint called.');
    return this.health.check([
      () => this.indexHealth.isHealthy('index'),
      () => this.kafkaHealth.isHealthy('kafka'),
    ]);
  }
}
