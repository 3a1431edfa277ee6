import { Controller } from '@nestjs/common';
import { EventPattern, Payload } from '@nestjs/microservices';
import { DOCUMENT_INGESTION_TOPIC } from '../../config/kafka.config';
import { ConsumerService, IngestionOutcome } from './consumer.service';

@Controller()
export class ConsumerController {
  constructor(private readonly consumerService: ConsumerService) { }

  @EventPattern(DOCUMENT_INGESTION_TOPIC)
  handleDocumentIngestion(@Payload() message: unknown): Promise<IngestionOutcome> {
    return this.consumerService.handleDocumentIngestion(message);
  }
}
