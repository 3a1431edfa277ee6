import { ConfigService } from '@nestjs/config';
import { DOCUMENT_INGESTION_TOPIC } from '../../config/kafka.config';
import { KafkaService } from './kafka.service';

describe('KafkaService', () => {
    it('stays disabled without a broker', async () => {
        const service = new KafkaService(new ConfigService({ kafka: { clientId: 'paper-retrieval' } }));

        await service.onModuleInit();

        expect(service.isEnabled).toBe(false);
        expect(service.getAdmin()).toBeUndefined();
        expect(() => service.getOptions()).toThrow('Kafka configuration is missing or incomplete.');
    });

    it('reports the topic the consumer subscribes to', () => {
        const service = new KafkaService(new ConfigService({}));

        expect(service.getTopic()).toBe(DOCUMENT_INGESTION_TOPIC);
        expect(DOCUMENT_INGESTION_TOPIC).toBe('document-ingestion-events');
    });
});
