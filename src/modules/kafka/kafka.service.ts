import { Injectable, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KafkaOptions, Transport } from '@nestjs/microservices';
import { Kafka, Admin } from 'kafkajs';
import { DOCUMENT_INGESTION_TOPIC } from '../../config/kafka.config';

/**
 * Kafka connection settings and admin client. Ingestion is off when no broker is configured.
 */
@Injectable()
export class KafkaService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(KafkaService.name);
  private readonly admin?: Admin;

  constructor(private readonly configService: ConfigService) {
    const broker = this.configService.get<string>('kafka.broker');
    if (broker) {
      const kafka = new Kafka({
        clientId: this.configService.get<string>('kafka.clientId'),
        brokers: [broker],
      });
      this.admin = kafka.admin();
    }
  }

  get isEnabled(): boolean {
    return this.admin !== undefined;
  }

  async onModuleInit() {
    if (!this.admin) {
      this.logger.log('Kafka broker not configured; document ingestion consumer disabled.');
      return;
    }
    this.logger.log('Connecting Kafka admin...');
    await this.admin.connect();
    this.logger.log('Kafka admin connected successfully.');
  }

  async onModuleDestroy() {
    if (this.admin) {
      await this.admin.disconnect();
      this.logger.log('Kafka admin disconnected');
    }
  }

  getAdmin(): Admin | undefined {
    return this.admin;
  }

  getTopic(): string {
    return DOCUMENT_INGESTION_TOPIC;
  }

  getOptions(): KafkaOptions {
    const broker = this.configService.get<string>('kafka.broker');
    const clientId = this.configService.get<string>('kafka.clientId');
    const groupId = this.configService.get<string>('kafka.consumerGroupId');

    if (!broker || !clientId || !groupId) {
      throw new Error('Kafka configuration is missing or incomplete.');
    }

    this.logger.log(
      `Connecting to Kafka broker at ${broker} with client ID '${clientId}' and group ID '${groupId}'`,
    );

    return {
      transport: Transport.KAFKA,
      options: {
        client: {
          clientId,
          brokers: [broker],
        },
        consumer: {
          groupId,
        },
        subscribe: {
          fromBeginning: true,
        },
      },
    };
  }
}
