import { Injectable, Logger } from '@nestjs/common';
import { getErrorMessage, RetrievalError } from '../../common/errors';
import { IndexingService } from '../retrieval/services/indexing.service';
import { Document } from '../retrieval/types';
import { parseDocument } from '../retrieval/utils/document-source';

export type IngestionOutcome =
  | { status: 'indexed'; documents: number; added: number; skipped: number }
  | { status: 'skipped'; reason: string };

/**
 * Consumer Service - Kafka document ingestion.
 *
 * A message carries one Document record or `{ documents: [...] }`.
 */
@Injectable()
export class ConsumerService {
  private readonly logger = new Logger(ConsumerService.name);

  constructor(private readonly indexing: IndexingService) { }

  private toDocuments(message: unknown): Document[] {
    if (typeof message === 'object' && message !== null && 'documents' in message) {
      const { documents } = message;
      if (!Array.isArray(documents)) {
        throw new TypeError('documents must be an array');
      }
      return documents.map((value, i) => parseDocument(value, `documents[${i}]`));
    }
    return [parseDocument(message, 'message')];
  }

  async handleDocumentIngestion(message: unknown): Promise<IngestionOutcome> {
    this.logger.log('--> Received document ingestion event');
    this.logger.debug(`Full event payload: ${JSON.stringify(message)}`);

    try {
      const documents = this.toDocuments(message);
      const result = await this.indexing.indexDocuments(documents);

      this.logger.log(`🎯 Indexed ${result.documents} documents: ${result.added} chunks added, ${result.skipped} already present`);
      return { status: 'indexed', documents: result.documents, added: result.added, skipped: result.skipped };
    } catch (error) {
      const reason = error instanceof RetrievalError ? `${error.code}: ${error.message}` : getErrorMessage(error);
      this.logger.error(`Error processing document ingestion event: ${reason}`);

      this.logger.warn('Skipping document ingestion event due to processing error');
      return { status: 'skipped', reason };
    }
  }
}
