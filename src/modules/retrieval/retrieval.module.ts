import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import retrievalConfig from '../../config/retrieval.config';
import { VectorIndexModule } from '../vector-index/vector-index.module';
import { EmbeddingModelProvider } from './models/embedding-model.provider';
import { ChunkerService } from './services/chunker.service';
import { EmbedderService } from './services/embedder.service';
import { IndexingService } from './services/indexing.service';
import { RetrieverService } from './services/retriever.service';

/**
 * Retrieval Module - chunking, embedding, indexing pipeline and retriever
 */
@Module({
    imports: [ConfigModule.forFeature(retrievalConfig), VectorIndexModule],
    providers: [
        ChunkerService,
        EmbeddingModelProvider,
        EmbedderService,
        RetrieverService,
        IndexingService,
    ],
    exports: [
        ChunkerService,
        EmbeddingModelProvider,
        EmbedderService,
        RetrieverService,
        IndexingService,
        VectorIndexModule,
    ],
})
export class RetrievalModule { }
