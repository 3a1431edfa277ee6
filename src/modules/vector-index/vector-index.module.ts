import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import retrievalConfig from '../../config/retrieval.config';
import { VectorIndexService } from './vector-index.service';

/**
 * Vector Index Module - in-process similarity search with on-disk persistence
 */
@Module({
    imports: [ConfigModule.forFeature(retrievalConfig)],
    providers: [VectorIndexService],
    exports: [VectorIndexService],
})
export class VectorIndexModule { }
