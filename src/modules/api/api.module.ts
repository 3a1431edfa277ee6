import { Module } from '@nestjs/common';
import { EvaluationModule } from '../evaluation/evaluation.module';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { EvaluationController } from './evaluation.controller';
import { IndexingController } from './indexing.controller';
import { SearchController } from './search.controller';

/**
 * API Module - search, indexing and evaluation endpoints
 */
@Module({
  imports: [RetrievalModule, EvaluationModule],
  controllers: [SearchController, IndexingController, EvaluationController],
})
export class ApiModule { }
