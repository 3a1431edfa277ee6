import { Module } from '@nestjs/common';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { EvaluationService } from './evaluation.service';

@Module({
    imports: [RetrievalModule],
    providers: [EvaluationService],
    exports: [EvaluationService],
})
export class EvaluationModule { }
