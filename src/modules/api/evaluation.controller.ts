import { Body, Controller, HttpCode, Logger, Post, UsePipes, ValidationPipe } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { EvaluationReport, EvaluationService } from '../evaluation/evaluation.service';
import { EvaluateDto } from './dto/evaluate.dto';

@ApiTags('evaluation')
@Controller('evaluate')
export class EvaluationController {
  private readonly logger = new Logger(EvaluationController.name);

  constructor(private readonly evaluation: EvaluationService) { }

  @Post()
  @HttpCode(200)
  @ApiOperation({ summary: 'Evaluate retrieval', description: 'Recall@k and precision@k over labelled queries.' })
  @UsePipes(new ValidationPipe({ transform: true }))
  async evaluate(@Body() body: EvaluateDto): Promise<EvaluationReport> {
    this.logger.log(`🌐 HTTP REQUEST: Evaluate ${body.queries.length} queries`);
    return this.evaluation.evaluate(body.queries, body.kValues);
  }
}
