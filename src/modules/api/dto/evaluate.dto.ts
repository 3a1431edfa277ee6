import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { ArrayNotEmpty, IsArray, IsInt, IsNotEmpty, IsOptional, IsString, Min, ValidateNested } from 'class-validator';
import { EvaluationQuery } from '../../evaluation/evaluation.service';

export class EvaluationQueryDto implements EvaluationQuery {
  @ApiProperty({ example: 'diffusion models' })
  @IsString()
  @IsNotEmpty()
  query!: string;

  @ApiProperty({ example: ['2006.11239'] })
  @IsArray()
  @IsString({ each: true })
  relevantDocumentIds!: string[];
}

export class EvaluateDto {
  @ApiProperty({ type: [EvaluationQueryDto] })
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => EvaluationQueryDto)
  queries!: EvaluationQueryDto[];

  @ApiPropertyOptional({ example: [1, 3, 5, 10] })
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsInt({ each: true })
  @Min(1, { each: true })
  kValues?: number[];
}
