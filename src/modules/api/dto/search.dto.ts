import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsDateString,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { SearchFilters } from '../../retrieval/types';

export class SearchFiltersDto implements SearchFilters {
  @ApiPropertyOptional({ description: 'Only return chunks of these documents.', example: ['2006.11239'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  documentIds?: string[];

  @ApiPropertyOptional({ description: 'Only return chunks of documents in any of these categories.', example: ['cs.LG'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  categories?: string[];

  @ApiPropertyOptional({ description: 'Inclusive lower bound on the publication date.', example: '2020-01-01' })
  @IsOptional()
  @IsDateString()
  publishedAfter?: string;

  @ApiPropertyOptional({ description: 'Inclusive upper bound on the publication date.', example: '2023-12-31' })
  @IsOptional()
  @IsDateString()
  publishedBefore?: string;
}

export class SearchDto {
  @ApiProperty({ description: 'Natural-language query.', example: 'denoising diffusion probabilistic models' })
  @IsString()
  @IsNotEmpty()
  query!: string;

  @ApiPropertyOptional({ description: 'Number of passages to return.', default: 5, minimum: 1, maximum: 100 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  k?: number;

  @ApiPropertyOptional({ type: SearchFiltersDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => SearchFiltersDto)
  filters?: SearchFiltersDto;

  @ApiPropertyOptional({ description: 'Include the query and index statistics in the response.', default: false })
  @IsOptional()
  @IsBoolean()
  withContext?: boolean;
}
