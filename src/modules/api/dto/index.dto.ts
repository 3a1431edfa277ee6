import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { ArrayNotEmpty, IsArray, IsDateString, IsNotEmpty, IsOptional, IsString, ValidateNested } from 'class-validator';
import { Document, DocumentMetadata } from '../../retrieval/types';

export class DocumentMetadataDto implements DocumentMetadata {
  @ApiPropertyOptional({ example: 'Denoising Diffusion Probabilistic Models' })
  @IsOptional()
  @IsString()
  title?: string;

  @ApiPropertyOptional({ example: ['A. Author', 'B. Author'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  authors?: string[];

  @ApiPropertyOptional({ example: ['cs.LG', 'stat.ML'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  categories?: string[];

  @ApiPropertyOptional({ example: '2020-06-19' })
  @IsOptional()
  @IsDateString()
  published?: string;
}

export class DocumentDto implements Document {
  @ApiProperty({ description: 'Stable document id.', example: '2006.11239' })
  @IsString()
  @IsNotEmpty()
  id!: string;

  @ApiProperty({ description: 'Extracted document text.' })
  @IsString()
  text!: string;

  @ApiPropertyOptional({ type: DocumentMetadataDto })
  @ValidateNested()
  @Type(() => DocumentMetadataDto)
  metadata: DocumentMetadataDto = {};
}

export class IndexDocumentsDto {
  @ApiProperty({ type: [DocumentDto] })
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => DocumentDto)
  documents!: DocumentDto[];
}
