import { Body, Controller, Get, HttpCode, Logger, Post, UsePipes, ValidationPipe } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  BuildIndexResult,
  ChunkCorpusResult,
  IndexDocumentsResult,
  IndexingService,
} from '../retrieval/services/indexing.service';
import { RetrieverService } from '../retrieval/services/retriever.service';
import { IndexStats } from '../vector-index/types/vector-index.types';
import { IndexDocumentsDto } from './dto/index.dto';

/**
 * Corpus and index paths come from configuration only; the CLI is the way to work on other locations.
 */
@ApiTags('index')
@Controller('index')
export class IndexingController {
  private readonly logger = new Logger(IndexingController.name);

  constructor(
    private readonly indexing: IndexingService,
    private readonly retriever: RetrieverService,
  ) { }

  @Post('chunks')
  @HttpCode(200)
  @ApiOperation({ summary: 'Chunk the document corpus', description: 'Reads the configured documents JSONL and writes the configured chunk corpus.' })
  async chunkCorpus(): Promise<ChunkCorpusResult> {
    this.logger.log('🌐 HTTP REQUEST: Chunk corpus');
    return this.indexing.chunkCorpus();
  }

  @Post('build')
  @HttpCode(200)
  @ApiOperation({ summary: 'Build the index', description: 'Embeds the configured chunk corpus, builds a fresh index, saves it to the configured location and serves it.' })
  @ApiResponse({ status: 400, description: 'The chunk corpus is empty.' })
  async build(): Promise<BuildIndexResult> {
    this.logger.log('🌐 HTTP REQUEST: Build index');
    return this.indexing.buildIndex();
  }

  @Post('documents')
  @HttpCode(200)
  @ApiOperation({ summary: 'Index documents', description: 'Chunks, embeds and appends documents to the served index.' })
  @UsePipes(new ValidationPipe({ transform: true }))
  async indexDocuments(@Body() body: IndexDocumentsDto): Promise<IndexDocumentsResult> {
    this.logger.log(`🌐 HTTP REQUEST: Index ${body.documents.length} documents`);
    return this.indexing.indexDocuments(body.documents);
  }

  @Get('stats')
  @ApiOperation({ summary: 'Index statistics' })
  @ApiResponse({ status: 503, description: 'No index has been built or loaded.' })
  async stats(): Promise<IndexStats> {
    return this.retriever.indexStats();
  }
}
