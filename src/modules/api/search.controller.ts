import { Body, Controller, HttpCode, Logger, Post, UsePipes, ValidationPipe } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { getErrorMessage } from '../../common/errors';
import { RetrieverService } from '../retrieval/services/retriever.service';
import { SearchContext, SearchResult } from '../retrieval/types';
import { SearchDto } from './dto/search.dto';

export const DEFAULT_SEARCH_K = 5;

@ApiTags('search')
@Controller()
export class SearchController {
  private readonly logger = new Logger(SearchController.name);

  constructor(private readonly retriever: RetrieverService) { }

  @Post('search')
  @HttpCode(200)
  @ApiOperation({ summary: 'Search passages', description: 'Returns the top-k passages for a natural-language query.' })
  @ApiResponse({ status: 200, description: 'Ranked passages, best first.' })
  @ApiResponse({ status: 503, description: 'No index has been built or loaded.' })
  @UsePipes(new ValidationPipe({ transform: true }))
  async search(@Body() searchDto: SearchDto): Promise<SearchResult[] | SearchContext> {
    const requestStart = Date.now();
    const k = searchDto.k ?? DEFAULT_SEARCH_K;
    this.logger.log(`🌐 HTTP REQUEST: Search for "${searchDto.query}" (k=${k})`);

    try {
      const response = searchDto.withContext
        ? await this.retriever.searchWithContext(searchDto.query, k, searchDto.filters)
        : await this.retriever.search(searchDto.query, k, searchDto.filters);

      this.logger.log(`🌐 HTTP RESPONSE: Search completed in ${Date.now() - requestStart}ms`);
      return response;
    } catch (error) {
      this.logger.error(`❌ HTTP ERROR: Search failed after ${Date.now() - requestStart}ms - ${getErrorMessage(error)}`);
      throw error;
    }
  }
}
