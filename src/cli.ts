#!/usr/bin/env node
import 'reflect-metadata';
import { Logger, Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule, Logger as PinoLogger } from 'nestjs-pino';
import { parseArgs } from 'util';
import { envSchema } from './config/env.schema';
import appConfig from './config/app.config';
import retrievalConfig from './config/retrieval.config';
import { RetrievalError } from './common/errors';
import { RetrievalModule } from './modules/retrieval/retrieval.module';
import { IndexingService } from './modules/retrieval/services/indexing.service';
import { RetrieverService } from './modules/retrieval/services/retriever.service';
import { SearchResult } from './modules/retrieval/types';

const USAGE = `Usage:
  cli chunk [--documents <path>] [--chunks <path>]
  cli build [--chunks <path>] [--index <path>]
  cli search <query> [--k <n>] [--json]`;

/**
 * Standalone context: configuration, logging and the retrieval engine, no HTTP
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: `.env`,
      load: [appConfig, retrievalConfig],
      validate: (config) => {
        const result = envSchema.safeParse(config);
        if (!result.success) {
          throw new Error(`Environment validation failed: ${result.error.message}`);
        }
        return result.data;
      },
    }),
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        pinoHttp: {
          level: configService.get<string>('app.logLevel', 'info'),
          // stdout carries command output
          stream: process.stderr,
        },
      }),
    }),
    RetrievalModule,
  ],
})
class CliModule { }

function formatResult(result: SearchResult, rank: number): string {
  const title = result.document.title ?? result.documentId;
  const snippet = result.text.length > 200 ? `${result.text.slice(0, 200)}...` : result.text;
  return [
    `${rank}. ${title}`,
    `   id: ${result.documentId} | chunk: ${result.sequenceIndex} | score: ${result.score.toFixed(4)}`,
    `   ${snippet.replace(/\s+/g, ' ')}`,
  ].join('\n');
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      documents: { type: 'string' },
      chunks: { type: 'string' },
      index: { type: 'string' },
      k: { type: 'string', default: '5' },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
  const [command, ...rest] = positionals;
  if (values.help || !command) {
    process.stdout.write(`${USAGE}\n`);
    return command || values.help ? 0 : 1;
  }

  const app = await NestFactory.createApplicationContext(CliModule, { bufferLogs: true });
  app.useLogger(app.get(PinoLogger));
  try {
    switch (command) {
      case 'chunk': {
        const result = await app.get(IndexingService).chunkCorpus(values.documents, values.chunks);
        process.stdout.write(`${JSON.stringify(result)}\n`);
        return 0;
      }
      case 'build': {
        const result = await app.get(IndexingService).buildIndex(values.chunks, values.index);
        process.stdout.write(`${JSON.stringify(result)}\n`);
        return 0;
      }
      case 'search': {
        const query = rest.join(' ');
        const k = Number(values.k);
        const context = await app.get(RetrieverService).searchWithContext(query, k);
        if (values.json) {
          process.stdout.write(`${JSON.stringify(context, null, 2)}\n`);
        } else if (context.results.length === 0) {
          process.stdout.write('No results found.\n');
        } else {
          process.stdout.write(`\n🔍 Vector Search: '${query}'\n\n`);
          process.stdout.write(`${context.results.map((result, i) => formatResult(result, i + 1)).join('\n\n')}\n`);
        }
        return 0;
      }
      default:
        process.stderr.write(`Unknown command: ${command}\n${USAGE}\n`);
        return 1;
    }
  } finally {
    await app.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const logger = new Logger('Cli');
    if (error instanceof RetrievalError) {
      logger.error(`❌ ${error.code}: ${error.message}`);
    } else {
      logger.error(error instanceof Error ? error.stack ?? error.message : String(error));
    }
    process.exitCode = 1;
  });
