import 'reflect-metadata';
import { Logger } from '@nestjs/common';

process.env.LOG_LEVEL = 'silent';
Logger.overrideLogger(false);
