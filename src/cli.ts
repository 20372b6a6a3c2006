#!/usr/bin/env node
/**
 * CLI Entry Point
 * Crawls a documentation site into a corpus directory
 *
 * Usage: doc-corpus-crawler [baseUrl]   (other settings come from CRAWL_* variables)
 */

import * as fs from 'fs/promises';
import { buildCrawlerConfig, ConfigError, CrawlerConfig } from './config/crawler.config';
import { env } from './config/env';
import { CorpusStateError, CorpusWriteError } from './lib/corpus/corpus-errors';
import { createCrawlEngine } from './lib/engine/crawl-engine';
import { ClosableLogger, createLogger } from './lib/logging/logger';

const EXIT_OK = 0;
const EXIT_FATAL = 1;
const EXIT_CONFIG = 2;
const EXIT_INTERRUPTED = 130;

const startCrawl = async (): Promise<number> => {
  let config: CrawlerConfig;
  try {
    config = buildCrawlerConfig(env, { baseUrl: process.argv[2] });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      return EXIT_CONFIG;
    }
    throw error;
  }

  let logger: ClosableLogger;
  try {
    await fs.mkdir(config.outDir, { recursive: true });
    logger = createLogger({ level: config.logLevel, filePath: config.logFile ?? undefined });
  } catch (error) {
    console.error(`Cannot create output directory ${config.outDir}:`, error);
    return EXIT_FATAL;
  }

  const engine = createCrawlEngine(config, { logger });

  let interrupts = 0;
  const onSigint = (): void => {
    interrupts++;
    if (interrupts === 1) {
      logger.warn('SIGINT received: finishing in-flight pages (press Ctrl+C again to abort)');
      engine.stop();
      return;
    }
    logger.error('Second SIGINT received: aborting');
    process.exit(EXIT_INTERRUPTED);
  };
  process.on('SIGINT', onSigint);

  try {
    await engine.run();
    return EXIT_OK;
  } catch (error) {
    if (error instanceof CorpusStateError) {
      logger.error(`${error.message}. Use a fresh output directory or CRAWL_RESUME=false.`);
      return EXIT_CONFIG;
    }
    if (error instanceof CorpusWriteError) {
      logger.error(`Crawl aborted, output not writable (${error.path}): ${error.message}`);
    } else {
      logger.error(`Crawl failed: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    }
    return EXIT_FATAL;
  } finally {
    process.off('SIGINT', onSigint);
    await logger.close();
  }
};

startCrawl().then(
  (code) => process.exit(code),
  (error) => {
    console.error('Failed to start crawler:', error);
    process.exit(EXIT_FATAL);
  }
);
