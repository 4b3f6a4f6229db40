#!/usr/bin/env node
import 'reflect-metadata';

import { config } from 'dotenv';

import { Logger } from './shared/logger';
import { registerDependencies } from './app.container';
import { loadScannerConfig } from './config/scanner.config';
import { createStatusServer } from './presentation/http/status.server';
import type { ScanResultStore } from './application/services/scan-result.store';
import { ConfluenceScanner } from './app';

config();

const logger = new Logger('Main');
const PORT: number = Number(process.env.PORT) || 8000;

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection:', reason);
  process.exit(1);
});

async function bootstrap(): Promise<void> {
  try {
    logger.info('Starting confluence scanner...');

    const scannerConfig = loadScannerConfig();
    const container = registerDependencies(scannerConfig);

    const scanner = container.get<ConfluenceScanner>(ConfluenceScanner);

    if (scannerConfig.scan.intervalMinutes <= 0) {
      await scanner.start();
      logger.info('Single scan finished');
      process.exit(0);
    }

    const server = createStatusServer(container.get<ScanResultStore>('ScanResultStore')).listen(PORT, '0.0.0.0', () => {
      logger.info(`Status server listening on port ${PORT}`);
    });

    // Graceful shutdown
    let isShuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
      if (isShuttingDown) return;
      isShuttingDown = true;
      logger.info(`Received ${signal}, shutting down gracefully...`);
      try {
        await scanner.stop();
      } finally {
        server.close();
        process.exit(0);
      }
    };

    process.once('SIGINT', () => void shutdown('SIGINT'));
    process.once('SIGTERM', () => void shutdown('SIGTERM'));

    await scanner.start();
  } catch (error) {
    logger.error('Failed to start application:', error);
    process.exit(1);
  }
}

void bootstrap();
