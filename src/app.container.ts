import { DIContainer } from './shared/container';
import { Logger } from './shared/logger';
import type { ScannerConfig } from './config/scanner.config';
import type { IMarketDataProvider } from './domain/interfaces/market-data-provider.interface';
import type { INotifier } from './domain/interfaces/services.interface';

import { BinanceApiClient } from './infrastructure/http/binance-api.client';
import { BinanceMarketDataProvider } from './infrastructure/market-data/providers/binance.provider';
import { JsonAlertStateRepository } from './infrastructure/repositories/alert-state.repository';
import { NotificationService } from './infrastructure/services/notification.service';
import { ConsoleNotifier } from './infrastructure/notifiers/console.notifier';
import { TelegramNotifier } from './infrastructure/notifiers/telegram.notifier';
import { DiscordNotifier } from './infrastructure/notifiers/discord.notifier';

import { MarketHealthService } from './modules/confluence';
import { ScanResultStore } from './application/services/scan-result.store';
import { RunScanUseCase } from './application/use-cases/run-scan.use-case';
import { ConfluenceScanner } from './app';

const logger = new Logger('DependencyContainer');

function createProvider(config: ScannerConfig): IMarketDataProvider {
  const { exchange } = config;
  logger.info(`✅ Market data: ${exchange.name}-${exchange.market}`);
  const client = new BinanceApiClient({
    market: exchange.market,
    requestsPerSecond: exchange.requestsPerSecond,
    timeoutMs: exchange.timeoutMs,
  });
  return new BinanceMarketDataProvider(client, exchange);
}

function createNotifiers(config: ScannerConfig, env: NodeJS.ProcessEnv): INotifier[] {
  const notifiers: INotifier[] = [new ConsoleNotifier()];
  const { telegram, discord } = config.alerts;

  if (telegram.enabled) {
    const token = env.TELEGRAM_BOT_TOKEN;
    if (token && telegram.chatId) {
      notifiers.push(new TelegramNotifier(token, telegram.chatId));
      logger.info('✅ Enabled: telegram notifier');
    } else {
      logger.warn('⚠️ Telegram enabled but TELEGRAM_BOT_TOKEN or chatId is missing, skipping');
    }
  }

  if (discord.enabled) {
    if (discord.webhookUrl) {
      notifiers.push(new DiscordNotifier(discord.webhookUrl));
      logger.info('✅ Enabled: discord notifier');
    } else {
      logger.warn('⚠️ Discord enabled but webhookUrl is missing, skipping');
    }
  }
  return notifiers;
}

export function registerDependencies(config: ScannerConfig, env: NodeJS.ProcessEnv = process.env): DIContainer {
  const container = DIContainer.getInstance();

  container.bind('ScannerConfig', () => config);

  // --- Infrastructure ---
  container.bind('IMarketDataProvider', () => createProvider(config));
  container.bind('IAlertStateRepository', () => new JsonAlertStateRepository(config.alerts.stateFile));
  container.bind('INotificationService', () => new NotificationService(createNotifiers(config, env)));

  // --- Core services ---
  container.bind('MarketHealthService', () => new MarketHealthService());
  container.bindClass('ScanResultStore', ScanResultStore);

  // --- Use cases & app ---
  container.bindClass('RunScanUseCase', RunScanUseCase);
  container.bindClass(ConfluenceScanner, ConfluenceScanner);

  return container;
}
