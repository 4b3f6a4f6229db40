import { Inject, Injectable } from './shared/decorators';
import { Logger } from './shared/logger';
import type { RunScanUseCase } from './application/use-cases/run-scan.use-case';
import type { ScannerConfig } from './config/scanner.config';

@Injectable()
export class ConfluenceScanner {
  private readonly logger = new Logger(ConfluenceScanner.name);
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private stopped = false;

  constructor(
    @Inject('RunScanUseCase') private readonly runScan: Pick<RunScanUseCase, 'execute'>,
    @Inject('ScannerConfig') private readonly config: ScannerConfig,
  ) {}

  get isScanning(): boolean {
    return this.running !== null;
  }

  /** Runs one scan now; with a positive interval keeps scanning until stopped. */
  public async start(): Promise<void> {
    const { intervalMinutes } = this.config.scan;
    this.logger.info(
      `Starting confluence scanner on ${this.config.exchange.name} ${this.config.exchange.market}, timeframe ${this.config.timeframes[0]}`,
    );

    this.stopped = false;
    await this.tick();

    if (intervalMinutes > 0 && !this.stopped) {
      this.timer = setInterval(() => {
        this.tick().catch((error) => this.logger.error('Scheduled scan failed:', error));
      }, intervalMinutes * 60_000);
      this.logger.info(`Next scans every ${intervalMinutes} minutes`);
    }
  }

  /** Skips when the previous scan is still running. */
  public async tick(): Promise<void> {
    if (this.running) {
      this.logger.warn('Previous scan still running, skipping this tick');
      return;
    }
    this.running = this.scanOnce();
    try {
      await this.running;
    } finally {
      this.running = null;
    }
  }

  private async scanOnce(): Promise<void> {
    try {
      await this.runScan.execute();
    } catch (error) {
      this.logger.error('Scan failed:', error);
    }
  }

  public async stop(): Promise<void> {
    this.logger.info('Stopping confluence scanner...');
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) await this.running;
    this.logger.info('Confluence scanner stopped gracefully.');
  }
}
