import { Injectable } from '../../shared/decorators';
import type { AlertEvent } from '../../domain/entities/alert.entity';
import type { MarketHealth } from '../../domain/entities/market-health.entity';
import type { ScoreBundle } from '../../domain/entities/score-bundle.entity';
import type { RankingOutput } from '../../modules/confluence/ranking';

export interface ScanResult {
  startedAt: Date;
  finishedAt: Date;
  timeframe: string;
  universeSize: number;
  health: MarketHealth;
  bundles: ScoreBundle[];
  ranking: RankingOutput;
  alerts: AlertEvent[];
}

/** Latest scan result, read by the status server. */
@Injectable()
export class ScanResultStore {
  private latest: ScanResult | null = null;
  private scans = 0;

  publish(result: ScanResult): void {
    this.latest = result;
    this.scans++;
  }

  getLatest(): ScanResult | null {
    return this.latest;
  }

  get scanCount(): number {
    return this.scans;
  }
}
