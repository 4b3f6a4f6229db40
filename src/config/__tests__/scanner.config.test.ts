import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Logger } from '../../shared/logger';
import { loadScannerConfig, parseRegimeWeights, resolveScannerConfig } from '../scanner.config';

const SHIPPED_CONFIG = path.resolve(__dirname, '../../../config/scanner.json');

afterEach(() => {
  vi.restoreAllMocks();
});

describe('resolveScannerConfig', () => {
  it('resolves an empty document to the defaults', () => {
    const config = resolveScannerConfig({});
    expect(config.timeframes).toEqual(['1d']);
    expect(config.scan.intervalMinutes).toBe(60);
    expect(config.exchange.market).toBe('futures');
    expect(config.ranking.topN).toBeNull();
    expect(config.reports.topN).toBe(10);
    expect(config.alerts.cooldownMinutes).toBe(60);
    expect(config.alerts.rsiDivergence.minStrength).toBe(5);
    expect(config.patterns.params.rsi_divergence.minStrength).toBe(1);
    expect(config.patterns.enabled).toEqual([]);
    expect(config.confluence.regimeWeights).toEqual({});
  });

  it('coerces strings toward the type of each default', () => {
    const config = resolveScannerConfig({
      exchange: { maxSymbols: '25', symbols: 'BTCUSDT, ETHUSDT' },
      alerts: { enabled: 'false', minCsDelta: '2.5' },
    });
    expect(config.exchange.maxSymbols).toBe(25);
    expect(config.exchange.symbols).toEqual(['BTCUSDT', 'ETHUSDT']);
    expect(config.alerts.enabled).toBe(false);
    expect(config.alerts.minCsDelta).toBe(2.5);
  });

  it('falls back to the default for invalid values', () => {
    const config = resolveScannerConfig({
      scan: { intervalMinutes: 2.5 },
      alerts: { cooldownMinutes: -5, minConfluenceScore: 'high' },
      timeframes: [],
    });
    expect(config.scan.intervalMinutes).toBe(60);
    expect(config.alerts.cooldownMinutes).toBe(60);
    expect(config.alerts.minConfluenceScore).toBe(60);
    expect(config.timeframes).toEqual(['1d']);
  });

  it('ignores unknown keys', () => {
    const config = resolveScannerConfig({ exchange: { colour: 'blue' } });
    expect('colour' in config.exchange).toBe(false);
  });

  it('warns only about keys it cannot place', () => {
    const warn = vi.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

    resolveScannerConfig({
      ranking: { topN: 15, filters: { minTrendScore: 55 } },
      patterns: { enabled: ['pullback'], pullback: { lookback: 10 }, rsi_divergence: { minStrength: 2 } },
    });
    expect(warn).not.toHaveBeenCalled();

    resolveScannerConfig({ patterns: { breakuot: { lookback: 30 } } });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Unknown config key "patterns.breakuot" ignored');
  });

  it('resolves nested sections', () => {
    const config = resolveScannerConfig({
      alerts: {
        types: { volumeSpike: false },
        rsiDivergence: { timeframes: ['1h', '4h'] },
        telegram: { enabled: true, chatId: '-100123' },
      },
      ranking: { topN: 15, filters: { minTrendScore: 55 } },
      patterns: { enabled: ['breakout'], breakout: { lookback: 30 } },
    });
    expect(config.alerts.types.volumeSpike).toBe(false);
    expect(config.alerts.types.highConfluence).toBe(true);
    expect(config.alerts.rsiDivergence.timeframes).toEqual(['1h', '4h']);
    expect(config.alerts.telegram).toEqual({ enabled: true, chatId: '-100123' });
    expect(config.ranking.topN).toBe(15);
    expect(config.ranking.filters.minTrendScore).toBe(55);
    expect(config.patterns.enabled).toEqual(['breakout']);
    expect(config.patterns.params.breakout.lookback).toBe(30);
    expect(config.patterns.params.breakout.minRvol).toBe(1.5);
  });
});

describe('parseRegimeWeights', () => {
  it('normalizes regime and component keys and drops the rest', () => {
    expect(
      parseRegimeWeights({
        BULL: { trend_score: '0.5', rs: 0.5, momentum: 1 },
        crab: { trend: 1 },
      }),
    ).toEqual({ bull: { trend: 0.5, rs: 0.5 } });
  });

  it('ignores a non-object table', () => {
    expect(parseRegimeWeights('equal')).toEqual({});
  });
});

describe('loadScannerConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scanner-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads the file named by CONFIG_PATH and applies env overrides', () => {
    const file = path.join(dir, 'scanner.json');
    fs.writeFileSync(file, JSON.stringify({ timeframes: ['4h'], scan: { intervalMinutes: 15 } }));

    const config = loadScannerConfig({
      CONFIG_PATH: file,
      SCAN_INTERVAL_MINUTES: '0',
      ALERT_STATE_FILE: path.join(dir, 'state.json'),
      TELEGRAM_CHAT_ID: '42',
    });
    expect(config.timeframes).toEqual(['4h']);
    expect(config.scan.intervalMinutes).toBe(0);
    expect(config.alerts.stateFile).toBe(path.join(dir, 'state.json'));
    expect(config.alerts.telegram.chatId).toBe('42');
  });

  it('loads the shipped configuration without warnings', () => {
    const warn = vi.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

    const config = loadScannerConfig({ CONFIG_PATH: SHIPPED_CONFIG });

    expect(warn).not.toHaveBeenCalled();
    expect(config.patterns.enabled).toEqual(['breakout', 'pullback', 'volatility_squeeze', 'rsi_divergence']);
    expect(config.patterns.params.breakout.minRvol).toBe(1.5);
    expect(config.ranking.topN).toBe(20);
    expect(config.ranking.filters.maxAtrPct).toBe(0);
  });

  it('uses the defaults when the file is missing or corrupt', () => {
    expect(loadScannerConfig({ CONFIG_PATH: path.join(dir, 'missing.json') }).scan.intervalMinutes).toBe(60);

    const corrupt = path.join(dir, 'corrupt.json');
    fs.writeFileSync(corrupt, '{ not json');
    expect(loadScannerConfig({ CONFIG_PATH: corrupt }).timeframes).toEqual(['1d']);
  });

  it('keeps the file value when the interval override is invalid', () => {
    const file = path.join(dir, 'scanner.json');
    fs.writeFileSync(file, JSON.stringify({ scan: { intervalMinutes: 15 } }));
    expect(loadScannerConfig({ CONFIG_PATH: file, SCAN_INTERVAL_MINUTES: 'soon' }).scan.intervalMinutes).toBe(15);
  });
});
