import fs from 'fs';
import { validateSync } from 'class-validator';
import { isRegime, REGIMES } from '../domain/entities/market-health.entity';
import type { ComponentWeights } from '../domain/entities/score-bundle.entity';
import type { PatternParamsByName } from '../modules/confluence/patterns';
import { canonicalComponentKey, type RegimeWeightTable } from '../modules/confluence/scoring';
import { Logger } from '../shared/logger';
import {
  AlertSettingsDto,
  AlertTypesDto,
  BreakoutParamsDto,
  DiscordSettingsDto,
  ExchangeSettingsDto,
  FilterSettingsDto,
  PatternsSettingsDto,
  PullbackParamsDto,
  RankingSettingsDto,
  RegimeThresholdsDto,
  ReportsSettingsDto,
  RsiDivergenceAlertDto,
  RsiDivergenceParamsDto,
  ScanSettingsDto,
  TelegramSettingsDto,
  TimeframesDto,
  VolatilitySqueezeParamsDto,
} from './config.dto';

const logger = new Logger('ScannerConfig');

export const DEFAULT_CONFIG_PATH = 'config/scanner.json';

// Per-pattern parameter blocks that sit beside `patterns.enabled`.
const PATTERN_PARAM_KEYS: ReadonlyArray<keyof PatternParamsByName> = [
  'breakout',
  'pullback',
  'volatility_squeeze',
  'rsi_divergence',
];

export interface ScannerConfig {
  exchange: ExchangeSettingsDto;
  timeframes: string[];
  scan: ScanSettingsDto;
  regimes: RegimeThresholdsDto;
  confluence: { regimeWeights: RegimeWeightTable };
  patterns: { enabled: string[]; params: Required<PatternParamsByName> };
  ranking: RankingSettingsDto & { filters: FilterSettingsDto };
  reports: ReportsSettingsDto;
  alerts: AlertSettingsDto;
}

type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasKey<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return key in obj;
}

function toNumber(value: unknown): unknown {
  if (typeof value !== 'string' || value.trim() === '') return value;
  const n = Number(value);
  return Number.isFinite(n) ? n : value;
}

/** Best-effort coercion toward the type of the default value; nullable fields keep the raw value. */
function coerceLike(current: unknown, value: unknown): unknown {
  if (typeof current === 'number') return toNumber(value);
  if (typeof current === 'boolean' && typeof value === 'string') {
    const v = value.trim().toLowerCase();
    if (v === 'true') return true;
    if (v === 'false') return false;
    return value;
  }
  if (Array.isArray(current) && typeof value === 'string') {
    return value
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
  return value;
}

/**
 * Resolves one flat section onto a fresh DTO. Unknown keys are ignored,
 * nested objects and `nestedKeys` are left to the caller and any field still
 * failing validation falls back to its default.
 */
export function resolveSection<T extends object>(
  ctor: new () => T,
  raw: unknown,
  section: string,
  nestedKeys: readonly string[] = [],
): T {
  const dto = new ctor();
  if (raw === undefined || raw === null) return dto;
  if (!isRecord(raw)) {
    logger.warn(`Config section "${section}" is not an object, using defaults`);
    return dto;
  }

  const defaults = new ctor();
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined || nestedKeys.includes(key)) continue;
    if (!hasKey(dto, key)) {
      logger.warn(`Unknown config key "${section}.${key}" ignored`);
      continue;
    }
    const current: unknown = dto[key];
    if (isRecord(current)) continue;
    Object.assign(dto, { [key]: coerceLike(current, value) });
  }

  for (const error of validateSync(dto)) {
    const { property } = error;
    if (!hasKey(defaults, property)) continue;
    logger.warn(`Invalid config value for "${section}.${property}", using default`, {
      constraints: error.constraints,
    });
    Object.assign(dto, { [property]: defaults[property] });
  }
  return dto;
}

function child(raw: unknown, key: string): unknown {
  return isRecord(raw) ? raw[key] : undefined;
}

/** regime -> component -> weight; accepts `trend` or `trend_score` style keys. */
export function parseRegimeWeights(raw: unknown): RegimeWeightTable {
  const table: RegimeWeightTable = {};
  if (raw === undefined) return table;
  if (!isRecord(raw)) {
    logger.warn('confluence.regimeWeights is not an object, ignoring');
    return table;
  }

  for (const [regimeKey, weightsRaw] of Object.entries(raw)) {
    const regime = regimeKey.trim().toLowerCase();
    if (!isRegime(regime)) {
      logger.warn(`Unknown regime "${regimeKey}" in confluence.regimeWeights, expected one of ${REGIMES.join(', ')}`);
      continue;
    }
    if (!isRecord(weightsRaw)) {
      logger.warn(`Weights for regime "${regime}" are not an object, ignoring`);
      continue;
    }

    const weights: ComponentWeights = {};
    for (const [key, value] of Object.entries(weightsRaw)) {
      const component = canonicalComponentKey(key);
      const w = toNumber(value);
      if (!component || typeof w !== 'number' || !Number.isFinite(w)) {
        logger.warn(`Dropping unparseable weight "${regime}.${key}"`);
        continue;
      }
      weights[component] = w;
    }
    if (Object.keys(weights).length) table[regime] = weights;
  }
  return table;
}

export function resolveScannerConfig(raw: unknown): ScannerConfig {
  const root = isRecord(raw) ? raw : {};

  const alerts = resolveSection(AlertSettingsDto, root.alerts, 'alerts');
  alerts.types = resolveSection(AlertTypesDto, child(root.alerts, 'types'), 'alerts.types');
  alerts.rsiDivergence = resolveSection(
    RsiDivergenceAlertDto,
    child(root.alerts, 'rsiDivergence'),
    'alerts.rsiDivergence',
  );
  alerts.telegram = resolveSection(TelegramSettingsDto, child(root.alerts, 'telegram'), 'alerts.telegram');
  alerts.discord = resolveSection(DiscordSettingsDto, child(root.alerts, 'discord'), 'alerts.discord');

  const patternsRaw = root.patterns;
  const patterns = resolveSection(PatternsSettingsDto, patternsRaw, 'patterns', PATTERN_PARAM_KEYS);

  return {
    exchange: resolveSection(ExchangeSettingsDto, root.exchange, 'exchange'),
    timeframes: resolveSection(TimeframesDto, { timeframes: root.timeframes }, 'timeframes').timeframes,
    scan: resolveSection(ScanSettingsDto, root.scan, 'scan'),
    regimes: resolveSection(RegimeThresholdsDto, root.regimes, 'regimes'),
    confluence: { regimeWeights: parseRegimeWeights(child(root.confluence, 'regimeWeights')) },
    patterns: {
      enabled: patterns.enabled,
      params: {
        breakout: resolveSection(BreakoutParamsDto, child(patternsRaw, 'breakout'), 'patterns.breakout'),
        pullback: resolveSection(PullbackParamsDto, child(patternsRaw, 'pullback'), 'patterns.pullback'),
        volatility_squeeze: resolveSection(
          VolatilitySqueezeParamsDto,
          child(patternsRaw, 'volatility_squeeze'),
          'patterns.volatility_squeeze',
        ),
        rsi_divergence: resolveSection(
          RsiDivergenceParamsDto,
          child(patternsRaw, 'rsi_divergence'),
          'patterns.rsi_divergence',
        ),
      },
    },
    ranking: {
      ...resolveSection(RankingSettingsDto, root.ranking, 'ranking', ['filters']),
      filters: resolveSection(FilterSettingsDto, child(root.ranking, 'filters'), 'ranking.filters'),
    },
    reports: resolveSection(ReportsSettingsDto, root.reports, 'reports'),
    alerts,
  };
}

function applyEnvOverrides(config: ScannerConfig, env: NodeJS.ProcessEnv): ScannerConfig {
  if (env.SCAN_INTERVAL_MINUTES !== undefined) {
    const minutes = Number(env.SCAN_INTERVAL_MINUTES);
    if (env.SCAN_INTERVAL_MINUTES.trim() !== '' && Number.isInteger(minutes) && minutes >= 0) {
      config.scan.intervalMinutes = minutes;
    } else {
      logger.warn(`Ignoring invalid SCAN_INTERVAL_MINUTES "${env.SCAN_INTERVAL_MINUTES}"`);
    }
  }
  if (env.ALERT_STATE_FILE) config.alerts.stateFile = env.ALERT_STATE_FILE;
  if (env.TELEGRAM_CHAT_ID) config.alerts.telegram.chatId = env.TELEGRAM_CHAT_ID;
  if (env.DISCORD_WEBHOOK_URL) config.alerts.discord.webhookUrl = env.DISCORD_WEBHOOK_URL;
  return config;
}

/** Missing or unparseable file resolves to all defaults. */
export function loadScannerConfig(env: NodeJS.ProcessEnv = process.env): ScannerConfig {
  const path = env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
  let raw: unknown = {};

  if (!fs.existsSync(path)) {
    logger.warn(`Config file ${path} not found, using defaults`);
  } else {
    try {
      raw = JSON.parse(fs.readFileSync(path, 'utf8'));
    } catch (error) {
      logger.warn(`Config file ${path} could not be parsed, using defaults`, error);
    }
  }

  return applyEnvOverrides(resolveScannerConfig(raw), env);
}
