import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  Min,
} from 'class-validator';
import type { AlertSettings, AlertTypeToggles, RsiDivergenceAlertSettings } from '../modules/confluence/alerts';
import type {
  BreakoutParams,
  PullbackParams,
  RsiDivergenceParams,
  VolatilitySqueezeParams,
} from '../modules/confluence/patterns';
import type { FilterSettings } from '../modules/confluence/ranking';
import type { RegimeThresholds } from '../modules/confluence/scoring';

// Field initializers are the defaults; every section is resolved onto a fresh instance.

export class ExchangeSettingsDto {
  @IsIn(['binance'])
  name = 'binance';

  @IsIn(['futures', 'spot'])
  market: 'futures' | 'spot' = 'futures';

  @IsString()
  quoteAsset = 'USDT';

  /** Fixed universe; empty means discover from exchange info. */
  @IsArray()
  @IsString({ each: true })
  symbols: string[] = [];

  @IsInt()
  @IsPositive()
  maxSymbols = 50;

  @IsInt()
  @Min(20)
  @Max(1500)
  barLimit = 200;

  @IsNumber()
  @IsPositive()
  requestsPerSecond = 8;

  @IsInt()
  @Min(1000)
  timeoutMs = 10_000;
}

export class ScanSettingsDto {
  /** 0 runs a single scan. */
  @IsInt()
  @Min(0)
  intervalMinutes = 60;
}

export class RegimeThresholdsDto implements RegimeThresholds {
  @IsNumber() @Min(0) @Max(100) bullMinRiskOn = 65;
  @IsNumber() @Min(0) @Max(100) bullMinBreadth = 60;
  @IsNumber() @Min(0) @Max(100) bullMinTrend = 60;
  @IsNumber() @Min(0) @Max(100) bearMaxRiskOn = 35;
  @IsNumber() @Min(0) @Max(100) bearMaxBreadth = 40;
  @IsNumber() @Min(0) @Max(100) bearMaxTrend = 40;
}

export class BreakoutParamsDto implements BreakoutParams {
  @IsInt() @IsPositive() lookback = 20;
  @IsNumber() @Min(0) minRvol = 1.5;
  @IsNumber() @Min(0) @Max(100) minTrendScore = 50;
  @IsNumber() @Min(0) @Max(100) minVolumeScore = 50;
  @IsNumber() @Min(0) @Max(100) minRsScore = 0;
  @IsNumber() @Min(0) @Max(100) minConfluence = 0;
  @IsBoolean() allowBearish = false;
  @IsNumber() @Min(0) breakBufferPct = 0.1;
}

export class PullbackParamsDto implements PullbackParams {
  @IsInt() @IsPositive() lookback = 15;
  @IsNumber() @Min(0) @Max(100) minTrendScore = 60;
  @IsNumber() @Min(0) minPullbackPct = 2;
  @IsNumber() @Min(0) maxPullbackPct = 10;
  @IsNumber() @Min(0) maProximityPct = 5;
  @IsNumber() @Min(0) maxRvol = 2;
  @IsNumber() @Min(0) @Max(100) minRsScore = 40;
  @IsNumber() @Min(0) @Max(100) maxRsiInTrend = 55;
}

export class VolatilitySqueezeParamsDto implements VolatilitySqueezeParams {
  @IsNumber() @IsPositive() maxBbWidthPct = 6;
  @IsNumber() @Min(0) maxContractionRatio = 1;
  @IsNumber() @Min(0) @Max(100) minVolatilityScore = 60;
  @IsNumber() @Min(0) @Max(100) minTrendScore = 0;
  @IsNumber() @Min(0) @Max(100) minRsScore = 0;
}

export class RsiDivergenceParamsDto implements RsiDivergenceParams {
  @IsInt() @Min(2) period = 14;
  @IsInt() @Min(20) lookback = 150;
  @IsInt() @Min(1) pivotLookback = 3;
  @IsNumber() @Min(0) minStrength = 1;
  @IsInt() @Min(0) maxBarsFromLast = 5;
}

export class FilterSettingsDto implements FilterSettings {
  @IsNumber() @Min(0) @Max(100) minTrendScore = 0;
  @IsNumber() @Min(0) @Max(100) minRsScore = 0;
  @IsNumber() @Min(0) @Max(100) minVolumeScore = 0;
  @IsNumber() @Min(0) @Max(100) minVolatilityScore = 0;
  @IsNumber() @Min(0) maxAtrPct = 0;
  @IsNumber() @Min(0) maxBbWidthPct = 0;
}

export class RankingSettingsDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  topN: number | null = null;

  @IsBoolean() applyFiltering = true;
  @IsNumber() @Min(0) @Max(100) volumeSurgeMinScore = 60;
  @IsNumber() @Min(0) @Max(100) squeezeMinVolatilityScore = 60;
  @IsNumber() @Min(0) @Max(100) watchlistMinConfluence = 70;
}

export class ReportsSettingsDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  topN: number | null = 10;
}

export class AlertTypesDto implements AlertTypeToggles {
  @IsBoolean() highConfluence = true;
  @IsBoolean() volumeSpike = true;
  @IsBoolean() squeezeCandidate = true;
  @IsBoolean() rsiDivergence = true;
  @IsBoolean() regimeChange = true;
}

export class RsiDivergenceAlertDto implements RsiDivergenceAlertSettings {
  @IsArray()
  @IsString({ each: true })
  timeframes: string[] = ['4h'];

  @IsInt() @Min(20) lookback = 150;
  @IsInt() @Min(1) pivotLookback = 3;
  @IsNumber() @Min(0) minStrength = 5;
  @IsInt() @Min(0) maxBarsFromLast = 5;
}

export class TelegramSettingsDto {
  @IsBoolean() enabled = false;

  @IsOptional()
  @IsString()
  chatId: string | null = null;
}

export class DiscordSettingsDto {
  @IsBoolean() enabled = false;

  @IsOptional()
  @IsString()
  webhookUrl: string | null = null;
}

export class AlertSettingsDto implements AlertSettings {
  @IsBoolean() enabled = true;
  @IsString() stateFile = 'alerts_state.json';
  @IsInt() @IsPositive() scanTopN = 100;
  @IsNumber() @Min(0) cooldownMinutes = 60;
  @IsNumber() @Min(0) minCsDelta = 3;
  @IsNumber() @Min(0) @Max(100) minConfluenceScore = 60;
  @IsNumber() @Min(0) @Max(100) minTrendScore = 55;
  @IsNumber() @Min(0) @Max(100) minVolumeScore = 50;
  @IsNumber() @Min(0) @Max(100) minPositioningScore = 50;
  @IsNumber() @Min(0) @Max(100) volumeSpikeMinVolumeScore = 75;
  @IsNumber() @Min(0) @Max(100) squeezeMaxVolScore = 40;
  @IsNumber() @Min(0) squeezeMaxBbwPct = 6;
  @IsBoolean() requireUptrendRegime = false;

  types = new AlertTypesDto();
  rsiDivergence = new RsiDivergenceAlertDto();
  telegram = new TelegramSettingsDto();
  discord = new DiscordSettingsDto();
}

export class PatternsSettingsDto {
  /** Empty runs every registered detector. */
  @IsArray()
  @IsString({ each: true })
  enabled: string[] = [];
}

export class TimeframesDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  timeframes: string[] = ['1d'];
}
