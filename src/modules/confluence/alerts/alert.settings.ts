export interface AlertTypeToggles {
  highConfluence: boolean;
  volumeSpike: boolean;
  squeezeCandidate: boolean;
  rsiDivergence: boolean;
  regimeChange: boolean;
}

export interface RsiDivergenceAlertSettings {
  timeframes: string[];
  lookback: number;
  pivotLookback: number;
  minStrength: number;
  maxBarsFromLast: number;
}

export interface AlertSettings {
  enabled: boolean;
  stateFile: string;
  /** Ranked symbols considered for alerts. */
  scanTopN: number;
  cooldownMinutes: number;
  minCsDelta: number;
  minConfluenceScore: number;
  minTrendScore: number;
  minVolumeScore: number;
  minPositioningScore: number;
  volumeSpikeMinVolumeScore: number;
  squeezeMaxVolScore: number;
  squeezeMaxBbwPct: number;
  requireUptrendRegime: boolean;
  types: AlertTypeToggles;
  rsiDivergence: RsiDivergenceAlertSettings;
}

export const DEFAULT_ALERT_SETTINGS: Readonly<AlertSettings> = {
  enabled: true,
  stateFile: 'alerts_state.json',
  scanTopN: 100,
  cooldownMinutes: 60,
  minCsDelta: 3,
  minConfluenceScore: 60,
  minTrendScore: 55,
  minVolumeScore: 50,
  minPositioningScore: 50,
  volumeSpikeMinVolumeScore: 75,
  squeezeMaxVolScore: 40,
  squeezeMaxBbwPct: 6,
  requireUptrendRegime: false,
  types: {
    highConfluence: true,
    volumeSpike: true,
    squeezeCandidate: true,
    rsiDivergence: true,
    regimeChange: true,
  },
  rsiDivergence: {
    timeframes: ['4h'],
    lookback: 150,
    pivotLookback: 3,
    minStrength: 5,
    maxBarsFromLast: 5,
  },
};
