import fs from 'fs';
import path from 'path';
import { Logger } from '../../shared/logger';
import type { AlertState, SymbolAlertState } from '../../domain/entities/alert.entity';
import { isRegime } from '../../domain/entities/market-health.entity';
import type { IAlertStateRepository } from '../../domain/interfaces/repositories.interface';
import { emptyAlertState, parseStateTimestamp } from '../../modules/confluence/alerts';

type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSymbolState(value: unknown): SymbolAlertState | undefined {
  if (!isRecord(value)) return undefined;
  const { last_cs: lastCs, last_ts: lastTs } = value;
  if (typeof lastCs !== 'number' || !Number.isFinite(lastCs)) return undefined;
  if (typeof lastTs !== 'string' || !parseStateTimestamp(lastTs)) return undefined;
  return { last_cs: lastCs, last_ts: lastTs };
}

/**
 * Alert state as a JSON file. Writes go to `<file>.tmp` and are renamed over the
 * real file. Malformed symbol entries are dropped on load.
 */
export class JsonAlertStateRepository implements IAlertStateRepository {
  private readonly logger = new Logger(JsonAlertStateRepository.name);

  constructor(private readonly filePath: string) {}

  load(): AlertState {
    if (!fs.existsSync(this.filePath)) return emptyAlertState();

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
    } catch (error) {
      this.logger.warn(`Alert state ${this.filePath} is unreadable, starting fresh`, error);
      return emptyAlertState();
    }

    if (!isRecord(parsed) || !isRecord(parsed.symbols)) {
      this.logger.warn(`Alert state ${this.filePath} has an unexpected shape, starting fresh`);
      return emptyAlertState();
    }

    const state = emptyAlertState();
    for (const [symbol, entry] of Object.entries(parsed.symbols)) {
      const symbolState = toSymbolState(entry);
      if (symbolState) state.symbols[symbol] = symbolState;
      else this.logger.warn(`Dropping malformed alert state entry for ${symbol}`);
    }
    if (isRegime(parsed.global_regime)) state.global_regime = parsed.global_regime;
    return state;
  }

  save(state: AlertState): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });

    const tmp = `${this.filePath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(state, null, 2), 'utf8');
    fs.renameSync(tmp, this.filePath);
    this.logger.debug(`Saved alert state for ${Object.keys(state.symbols).length} symbols`);
  }
}
