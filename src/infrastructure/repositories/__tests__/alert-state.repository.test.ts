import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JsonAlertStateRepository } from '../alert-state.repository';

describe('JsonAlertStateRepository', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'alert-state-'));
    file = path.join(dir, 'nested', 'alerts_state.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', () => {
    expect(new JsonAlertStateRepository(file).load()).toEqual({ symbols: {} });
  });

  it('round-trips the stored format', () => {
    const repo = new JsonAlertStateRepository(file);
    const state = {
      symbols: { BTCUSDT: { last_cs: 72.5, last_ts: '2024-05-01T12:00:00Z' } },
      global_regime: 'bull' as const,
    };
    repo.save(state);

    expect(JSON.parse(fs.readFileSync(file, 'utf8'))).toEqual(state);
    expect(repo.load()).toEqual(state);
  });

  it('leaves no temp file behind after saving', () => {
    new JsonAlertStateRepository(file).save({ symbols: {} });
    expect(fs.readdirSync(path.dirname(file))).toEqual(['alerts_state.json']);
  });

  it('starts fresh on a corrupt or wrongly shaped file', () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '{"symbols": ');
    expect(new JsonAlertStateRepository(file).load()).toEqual({ symbols: {} });

    fs.writeFileSync(file, JSON.stringify({ symbols: [] }));
    expect(new JsonAlertStateRepository(file).load()).toEqual({ symbols: {} });
  });

  it('drops malformed entries and unknown regimes', () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(
      file,
      JSON.stringify({
        symbols: {
          BTCUSDT: { last_cs: 70, last_ts: '2024-05-01T12:00:00Z' },
          ETHUSDT: { last_cs: 'high', last_ts: '2024-05-01T12:00:00Z' },
          SOLUSDT: { last_cs: 65, last_ts: '2024-05-01 12:00' },
        },
        global_regime: 'euphoric',
      }),
    );
    expect(new JsonAlertStateRepository(file).load()).toEqual({
      symbols: { BTCUSDT: { last_cs: 70, last_ts: '2024-05-01T12:00:00Z' } },
    });
  });
});
