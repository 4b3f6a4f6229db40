import express from 'express';
import type { Express, Request, Response } from 'express';
import type { ScoreBundle } from '../../domain/entities/score-bundle.entity';
import type { ScanResultStore } from '../../application/services/scan-result.store';

export interface BundleView {
  symbol: string;
  timeframe: string;
  confluenceScore: number;
  confidence: number;
  regime: string;
  scores: ScoreBundle['scores'];
  patterns: string[];
}

export interface StatusReply {
  status: number;
  body: unknown;
}

const NO_SCAN_YET: StatusReply = { status: 404, body: { error: 'No scan has completed yet' } };

export function toBundleView(bundle: ScoreBundle): BundleView {
  return {
    symbol: bundle.symbol,
    timeframe: bundle.timeframe,
    confluenceScore: Number(bundle.confluenceScore.toFixed(2)),
    confidence: Number(bundle.confidence.toFixed(3)),
    regime: bundle.regime,
    scores: bundle.scores,
    patterns: bundle.patterns,
  };
}

export function regimeReply(store: ScanResultStore): StatusReply {
  const latest = store.getLatest();
  if (!latest) return NO_SCAN_YET;
  return { status: 200, body: { ...latest.health, scannedAt: latest.finishedAt.toISOString() } };
}

export function leaderboardsReply(store: ScanResultStore): StatusReply {
  const latest = store.getLatest();
  if (!latest) return NO_SCAN_YET;
  const sizes = Object.fromEntries(
    Object.entries(latest.ranking.leaderboards).map(([name, bundles]) => [name, bundles.length]),
  );
  return {
    status: 200,
    body: { timeframe: latest.timeframe, scannedAt: latest.finishedAt.toISOString(), leaderboards: sizes },
  };
}

export function leaderboardReply(store: ScanResultStore, name: string): StatusReply {
  const boards = store.getLatest()?.ranking.leaderboards;
  if (!boards || !Object.hasOwn(boards, name)) return { status: 404, body: { error: `Unknown leaderboard: ${name}` } };
  return { status: 200, body: boards[name].map(toBundleView) };
}

function send(res: Response, reply: StatusReply) {
  res.status(reply.status).json(reply.body);
}

/** Read-only views over the latest scan. */
export function createStatusServer(store: ScanResultStore): Express {
  const server = express();

  server.get('/health', (_req: Request, res: Response) => {
    res.status(200).send(`Confluence scanner is alive, ${store.scanCount} scans completed`);
  });
  server.get('/regime', (_req: Request, res: Response) => send(res, regimeReply(store)));
  server.get('/leaderboards', (_req: Request, res: Response) => send(res, leaderboardsReply(store)));
  server.get('/leaderboards/:name', (req: Request, res: Response) =>
    send(res, leaderboardReply(store, req.params.name)),
  );

  return server;
}
