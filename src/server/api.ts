import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import http from 'http';
import * as z from 'zod';
import { RANGE_POLICIES } from '../core/types';
import { isInputError } from '../core/errors';
import { CONFIG } from '../config';
import { listTournaments, loadTournament, parseTournamentDefinition, TournamentNotFoundError } from '../data/loader';
import { bindDefinition } from '../bracket/fixture-binding';
import { runAuto } from '../engine/simulator';
import { matchWinProb, scorelineDistribution } from '../engine/probability-model';
import { MAX_SEED } from '../engine/rng';
import { generateReport } from '../output/report-generator';
import { deleteRun, getRun, listRuns, saveRun } from '../storage/database';
import { attachEventBroadcaster } from './broadcast';

const MAX_TRIALS = 2_000_000;

const simulateRequestSchema = z.object({
  tournament: z.string().min(1).optional(),
  definition: z.unknown().optional(),
  trials: z.number().int().min(1).max(MAX_TRIALS).optional(),
  seed: z.number().int().nonnegative().max(MAX_SEED).optional(),
  scalingFactor: z.number().finite().optional(),
  rangePolicy: z.enum(['clamp', 'raw', 'reject']).optional(),
  save: z.boolean().optional(),
});

const matchProbabilityQuerySchema = z.object({
  frameProb: z.coerce.number().min(0).max(1),
  bestOf: z.coerce.number().int(),
});

class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

function parseRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new RequestValidationError(
      parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
    );
  }
  return parsed.data;
}

export function createApp(): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // === API Routes ===

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', rangePolicies: RANGE_POLICIES });
  });

  app.get('/api/tournaments', (_req, res) => {
    res.json({ tournaments: listTournaments() });
  });

  app.get('/api/tournaments/:name', (req, res) => {
    res.json(loadTournament(req.params.name));
  });

  app.post('/api/simulate', async (req, res, next) => {
    try {
      const body = parseRequest(simulateRequestSchema, req.body ?? {});
      const definition = body.definition !== undefined
        ? parseTournamentDefinition(body.definition)
        : loadTournament(body.tournament ?? CONFIG.DEFAULT_TOURNAMENT);

      const tournament = bindDefinition(definition);
      const run = await runAuto(tournament, {
        trials: body.trials ?? CONFIG.DEFAULT_TRIALS,
        seed: body.seed,
        scalingFactor: body.scalingFactor,
        rangePolicy: body.rangePolicy,
        tournamentName: definition.name,
      });

      const save = body.save ?? true;
      if (save) saveRun(run.runId, definition.name, run.result);

      res.json({
        runId: save ? run.runId : null,
        durationMs: run.durationMs,
        result: run.result,
        report: generateReport(run.result, definition.name),
      });
    } catch (err) {
      next(err);
    }
  });

  app.get('/api/runs', (req, res) => {
    const limit = parseRequest(z.coerce.number().int().min(1).max(500).default(20), req.query.limit);
    res.json({ runs: listRuns(limit) });
  });

  app.get('/api/runs/:id', (req, res) => {
    const stored = getRun(req.params.id);
    if (!stored) {
      res.status(404).json({ error: `Run ${req.params.id} not found` });
      return;
    }
    res.json({
      ...stored,
      report: generateReport(stored.result, stored.tournamentName, new Date(stored.createdAt)),
    });
  });

  app.delete('/api/runs/:id', (req, res) => {
    if (!deleteRun(req.params.id)) {
      res.status(404).json({ error: `Run ${req.params.id} not found` });
      return;
    }
    res.status(204).end();
  });

  app.get('/api/match-probability', (req, res) => {
    const query = parseRequest(matchProbabilityQuerySchema, req.query);
    res.json({
      frameProb: query.frameProb,
      bestOf: query.bestOf,
      matchProb: matchWinProb(query.frameProb, query.bestOf),
      scorelines: scorelineDistribution(query.frameProb, query.bestOf),
    });
  });

  // Express 4 requires all four parameters to recognise an error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof TournamentNotFoundError) {
      res.status(404).json({ error: err.message });
      return;
    }
    if (err instanceof RequestValidationError || isInputError(err)) {
      res.status(400).json({ error: err.message, type: err.name });
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    console.error('Request failed:', message);
    res.status(500).json({ error: message });
  });

  return app;
}

export interface RunningServer {
  server: http.Server;
  /** Detach the event relay, drop WebSocket clients and stop listening. */
  close(): Promise<void>;
}

export function startServer(port: number): RunningServer {
  const app = createApp();
  const server = http.createServer(app);
  const detachBroadcaster = attachEventBroadcaster(server);

  server.listen(port, () => {
    console.log(`\n  Knockout Odds`);
    console.log(`  API:        http://localhost:${port}/api`);
    console.log(`  Events:     ws://localhost:${port}/ws`);
    console.log(`  Press Ctrl+C to stop.\n`);
  });

  return {
    server,
    close: async () => {
      await detachBroadcaster();
      await new Promise<void>((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
      });
    },
  };
}
