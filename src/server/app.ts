import express, { NextFunction, Request, Response } from 'express';
import { z } from 'zod';

import { legalMoves, validateBoard } from '../core/board';
import { EngineError } from '../core/errors';
import { StrategyRegistry } from '../ai/registry';
import { Strategy } from '../ai/strategy';
import { DEFAULT_STRATEGY_ID } from '../index';
import { Logger, silentLogger } from '../util/log';
import { TrainingController } from './training_controller';

export interface ServerContext {
  registry: StrategyRegistry;
  /** Q-learning loop; the training endpoints answer 503 without one */
  training?: TrainingController;
  /** Instances served by id before the registry is asked, e.g. the trained Q-learner */
  instances?: ReadonlyMap<string, Strategy>;
  /** Performance history is saved here after each recorded game when set */
  performancePath?: string;
  logger?: Logger;
}

const moveRequestSchema = z.object({
  board: z.unknown(),
  strategy: z.string().min(1).optional(),
});

const gameRequestSchema = z.object({
  strategy: z.string().min(1),
  finalScore: z.number().int().min(0),
  movesCompleted: z.number().int().min(0),
  highestTile: z.number().int().min(0),
});

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * JSON decision service over a registry. Strategy instances are created on
 * first use and reused, so their performance records accumulate.
 */
export function createServer(context: ServerContext): express.Express {
  const app = express();
  const { registry, training } = context;
  const logger = context.logger ?? silentLogger;
  const instances = new Map<string, Strategy>(context.instances ?? []);

  const resolveStrategy = (id: string): Strategy | null => {
    const cached = instances.get(id);
    if (cached) {
      return cached;
    }
    const created = registry.create(id);
    if (!created.ok) {
      return null;
    }
    instances.set(id, created.strategy);
    return created.strategy;
  };

  app.use(express.json());

  app.get('/api/strategies', (_req, res) => {
    res.json({ strategies: registry.list() });
  });

  app.get('/api/strategies/:id', (req, res) => {
    const info = registry.info(req.params.id);
    if (!info) {
      res.status(404).json({ error: `Strategy ${req.params.id} is not registered` });
      return;
    }
    res.json(info);
  });

  app.post('/api/move', (req, res) => {
    const parsed = moveRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request', details: issuesOf(parsed.error) });
      return;
    }
    const board = validateBoard(parsed.data.board);
    const id = parsed.data.strategy ?? DEFAULT_STRATEGY_ID;
    const strategy = resolveStrategy(id);
    if (!strategy) {
      res.status(404).json({ error: `Strategy ${id} is not registered` });
      return;
    }
    const legal = legalMoves(board);
    res.json({
      strategy: id,
      move: strategy.nextMove(board),
      scores: strategy.moveScores(board),
      legalMoves: legal,
      gameOver: legal.length === 0,
    });
  });

  app.post('/api/games', (req, res) => {
    const parsed = gameRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request', details: issuesOf(parsed.error) });
      return;
    }
    const { strategy: id, ...result } = parsed.data;
    const strategy = resolveStrategy(id);
    if (!strategy) {
      res.status(404).json({ error: `Strategy ${id} is not registered` });
      return;
    }
    const performance = registry.recordGame(id, strategy, result);
    if (context.performancePath) {
      const saved = registry.savePerformance(context.performancePath);
      if (!saved.ok) {
        logger.warn('performance not saved', { reason: saved.reason, message: saved.message });
      }
    }
    res.json({ strategy: id, performance, historySize: registry.history(id).length });
  });

  app.get('/api/leaderboard', (_req, res) => {
    res.json(registry.exportReport());
  });

  app.post('/api/train/start', (_req, res) => {
    if (!training) {
      res.status(503).json({ error: 'Training is not available' });
      return;
    }
    const started = training.start();
    res.json({ started, status: training.getStatus() });
  });

  app.post('/api/train/stop', (_req, res, next) => {
    if (!training) {
      res.status(503).json({ error: 'Training is not available' });
      return;
    }
    training
      .stop()
      .then(() => res.json({ status: training.getStatus() }))
      .catch(next);
  });

  app.get('/api/train/status', (_req, res) => {
    if (!training) {
      res.status(503).json({ error: 'Training is not available' });
      return;
    }
    res.json(training.getStatus());
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not Found' });
  });

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof EngineError) {
      const status = error.code === 'concurrent_mutation' ? 409 : 400;
      res.status(status).json({ error: error.message, code: error.code });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    logger.error('request failed', { error });
    res.status(500).json({ error: 'Internal Server Error' });
  });

  return app;
}
