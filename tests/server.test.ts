import { Server } from 'http';
import { AddressInfo } from 'net';

import { afterEach, describe, expect, it } from 'vitest';

import { Move } from '../src/core/types';
import { QLearningStrategy } from '../src/ai/strategies/q_learning';
import { createDefaultRegistry, DEFAULT_STRATEGY_ID } from '../src/index';
import { createServer, ServerContext } from '../src/server/app';
import { TrainingController } from '../src/server/training_controller';

const board = [
  [2, 0, 0, 0],
  [0, 0, 0, 0],
  [0, 0, 0, 0],
  [0, 0, 0, 2],
];

let server: Server | null = null;

async function start(context: Partial<ServerContext> = {}): Promise<string> {
  const app = createServer({ registry: createDefaultRegistry(), ...context });
  const listening = await new Promise<Server>((resolve) => {
    const instance = app.listen(0, () => resolve(instance));
  });
  server = listening;
  const address = listening.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  const { port }: AddressInfo = address;
  return `http://127.0.0.1:${port}`;
}

async function post(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  });
}

async function waitForCycle(training: TrainingController): Promise<void> {
  for (let i = 0; i < 200 && training.getStatus().cycle < 1; i += 1) {
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

afterEach(async () => {
  const current = server;
  server = null;
  if (current) {
    await new Promise<void>((resolve, reject) => {
      current.close((error) => (error ? reject(error) : resolve()));
    });
  }
});

describe('decision service', () => {
  it('suggests a move with the default strategy', async () => {
    const base = await start();
    const response = await post(`${base}/api/move`, { board });
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      strategy: DEFAULT_STRATEGY_ID,
      move: Move.Up,
      legalMoves: [Move.Up, Move.Down, Move.Left, Move.Right],
      gameOver: false,
    });
  });

  it('uses the requested strategy', async () => {
    const base = await start();
    const response = await post(`${base}/api/move`, { board, strategy: 'Basic Priority_1.0' });
    expect(await response.json()).toMatchObject({
      strategy: 'Basic Priority_1.0',
      move: Move.Up,
      scores: { UP: 100, LEFT: 90, DOWN: 80, RIGHT: 70 },
    });
  });

  it('rejects malformed boards and bodies', async () => {
    const base = await start();
    const invalid = await post(`${base}/api/move`, { board: [[3, 0, 0, 0]] });
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toMatchObject({ code: 'invalid_board' });

    const garbled = await fetch(`${base}/api/move`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"board": ',
    });
    expect(garbled.status).toBe(400);
  });

  it('answers 404 for unknown strategies and routes', async () => {
    const base = await start();
    const unknown = await post(`${base}/api/move`, { board, strategy: 'Missing_0.1' });
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toEqual({ error: 'Strategy Missing_0.1 is not registered' });
    expect((await fetch(`${base}/api/strategies/Missing_0.1`)).status).toBe(404);
    expect((await fetch(`${base}/api/nothing`)).status).toBe(404);
  });

  it('lists registered strategies', async () => {
    const base = await start();
    const response = await fetch(`${base}/api/strategies`);
    const body: unknown = await response.json();
    expect(body).toMatchObject({
      strategies: [
        { id: 'Basic Priority_1.0' },
        { id: 'Enhanced Heuristic_2.1' },
        { id: 'Q-Learning_1.0' },
        { id: 'Random_1.0' },
      ],
    });
  });

  it('records games and ranks them on the leaderboard', async () => {
    const base = await start();
    const first = await post(`${base}/api/games`, {
      strategy: 'Basic Priority_1.0',
      finalScore: 1000,
      movesCompleted: 500,
      highestTile: 128,
    });
    expect(await first.json()).toEqual({
      strategy: 'Basic Priority_1.0',
      performance: {
        gamesPlayed: 1,
        totalScore: 1000,
        totalMoves: 500,
        highestTile: 128,
        averageEfficiency: 2,
      },
      historySize: 1,
    });
    await post(`${base}/api/games`, {
      strategy: DEFAULT_STRATEGY_ID,
      finalScore: 3000,
      movesCompleted: 1000,
      highestTile: 256,
    });

    const rejected = await post(`${base}/api/games`, { strategy: DEFAULT_STRATEGY_ID, finalScore: -1 });
    expect(rejected.status).toBe(400);

    const leaderboard: unknown = await (await fetch(`${base}/api/leaderboard`)).json();
    expect(leaderboard).toMatchObject({
      leaderboard: [
        { algorithm_id: DEFAULT_STRATEGY_ID, rank: 1, average_efficiency: 3 },
        { algorithm_id: 'Basic Priority_1.0', rank: 2, average_efficiency: 2 },
      ],
    });
  });

  it('reports training as unavailable without a controller', async () => {
    const base = await start();
    expect((await fetch(`${base}/api/train/status`)).status).toBe(503);
    expect((await post(`${base}/api/train/start`, {})).status).toBe(503);
  });

  it('starts and stops background training', async () => {
    const learner = new QLearningStrategy({ maxSteps: 10 });
    const training = new TrainingController(learner, { episodesPerBatch: 1, seed: 1, pauseMs: 5 });
    const base = await start({ training });

    const started = await post(`${base}/api/train/start`, {});
    expect(await started.json()).toMatchObject({ started: true });
    const again = await post(`${base}/api/train/start`, {});
    expect(await again.json()).toMatchObject({ started: false });

    await waitForCycle(training);
    const stopped = await post(`${base}/api/train/stop`, {});
    const body: unknown = await stopped.json();
    expect(body).toMatchObject({ status: { running: false } });
    expect(training.getStatus().cycle).toBeGreaterThanOrEqual(1);
    expect(training.getStatus().totalEpisodes).toBe(training.getStatus().cycle);
  });
});
