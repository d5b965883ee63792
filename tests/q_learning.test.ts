import fs from 'fs';
import os from 'os';
import path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigValidationError } from '../src/core/errors';
import { Board, Move } from '../src/core/types';
import {
  MODEL_FORMAT,
  qLearningDefinition,
  qLearningModelSchema,
  QLearningStrategy,
} from '../src/ai/strategies/q_learning';
import { StrategyCategory } from '../src/ai/strategy';

const fresh: Board = [
  [2, 0, 0, 0],
  [0, 0, 0, 0],
  [0, 0, 0, 0],
  [0, 0, 0, 2],
];

describe('QLearningStrategy', () => {
  let directory: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'q-learning-'));
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it('describes itself as a trainable strategy', () => {
    const metadata = new QLearningStrategy().metadata();
    expect(metadata.name).toBe('Q-Learning');
    expect(metadata.category).toBe(StrategyCategory.REINFORCEMENT_LEARNING);
    expect(metadata.trainingRequired).toBe(true);
  });

  it('plays the first canonical move on an unseen board', () => {
    const strategy = new QLearningStrategy();
    expect(strategy.nextMove(fresh)).toBe(Move.Up);
    expect(strategy.moveScores(fresh)).toEqual({
      [Move.Up]: 0,
      [Move.Down]: 0,
      [Move.Left]: 0,
      [Move.Right]: 0,
    });
  });

  it('decays exploration after every episode down to the floor', () => {
    const strategy = new QLearningStrategy({
      epsilon: 0.5,
      epsilonDecay: 0.5,
      minEpsilon: 0.1,
      maxSteps: 20,
    });
    const epsilons: number[] = [];
    const outcome = strategy.train(undefined, {
      episodes: 5,
      seed: 4,
      onEpisode: (stats) => epsilons.push(stats.epsilon),
    });
    expect(epsilons).toEqual([0.25, 0.125, 0.1, 0.1, 0.1]);
    expect(outcome.supported).toBe(true);
    if (outcome.supported) {
      expect(outcome.summary.episodesTrained).toBe(5);
      expect(outcome.summary.totalEpisodes).toBe(5);
      expect(outcome.summary.finalEpsilon).toBe(0.1);
      expect(outcome.summary.converged).toBe(true);
      expect(outcome.summary.modelSize).toBe(strategy.tableSize);
      expect(outcome.summary.averageEpisodeLength).toBeLessThanOrEqual(20);
    }
  });

  it('learns only finite values', () => {
    const strategy = new QLearningStrategy({ maxSteps: 50 });
    strategy.train(undefined, { episodes: 10, seed: 9 });
    expect(strategy.tableSize).toBeGreaterThan(0);
    const file = path.join(directory, 'model.json');
    expect(strategy.save(file).ok).toBe(true);
    const model = qLearningModelSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
    expect(model.format).toBe(MODEL_FORMAT);
    expect(model.trainingEpisodes).toBe(10);
    expect(model.isTrained).toBe(true);
    const values = Object.values(model.qTable).flat();
    expect(values.every((value) => Number.isFinite(value))).toBe(true);
  });

  it('trains the same table from the same seed', () => {
    const first = new QLearningStrategy({ maxSteps: 30 });
    const second = new QLearningStrategy({ maxSteps: 30 });
    const a = first.train(undefined, { episodes: 5, seed: 12 });
    const b = second.train(undefined, { episodes: 5, seed: 12 });
    expect(b).toEqual(a);
  });

  it('round-trips a trained model', () => {
    const strategy = new QLearningStrategy({ maxSteps: 30 });
    strategy.train(undefined, { episodes: 5, seed: 2 });
    const file = path.join(directory, 'nested', 'model.json');
    expect(strategy.save(file)).toEqual({ ok: true, path: file });

    const restored = new QLearningStrategy();
    expect(restored.load(file)).toEqual({ ok: true, path: file });
    expect(restored.trainingProgress()).toEqual(strategy.trainingProgress());
    expect(restored.configuration()).toEqual(strategy.configuration());
  });

  it('keeps its state when a model is missing or corrupt', () => {
    const strategy = new QLearningStrategy({ maxSteps: 30 });
    strategy.train(undefined, { episodes: 2, seed: 5 });
    const before = strategy.trainingProgress();

    const missing = strategy.load(path.join(directory, 'absent.json'));
    expect(missing.ok).toBe(false);
    if (!missing.ok) {
      expect(missing.reason).toBe('missing');
    }

    const file = path.join(directory, 'bad.json');
    fs.writeFileSync(file, JSON.stringify({ format: MODEL_FORMAT, qTable: { s: [1, 2] } }));
    const corrupt = strategy.load(file);
    expect(corrupt.ok).toBe(false);
    if (!corrupt.ok) {
      expect(corrupt.reason).toBe('corrupt');
    }

    expect(strategy.trainingProgress()).toEqual(before);
  });

  it('rejects a saved model whose exploration floor exceeds its epsilon', () => {
    const strategy = new QLearningStrategy({ maxSteps: 10 });
    strategy.train(undefined, { episodes: 2, seed: 3 });
    const file = path.join(directory, 'model.json');
    expect(strategy.save(file).ok).toBe(true);

    const model = qLearningModelSchema.parse(JSON.parse(fs.readFileSync(file, 'utf8')));
    fs.writeFileSync(file, JSON.stringify({ ...model, config: { ...model.config, epsilon: 0.05, minEpsilon: 0.5 } }));

    const restored = new QLearningStrategy({ epsilon: 0.4, minEpsilon: 0.2 });
    const before = restored.trainingProgress();
    const result = restored.load(file);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe('corrupt');
    }
    expect(restored.trainingProgress()).toEqual(before);
    expect(restored.configuration()).toMatchObject({ epsilon: 0.4, minEpsilon: 0.2 });
  });

  it('summarizes very long training runs', () => {
    const strategy = new QLearningStrategy({ maxSteps: 1 });
    const outcome = strategy.train(undefined, { episodes: 300000, seed: 1, progressInterval: 0 });
    expect(outcome.supported).toBe(true);
    if (outcome.supported) {
      expect(outcome.summary.episodesTrained).toBe(300000);
      expect(outcome.summary.totalEpisodes).toBe(300000);
      expect(outcome.summary.averageEpisodeLength).toBe(1);
      expect(outcome.summary.maxHighestTile).toBeGreaterThanOrEqual(2);
    }
    expect(strategy.trainingProgress().recentRewards).toHaveLength(100);
  }, 60000);

  it('forgets everything on reset', () => {
    const strategy = new QLearningStrategy({ epsilon: 0.3, maxSteps: 20 });
    strategy.train(undefined, { episodes: 3, seed: 1 });
    strategy.reset();
    expect(strategy.trainingProgress()).toEqual({
      trainingEpisodes: 0,
      isTrained: false,
      epsilon: 0.3,
      qTableSize: 0,
      recentRewards: [],
    });
  });

  it('rejects invalid configuration', () => {
    expect(() => new QLearningStrategy({ epsilon: 0.05, minEpsilon: 0.1 })).toThrow(ConfigValidationError);
    expect(() => qLearningDefinition.create({ learningRate: 0 })).toThrow(ConfigValidationError);
    expect(() => qLearningDefinition.create({ temperature: 1 })).toThrow(ConfigValidationError);
  });
});
