/**
 * Runtime settings
 *
 * Read from the environment (entry points load `.env` through dotenv first)
 * and validated once. Every value has a default, so an empty environment is a
 * valid configuration.
 */

import { z } from 'zod';

import { ConfigValidationError } from '../core/errors';
import { LogLevel } from '../util/log';

export interface QLearningSettings {
  /** Step size of the tabular update */
  learningRate: number;

  /** Discount applied to the best next-state value */
  discountFactor: number;

  /** Initial exploration rate */
  epsilon: number;

  /** Multiplicative decay applied after every episode */
  epsilonDecay: number;

  /** Exploration floor */
  minEpsilon: number;

  /** Step cap per training episode */
  maxSteps: number;
}

export interface Settings {
  logLevel: LogLevel;
  port: number;
  episodes: number;
  trainBatchEpisodes: number;
  modelPath: string;
  performancePath: string;
  seed: number | undefined;
  qLearning: QLearningSettings;
}

export const DEFAULT_Q_LEARNING: Readonly<QLearningSettings> = Object.freeze({
  learningRate: 0.1,
  discountFactor: 0.95,
  epsilon: 0.1,
  epsilonDecay: 0.995,
  minEpsilon: 0.01,
  maxSteps: 1000,
});

const probability = z.coerce.number().min(0).max(1);

/** Learning rate and decay: (0, 1], matching the Q-learning config schema. */
const positiveFraction = z.coerce.number().gt(0).max(1);

const envSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  PORT: z.coerce.number().int().min(0).max(65535).default(5173),
  QLEARN_EPISODES: z.coerce.number().int().positive().default(1000),
  QLEARN_LEARNING_RATE: positiveFraction.default(DEFAULT_Q_LEARNING.learningRate),
  QLEARN_DISCOUNT: probability.default(DEFAULT_Q_LEARNING.discountFactor),
  QLEARN_EPSILON: probability.default(DEFAULT_Q_LEARNING.epsilon),
  QLEARN_EPSILON_DECAY: positiveFraction.default(DEFAULT_Q_LEARNING.epsilonDecay),
  QLEARN_MIN_EPSILON: probability.default(DEFAULT_Q_LEARNING.minEpsilon),
  QLEARN_MAX_STEPS: z.coerce.number().int().positive().default(DEFAULT_Q_LEARNING.maxSteps),
  TRAIN_BATCH_EPISODES: z.coerce.number().int().positive().default(100),
  MODEL_PATH: z.string().min(1).default('models/q_learning.json'),
  PERFORMANCE_PATH: z.string().min(1).default('performance.json'),
  SEED: z.coerce.number().int().optional(),
});

type Environment = Record<string, string | undefined>;

/**
 * Blank values count as unset so `FOO=` in a .env file falls back to the
 * default.
 */
function withoutBlanks(env: Environment): Environment {
  const result: Environment = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

export function loadSettings(env: Environment = process.env): Settings {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigValidationError(
      'Invalid environment configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const values = parsed.data;
  if (values.QLEARN_MIN_EPSILON > values.QLEARN_EPSILON) {
    throw new ConfigValidationError('Invalid environment configuration', [
      'QLEARN_MIN_EPSILON must not exceed QLEARN_EPSILON',
    ]);
  }
  return {
    logLevel: values.LOG_LEVEL,
    port: values.PORT,
    episodes: values.QLEARN_EPISODES,
    trainBatchEpisodes: values.TRAIN_BATCH_EPISODES,
    modelPath: values.MODEL_PATH,
    performancePath: values.PERFORMANCE_PATH,
    seed: values.SEED,
    qLearning: {
      learningRate: values.QLEARN_LEARNING_RATE,
      discountFactor: values.QLEARN_DISCOUNT,
      epsilon: values.QLEARN_EPSILON,
      epsilonDecay: values.QLEARN_EPSILON_DECAY,
      minEpsilon: values.QLEARN_MIN_EPSILON,
      maxSteps: values.QLEARN_MAX_STEPS,
    },
  };
}
