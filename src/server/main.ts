import 'dotenv/config';

import { strategyId } from '../ai/registry';
import { QLearningStrategy } from '../ai/strategies/q_learning';
import { loadSettings } from '../config/settings';
import { createDefaultRegistry } from '../index';
import { createLogger } from '../util/log';
import { createServer } from './app';
import { TrainingController } from './training_controller';

async function main(): Promise<void> {
  const settings = loadSettings();
  const logger = createLogger({ level: settings.logLevel, scope: 'server' });
  const registry = createDefaultRegistry({ logger: logger.child('registry') });

  const performance = registry.loadPerformance(settings.performancePath);
  if (!performance.ok && performance.reason !== 'missing') {
    logger.warn('starting with empty performance history', { reason: performance.reason });
  }

  const learner = new QLearningStrategy(settings.qLearning, { logger: logger.child('q-learning') });
  const model = learner.load(settings.modelPath);
  if (!model.ok && model.reason !== 'missing') {
    logger.warn('starting with an untrained Q-table', { reason: model.reason });
  }

  const training = new TrainingController(learner, {
    episodesPerBatch: settings.trainBatchEpisodes,
    modelPath: settings.modelPath,
    seed: settings.seed,
    logger: logger.child('training'),
  });

  const app = createServer({
    registry,
    training,
    instances: new Map([[strategyId(learner.metadata()), learner]]),
    performancePath: settings.performancePath,
    logger,
  });

  await new Promise<void>((resolve) => {
    app.listen(settings.port, () => {
      logger.info('decision service listening', { url: `http://localhost:${settings.port}` });
      resolve();
    });
  });
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
