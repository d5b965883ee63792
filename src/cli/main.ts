#!/usr/bin/env node
import 'dotenv/config';

import { describeError } from '../core/errors';
import { loadSettings, Settings } from '../config/settings';
import { createDefaultRegistry, DEFAULT_STRATEGY_ID } from '../index';
import {
  CliCommand,
  CliOptions,
  COMMANDS,
  runLeaderboard,
  runList,
  runPlay,
  runSuggest,
  runTrain,
  runTune,
} from './commands';

function isCommand(value: string | undefined): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

function parseOptions(settings: Settings): CliOptions {
  const args = process.argv.slice(2);
  const getNumber = (flag: string, fallback: number): number => {
    const index = args.indexOf(flag);
    if (index >= 0 && index + 1 < args.length) {
      const value = Number(args[index + 1]);
      if (!Number.isNaN(value)) {
        return value;
      }
    }
    return fallback;
  };
  const getString = (flag: string): string | null => {
    const index = args.indexOf(flag);
    if (index >= 0 && index + 1 < args.length) {
      return args[index + 1] ?? null;
    }
    return null;
  };
  const getOptionalNumber = (flag: string, fallback: number | undefined): number | undefined => {
    const value = getString(flag);
    return value !== null && !Number.isNaN(Number(value)) ? Number(value) : fallback;
  };
  const hasFlag = (flag: string): boolean => args.includes(flag);
  const first = args[0];
  return {
    command: isCommand(first) ? first : 'play',
    strategy: getString('--strategy') ?? DEFAULT_STRATEGY_ID,
    games: getNumber('--games', 1),
    episodes: getNumber('--episodes', settings.episodes),
    seed: getOptionalNumber('--seed', settings.seed),
    maxMoves: getOptionalNumber('--max-moves', undefined),
    render: hasFlag('--render'),
    renderEvery: getNumber('--render-every', 50),
    modelPath: getString('--model') ?? settings.modelPath,
    outPath: getString('--out'),
    board: getString('--board'),
  };
}

function print(line: string): void {
  // eslint-disable-next-line no-console
  console.log(line);
}

function main(): void {
  const settings = loadSettings();
  const options = parseOptions(settings);
  const registry = createDefaultRegistry();
  switch (options.command) {
    case 'play':
      runPlay(registry, options, print);
      return;
    case 'train':
      runTrain(settings, options, print);
      return;
    case 'leaderboard':
      runLeaderboard(registry, settings, options, print);
      return;
    case 'suggest':
      runSuggest(registry, options, print);
      return;
    case 'list':
      runList(registry, print);
      return;
    case 'tune':
      runTune(settings, options, print);
      return;
  }
}

try {
  main();
} catch (error) {
  // eslint-disable-next-line no-console
  console.error(describeError(error));
  process.exitCode = 1;
}
