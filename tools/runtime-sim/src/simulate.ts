import {
  createGame,
  createRecordingTelemetry,
  resetTelemetry,
  setTelemetry,
  type EngineConfigOverrides,
  type Game,
  type GameStatistics,
} from '@epochs/core';
import type { ContentPack } from '@epochs/content-sample';

export interface SimulationOptions {
  readonly content: ContentPack;
  readonly config?: EngineConfigOverrides;
  readonly seconds: number;
  readonly frameMs: number;
  readonly speed?: number;
  readonly autoBuy?: boolean;
  readonly autoChoose?: boolean;
}

export interface SimulationResult {
  readonly pack: string;
  readonly seconds: number;
  readonly frames: number;
  readonly finalYear: number;
  readonly speed: number;
  readonly resources: Readonly<Record<string, number>>;
  readonly unlockedResources: readonly string[];
  readonly purchases: readonly { readonly upgradeId: string; readonly year: number }[];
  readonly choices: readonly {
    readonly eventId: string;
    readonly choiceId: string;
    readonly year: number;
  }[];
  readonly statistics: GameStatistics;
  readonly telemetry: Readonly<{ errors: number; warnings: number }>;
}

/**
 * Cheapest upgrade that can be bought right now, by summed cost. Ties keep
 * catalog order.
 */
export function pickCheapestUpgrade(game: Game): string | null {
  let best: { readonly id: string; readonly total: number } | null = null;
  for (const upgradeId of game.getAvailableUpgradeIds()) {
    if (game.getUpgradeStatus(upgradeId) !== 'available') {
      continue;
    }
    const upgrade = game.internals.catalog.get(upgradeId);
    if (!upgrade) {
      continue;
    }
    const total = upgrade.costs.reduce((sum, cost) => sum + cost.amount, 0);
    if (best === null || total < best.total) {
      best = { id: upgradeId, total };
    }
  }
  return best?.id ?? null;
}

function chooseFirstAvailable(game: Game): void {
  const active = game.getSnapshot().activeEvent;
  const choice = active?.choices.find((candidate) => candidate.isAvailable);
  if (choice) {
    game.makeEventChoice(choice.id);
  }
}

/**
 * Advances a fresh session in fixed frames. Auto-play acts after each frame:
 * first resolving a waiting event, then buying at most one upgrade.
 */
export function runSimulation(options: SimulationOptions): SimulationResult {
  const recording = createRecordingTelemetry();
  setTelemetry(recording);

  try {
    const game = createGame(options.content, options.config ? { config: options.config } : {});
    if (options.speed !== undefined) {
      game.setSpeed(options.speed);
    }

    const purchases: { upgradeId: string; year: number }[] = [];
    const choices: { eventId: string; choiceId: string; year: number }[] = [];
    game.on('upgrade:purchased', (event) => {
      purchases.push({ ...event.payload });
    });
    game.on('event:resolved', (event) => {
      choices.push({ ...event.payload });
    });

    const totalMs = options.seconds * 1000;
    let elapsedMs = 0;
    let frames = 0;
    while (elapsedMs < totalMs) {
      const stepMs = Math.min(options.frameMs, totalMs - elapsedMs);
      game.tick(stepMs);
      elapsedMs += stepMs;
      frames += 1;

      if (options.autoChoose) {
        chooseFirstAvailable(game);
      }
      if (options.autoBuy) {
        const upgradeId = pickCheapestUpgrade(game);
        if (upgradeId !== null) {
          game.purchaseUpgrade(upgradeId);
        }
      }
    }

    const snapshot = game.getSnapshot();
    return {
      pack: options.content.metadata.id,
      seconds: options.seconds,
      frames,
      finalYear: snapshot.year,
      speed: snapshot.speed,
      resources: Object.fromEntries(
        snapshot.resources.map((resource) => [resource.id, resource.amount]),
      ),
      unlockedResources: snapshot.resources
        .filter((resource) => resource.isUnlocked)
        .map((resource) => resource.id),
      purchases,
      choices,
      statistics: game.getStatistics(),
      telemetry: {
        errors: recording.count('error'),
        warnings: recording.count('warning'),
      },
    };
  } finally {
    resetTelemetry();
  }
}
