/**
 * Battle service container.
 *
 * Builds one event bus and every service around it, then subscribes them
 * in dependency order. Nothing here is module-global, so tests can build as
 * many independent containers as they need.
 */

import { buildBattleConfig, type BattleConfig } from "../config/battle";
import logger from "../logger";
import { BattleEventBus } from "./battle/eventBus";
import { Matchmaker } from "./battle/matchmaker";
import type { BattleGateway } from "./battle/messages";
import type { PlantProvider } from "./battle/plantSelection";
import { LoggingRewardSink, type RewardSink } from "./battle/rewards";
import { RoundResolver } from "./battle/roundResolver";
import { SessionRegistry, type SessionArchive } from "./battle/sessionRegistry";
import { LeaderboardService } from "./leaderboard/leaderboardService";
import type { LeaderboardCache } from "./leaderboard/types";
import { StaticPlantProvider } from "./plants/staticPlantProvider";
import { RatingEngine } from "./rating/ratingEngine";
import type { RatingStore } from "./rating/ratingStore";
import type { RankBand } from "./rating/types";

export interface BattleServicesOptions {
  gateway: BattleGateway;
  ratingStore: RatingStore;
  leaderboardCache: LeaderboardCache;
  plants?: PlantProvider;
  rewards?: RewardSink;
  archive?: SessionArchive | null;
  rankBands?: readonly RankBand[];
  config?: BattleConfig;
  now?: () => number;
  random?: () => number;
}

export interface BattleServices {
  bus: BattleEventBus;
  registry: SessionRegistry;
  matchmaker: Matchmaker;
  resolver: RoundResolver;
  ratings: RatingEngine;
  ratingStore: RatingStore;
  leaderboard: LeaderboardService;
  /** Subscribe every service to the bus and start background schedulers. */
  start(): void;
  shutdown(): void;
}

export function createBattleServices(options: BattleServicesOptions): BattleServices {
  const config = options.config ?? buildBattleConfig();
  const now = options.now ?? Date.now;

  const bus = new BattleEventBus();
  const registry = new SessionRegistry({ bus, archive: options.archive ?? null, now });
  const matchmaker = new Matchmaker({ registry, bus, config: config.matchmaker, now });
  const resolver = new RoundResolver({
    registry,
    gateway: options.gateway,
    plants: options.plants ?? new StaticPlantProvider(),
    bus,
    rewards: options.rewards ?? new LoggingRewardSink(),
    config: config.resolver,
    random: options.random,
    now,
  });
  const ratings = new RatingEngine({
    store: options.ratingStore,
    bus,
    kFactor: config.kFactor,
    rankBands: options.rankBands,
    now,
  });
  const leaderboard = new LeaderboardService({
    store: options.ratingStore,
    cache: options.leaderboardCache,
    bus,
    ttlSeconds: config.leaderboardTtlSeconds,
  });

  return {
    bus,
    registry,
    matchmaker,
    resolver,
    ratings,
    ratingStore: options.ratingStore,
    leaderboard,
    start() {
      matchmaker.attach();
      resolver.attach();
      ratings.attach();
      leaderboard.attach();
      ratings.start();
      logger.info("[Battle] Services started", { kFactor: config.kFactor });
    },
    shutdown() {
      matchmaker.shutdown();
      resolver.detach();
      ratings.stop();
      leaderboard.detach();
      registry.shutdown();
      bus.removeAllListeners();
      logger.info("[Battle] Services stopped");
    },
  };
}
