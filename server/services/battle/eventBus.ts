/**
 * Battle Event Bus
 *
 * Typed pub/sub between the Session Registry, Round Resolver, Matchmaker,
 * Rating Engine and Leaderboard. Each service instance gets its own bus;
 * nothing is module-global.
 */

import { EventEmitter } from "node:events";
import logger from "../../logger";
import type { BattleSession } from "./types";
import type { RatingSettlement } from "../rating/types";

export interface BattleEvents {
  "session.matched": BattleSession;
  "session.started": BattleSession;
  "session.completed": BattleSession;
  "session.abandoned": BattleSession;
  "ratings.updated": RatingSettlement;
}

export type BattleEventName = keyof BattleEvents;

type Listener<K extends BattleEventName> = (payload: BattleEvents[K]) => void | Promise<void>;

export class BattleEventBus {
  private readonly emitter = new EventEmitter();
  /** Collects async listener work while `publish` is emitting. */
  private collecting: Promise<void>[] | null = null;

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  /**
   * Subscribe to an event. Async listeners are not awaited by `emit`;
   * their rejections are logged against the event name.
   * Returns an unsubscribe function.
   */
  on<K extends BattleEventName>(event: K, listener: Listener<K>): () => void {
    const wrapped = (payload: BattleEvents[K]): void => {
      try {
        const pending = listener(payload);
        if (pending instanceof Promise) {
          const settled = pending.catch((error: unknown) => {
            logger.error("[EventBus] Listener failed", { event, error });
          });
          this.collecting?.push(settled);
        }
      } catch (error) {
        logger.error("[EventBus] Listener threw", { event, error });
      }
    };
    this.emitter.on(event, wrapped);
    return () => {
      this.emitter.off(event, wrapped);
    };
  }

  emit<K extends BattleEventName>(event: K, payload: BattleEvents[K]): void {
    this.emitter.emit(event, payload);
  }

  /** Emit, then wait for every async listener to settle. Never rejects. */
  async publish<K extends BattleEventName>(event: K, payload: BattleEvents[K]): Promise<void> {
    const outer = this.collecting;
    const pending: Promise<void>[] = [];
    this.collecting = pending;
    try {
      this.emitter.emit(event, payload);
    } finally {
      this.collecting = outer;
    }
    await Promise.all(pending);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
