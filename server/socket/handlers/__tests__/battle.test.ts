import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { BattleEventBus } from "../../../services/battle/eventBus";
import { Matchmaker } from "../../../services/battle/matchmaker";
import { RoundResolver } from "../../../services/battle/roundResolver";
import { SessionRegistry } from "../../../services/battle/sessionRegistry";
import { InMemoryRatingStore } from "../../../services/rating/ratingStore";
import type { RatingSettlement } from "../../../services/rating/types";
import { SocketGateway } from "../../gateway";
import { BATTLE_EVENT_LIMITS, SocketRateLimiter } from "../../socketRateLimit";
import { createBattleHandlers, registerRatingNotifications, type BattleHandlerDeps } from "../battle";
import { fixturePlantProvider } from "../../../__tests__/helpers/battle";

vi.mock("../../../logger");

describe("battle socket handlers", () => {
  let bus: BattleEventBus;
  let registry: SessionRegistry;
  let matchmaker: Matchmaker;
  let roomEmit: ReturnType<typeof vi.fn>;
  let deps: BattleHandlerDeps;
  let ratings: InMemoryRatingStore;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    bus = new BattleEventBus();
    registry = new SessionRegistry({ bus, generateId: () => "s1" });
    matchmaker = new Matchmaker({ registry, bus, generateCode: () => "ABC234" });
    roomEmit = vi.fn();
    const gateway = new SocketGateway({ to: () => ({ emit: roomEmit }) });
    ratings = new InMemoryRatingStore();
    deps = {
      matchmaker,
      resolver: new RoundResolver({
        registry,
        gateway,
        plants: fixturePlantProvider(),
        bus,
        rewards: { emitReward: vi.fn().mockResolvedValue(undefined) },
      }),
      gateway,
      ratings,
      limiter: new SocketRateLimiter(BATTLE_EVENT_LIMITS),
    };
  });

  afterEach(() => {
    matchmaker.shutdown();
    registry.shutdown();
    vi.useRealTimers();
  });

  function handlersFor(playerId: string, socketId = `socket-${playerId}`) {
    const emit = vi.fn();
    const handlers = createBattleHandlers({ socketId, playerId, displayName: `Player ${playerId}`, emit }, deps);
    return { handlers, emit };
  }

  it("confirms a queued player with ISO timestamps", async () => {
    const { handlers, emit } = handlersFor("alice");

    await handlers.enqueueMatch();

    expect(emit).toHaveBeenCalledWith("matchQueued", {
      queuedAt: "1970-01-01T00:00:00.000Z",
      timeoutAt: "1970-01-01T00:00:30.000Z",
    });
    expect(matchmaker.isQueued("alice")).toBe(true);
  });

  it("queues players at their stored rating", async () => {
    await ratings.ensurePlayer({ id: "alice", displayName: "Player alice" });
    const enqueue = vi.spyOn(matchmaker, "enqueue");
    const { handlers } = handlersFor("alice");

    await handlers.enqueueMatch();

    expect(enqueue).toHaveBeenCalledWith({ id: "alice", displayName: "Player alice", rating: 1000 });
  });

  it("maps core errors to error events", async () => {
    const { handlers, emit } = handlersFor("alice");
    await handlers.enqueueMatch();

    await handlers.enqueueMatch();

    expect(emit).toHaveBeenLastCalledWith("error", expect.objectContaining({ code: "ALREADY_QUEUED", retryable: false }));
  });

  it("hands out invite codes", async () => {
    const { handlers, emit } = handlersFor("alice");

    await handlers.createInvite();

    expect(emit).toHaveBeenCalledWith("inviteCreated", { code: "ABC234", expiresAt: "1970-01-01T00:05:00.000Z" });
  });

  it("refuses a second invite while the first is still open", async () => {
    const { handlers, emit } = handlersFor("alice");
    await handlers.createInvite();

    await handlers.createInvite();

    expect(emit).toHaveBeenLastCalledWith("error", {
      code: "ALREADY_QUEUED",
      message: "Player is already waiting for a match",
      retryable: false,
    });
  });

  it("rejects malformed invite codes before they reach the matchmaker", async () => {
    const accept = vi.spyOn(matchmaker, "acceptInvite");
    const { handlers, emit } = handlersFor("bob");

    await handlers.acceptInvite({ code: "??" });

    expect(accept).not.toHaveBeenCalled();
    expect(emit).toHaveBeenCalledWith("error", {
      code: "VALIDATION_ERROR",
      message: "code: Invalid invite code",
      retryable: false,
    });
  });

  it("reports unknown invite codes", async () => {
    const { handlers, emit } = handlersFor("bob");

    await handlers.acceptInvite({ code: "ZZZ999" });

    expect(emit).toHaveBeenCalledWith("error", expect.objectContaining({ code: "INVITE_NOT_FOUND" }));
  });

  it("pairs an invite guest with the host", async () => {
    const host = handlersFor("alice");
    const guest = handlersFor("bob");
    await host.handlers.createInvite();

    await guest.handlers.acceptInvite({ code: "abc234" });

    expect(guest.emit).not.toHaveBeenCalledWith("error", expect.anything());
    expect(registry.findActiveSessionFor("bob")).toMatchObject({ id: "s1", state: "matched" });
  });

  it("validates answers and reports unknown sessions", async () => {
    const { handlers, emit } = handlersFor("alice");

    await handlers.submitAnswer({ sessionId: "s1", roundIndex: 0, selectedIndex: 7 });
    await handlers.submitAnswer({ sessionId: "missing", roundIndex: 0, selectedIndex: 1 });

    expect(emit).toHaveBeenNthCalledWith(1, "error", expect.objectContaining({ code: "VALIDATION_ERROR" }));
    expect(emit).toHaveBeenNthCalledWith(2, "error", {
      code: "SESSION_NOT_FOUND",
      message: "Session missing not found",
      retryable: false,
    });
  });

  it("reports leave requests for unknown sessions", async () => {
    const { handlers, emit } = handlersFor("alice");

    await handlers.leaveSession({ sessionId: "missing" });

    expect(emit).toHaveBeenCalledWith("error", expect.objectContaining({ code: "SESSION_NOT_FOUND" }));
  });

  it("rate-limits each socket per event", async () => {
    const { handlers, emit } = handlersFor("alice");

    for (let i = 0; i < 4; i++) {
      await handlers.createInvite();
    }

    expect(emit).toHaveBeenLastCalledWith("error", {
      code: "RATE_LIMITED",
      message: "Too many requests, slow down",
      retryable: true,
    });
  });

  it("turns unexpected failures into a generic error", async () => {
    vi.spyOn(ratings, "ensurePlayer").mockRejectedValue(new Error("database offline"));
    const { handlers, emit } = handlersFor("alice");

    await expect(handlers.enqueueMatch()).resolves.toBeUndefined();

    expect(emit).toHaveBeenCalledWith("error", {
      code: "INTERNAL_ERROR",
      message: "Something went wrong",
      retryable: true,
    });
  });

  it("leaves the pool only when the player's last socket closes", async () => {
    deps.gateway.connect("alice");
    deps.gateway.connect("alice");
    const first = handlersFor("alice", "socket-1");
    const second = handlersFor("alice", "socket-2");
    await first.handlers.enqueueMatch();

    await first.handlers.disconnect("transport close");
    expect(matchmaker.isQueued("alice")).toBe(true);

    await second.handlers.disconnect("transport close");
    expect(matchmaker.isQueued("alice")).toBe(false);
  });
});

describe("registerRatingNotifications", () => {
  it("sends each player their own rating change", () => {
    const bus = new BattleEventBus();
    const roomEmit = vi.fn();
    const to = vi.fn((_room: string) => ({ emit: roomEmit }));
    const unsubscribe = registerRatingNotifications(bus, new SocketGateway({ to }));
    const settlement: RatingSettlement = {
      sessionId: "s1",
      winner: {
        playerId: "alice",
        previousRating: 1190,
        rating: 1206,
        delta: 16,
        previousRank: "Sprout",
        rank: "Green Thumb",
        rankChanged: true,
        currentStreak: 2,
      },
      loser: {
        playerId: "bob",
        previousRating: 1190,
        rating: 1174,
        delta: -16,
        previousRank: "Sprout",
        rank: "Sprout",
        rankChanged: false,
        currentStreak: -1,
      },
      settledAt: 0,
    };

    bus.emit("ratings.updated", settlement);

    expect(to).toHaveBeenNthCalledWith(1, "player:alice");
    expect(roomEmit).toHaveBeenNthCalledWith(1, "ratingUpdate", {
      sessionId: "s1",
      rating: 1206,
      delta: 16,
      rank: "Green Thumb",
      rankChanged: true,
      currentStreak: 2,
    });
    expect(to).toHaveBeenNthCalledWith(2, "player:bob");
    expect(roomEmit).toHaveBeenNthCalledWith(2, "ratingUpdate", expect.objectContaining({ delta: -16 }));

    unsubscribe();
    bus.emit("ratings.updated", settlement);
    expect(roomEmit).toHaveBeenCalledTimes(2);
  });
});
