import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { BattleEventBus } from "../eventBus";
import { Matchmaker } from "../matchmaker";
import { SessionRegistry } from "../sessionRegistry";
import { flushAsync, playerRef } from "../../../__tests__/helpers/battle";
import type { PlayerRef } from "../types";

vi.mock("../../../logger");

describe("Matchmaker", () => {
  let bus: BattleEventBus;
  let registry: SessionRegistry;
  let matchmaker: Matchmaker;
  let ids: number;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    bus = new BattleEventBus();
    ids = 0;
    registry = new SessionRegistry({ bus, generateId: () => `s${++ids}` });
    matchmaker = new Matchmaker({ registry, bus, generateCode: () => "ABC234" });
    matchmaker.attach();
  });

  afterEach(() => {
    matchmaker.shutdown();
    registry.shutdown();
    vi.useRealTimers();
  });

  describe("windowFor", () => {
    it("widens by 50 every 5 seconds up to 600", () => {
      const entry = { enqueuedAt: 0 };
      expect(matchmaker.windowFor(entry, 0)).toBe(300);
      expect(matchmaker.windowFor(entry, 4_999)).toBe(300);
      expect(matchmaker.windowFor(entry, 5_000)).toBe(350);
      expect(matchmaker.windowFor(entry, 60_000)).toBe(600);
    });
  });

  describe("enqueue", () => {
    it("queues the first player with a bounded wait", async () => {
      const result = await matchmaker.enqueue(playerRef("alice"));

      expect(result).toEqual({
        success: true,
        data: { status: "queued", sessionId: "s1", queuedAt: 0, timeoutAt: 30_000 },
      });
      expect(matchmaker.poolSize()).toBe(1);
      expect(matchmaker.isQueued("alice")).toBe(true);
    });

    it("pairs a newcomer within the rating window with the waiting player", async () => {
      await matchmaker.enqueue(playerRef("alice", 1000));
      const result = await matchmaker.enqueue(playerRef("bob", 1250));

      expect(result.success).toBe(true);
      if (result.success && result.data.status === "matched") {
        expect(result.data.session.id).toBe("s1");
        expect(result.data.session.playerA.id).toBe("alice");
        expect(result.data.session.playerB?.id).toBe("bob");
        expect(result.data.session.state).toBe("matched");
      } else {
        throw new Error("expected a match");
      }
      expect(matchmaker.poolSize()).toBe(0);
    });

    it("picks the closest rating among acceptable partners", async () => {
      await matchmaker.enqueue(playerRef("far", 1290));
      await matchmaker.enqueue(playerRef("near", 950));

      const result = await matchmaker.enqueue(playerRef("carol", 1000));

      expect(result.success && result.data.status === "matched" && result.data.session.playerA.id).toBe("near");
      expect(matchmaker.isQueued("far")).toBe(true);
    });

    it("rejects a second enqueue from the same player", async () => {
      await matchmaker.enqueue(playerRef("alice"));
      const result = await matchmaker.enqueue(playerRef("alice"));
      expect(!result.success && result.error.code).toBe("ALREADY_QUEUED");
    });

    it("rejects players who are already in a running session", async () => {
      await matchmaker.enqueue(playerRef("alice"));
      await matchmaker.enqueue(playerRef("bob"));

      const result = await matchmaker.enqueue(playerRef("alice"));
      expect(!result.success && result.error.code).toBe("ALREADY_IN_SESSION");
    });

    it("pairs players outside the initial window once the window has widened", async () => {
      await matchmaker.enqueue(playerRef("alice", 1000));
      await matchmaker.enqueue(playerRef("bob", 1400));
      expect(matchmaker.poolSize()).toBe(2);

      await vi.advanceTimersByTimeAsync(5_000);
      await flushAsync();
      expect(matchmaker.poolSize()).toBe(2);

      await vi.advanceTimersByTimeAsync(5_000);
      await flushAsync();

      expect(matchmaker.poolSize()).toBe(0);
      expect(registry.findActiveSessionFor("bob")).toMatchObject({
        id: "s1",
        state: "matched",
        playerA: { id: "alice" },
        playerB: { id: "bob" },
      });
      const superseded = registry.getSession("s2");
      expect(superseded.success && superseded.data.abandonReason).toBe("superseded");
    });

    it("drops the player from the pool after the matchmaking timeout", async () => {
      await matchmaker.enqueue(playerRef("alice"));

      await vi.advanceTimersByTimeAsync(30_000);
      await flushAsync();

      expect(matchmaker.poolSize()).toBe(0);
      const session = registry.getSession("s1");
      expect(session.success && session.data.abandonReason).toBe("matchmaking_timeout");
    });
  });

  describe("cancel", () => {
    it("removes the player and abandons the waiting session", async () => {
      await matchmaker.enqueue(playerRef("alice"));

      await expect(matchmaker.cancel("alice")).resolves.toBe(true);
      await expect(matchmaker.cancel("alice")).resolves.toBe(false);

      const session = registry.getSession("s1");
      expect(session.success && session.data.abandonReason).toBe("player_left");
    });
  });

  describe("invites", () => {
    it("creates a single-use code that pairs regardless of rating gap", async () => {
      const invite = await matchmaker.createInvite(playerRef("alice", 800));
      expect(invite).toEqual({
        success: true,
        data: { code: "ABC234", host: playerRef("alice", 800), sessionId: "s1", expiresAt: 300_000 },
      });

      const accepted = await matchmaker.acceptInvite(" abc234 ", playerRef("bob", 2000));
      expect(accepted.success && accepted.data.playerB?.id).toBe("bob");
      expect(accepted.success && accepted.data.origin).toBe("invite");

      const reused = await matchmaker.acceptInvite("ABC234", playerRef("carol"));
      expect(!reused.success && reused.error.code).toBe("INVITE_NOT_FOUND");
    });

    it("rejects the host accepting their own invite", async () => {
      await matchmaker.createInvite(playerRef("alice"));
      const result = await matchmaker.acceptInvite("ABC234", playerRef("alice"));
      expect(!result.success && result.error.code).toBe("SELF_PAIRING");
    });

    it("expires unused invites", async () => {
      await matchmaker.createInvite(playerRef("alice"));

      await vi.advanceTimersByTimeAsync(300_000);
      await flushAsync();

      const result = await matchmaker.acceptInvite("ABC234", playerRef("bob"));
      expect(!result.success && result.error.code).toBe("INVITE_NOT_FOUND");
      const session = registry.getSession("s1");
      expect(session.success && session.data.abandonReason).toBe("invite_expired");
    });

    it("takes an accepting guest out of the pool", async () => {
      await matchmaker.createInvite(playerRef("alice"));
      await matchmaker.enqueue(playerRef("bob", 2400));
      expect(matchmaker.isQueued("bob")).toBe(true);

      const result = await matchmaker.acceptInvite("ABC234", playerRef("bob", 2400));

      expect(result.success).toBe(true);
      expect(matchmaker.isQueued("bob")).toBe(false);
      const pool = registry.getSession("s2");
      expect(pool.success && pool.data.abandonReason).toBe("superseded");
    });
  });

  describe("cancel on abandon", () => {
    it("drops the pool entry whenever the waiting session is abandoned", async () => {
      await matchmaker.enqueue(playerRef("alice"));
      const sweep = vi.spyOn(matchmaker, "sweep");

      await registry.transition("s1", { type: "ABANDON", reason: "player_left" });
      await flushAsync();
      await vi.advanceTimersByTimeAsync(10_000);

      expect(matchmaker.isQueued("alice")).toBe(false);
      expect(sweep).not.toHaveBeenCalled();
      const again = await matchmaker.enqueue(playerRef("alice"));
      expect(again.success && again.data.status).toBe("queued");
    });
  });

  describe("one waiting session per player", () => {
    beforeEach(() => {
      matchmaker.shutdown();
      let codes = 0;
      matchmaker = new Matchmaker({ registry, bus, generateCode: () => `CODE${++codes}` });
      matchmaker.attach();
    });

    it("rejects a second invite while the first is open", async () => {
      await matchmaker.createInvite(playerRef("alice"));

      const second = await matchmaker.createInvite(playerRef("alice"));

      expect(!second.success && second.error.code).toBe("ALREADY_QUEUED");
      expect(registry.waitingSessionsFor("alice").map((s) => s.id)).toEqual(["s1"]);
    });

    it("rejects a pool ticket while the player's invite is open", async () => {
      await matchmaker.createInvite(playerRef("alice"));

      const queued = await matchmaker.enqueue(playerRef("alice"));

      expect(!queued.success && queued.error.code).toBe("ALREADY_QUEUED");
      expect(matchmaker.poolSize()).toBe(0);
    });

    it("rejects an invite while the player is in the pool", async () => {
      await matchmaker.enqueue(playerRef("alice"));

      const invite = await matchmaker.createInvite(playerRef("alice"));

      expect(!invite.success && invite.error.code).toBe("ALREADY_QUEUED");
    });

    it("retires a guest's own invite once they accept someone else's", async () => {
      await matchmaker.createInvite(playerRef("alice"));
      await matchmaker.createInvite(playerRef("bob"));

      const accepted = await matchmaker.acceptInvite("CODE1", playerRef("bob"));
      const stale = await matchmaker.acceptInvite("CODE2", playerRef("carol"));

      expect(accepted.success && accepted.data.id).toBe("s1");
      expect(!stale.success && stale.error.code).toBe("INVITE_NOT_FOUND");
      const superseded = registry.getSession("s2");
      expect(superseded.success && superseded.data.abandonReason).toBe("superseded");
      expect(registry.findActiveSessionFor("bob")?.id).toBe("s1");
    });

    it("gives up on invite codes after repeated collisions", async () => {
      matchmaker.shutdown();
      const generateCode = vi.fn(() => "ABC234");
      matchmaker = new Matchmaker({ registry, bus, generateCode });
      await matchmaker.createInvite(playerRef("alice"));

      const second = await matchmaker.createInvite(playerRef("bob"));

      expect(second).toEqual({
        success: false,
        error: expect.objectContaining({ code: "INVITE_CODE_UNAVAILABLE", retryable: true }),
      });
      expect(generateCode).toHaveBeenCalledTimes(11);
      expect(registry.waitingSessionsFor("bob")).toEqual([]);
    });

    it("never places a player in two live sessions under a burst of requests", async () => {
      const hosts = ["h0", "h1", "h2", "h3"].map((id) => playerRef(id));
      const codes: string[] = [];
      for (const host of hosts) {
        const invite = await matchmaker.createInvite(host);
        if (!invite.success) throw invite.error;
        codes.push(invite.data.code);
      }
      const players: PlayerRef[] = Array.from({ length: 20 }, (_, i) => playerRef(`p${i}`, 900 + i * 40));

      await Promise.all([
        ...players.map((player) => matchmaker.enqueue(player)),
        ...codes.map((code, i) => matchmaker.acceptInvite(code, players[i * 2])),
        matchmaker.sweep(),
        ...hosts.map((host) => matchmaker.enqueue(host)),
        ...players.slice(0, 5).map((player) => matchmaker.enqueue(player)),
        matchmaker.sweep(),
        ...codes.map((code, i) => matchmaker.acceptInvite(code, players[i * 2 + 1])),
      ]);
      await vi.advanceTimersByTimeAsync(10_000);
      await flushAsync();

      const live = new Map<string, string[]>();
      for (let i = 1; i <= ids; i++) {
        const session = registry.getSession(`s${i}`);
        if (!session.success || session.data.state === "completed" || session.data.state === "abandoned") continue;
        for (const player of [session.data.playerA, session.data.playerB]) {
          if (player) live.set(player.id, [...(live.get(player.id) ?? []), session.data.id]);
        }
      }
      const doubled = [...live].filter(([, sessions]) => sessions.length > 1);
      expect(doubled).toEqual([]);
      expect(live.size).toBeGreaterThan(0);

      for (const player of [...players, ...hosts]) {
        if (matchmaker.isQueued(player.id)) {
          expect(registry.findActiveSessionFor(player.id)?.state).toBe("waiting");
        }
      }
    });
  });
});
