import { describe, it, expect, vi } from "vitest";
import type { IdentityProvider } from "../../auth/identity";
import { createSocketAuthMiddleware, type HandshakeSocket } from "../auth";
import { SocketRateLimiter } from "../socketRateLimit";

vi.mock("../../logger");

function handshake(auth: Record<string, unknown>, address = "10.0.0.1"): HandshakeSocket {
  return { handshake: { address, auth }, data: {} };
}

function identity(verify: IdentityProvider["verify"]): IdentityProvider {
  return { verify };
}

function run(middleware: ReturnType<typeof createSocketAuthMiddleware>, socket: HandshakeSocket) {
  return new Promise<Error | undefined>((resolve) => middleware(socket, resolve));
}

describe("createSocketAuthMiddleware", () => {
  const limiter = () => new SocketRateLimiter({ connection: { maxPerWindow: 10, windowMs: 60_000 } });

  it("attaches the verified player to the socket", async () => {
    const verify = vi.fn(async (_token: string) => ({ playerId: "alice", displayName: "Alice" }));
    const middleware = createSocketAuthMiddleware(identity(verify), limiter());
    const socket = handshake({ token: "test-token" });

    await expect(run(middleware, socket)).resolves.toBeUndefined();

    expect(verify).toHaveBeenCalledWith("test-token");
    expect(socket.data.playerId).toBe("alice");
    expect(socket.data.displayName).toBe("Alice");
    expect(socket.data.connectedAt).toBeInstanceOf(Date);
  });

  it("requires a string token", async () => {
    const middleware = createSocketAuthMiddleware(identity(vi.fn()), limiter());

    const missing = await run(middleware, handshake({}));
    const numeric = await run(middleware, handshake({ token: 42 }));

    expect(missing?.message).toBe("authentication_required");
    expect(numeric?.message).toBe("authentication_required");
  });

  it("rejects tokens the provider refuses", async () => {
    const verify = vi.fn(async (_token: string) => {
      throw new Error("expired");
    });
    const middleware = createSocketAuthMiddleware(identity(verify), limiter());

    const error = await run(middleware, handshake({ token: "test-token" }));

    expect(error?.message).toBe("invalid_token");
  });

  it("rate-limits connection attempts per address", async () => {
    const verify = vi.fn(async (_token: string) => ({ playerId: "alice", displayName: "Alice" }));
    const strict = new SocketRateLimiter({ connection: { maxPerWindow: 1, windowMs: 60_000 } });
    const middleware = createSocketAuthMiddleware(identity(verify), strict);

    await run(middleware, handshake({ token: "test-token" }));
    const second = await run(middleware, handshake({ token: "test-token" }));
    const otherAddress = await run(middleware, handshake({ token: "test-token" }, "10.0.0.2"));

    expect(second?.message).toBe("rate_limit_exceeded");
    expect(otherAddress).toBeUndefined();
    expect(verify).toHaveBeenCalledTimes(2);
  });
});
