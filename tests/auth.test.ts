import { describe, expect, it, vi } from "vitest";
import { AuthSession, isAlreadyOnboardedError, needsRefresh } from "../src/auth.js";
import { AccountStateError, ApiError } from "../src/errors.js";

function manualClock(start: number) {
  let now = start;
  return {
    clock: () => now,
    advance(ms: number) {
      now += ms;
    },
  };
}

describe("Auth Module", () => {
  describe("needsRefresh", () => {
    it("keeps a token fresh up to and including 240 seconds", () => {
      expect(needsRefresh(0, 0)).toBe(false);
      expect(needsRefresh(0, 240_000)).toBe(false);
      expect(needsRefresh(0, 240_999)).toBe(false);
    });

    it("refreshes from 241 seconds", () => {
      expect(needsRefresh(0, 241_000)).toBe(true);
      expect(needsRefresh(1_000, 242_000)).toBe(true);
    });

    it("treats a timestamp in the future as fresh", () => {
      expect(needsRefresh(10_000, 0)).toBe(false);
    });
  });

  describe("isAlreadyOnboardedError", () => {
    it("matches 400 responses mentioning already", () => {
      expect(isAlreadyOnboardedError(new ApiError(400, "Account already onboarded"))).toBe(true);
      expect(isAlreadyOnboardedError(new ApiError(400, "ALREADY_ONBOARDED"))).toBe(true);
    });

    it("does not match anything else", () => {
      expect(isAlreadyOnboardedError(new ApiError(400, "Invalid signature"))).toBe(false);
      expect(isAlreadyOnboardedError(new ApiError(500, "already"))).toBe(false);
      expect(isAlreadyOnboardedError(new Error("already"))).toBe(false);
    });
  });

  describe("AuthSession", () => {
    it("starts unauthenticated", () => {
      const session = new AuthSession(() => 0);
      expect(session.state).toBe("unauthenticated");
      expect(session.token).toBeUndefined();
      expect(session.needsRefresh()).toBe(true);
      expect(() => session.requireToken()).toThrow(AccountStateError);
      expect(() => session.authorizationHeader()).toThrow(
        "No session token; authenticate first",
      );
    });

    it("stores tokens with the time they were set", () => {
      const session = new AuthSession(() => 5_000);
      session.setToken("test-token");
      expect(session.state).toBe("authenticated");
      expect(session.authTimestamp).toBe(5_000);
      expect(session.authorizationHeader()).toEqual(["Authorization", "Bearer test-token"]);
    });

    it("re-authenticates only once the token is due", async () => {
      const { clock, advance } = manualClock(1_000);
      const session = new AuthSession(clock);
      const authenticate = vi
        .fn<() => Promise<string>>()
        .mockResolvedValueOnce("token-1")
        .mockResolvedValueOnce("token-2");

      await expect(session.ensureFresh(authenticate)).resolves.toBe("token-1");
      advance(240_000);
      await expect(session.ensureFresh(authenticate)).resolves.toBe("token-1");
      expect(authenticate).toHaveBeenCalledTimes(1);

      advance(1_000);
      await expect(session.ensureFresh(authenticate)).resolves.toBe("token-2");
      expect(authenticate).toHaveBeenCalledTimes(2);
      expect(session.authTimestamp).toBe(242_000);
    });

    it("coalesces concurrent refreshes", async () => {
      const session = new AuthSession(() => 0);
      let resolve: (token: string) => void = () => {};
      const authenticate = vi.fn(
        () =>
          new Promise<string>((r) => {
            resolve = r;
          }),
      );

      const first = session.ensureFresh(authenticate);
      const second = session.ensureFresh(authenticate);
      resolve("shared-token");

      await expect(Promise.all([first, second])).resolves.toEqual([
        "shared-token",
        "shared-token",
      ]);
      expect(authenticate).toHaveBeenCalledTimes(1);
    });

    it("propagates refresh failures and retries on the next call", async () => {
      const session = new AuthSession(() => 0);
      const failure = new ApiError(401, "Invalid signature");
      const authenticate = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(failure)
        .mockResolvedValueOnce("token-1");

      await expect(session.ensureFresh(authenticate)).rejects.toBe(failure);
      expect(session.state).toBe("unauthenticated");
      await expect(session.ensureFresh(authenticate)).resolves.toBe("token-1");
      expect(authenticate).toHaveBeenCalledTimes(2);
    });

    it("clears the token", () => {
      const session = new AuthSession(() => 0);
      session.setToken("test-token");
      session.clear();
      expect(session.token).toBeUndefined();
      expect(session.needsRefresh()).toBe(true);
    });
  });

  describe("Onboarding", () => {
    it("marks the session onboarded", async () => {
      const session = new AuthSession(() => 0);
      await session.onboard(async () => {});
      expect(session.state).toBe("onboarded");
    });

    it("treats an already-onboarded response as success", async () => {
      const session = new AuthSession(() => 0);
      await expect(
        session.onboard(async () => {
          throw new ApiError(400, "Account already onboarded");
        }),
      ).resolves.toBeUndefined();
      expect(session.state).toBe("onboarded");
    });

    it("propagates other failures", async () => {
      const session = new AuthSession(() => 0);
      const failure = new ApiError(400, "Invalid signature");
      await expect(
        session.onboard(async () => {
          throw failure;
        }),
      ).rejects.toBe(failure);
      expect(session.state).toBe("unauthenticated");
    });

    it("returns to onboarded after the token is cleared", async () => {
      const session = new AuthSession(() => 0);
      await session.onboard(async () => {});
      session.setToken("test-token");
      session.clear();
      expect(session.state).toBe("onboarded");
    });
  });
});
