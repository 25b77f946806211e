import type { SessionId, SessionLease } from "@panelkit/interface";
import { bytesToHex, randomBytes } from "@noble/hashes/utils";

export type SessionLocks = {
  acquire: (sessionId: SessionId) => Promise<SessionLease>;
  isHeld: (sessionId: SessionId) => boolean;
};

/**
 * In-process, per-session mutex. Leases for one session id are granted in
 * request order; different session ids never wait on each other.
 */
export function createSessionLocks(): SessionLocks {
  const tails = new Map<SessionId, Promise<void>>();

  return {
    acquire: async (sessionId) => {
      const previous = tails.get(sessionId) ?? Promise.resolve();
      let unlock = () => {};
      const held = new Promise<void>((resolve) => {
        unlock = () => resolve();
      });
      const tail = previous.then(() => held);
      tails.set(sessionId, tail);
      await previous;

      let released = false;
      return {
        sessionId,
        release: () => {
          if (released) return;
          released = true;
          unlock();
          if (tails.get(sessionId) === tail) tails.delete(sessionId);
        },
      };
    },
    isHeld: (sessionId) => tails.has(sessionId),
  };
}

export function generateSessionId(): SessionId {
  return bytesToHex(randomBytes(16));
}
