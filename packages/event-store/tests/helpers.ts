import type { DomainEvent } from "@basketwrap/types";

export const FIXED_TIME = new Date("2026-03-01T12:00:00.000Z");

export function minted(amount: string, actor = "0xalice"): DomainEvent {
  return {
    type: "wrapper.minted",
    metadata: {
      eventId: `evt-${amount}`,
      timestamp: "2026-03-01T12:00:00.000Z",
      actor,
      correlationId: `op-${amount}`,
      source: "engine",
    },
    payload: { caller: actor, amount },
  };
}
