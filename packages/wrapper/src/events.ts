/**
 * Wrapper domain events.
 *
 * One event per successful state change; failed operations emit
 * nothing. Payload amounts are decimal strings.
 */

import type { EventSource } from "@basketwrap/types";

export const WRAPPER_EVENTS = {
  BASKET_CONFIGURED: "basket.configured",
  MINTED: "wrapper.minted",
  BURNED: "wrapper.burned",
  PRICE_FEED_CONFIGURED: "oracle.feed.configured",
  PRICE_FEED_REMOVED: "oracle.feed.removed",
  SLIPPAGE_TOLERANCE_UPDATED: "slippage.tolerance.updated",
  PAUSED: "wrapper.paused",
  UNPAUSED: "wrapper.unpaused",
  TOKEN_RECOVERED: "token.recovered",
  OWNERSHIP_TRANSFERRED: "ownership.transferred",
} as const;

export type WrapperEventType = (typeof WRAPPER_EVENTS)[keyof typeof WRAPPER_EVENTS];

export const EVENT_SOURCES: Readonly<Record<WrapperEventType, EventSource>> = {
  "basket.configured": "basket",
  "wrapper.minted": "engine",
  "wrapper.burned": "engine",
  "oracle.feed.configured": "oracle",
  "oracle.feed.removed": "oracle",
  "slippage.tolerance.updated": "admin",
  "wrapper.paused": "admin",
  "wrapper.unpaused": "admin",
  "token.recovered": "admin",
  "ownership.transferred": "admin",
};

// ─── Payloads ────────────────────────────────────────────────────────────

export type BasketConfiguredPayload = {
  readonly version: number;
  readonly tokens: readonly string[];
  readonly weights: readonly number[];
};

export type MintedPayload = {
  readonly holder: string;
  readonly amount: string;
  readonly pulled: readonly { readonly token: string; readonly amount: string }[];
  readonly maxValue?: string;
  readonly checkedValue?: string;
};

export type BurnedPayload = {
  readonly holder: string;
  readonly amount: string;
  readonly paidOut: readonly { readonly token: string; readonly amount: string }[];
  readonly minValue?: string;
  readonly checkedValue?: string;
};

export type PriceFeedConfiguredPayload = {
  readonly token: string;
  readonly feed: string;
  readonly decimals: number;
};

export type PriceFeedRemovedPayload = {
  readonly token: string;
  readonly feed: string;
};

export type SlippageToleranceUpdatedPayload = {
  readonly previousBps: number;
  readonly bps: number;
};

export type TokenRecoveredPayload = {
  readonly token: string;
  readonly to: string;
  readonly amount: string;
};

export type OwnershipTransferredPayload = {
  readonly previousOwner: string;
  readonly newOwner: string;
};

export interface WrapperEventPayloads {
  "basket.configured": BasketConfiguredPayload;
  "wrapper.minted": MintedPayload;
  "wrapper.burned": BurnedPayload;
  "oracle.feed.configured": PriceFeedConfiguredPayload;
  "oracle.feed.removed": PriceFeedRemovedPayload;
  "slippage.tolerance.updated": SlippageToleranceUpdatedPayload;
  "wrapper.paused": Record<string, never>;
  "wrapper.unpaused": Record<string, never>;
  "token.recovered": TokenRecoveredPayload;
  "ownership.transferred": OwnershipTransferredPayload;
}
