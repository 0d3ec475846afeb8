/**
 * Tests for config.ts - parseApiKeys + loadConfig.
 */

import { describe, it, expect } from "vitest";
import { parseApiKeys, loadConfig } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses comma-separated entries", () => {
    expect(parseApiKeys(" k1:admin:0xowner , k2:user:0xuser ")).toEqual([
      { key: "k1", role: "admin", address: "0xowner" },
      { key: "k2", role: "user", address: "0xuser" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b:c:d")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key or address", () => {
    expect(() => parseApiKeys(":admin:0xowner")).toThrow("API key cannot be empty");
    expect(() => parseApiKeys("k1:admin:")).toThrow("Address cannot be empty");
  });

  it("throws on an unknown role", () => {
    expect(() => parseApiKeys("k1:operator:0xowner")).toThrow('Invalid role "operator"');
  });

  it("throws on a repeated key", () => {
    expect(() => parseApiKeys("k1:admin:0xa,k1:user:0xb")).toThrow('Duplicate API key in API_KEYS: "k1"');
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      API_KEYS: "",
      WRAPPER_NAME: "Multi-Asset Wrapper",
      WRAPPER_SYMBOL: "MAW",
      OWNER_ADDRESS: "0xowner",
      CUSTODY_ADDRESS: "0xwrapper",
      SLIPPAGE_TOLERANCE_BPS: 100,
      RECOVERY_SCOPE: "unrestricted",
    });
  });

  it("coerces numeric values", () => {
    const config = loadConfig({ PORT: "8080", SLIPPAGE_TOLERANCE_BPS: "250" });
    expect(config.PORT).toBe(8080);
    expect(config.SLIPPAGE_TOLERANCE_BPS).toBe(250);
  });

  it("rejects a tolerance above 10000 bps", () => {
    expect(() => loadConfig({ SLIPPAGE_TOLERANCE_BPS: "10001" })).toThrow();
  });

  it("rejects an unknown recovery scope", () => {
    expect(() => loadConfig({ RECOVERY_SCOPE: "everything" })).toThrow();
  });
});
