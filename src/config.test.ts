import { describe, it, expect } from "vitest";
import { loadConfig, validatePoolConfig } from "./config";
import { ONE, SECONDS_PER_DAY, SECONDS_PER_YEAR, ZERO_ADDRESS } from "./constants";

describe("loadConfig", () => {
  it("should fall back to defaults", () => {
    const config = loadConfig({});
    expect(config.logLevel).toBe("info");
    expect(config.poolAddress).toBe(ZERO_ADDRESS);
    expect(config.initialApr).toBe(ONE / 20n);
    expect(config.pool.positionDuration).toBe(SECONDS_PER_YEAR);
    expect(config.pool.checkpointDuration).toBe(SECONDS_PER_DAY);
    expect(config.pool.timeStretch).toBe(44463125629060298n);
    expect(config.pool.fees).toEqual({
      curve: 10000000000000000n,
      flat: 500000000000000n,
      governance: 150000000000000000n,
    });
    expect(config.engine.chainId).toBe(1n);
  });

  it("should read overrides", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      INITIAL_APR: "0.1",
      POSITION_DURATION: "604800",
      CHECKPOINT_DURATION: "3600",
      FLAT_FEE: "0.001",
      CHAIN_ID: "31337",
      ENGINE_ADDRESS: "0x00000000000000000000000000000000000000E1",
    });
    expect(config.logLevel).toBe("debug");
    expect(config.pool.timeStretch).toBe(88926251258120596n);
    expect(config.pool.positionDuration).toBe(604800n);
    expect(config.pool.checkpointDuration).toBe(3600n);
    expect(config.pool.fees.flat).toBe(ONE / 1000n);
    expect(config.engine.chainId).toBe(31337n);
    expect(config.engine.address).toBe("0x00000000000000000000000000000000000000E1");
  });

  it("should take an explicit time stretch over the derived one", () => {
    expect(loadConfig({ TIME_STRETCH: "0.02" }).pool.timeStretch).toBe(ONE / 50n);
  });

  it("should reject malformed values", () => {
    expect(() => loadConfig({ CHAIN_ID: "one" })).toThrow(expect.objectContaining({ code: "InvalidConfig" }));
    expect(() => loadConfig({ CURVE_FEE: "1.2.3" })).toThrow(expect.objectContaining({ code: "InvalidConfig" }));
  });

  it("should reject inconsistent durations", () => {
    expect(() => loadConfig({ CHECKPOINT_DURATION: "0" })).toThrow(
      expect.objectContaining({ code: "InvalidConfig" })
    );
    expect(() => loadConfig({ POSITION_DURATION: "100000" })).toThrow(
      expect.objectContaining({ code: "InvalidConfig" })
    );
  });
});

describe("validatePoolConfig", () => {
  const base = loadConfig({}).pool;

  it("should accept the defaults", () => {
    expect(() => validatePoolConfig(base)).not.toThrow();
  });

  it("should reject fees above one", () => {
    expect(() => validatePoolConfig({ ...base, fees: { ...base.fees, governance: ONE + 1n } })).toThrow(
      expect.objectContaining({ code: "InvalidConfig" })
    );
  });

  it("should reject a time stretch outside (0, 1)", () => {
    expect(() => validatePoolConfig({ ...base, timeStretch: ONE })).toThrow(
      expect.objectContaining({ code: "InvalidConfig" })
    );
    expect(() => validatePoolConfig({ ...base, timeStretch: 0n })).toThrow(
      expect.objectContaining({ code: "InvalidConfig" })
    );
  });
});
