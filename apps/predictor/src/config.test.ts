import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      MODEL_DIR: "./models",
      MODEL_PREFIX: "",
      USDA_API_KEY: "DEMO_KEY",
      NCI_TIMEOUT_MS: 5000,
      PUBCHEM_TIMEOUT_MS: 8000,
      USDA_TIMEOUT_MS: 8000,
      FALLBACK_OVERRIDE_PROBABILITY: 0.3,
    });
  });

  it("treats blank values as unset and coerces numbers", () => {
    const config = loadConfig({ USDA_API_KEY: "  ", FALLBACK_OVERRIDE_PROBABILITY: "0", NCI_TIMEOUT_MS: "1500" });
    expect(config.USDA_API_KEY).toBe("DEMO_KEY");
    expect(config.FALLBACK_OVERRIDE_PROBABILITY).toBe(0);
    expect(config.NCI_TIMEOUT_MS).toBe(1500);
  });

  it("names the offending keys", () => {
    expect(() => loadConfig({ FALLBACK_OVERRIDE_PROBABILITY: "2", DESCRIPTOR_SERVICE_URL: "not a url" })).toThrow(
      /^Invalid configuration: .*DESCRIPTOR_SERVICE_URL.*FALLBACK_OVERRIDE_PROBABILITY|^Invalid configuration: .*FALLBACK_OVERRIDE_PROBABILITY.*DESCRIPTOR_SERVICE_URL/
    );
  });
});
