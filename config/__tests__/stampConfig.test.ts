import path from "node:path";
import { describe, expect, it } from "vitest";
import { expandHome, loadStampConfig } from "../stampConfig.js";

describe("expandHome", () => {
  it("expands a leading tilde only", () => {
    expect(expandHome("~", "/home/stargazer")).toBe("/home/stargazer");
    expect(expandHome("~/Desktop", "/home/stargazer")).toBe(path.join("/home/stargazer", "Desktop"));
    expect(expandHome("/tmp/~/x", "/home/stargazer")).toBe("/tmp/~/x");
  });
});

describe("loadStampConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadStampConfig({});
    expect(config.size).toBe(354);
    expect(config.geolocationUrl).toBe("http://ip-api.com/json");
    expect(config.geolocationTimeoutMs).toBe(5000);
    expect(config.catalogPath).toBeUndefined();
    expect(config.outputDir.endsWith("Desktop")).toBe(true);
  });

  it("coerces numeric variables and treats blanks as unset", () => {
    const config = loadStampConfig({
      STAR_CIPHER_SIZE: "472",
      STAR_CIPHER_OUTPUT_DIR: "/tmp/stamps",
      STAR_CIPHER_GEOLOCATION_TIMEOUT_MS: "",
      STAR_CIPHER_CATALOG_PATH: "/data/stars.csv",
    });
    expect(config).toEqual({
      size: 472,
      outputDir: "/tmp/stamps",
      geolocationUrl: "http://ip-api.com/json",
      geolocationTimeoutMs: 5000,
      catalogPath: "/data/stars.csv",
    });
  });

  it("rejects invalid values", () => {
    expect(() => loadStampConfig({ STAR_CIPHER_SIZE: "10" })).toThrow(/Invalid star-cipher configuration: STAR_CIPHER_SIZE/);
    expect(() => loadStampConfig({ STAR_CIPHER_GEOLOCATION_URL: "not a url" })).toThrow(
      /STAR_CIPHER_GEOLOCATION_URL/
    );
  });
});
