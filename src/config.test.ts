import { describe, it, expect } from "vitest";
import { DEFAULT_MAX_PAGES, DEFAULT_REGION, resolveConfig } from "./config.js";
import { ValidationError } from "./lib/errors.js";

describe("resolveConfig", () => {
  it("should apply defaults when nothing is set", () => {
    const config = resolveConfig({}, { env: {} });

    expect(config).toEqual({
      fetcher: {
        region: DEFAULT_REGION,
        profile: undefined,
        maxPages: DEFAULT_MAX_PAGES,
        endpoint: undefined,
      },
      inventoryFile: undefined,
      format: "text",
      color: false,
      verbose: false,
    });
  });

  describe("region", () => {
    it("should prefer the flag over the environment", () => {
      const config = resolveConfig(
        { region: "eu-west-2" },
        { env: { AWS_REGION: "eu-west-1", AWS_DEFAULT_REGION: "us-west-2" } }
      );
      expect(config.fetcher.region).toBe("eu-west-2");
    });

    it("should prefer AWS_REGION over AWS_DEFAULT_REGION", () => {
      const config = resolveConfig(
        {},
        { env: { AWS_REGION: "eu-west-1", AWS_DEFAULT_REGION: "us-west-2" } }
      );
      expect(config.fetcher.region).toBe("eu-west-1");
    });

    it("should fall back to AWS_DEFAULT_REGION", () => {
      const config = resolveConfig({}, { env: { AWS_REGION: "  ", AWS_DEFAULT_REGION: "us-west-2" } });
      expect(config.fetcher.region).toBe("us-west-2");
    });

    it("should reject a malformed region", () => {
      expect(() => resolveConfig({ region: "Narnia" }, { env: {} })).toThrow(
        'Invalid region: "Narnia"'
      );
      expect(() => resolveConfig({ region: "Narnia" }, { env: {} })).toThrow(ValidationError);
    });
  });

  it("should take the profile from AWS_PROFILE unless a flag is given", () => {
    expect(resolveConfig({}, { env: { AWS_PROFILE: "audit" } }).fetcher.profile).toBe("audit");
    expect(
      resolveConfig({ profile: "billing" }, { env: { AWS_PROFILE: "audit" } }).fetcher.profile
    ).toBe("billing");
  });

  it("should read the page limit and endpoint from the environment", () => {
    const config = resolveConfig(
      {},
      { env: { RI_COVERAGE_MAX_PAGES: "5", AWS_ENDPOINT_URL: "http://localhost:4566" } }
    );
    expect(config.fetcher.maxPages).toBe(5);
    expect(config.fetcher.endpoint).toBe("http://localhost:4566");
  });

  it("should reject an out-of-range page limit", () => {
    expect(() => resolveConfig({}, { env: { RI_COVERAGE_MAX_PAGES: "0" } })).toThrow(
      "Invalid RI_COVERAGE_MAX_PAGES: 0. Must be at least 1."
    );
  });

  it("should reject an unknown format", () => {
    expect(() => resolveConfig({ format: "html" }, { env: {} })).toThrow(
      "Invalid command-line options: format:"
    );
  });

  it("should pass the inventory file and format through", () => {
    const config = resolveConfig(
      { inventory: "snapshot.json", format: "markdown", verbose: true },
      { env: {} }
    );
    expect(config.inventoryFile).toBe("snapshot.json");
    expect(config.format).toBe("markdown");
    expect(config.verbose).toBe(true);
  });

  describe("color", () => {
    it("should be on for a terminal", () => {
      expect(resolveConfig({ color: true }, { env: {}, stdoutIsTTY: true }).color).toBe(true);
    });

    it("should be off when stdout is not a terminal", () => {
      expect(resolveConfig({ color: true }, { env: {}, stdoutIsTTY: false }).color).toBe(false);
    });

    it("should be off with --no-color", () => {
      expect(resolveConfig({ color: false }, { env: {}, stdoutIsTTY: true }).color).toBe(false);
    });

    it("should be off when NO_COLOR is set", () => {
      expect(
        resolveConfig({ color: true }, { env: { NO_COLOR: "1" }, stdoutIsTTY: true }).color
      ).toBe(false);
    });
  });
});
