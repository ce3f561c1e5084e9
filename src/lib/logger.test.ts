import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { createLogger, type LogContext } from "./logger.js";

describe("logger", () => {
  // Capture stderr output; the report itself goes to stdout
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  function entry(index = 0): Record<string, unknown> {
    return JSON.parse(String(consoleErrorSpy.mock.calls[index]?.[0]));
  }

  describe("info", () => {
    it("should log INFO level with message and context", () => {
      const context: LogContext = {
        component: "InventoryFetcher",
        region: "eu-west-1",
      };

      const logger = createLogger(context);
      logger.info("Fetched inventory");

      expect(consoleErrorSpy).toHaveBeenCalledOnce();
      expect(entry()).toMatchObject({
        level: "INFO",
        message: "Fetched inventory",
        component: "InventoryFetcher",
        region: "eu-west-1",
      });
      expect(entry().timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    it("should include additional fields in log entry", () => {
      const logger = createLogger({ component: "TestComponent" });
      logger.info("Fetched page", { operation: "DescribeInstances", count: 42 });

      expect(entry()).toMatchObject({
        message: "Fetched page",
        operation: "DescribeInstances",
        count: 42,
      });
    });

    it("should skip undefined fields and keep null fields", () => {
      const logger = createLogger({ component: "TestComponent" });
      logger.info("Test message", { defined: "value", missing: undefined, empty: null });

      expect(entry()).toHaveProperty("defined", "value");
      expect(entry()).toHaveProperty("empty", null);
      expect(entry()).not.toHaveProperty("missing");
    });
  });

  describe("levels", () => {
    it("should drop DEBUG entries by default", () => {
      const logger = createLogger({ component: "TestComponent" });
      logger.debug("Page fetched");

      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    it("should emit DEBUG entries when the minimum level is DEBUG", () => {
      const logger = createLogger({ component: "TestComponent" }, { minLevel: "DEBUG" });
      logger.debug("Page fetched");

      expect(entry()).toMatchObject({ level: "DEBUG", message: "Page fetched" });
    });

    it("should drop INFO but keep WARN when the minimum level is WARN", () => {
      const logger = createLogger({ component: "TestComponent" }, { minLevel: "WARN" });
      logger.info("Quiet");
      logger.warn("Loud");

      expect(consoleErrorSpy).toHaveBeenCalledOnce();
      expect(entry()).toMatchObject({ level: "WARN", message: "Loud" });
    });
  });

  describe("error", () => {
    it("should include Error object details", () => {
      const logger = createLogger({ component: "TestComponent" });
      logger.error("Operation failed", new Error("Something went wrong"));

      expect(entry()).toMatchObject({
        level: "ERROR",
        message: "Operation failed",
        error: "Something went wrong",
      });
      expect(entry().errorStack).toContain("Error: Something went wrong");
    });

    it("should handle Error without stack trace", () => {
      const logger = createLogger({ component: "TestComponent" });
      const error = new Error("Test error");
      delete error.stack;

      logger.error("Operation failed", error);

      expect(entry()).toMatchObject({ error: "Test error" });
      expect(entry()).not.toHaveProperty("errorStack");
    });

    it("should convert Error objects in fields to strings", () => {
      const logger = createLogger({ component: "TestComponent" });
      logger.error("Operation failed", undefined, { fieldError: new Error("Field error") });

      expect(entry()).toMatchObject({ fieldError: "Field error" });
    });
  });

  describe("child", () => {
    it("should add context fields and keep the parent's", () => {
      const logger = createLogger({ component: "InventoryFetcher", region: "us-east-1" });
      logger.child({ family: "database" }).warn("Skipped instance");

      expect(entry()).toMatchObject({
        component: "InventoryFetcher",
        region: "us-east-1",
        family: "database",
        message: "Skipped instance",
      });
    });

    it("should inherit the parent's minimum level", () => {
      const logger = createLogger({ component: "TestComponent" }, { minLevel: "ERROR" });
      logger.child({ family: "compute" }).warn("Dropped");

      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });
  });

  describe("JSON format", () => {
    it("should output valid JSON on a single line", () => {
      const logger = createLogger({ component: "TestComponent" });
      logger.info("Message with\nnewline", { field: "value" });

      const output = String(consoleErrorSpy.mock.calls[0]?.[0]);

      expect(output).not.toContain("\n");
      expect(JSON.parse(output).message).toBe("Message with\nnewline");
    });
  });
});
