import { describe, expect, it, vi, beforeEach, afterEach } from "vitest";
import type { Logger } from "pino";
import { createShutdownManager, SIGNAL_EXIT_CODES } from "./shutdown.js";

describe("shutdown", () => {
  // Store original methods using bind to avoid unbound-method issues
  const originalProcessOn = process.on.bind(process);
  const originalProcessExit = process.exit.bind(process);

  let registeredHandlers: Map<string, () => void>;
  let mockProcessOn: ReturnType<typeof vi.fn>;
  let mockProcessExit: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    registeredHandlers = new Map();

    mockProcessOn = vi.fn((event: string, handler: () => void) => {
      registeredHandlers.set(event, handler);
      return process;
    });
    mockProcessExit = vi.fn();

    process.on = mockProcessOn as unknown as typeof process.on;
    process.exit = mockProcessExit as unknown as typeof process.exit;
  });

  afterEach(() => {
    process.on = originalProcessOn;
    process.exit = originalProcessExit;
  });

  function trigger(signal: "SIGINT" | "SIGTERM"): void {
    const handler = registeredHandlers.get(signal);
    if (!handler) throw new Error(`No ${signal} handler registered`);
    handler();
  }

  const flush = () => new Promise((resolve) => setTimeout(resolve, 20));

  describe("setup", () => {
    it("registers SIGINT and SIGTERM handlers", () => {
      const manager = createShutdownManager();
      manager.setup();

      expect(mockProcessOn).toHaveBeenCalledWith("SIGINT", expect.any(Function));
      expect(mockProcessOn).toHaveBeenCalledWith("SIGTERM", expect.any(Function));
    });
  });

  describe("isShuttingDown", () => {
    it("returns false initially", () => {
      expect(createShutdownManager().isShuttingDown()).toBe(false);
    });

    it("returns true after shutdown is triggered", async () => {
      const manager = createShutdownManager();
      manager.setup();

      trigger("SIGINT");
      await flush();

      expect(manager.isShuttingDown()).toBe(true);
    });
  });

  describe("registerCleanup", () => {
    it("runs cleanups in registration order", async () => {
      const manager = createShutdownManager();
      manager.setup();

      const order: string[] = [];
      manager.registerCleanup(() => {
        order.push("engine");
      });
      manager.registerCleanup(async () => {
        await Promise.resolve();
        order.push("logging");
      });

      trigger("SIGTERM");
      await flush();

      expect(order).toEqual(["engine", "logging"]);
    });
  });

  describe("exit codes", () => {
    it("exits with 130 on SIGINT", async () => {
      const manager = createShutdownManager();
      manager.setup();

      trigger("SIGINT");
      await flush();

      expect(mockProcessExit).toHaveBeenCalledWith(SIGNAL_EXIT_CODES.SIGINT);
      expect(SIGNAL_EXIT_CODES.SIGINT).toBe(130);
    });

    it("exits with 143 on SIGTERM", async () => {
      const manager = createShutdownManager();
      manager.setup();

      trigger("SIGTERM");
      await flush();

      expect(mockProcessExit).toHaveBeenCalledWith(143);
    });
  });

  describe("logging", () => {
    it("logs the signal and cleanup failures", async () => {
      const warn = vi.fn();
      const error = vi.fn();
      const logger = { warn, error } as unknown as Logger;
      const manager = createShutdownManager(logger);
      manager.setup();

      const failure = new Error("Cleanup failed");
      manager.registerCleanup(() => Promise.reject(failure));

      trigger("SIGINT");
      await flush();

      expect(warn).toHaveBeenCalledWith({ signal: "SIGINT" }, "shutdown_requested");
      expect(error).toHaveBeenCalledWith({ err: failure }, "shutdown_cleanup_failed");
      expect(mockProcessExit).toHaveBeenCalledWith(130);
    });
  });
});
