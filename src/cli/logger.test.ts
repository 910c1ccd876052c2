import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import {
  setSilentMode,
  isSilentMode,
  error,
  success,
  info,
  warn,
  debug,
  LOG_FILE,
} from "@/cli/logger.js";

const waitForLogFlush = async (): Promise<void> => {
  await new Promise((resolve) => setTimeout(resolve, 200));
};

describe("logger silent mode", () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    setSilentMode({ silent: false });

    // Suppress output during tests
    consoleLogSpy = vi
      .spyOn(console, "log")
      .mockImplementation(() => undefined);
    consoleErrorSpy = vi
      .spyOn(console, "error")
      .mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    setSilentMode({ silent: false });
  });

  it("should have silent mode disabled by default", () => {
    expect(isSilentMode()).toBe(false);
  });

  it("should toggle silent mode", () => {
    setSilentMode({ silent: true });
    expect(isSilentMode()).toBe(true);
    setSilentMode({ silent: false });
    expect(isSilentMode()).toBe(false);
  });

  it("should suppress console output when silent mode is enabled", () => {
    setSilentMode({ silent: true });
    info({ message: "test info message" });
    success({ message: "test success message" });
    warn({ message: "test warn message" });
    error({ message: "test error message" });
    expect(consoleLogSpy).not.toHaveBeenCalled();
    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  it("should send errors to stderr and everything else to stdout", () => {
    info({ message: "test info message" });
    success({ message: "test success message" });
    warn({ message: "test warn message" });
    error({ message: "test error message" });
    expect(consoleLogSpy).toHaveBeenCalledTimes(3);
    expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
  });

  it("should never print debug messages", () => {
    debug({ message: "test debug message" });
    expect(consoleLogSpy).not.toHaveBeenCalled();
    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });
});

describe("logger console output format", () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    setSilentMode({ silent: false });
    consoleLogSpy = vi
      .spyOn(console, "log")
      .mockImplementation(() => undefined);
    consoleErrorSpy = vi
      .spyOn(console, "error")
      .mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  it("should prefix error messages with 'Error: '", () => {
    error({ message: "something went wrong" });
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      "\x1b[0;31mError: something went wrong\x1b[0m",
    );
  });

  it("should prefix warn messages with 'Warning: '", () => {
    warn({ message: "careful" });
    expect(consoleLogSpy).toHaveBeenCalledWith(
      "\x1b[1;33mWarning: careful\x1b[0m",
    );
  });
});

describe("logger file output", () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    setSilentMode({ silent: false });
    consoleLogSpy = vi
      .spyOn(console, "log")
      .mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    setSilentMode({ silent: false });
  });

  it("should keep the log file in the system temp directory", () => {
    expect(LOG_FILE).toBe(path.join(os.tmpdir(), "pairtrail.log"));
  });

  it("should write info messages to log file with INFO level", async () => {
    const uniqueId = `info-${Date.now()}-${Math.random()}`;
    info({ message: uniqueId });
    await waitForLogFlush();
    const content = fs.readFileSync(LOG_FILE, "utf-8");
    expect(content).toContain(`[INFO] ${uniqueId}`);
  });

  it("should write debug messages to log file with DEBUG level", async () => {
    const uniqueId = `debug-${Date.now()}-${Math.random()}`;
    debug({ message: uniqueId });
    await waitForLogFlush();
    const content = fs.readFileSync(LOG_FILE, "utf-8");
    expect(content).toContain(`[DEBUG] ${uniqueId}`);
  });

  it("should continue writing to log file when silent mode is enabled", async () => {
    setSilentMode({ silent: true });
    const uniqueId = `silent-${Date.now()}-${Math.random()}`;
    warn({ message: uniqueId });
    await waitForLogFlush();
    const content = fs.readFileSync(LOG_FILE, "utf-8");
    expect(content).toContain(`[WARN] ${uniqueId}`);
  });
});
