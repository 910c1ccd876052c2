/**
 * Shared logging utilities for pairtrail
 * Provides colorized console output functions and file logging
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

// Silent mode flag - when true, all console output is suppressed
let silentMode = false;

/**
 * Enable or disable silent mode
 * When silent mode is enabled, all console output is suppressed
 *
 * @param args - Configuration arguments
 * @param args.silent - Whether to enable silent mode
 */
export const setSilentMode = (args: { silent: boolean }): void => {
  silentMode = args.silent;
};

/**
 * Check if silent mode is enabled
 *
 * @returns Whether silent mode is currently enabled
 */
export const isSilentMode = (): boolean => {
  return silentMode;
};

// ANSI color codes for output
const colors = {
  RED: "\x1b[0;31m",
  GREEN: "\x1b[0;32m",
  YELLOW: "\x1b[1;33m",
  BLUE: "\x1b[36m",
  NC: "\x1b[0m", // No Color
};

/** Log file shared by every pairtrail invocation, hooks included */
export const LOG_FILE = path.join(os.tmpdir(), "pairtrail.log");

type LogLevel = "ERROR" | "SUCCESS" | "INFO" | "WARN" | "DEBUG";

/**
 * Append message to log file
 * @param args - Configuration arguments
 * @param args.message - Message to log
 * @param args.level - Log level
 */
const appendToLogFile = async (args: {
  message: string;
  level: LogLevel;
}): Promise<void> => {
  const { message, level } = args;
  const timestamp = new Date().toISOString();
  try {
    await fs.appendFile(LOG_FILE, `[${timestamp}] [${level}] ${message}\n`);
  } catch {
    // A missing or read-only log file must not fail a commit
    return;
  }
};

/**
 * Print error message in red
 * @param args - Configuration arguments
 * @param args.message - Error message to display
 */
export const error = (args: { message: string }): void => {
  const { message } = args;
  if (!silentMode) {
    console.error(`${colors.RED}Error: ${message}${colors.NC}`);
  }
  void appendToLogFile({ message, level: "ERROR" });
};

/**
 * Print success message in green
 * @param args - Configuration arguments
 * @param args.message - Success message to display
 */
export const success = (args: { message: string }): void => {
  const { message } = args;
  if (!silentMode) {
    console.log(`${colors.GREEN}${message}${colors.NC}`);
  }
  void appendToLogFile({ message, level: "SUCCESS" });
};

/**
 * Print info message in blue
 * @param args - Configuration arguments
 * @param args.message - Info message to display
 */
export const info = (args: { message: string }): void => {
  const { message } = args;
  if (!silentMode) {
    console.log(`${colors.BLUE}${message}${colors.NC}`);
  }
  void appendToLogFile({ message, level: "INFO" });
};

/**
 * Print warning message in yellow
 * @param args - Configuration arguments
 * @param args.message - Warning message to display
 */
export const warn = (args: { message: string }): void => {
  const { message } = args;
  if (!silentMode) {
    console.log(`${colors.YELLOW}Warning: ${message}${colors.NC}`);
  }
  void appendToLogFile({ message, level: "WARN" });
};

/**
 * Log debug message to file only (no console output)
 * @param args - Configuration arguments
 * @param args.message - Debug message to log
 */
export const debug = (args: { message: string }): void => {
  const { message } = args;
  void appendToLogFile({ message, level: "DEBUG" });
};
