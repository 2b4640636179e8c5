/**
 * Structured logging utilities for Tabsets.
 * Uses console.log/warn/error with consistent formatting.
 *
 * Entries are also stored in a ring buffer so a host can display them.
 */

import { getErrorDetails } from "./errorTypes.js";
import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { logBuffer, type LogEntry } from "../services/LogBuffer.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogContext {
  [key: string]: unknown;
}

const LOG_PREFIX = "tabsets";

// Optional file logging, enabled by pointing TABSETS_LOG_FILE at a path
const LOG_FILE = process.env.TABSETS_LOG_FILE;

const SENSITIVE_KEYS = new Set(["token", "password", "apikey", "secret", "accesstoken", "refreshtoken"]);

const IS_DEBUG = process.env.NODE_ENV === "development" || Boolean(process.env.TABSETS_DEBUG);
const IS_TEST = process.env.NODE_ENV === "test";

/**
 * Extract source module from stack trace
 */
function getCallerSource(): string | undefined {
  const err = new Error();
  const stack = err.stack?.split("\n");
  if (!stack || stack.length < 5) return undefined;

  // Skip Error, getCallerSource, log, and the exported log function
  const callerLine = stack[4];
  if (!callerLine) return undefined;

  // "    at functionName (/path/to/file.ts:line:col)" or "    at /path/to/file.ts:line:col"
  const match = callerLine.match(/\(([^)]+)\)/) || callerLine.match(/at\s+(.+)$/);
  if (!match) return undefined;

  const pathParts = match[1].split(/[/\\]/);
  const fileName = pathParts[pathParts.length - 1]?.split(":")[0];

  return fileName?.replace(/\.[tj]s$/, "");
}

/**
 * Safely stringify values, handling circular references
 */
function safeStringify(value: unknown): string {
  const seen = new WeakSet<object>();
  try {
    return JSON.stringify(
      value,
      (_key, val: unknown) => {
        if (typeof val === "bigint") return val.toString();

        if (val && typeof val === "object") {
          if (seen.has(val)) return "[Circular]";
          seen.add(val);
        }

        return val;
      },
      2
    );
  } catch (error) {
    return `[Unable to stringify: ${String(error)}]`;
  }
}

/**
 * Redact sensitive data from context object
 */
function redactSensitiveData(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      result[key] = "[redacted]";
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) => (isPlainRecord(item) ? redactSensitiveData(item) : item));
    } else if (isPlainRecord(value)) {
      result[key] = redactSensitiveData(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Append a line to the log file when file logging is enabled
 */
function writeToLogFile(level: string, message: string, context?: LogContext): void {
  if (!LOG_FILE) return;

  try {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${safeStringify(context)}` : "";
    mkdirSync(dirname(LOG_FILE), { recursive: true });
    appendFileSync(LOG_FILE, `[${timestamp}] [${level}] ${message}${contextStr}\n`, "utf8");
  } catch (error) {
    // The console is the only place left to report a broken log file
    if (!IS_TEST) console.error(`[${LOG_PREFIX}] Unable to write log file ${LOG_FILE}: ${String(error)}`);
  }
}

/**
 * Core logging function that handles all log levels
 */
function log(level: LogLevel, message: string, context?: LogContext): LogEntry {
  const source = getCallerSource();
  const safeContext = context ? redactSensitiveData(context) : undefined;

  return logBuffer.push({
    timestamp: Date.now(),
    level,
    message,
    context: safeContext,
    source,
  });
}

/**
 * Log a debug message (only echoed to the console in debug mode)
 */
export function logDebug(message: string, context?: LogContext): void {
  log("debug", message, context);
  writeToLogFile("DEBUG", message, context);
  if (IS_DEBUG && !IS_TEST) {
    console.log(`[${LOG_PREFIX}] [DEBUG] ${message}`, context ? safeStringify(context) : "");
  }
}

/**
 * Log an info message
 */
export function logInfo(message: string, context?: LogContext): void {
  log("info", message, context);
  writeToLogFile("INFO", message, context);
  if (IS_DEBUG && !IS_TEST) {
    console.log(`[${LOG_PREFIX}] [INFO] ${message}`, context ? safeStringify(context) : "");
  }
}

/**
 * Log a warning message
 */
export function logWarn(message: string, context?: LogContext): void {
  log("warn", message, context);
  writeToLogFile("WARN", message, context);
  if (IS_DEBUG && !IS_TEST) {
    console.warn(`[${LOG_PREFIX}] [WARN] ${message}`, context ? safeStringify(context) : "");
  }
}

/**
 * Log an error message
 */
export function logError(message: string, error?: unknown, context?: LogContext): void {
  const errorDetails = error ? getErrorDetails(error) : undefined;
  const fullContext = { ...context, error: errorDetails };
  log("error", message, fullContext);
  writeToLogFile("ERROR", message, fullContext);

  if (IS_TEST) return; // Suppress errors in tests to keep output clean

  console.error(
    `[${LOG_PREFIX}] [ERROR] ${message}`,
    errorDetails ? safeStringify(errorDetails) : "",
    context ? safeStringify(context) : ""
  );
}
