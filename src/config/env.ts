import dotenv from "dotenv";
import { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  debugMode: boolean;
  port: number;
  logLevel: LogLevel;
  hireThreshold: number;
  strongHireThreshold: number;
  jsonBodyLimit: string;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const debugModeRaw = source.DEBUG_MODE ?? "false";
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const hireThresholdRaw = source.HIRE_THRESHOLD ?? "70";
  const strongHireThresholdRaw = source.STRONG_HIRE_THRESHOLD ?? "85";
  const hireThreshold = Number(hireThresholdRaw);
  const strongHireThreshold = Number(strongHireThresholdRaw);
  const debugMode = parseBoolean(debugModeRaw);
  const logLevel = parseLogLevel(logLevelRaw);

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!isPercentage(hireThreshold)) {
    throw new Error(`Invalid HIRE_THRESHOLD value: ${hireThresholdRaw}. Expected number between 0 and 100.`);
  }
  if (!isPercentage(strongHireThreshold)) {
    throw new Error(
      `Invalid STRONG_HIRE_THRESHOLD value: ${strongHireThresholdRaw}. Expected number between 0 and 100.`,
    );
  }
  if (strongHireThreshold < hireThreshold) {
    throw new Error(
      `Invalid STRONG_HIRE_THRESHOLD value: ${strongHireThresholdRaw}. Must not be lower than HIRE_THRESHOLD (${hireThresholdRaw}).`,
    );
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    debugMode,
    port,
    logLevel: debugMode ? "debug" : logLevel,
    hireThreshold,
    strongHireThreshold,
    jsonBodyLimit: getOptionalTrimmed(source, "JSON_BODY_LIMIT") ?? "1mb",
  };
}

function getOptionalTrimmed(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isPercentage(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 100;
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
