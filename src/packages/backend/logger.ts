/*
Debug logging for clusterboot.

Every module gets a named logger:

    import getLogger from "@clusterboot/backend/logger";
    const logger = getLogger("bootstrap:artifacts");
    logger.info("installed binary", { name, version });

Each level is a separate debug namespace, clusterboot:<level>:<name>, so
DEBUG=clusterboot:* shows everything and DEBUG=clusterboot:warn:* only
warnings.  Output goes to stderr when DEBUG_CONSOLE is not "no", and is
appended to DEBUG_FILE when that is set.
*/

import { appendFileSync } from "node:fs";
import { format } from "node:util";
import debug from "debug";

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type LogFn = (...args: unknown[]) => void;

export interface Logger {
  error: LogFn;
  warn: LogFn;
  info: LogFn;
  debug: LogFn;
}

const PREFIX = "clusterboot";

function consoleEnabled(env = process.env): boolean {
  const raw = `${env.DEBUG_CONSOLE ?? "yes"}`.trim().toLowerCase();
  return !["0", "false", "no", "off"].includes(raw);
}

function logFile(env = process.env): string | undefined {
  const value = env.DEBUG_FILE?.trim();
  return value ? value : undefined;
}

function writer(namespace: string): LogFn {
  const sink = debug(namespace);
  const toConsole = consoleEnabled();
  const file = logFile();
  sink.log = (...args: unknown[]) => {
    const line = format(...args);
    if (toConsole) {
      process.stderr.write(`${line}\n`);
    }
    if (file) {
      try {
        appendFileSync(file, `${new Date().toISOString()} ${line}\n`);
      } catch {
        // ignore
      }
    }
  };
  return (...args: unknown[]) => {
    if (!sink.enabled) return;
    const [first, ...rest] = args;
    sink(typeof first === "string" ? first : format(first), ...rest.map(stringify));
  };
}

function stringify(value: unknown): unknown {
  if (value instanceof Error) return value.stack ?? value.message;
  if (value != null && typeof value === "object") {
    try {
      return JSON.stringify(value);
    } catch {
      return format(value);
    }
  }
  return value;
}

// Turn on logging at runtime, e.g. for a --verbose flag.
export function enableLogging(namespaces = `${PREFIX}:*`): void {
  debug.enable(namespaces);
}

export function getLogger(name: string): Logger {
  const make = (level: LogLevel) => writer(`${PREFIX}:${level}:${name}`);
  return {
    error: make("error"),
    warn: make("warn"),
    info: make("info"),
    debug: make("debug"),
  };
}

export default getLogger;
