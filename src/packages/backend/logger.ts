/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

/*
Debug logger for the mailer functions.

This is basically how winston works, but using the vastly simpler
super-popular debug module.  Loggers are namespaced as

    signup-mailer:<level>:<name>

so DEBUG='signup-mailer:*,-signup-mailer:silly:*' controls levels.
*/

// setting env var must come *BEFORE* debug is loaded the first time
process.env.DEBUG_HIDE_DATE = "yes"; // since we supply it ourselves

import debug, { Debugger } from "debug";
import { createWriteStream, mkdirSync, WriteStream } from "fs";
import { dirname } from "path";
import { format, inspect } from "util";

export const NAMESPACE = "signup-mailer";

const ROOT = debug(NAMESPACE);

function myFormat(...args: unknown[]): string {
  if (args.length > 1 && typeof args[0] == "string" && !args[0].includes("%")) {
    const v: string[] = [];
    for (const x of args) {
      try {
        v.push(
          typeof x == "object"
            ? inspect(x, { depth: 4, breakLength: 120 })
            : `${x}`,
        );
      } catch (_) {
        v.push(`${x}`);
      }
    }
    return v.join(" ");
  }
  return format(...args);
}

export function formatLine(args: unknown[], now: Date = new Date()): string {
  return `${now.toISOString()} (${process.pid}):${myFormat(...args)}`;
}

interface Transports {
  console?: boolean;
  file?: string;
}

export function transportsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Transports {
  const transports: Transports = {};
  if (env.DEBUG_FILE) {
    transports.file = env.DEBUG_FILE;
  }
  // a file replaces the console, except in production and Lambda
  if (
    !env.DEBUG_FILE ||
    env.NODE_ENV == "production" ||
    env.AWS_LAMBDA_FUNCTION_NAME
  ) {
    transports.console = true;
  }
  if (env.DEBUG_CONSOLE) {
    transports.console =
      env.DEBUG_CONSOLE != "no" && env.DEBUG_CONSOLE != "false";
  }
  return transports;
}

function initTransports() {
  if (!process.env.DEBUG) {
    if (!process.env.AWS_LAMBDA_FUNCTION_NAME) {
      return;
    }
    // Inside Lambda nobody sets DEBUG by hand, so default to the levels
    // that end up in CloudWatch.
    debug.enable(
      ["error", "warn", "info"].map((level) => `${NAMESPACE}:${level}:*`).join(","),
    );
  }
  const transports = transportsFromEnv();
  let fileStream: WriteStream | undefined = undefined;
  if (transports.file) {
    mkdirSync(dirname(transports.file), { recursive: true });
    // append mode, so restarts don't clobber earlier output
    fileStream = createWriteStream(transports.file, { flags: "a" });
  }
  ROOT.log = (...args: unknown[]) => {
    const line = formatLine(args);
    if (transports.console) {
      console.log(line);
    }
    fileStream?.write(`${line}\n`);
  };
}

initTransports();

const LEVELS = [
  "error",
  "warn",
  "info",
  "http",
  "verbose",
  "debug",
  "silly",
] as const;

export type Level = (typeof LEVELS)[number];

const DEBUGGERS: Record<Level, Debugger> = {
  error: ROOT.extend("error"),
  warn: ROOT.extend("warn"),
  info: ROOT.extend("info"),
  http: ROOT.extend("http"),
  verbose: ROOT.extend("verbose"),
  debug: ROOT.extend("debug"),
  silly: ROOT.extend("silly"),
};

type LogFunction = (...args: unknown[]) => void;

export interface WinstonLogger {
  error: LogFunction;
  warn: LogFunction;
  info: LogFunction;
  http: LogFunction;
  verbose: LogFunction;
  debug: LogFunction;
  silly: LogFunction;
  extend: (name: string) => WinstonLogger;
  isEnabled: (level: Level) => boolean;
}

class Logger implements WinstonLogger {
  private readonly name: string;
  private readonly debuggers: Record<Level, Debugger>;

  constructor(name: string) {
    this.name = name;
    this.debuggers = {
      error: DEBUGGERS.error.extend(name),
      warn: DEBUGGERS.warn.extend(name),
      info: DEBUGGERS.info.extend(name),
      http: DEBUGGERS.http.extend(name),
      verbose: DEBUGGERS.verbose.extend(name),
      debug: DEBUGGERS.debug.extend(name),
      silly: DEBUGGERS.silly.extend(name),
    };
  }

  error = (...args: unknown[]) => this.log("error", args);
  warn = (...args: unknown[]) => this.log("warn", args);
  info = (...args: unknown[]) => this.log("info", args);
  http = (...args: unknown[]) => this.log("http", args);
  verbose = (...args: unknown[]) => this.log("verbose", args);
  debug = (...args: unknown[]) => this.log("debug", args);
  silly = (...args: unknown[]) => this.log("silly", args);

  isEnabled = (level: Level): boolean => {
    return this.debuggers[level].enabled;
  };

  extend = (name: string): WinstonLogger => {
    return getLogger(`${this.name}:${name}`);
  };

  private log(level: Level, args: unknown[]): void {
    const [first, ...rest] = args;
    this.debuggers[level](first, ...rest);
  }
}

const cache: { [name: string]: Logger } = {};
export default function getLogger(name: string): WinstonLogger {
  if (cache[name] != null) {
    return cache[name];
  }
  return (cache[name] = new Logger(name));
}

export { getLogger };
