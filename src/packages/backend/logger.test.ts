/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

import debug from "debug";
import getLogger, { formatLine, transportsFromEnv } from "./logger";

describe("formatLine", () => {
  const now = new Date("2026-01-02T03:04:05.000Z");

  it("prefixes the timestamp and pid", () => {
    expect(formatLine(["hello"], now)).toBe(
      `2026-01-02T03:04:05.000Z (${process.pid}):hello`,
    );
  });

  it("inspects objects when the first argument is not a format string", () => {
    expect(formatLine(["status", { code: 202 }], now)).toBe(
      `2026-01-02T03:04:05.000Z (${process.pid}):status { code: 202 }`,
    );
  });

  it("honors printf style formatting", () => {
    expect(formatLine(["sent %d emails", 3], now)).toBe(
      `2026-01-02T03:04:05.000Z (${process.pid}):sent 3 emails`,
    );
  });
});

describe("transportsFromEnv", () => {
  it("logs to the console by default", () => {
    expect(transportsFromEnv({})).toEqual({ console: true });
  });

  it("writes only to the file when DEBUG_FILE is set", () => {
    expect(transportsFromEnv({ DEBUG_FILE: "/tmp/mailer.log" })).toEqual({
      file: "/tmp/mailer.log",
    });
  });

  it("keeps the console in production even with a file", () => {
    expect(
      transportsFromEnv({ NODE_ENV: "production", DEBUG_FILE: "/tmp/x.log" }),
    ).toEqual({ console: true, file: "/tmp/x.log" });
  });

  it("keeps the console inside Lambda even with a file", () => {
    expect(
      transportsFromEnv({
        AWS_LAMBDA_FUNCTION_NAME: "fn",
        DEBUG_FILE: "/tmp/x.log",
      }),
    ).toEqual({ file: "/tmp/x.log", console: true });
  });

  it("DEBUG_CONSOLE=no turns the console off", () => {
    expect(
      transportsFromEnv({ AWS_LAMBDA_FUNCTION_NAME: "fn", DEBUG_CONSOLE: "no" }),
    ).toEqual({ console: false });
  });
});

describe("getLogger", () => {
  afterEach(() => {
    debug.disable();
  });

  it("returns the same logger for the same name", () => {
    expect(getLogger("same")).toBe(getLogger("same"));
  });

  it("extends the name of the parent logger", () => {
    expect(getLogger("parent").extend("child")).toBe(
      getLogger("parent:child"),
    );
  });

  it("reports which levels are enabled", () => {
    debug.enable("signup-mailer:info:*");
    const logger = getLogger("levels");
    expect(logger.isEnabled("info")).toBe(true);
    expect(logger.isEnabled("debug")).toBe(false);
  });
});
