/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

import { domainPrefix, loadConfig, parseScheme } from "./config";

describe("domainPrefix", () => {
  it("is empty when ENV_PREFIX is unset or blank", () => {
    expect(domainPrefix(undefined)).toBe("");
    expect(domainPrefix("   ")).toBe("");
  });

  it("appends a dot to a trimmed prefix", () => {
    expect(domainPrefix(" staging ")).toBe("staging.");
  });
});

describe("parseScheme", () => {
  it("accepts http and https in any case", () => {
    expect(parseScheme("HTTP")).toBe("http");
    expect(parseScheme("https")).toBe("https");
  });

  it("rejects anything else", () => {
    expect(() => parseScheme("ftp")).toThrow(
      "VERIFY_LINK_SCHEME must be http or https, not 'ftp'",
    );
  });
});

describe("loadConfig", () => {
  it("fills in the defaults", () => {
    expect(loadConfig({})).toEqual({
      scheme: "https",
      domain: "cloudjourney.me",
      domainPrefix: "",
      sender: "noreply@em7116.cloudjourney.me",
      unsubscribeMailbox: "unsubscribe@em7116.cloudjourney.me",
      teamName: "The CloudJourney Team",
    });
  });

  it("uses the scheme default of the variant", () => {
    expect(loadConfig({}, { scheme: "http" }).scheme).toBe("http");
  });

  it("lets the environment override everything", () => {
    expect(
      loadConfig(
        {
          VERIFY_LINK_SCHEME: "https",
          VERIFY_DOMAIN: "example.org",
          ENV_PREFIX: "dev",
          EMAIL_FROM: "hello@example.org",
          EMAIL_UNSUBSCRIBE_MAILBOX: "bye@example.org",
          EMAIL_TEAM_NAME: "The Example Team",
        },
        { scheme: "http" },
      ),
    ).toEqual({
      scheme: "https",
      domain: "example.org",
      domainPrefix: "dev.",
      sender: "hello@example.org",
      unsubscribeMailbox: "bye@example.org",
      teamName: "The Example Team",
    });
  });
});
