import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig, parseScopes } from "./config.js";

const passwordEnv = {
  OUTLOOK_TENANT_ID: "tenant-id",
  OUTLOOK_CLIENT_ID: "client-id",
  OUTLOOK_USERNAME: "user@example.test",
  OUTLOOK_PASSWORD: "test-password",
};

describe("loadConfig", () => {
  it("applies defaults for a password-grant environment", () => {
    const result = loadConfig({}, passwordEnv);

    expect(result).toEqual({
      success: true,
      data: {
        credentials: {
          tenantId: "tenant-id",
          clientId: "client-id",
          clientSecret: undefined,
          username: "user@example.test",
          password: "test-password",
        },
        mailboxUser: undefined,
        keyword: undefined,
        outputPath: "outlook_data.json",
        pageSize: 100,
        maxPages: 500,
        timeoutMs: 30000,
        concurrent: false,
        authorityBaseUrl: "https://login.microsoftonline.com",
        graphBaseUrl: "https://graph.microsoft.com/v1.0",
        scopes: ["https://graph.microsoft.com/.default"],
      },
    });
  });

  it("coerces numeric and boolean variables", () => {
    const result = loadConfig(
      {},
      {
        ...passwordEnv,
        OUTLOOK_PAGE_SIZE: "25",
        OUTLOOK_MAX_PAGES: "3",
        OUTLOOK_TIMEOUT_MS: "5000",
        OUTLOOK_CONCURRENT_FETCH: "yes",
        OUTLOOK_SCOPES: "Mail.Read  Calendars.Read",
      }
    );

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.pageSize).toBe(25);
      expect(result.data.maxPages).toBe(3);
      expect(result.data.timeoutMs).toBe(5000);
      expect(result.data.concurrent).toBe(true);
      expect(result.data.scopes).toEqual(["Mail.Read", "Calendars.Read"]);
    }
  });

  it("lets overrides win and treats blank overrides as unset", () => {
    const result = loadConfig(
      { keyword: "wisp", outputPath: "  ", pageSize: 10, concurrent: true },
      { ...passwordEnv, OUTLOOK_INBOX_KEYWORD: "other", OUTLOOK_OUTPUT_PATH: "env.json" }
    );

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.keyword).toBe("wisp");
      expect(result.data.outputPath).toBe("env.json");
      expect(result.data.pageSize).toBe(10);
      expect(result.data.concurrent).toBe(true);
    }
  });

  it("reports missing tenant and client ids", () => {
    const result = loadConfig({}, { OUTLOOK_CLIENT_SECRET: "test-secret" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.issues).toContain(
        "tenantId: OUTLOOK_TENANT_ID is required"
      );
      expect(result.error.issues).toContain(
        "clientId: OUTLOOK_CLIENT_ID is required"
      );
    }
  });

  it("requires username and password together", () => {
    const result = loadConfig(
      {},
      {
        OUTLOOK_TENANT_ID: "tenant-id",
        OUTLOOK_CLIENT_ID: "client-id",
        OUTLOOK_USERNAME: "user@example.test",
      }
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toEqual([
        "password: OUTLOOK_USERNAME and OUTLOOK_PASSWORD must be set together",
        "clientSecret: OUTLOOK_CLIENT_SECRET or OUTLOOK_USERNAME/OUTLOOK_PASSWORD is required",
      ]);
    }
  });

  it("requires a mailbox user with an app-only secret", () => {
    const secretEnv = {
      OUTLOOK_TENANT_ID: "tenant-id",
      OUTLOOK_CLIENT_ID: "client-id",
      OUTLOOK_CLIENT_SECRET: "test-secret",
    };

    const missing = loadConfig({}, secretEnv);
    const given = loadConfig({ mailboxUser: "user@example.test" }, secretEnv);

    expect(missing.success).toBe(false);
    if (!missing.success) {
      expect(missing.error.issues).toEqual([
        "mailboxUser: OUTLOOK_MAILBOX_USER is required with a client secret, since an app-only token has no /me",
      ]);
    }
    expect(given.success).toBe(true);
    if (given.success) {
      expect(given.data.mailboxUser).toBe("user@example.test");
    }
  });

  it("rejects a page size above the Graph limit", () => {
    const result = loadConfig({ pageSize: "5000" }, passwordEnv);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0]).toMatch(/^pageSize: /);
    }
  });

  it("rejects unparseable base URLs", () => {
    const result = loadConfig(
      {},
      { ...passwordEnv, OUTLOOK_GRAPH_BASE_URL: "not a url" }
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toEqual([
        "graphBaseUrl: Invalid graph base URL: not a url",
      ]);
    }
  });

  it("formats the error message from its issues", () => {
    const error = new ConfigError(["a: one", "b: two"]);

    expect(error.message).toBe("Invalid configuration: a: one; b: two");
    expect(error.name).toBe("ConfigError");
  });
});

describe("parseScopes", () => {
  it("falls back to the Graph default scope", () => {
    expect(parseScopes(undefined)).toEqual([
      "https://graph.microsoft.com/.default",
    ]);
    expect(parseScopes("   ")).toEqual([
      "https://graph.microsoft.com/.default",
    ]);
  });

  it("splits on whitespace", () => {
    expect(parseScopes(" Mail.Read\tCalendars.Read ")).toEqual([
      "Mail.Read",
      "Calendars.Read",
    ]);
  });
});
