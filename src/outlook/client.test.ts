import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { OutlookClient, createClient } from "./client.js";

describe("OutlookClient", () => {
  const mockFetch = vi.fn();

  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns success for valid JSON response", async () => {
    const client = new OutlookClient({ token: "token" });

    mockFetch.mockResolvedValue({
      ok: true,
      status: 200,
      text: vi.fn().mockResolvedValue(JSON.stringify({ id: "123" })),
    });

    const result = await client.request<{ id: string }>({ path: "/me" });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.id).toBe("123");
    }
  });

  it("sends the bearer token and builds the URL with query params", async () => {
    const client = new OutlookClient({ token: "test-token" });

    mockFetch.mockResolvedValue({
      ok: true,
      status: 200,
      text: vi.fn().mockResolvedValue(JSON.stringify({ value: [] })),
    });

    await client.request({
      path: "/me/messages",
      params: { $top: "5" },
    });

    const [url, init] = mockFetch.mock.calls[0] as [string, RequestInit];
    expect(url).toBe("https://graph.microsoft.com/v1.0/me/messages?%24top=5");
    expect(init.method).toBe("GET");
    expect(init.headers).toEqual({
      Authorization: "Bearer test-token",
      Accept: "application/json",
    });
  });

  it("strips trailing slashes from a custom base URL", () => {
    const client = new OutlookClient({
      token: "token",
      baseUrl: "https://graph.example.test/v1.0///",
    });

    expect(client.baseUrl).toBe("https://graph.example.test/v1.0");
  });

  it("maps unauthorized errors", async () => {
    const client = new OutlookClient({ token: "token" });

    mockFetch.mockResolvedValue({
      ok: false,
      status: 401,
      json: vi.fn().mockResolvedValue({
        error: { message: "invalid token" },
      }),
    });

    const result = await client.request<{ id: string }>({ path: "/me" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("UNAUTHORIZED");
      expect(result.error.apiMessage).toBe("invalid token");
      expect(result.error.message).toBe(
        "Invalid or expired access token: invalid token"
      );
    }
  });

  it.each([
    [403, "FORBIDDEN", false],
    [404, "NOT_FOUND", false],
    [429, "RATE_LIMITED", true],
    [503, "SERVER_ERROR", true],
    [418, "UNKNOWN", false],
  ] as const)(
    "maps HTTP %i to %s",
    async (status, code, retryable) => {
      const client = new OutlookClient({ token: "token" });

      mockFetch.mockResolvedValue({
        ok: false,
        status,
        json: vi.fn().mockRejectedValue(new Error("no body")),
      });

      const result = await client.request({ path: "/me/events" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(code);
        expect(result.error.statusCode).toBe(status);
        expect(result.error.retryable).toBe(retryable);
        expect(result.error.apiMessage).toBeUndefined();
      }
    }
  );

  it("maps non-JSON success bodies to INVALID_RESPONSE errors", async () => {
    const client = new OutlookClient({ token: "token" });

    mockFetch.mockResolvedValue({
      ok: true,
      status: 200,
      text: vi.fn().mockResolvedValue("not-json"),
    });

    const result = await client.request<{ id: string }>({ path: "/me" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("INVALID_RESPONSE");
      expect(result.error.statusCode).toBe(200);
    }
  });

  it("maps aborted requests to TIMEOUT", async () => {
    const client = new OutlookClient({ token: "token" });
    const abortError = new Error("aborted");
    abortError.name = "AbortError";
    mockFetch.mockRejectedValue(abortError);

    const result = await client.request({ path: "/me" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("TIMEOUT");
      expect(result.error.retryable).toBe(true);
    }
  });

  it("maps fetch failures to NETWORK_ERROR", async () => {
    const client = new OutlookClient({ token: "token" });
    mockFetch.mockRejectedValue(new Error("socket hang up"));

    const result = await client.request({ path: "/me" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("NETWORK_ERROR");
      expect(result.error.message).toBe("Network error: socket hang up");
    }
  });

  it("maps non-Error rejections to UNKNOWN", async () => {
    const client = new OutlookClient({ token: "token" });
    mockFetch.mockRejectedValue("boom");

    const result = await client.request({ path: "/me" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("UNKNOWN");
    }
  });
});

describe("createClient", () => {
  const mockFetch = vi.fn();

  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns MISSING_TOKEN without a token", () => {
    const result = createClient(undefined);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("MISSING_TOKEN");
    }
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("returns MISSING_TOKEN for an empty token value", () => {
    const result = createClient({
      value: "",
      acquiredAt: "2026-01-01T00:00:00.000Z",
      grantType: "password",
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("MISSING_TOKEN");
    }
  });

  it("creates a client bound to the token and base URL", () => {
    const result = createClient(
      {
        value: "test-token",
        acquiredAt: "2026-01-01T00:00:00.000Z",
        grantType: "password",
      },
      { baseUrl: "https://graph.example.test/beta/" }
    );

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.baseUrl).toBe("https://graph.example.test/beta");
    }
  });
});
