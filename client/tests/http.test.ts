import fetch, { Response } from "node-fetch";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ApiRequestError } from "../errors.js";
import { getJson, retryAfterMs, withQuery } from "../utils/http.js";

vi.mock("node-fetch", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node-fetch")>();
  return { ...actual, default: vi.fn() };
});

const fetchMock = vi.mocked(fetch);

const json = (body: unknown, init: { status?: number; headers?: Record<string, string> } = {}) =>
  new Response(JSON.stringify(body), { status: init.status ?? 200, headers: init.headers });

const fast = { pauseMs: 0, backoffMs: 0 };

afterEach(() => {
  fetchMock.mockReset();
});

describe("withQuery", () => {
  it("repeats array values and skips undefined ones", () => {
    expect(withQuery("https://api.test/users.json", { classroom_id: "3", "roles[]": ["teacher", "parent"], page: undefined })).toBe(
      "https://api.test/users.json?classroom_id=3&roles%5B%5D=teacher&roles%5B%5D=parent",
    );
  });

  it("leaves the url alone without parameters", () => {
    expect(withQuery("https://api.test/schools.json")).toBe("https://api.test/schools.json");
    expect(withQuery("https://api.test/schools.json", {})).toBe("https://api.test/schools.json");
  });
});

describe("retryAfterMs", () => {
  it("reads seconds and HTTP dates", () => {
    expect(retryAfterMs("2")).toBe(2000);
    expect(retryAfterMs("Wed, 21 Oct 2015 07:28:00 GMT", Date.parse("Wed, 21 Oct 2015 07:27:00 GMT"))).toBe(60_000);
    expect(retryAfterMs("Wed, 21 Oct 2015 07:28:00 GMT", Date.parse("Wed, 21 Oct 2015 07:29:00 GMT"))).toBe(0);
  });

  it("ignores missing or unreadable values", () => {
    expect(retryAfterMs(null)).toBeUndefined();
    expect(retryAfterMs("soon")).toBeUndefined();
  });
});

describe("getJson", () => {
  it("sends Accept and caller headers and returns the parsed body", async () => {
    fetchMock.mockResolvedValueOnce(json([{ id: 1 }]));
    const body = await getJson("https://api.test/children.json", {
      ...fast,
      query: { classroom_id: "3" },
      headers: { "X-TransparentClassroomToken": "test-token" },
    });
    expect(body).toEqual([{ id: 1 }]);
    expect(fetchMock).toHaveBeenCalledWith("https://api.test/children.json?classroom_id=3", {
      headers: { Accept: "application/json", "X-TransparentClassroomToken": "test-token" },
    });
  });

  it("retries server errors", async () => {
    fetchMock.mockResolvedValueOnce(new Response("busy", { status: 503 })).mockResolvedValueOnce(json({ ok: true }));
    await expect(getJson("https://api.test/schools.json", fast)).resolves.toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("retries 429 after the advertised delay", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("slow down", { status: 429, headers: { "Retry-After": "0" } }))
      .mockResolvedValueOnce(json([]));
    await expect(getJson("https://api.test/schools.json", fast)).resolves.toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    fetchMock.mockResolvedValueOnce(new Response("not found", { status: 404 }));
    const error = await getJson("https://api.test/children/9.json", fast).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ApiRequestError);
    if (error instanceof ApiRequestError) {
      expect(error.status).toBe(404);
      expect(error.body).toBe("not found");
      expect(error.message).toBe("GET https://api.test/children/9.json -> 404");
    }
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("gives up after the configured retries", async () => {
    fetchMock.mockImplementation(async () => new Response("boom", { status: 500 }));
    await expect(getJson("https://api.test/schools.json", { ...fast, retries: 2 })).rejects.toThrow(
      "GET https://api.test/schools.json -> 500",
    );
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("passes network failures through", async () => {
    fetchMock.mockRejectedValueOnce(new Error("ECONNRESET"));
    await expect(getJson("https://api.test/schools.json", fast)).rejects.toThrow("ECONNRESET");
  });
});
