import { afterEach, describe, it, expect, vi } from "vitest";

import { TransportError } from "../../../src/errors.js";
import { httpLogger } from "../../../src/logger.js";
import {
  buildUrl,
  HttpClient,
  HttpResponse,
} from "../../../src/scraper/http.js";

function respondWith(body: string, status = 200) {
  return vi.fn<typeof fetch>(() =>
    Promise.resolve(new Response(body, { status }))
  );
}

describe("scraper/http", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("buildUrl", () => {
    it("should return the URL unchanged without params", () => {
      expect(buildUrl("https://example.test/api")).toBe(
        "https://example.test/api"
      );
      expect(buildUrl("https://example.test/api", {})).toBe(
        "https://example.test/api"
      );
    });

    it("should append encoded query params", () => {
      expect(
        buildUrl("https://example.test/api", {
          houseCodes: "abc",
          actual: true,
          page: 2,
        })
      ).toBe("https://example.test/api?houseCodes=abc&actual=true&page=2");
    });

    it("should extend an existing query string", () => {
      expect(buildUrl("https://example.test/api?x=1", { y: "г. Москва.zip" })).toBe(
        "https://example.test/api?x=1&y=%D0%B3.+%D0%9C%D0%BE%D1%81%D0%BA%D0%B2%D0%B0.zip"
      );
    });
  });

  describe("HttpResponse", () => {
    it("should expose status, text and parsed JSON", () => {
      const response = new HttpResponse(
        200,
        "OK",
        "https://example.test/api",
        Buffer.from('{"total":3}', "utf-8")
      );

      expect(response.ok).toBe(true);
      expect(response.text()).toBe('{"total":3}');
      expect(response.json()).toEqual({ total: 3 });
    });

    it("should not be ok outside 2xx", () => {
      expect(new HttpResponse(302, "", "u", Buffer.alloc(0)).ok).toBe(false);
      expect(new HttpResponse(500, "", "u", Buffer.alloc(0)).ok).toBe(false);
    });
  });

  describe("HttpClient", () => {
    it("should send GET requests with query params", async () => {
      const fetchMock = respondWith("uid-token");
      const client = new HttpClient({ fetch: fetchMock });

      const response = await client.get("https://example.test/api", {
        params: { context: "licenses" },
      });

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0]?.[0]).toBe(
        "https://example.test/api?context=licenses"
      );
      expect(fetchMock.mock.calls[0]?.[1]?.method).toBe("GET");
      expect(response.status).toBe(200);
      expect(response.text()).toBe("uid-token");
      expect(response.url).toBe("https://example.test/api?context=licenses");
    });

    it("should merge default headers with request headers", async () => {
      const fetchMock = respondWith("");
      const client = new HttpClient({
        fetch: fetchMock,
        defaultHeaders: { Accept: "application/json", "X-Client": "tests" },
      });

      await client.get("https://example.test/api", {
        headers: { "X-Client": "override" },
      });

      expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
        Accept: "application/json",
        "X-Client": "override",
      });
    });

    it("should JSON-encode object bodies", async () => {
      const fetchMock = respondWith("{}");
      const client = new HttpClient({ fetch: fetchMock });

      await client.post("https://example.test/api", {
        body: { organizationGuid: "org-1", calcCount: true },
      });

      const init = fetchMock.mock.calls[0]?.[1];
      expect(init?.method).toBe("POST");
      expect(init?.body).toBe('{"organizationGuid":"org-1","calcCount":true}');
    });

    it("should send string bodies as they are", async () => {
      const fetchMock = respondWith("{}");
      const client = new HttpClient({ fetch: fetchMock });

      await client.put("https://example.test/api", { body: "raw=1" });
      await client.patch("https://example.test/api", { body: "raw=2" });

      expect(fetchMock.mock.calls.map((call) => call[1]?.method)).toEqual([
        "PUT",
        "PATCH",
      ]);
      expect(fetchMock.mock.calls.map((call) => call[1]?.body)).toEqual([
        "raw=1",
        "raw=2",
      ]);
    });

    it("should attach a timeout signal", async () => {
      const fetchMock = respondWith("");
      const client = new HttpClient({ fetch: fetchMock, timeoutMs: 1000 });

      await client.get("https://example.test/api");

      expect(fetchMock.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
    });

    it("should return error responses and log them", async () => {
      const errorSpy = vi.spyOn(httpLogger, "error");
      const client = new HttpClient({ fetch: respondWith("not found", 404) });

      const response = await client.get("https://example.test/missing");

      expect(response.status).toBe(404);
      expect(response.ok).toBe(false);
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it("should wrap connection failures in TransportError", async () => {
      const failure = new TypeError("fetch failed");
      const client = new HttpClient({
        fetch: vi.fn<typeof fetch>(() => Promise.reject(failure)),
      });

      const request = client.get("https://example.test/api");

      await expect(request).rejects.toThrow(TransportError);
      await expect(request).rejects.toThrow(
        "GET https://example.test/api failed: fetch failed"
      );
      await expect(request).rejects.toHaveProperty("cause", failure);
    });

    it("should fail with TransportError when the timeout elapses", async () => {
      const hanging = vi.fn<typeof fetch>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => {
              reject(new Error("request aborted"));
            });
          })
      );
      const client = new HttpClient({ fetch: hanging, timeoutMs: 20 });

      await expect(client.get("https://example.test/slow")).rejects.toThrow(
        TransportError
      );
    });
  });
});
