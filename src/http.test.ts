import { describe, expect, it, vi } from "vitest";
import { FetchError } from "./errors.js";
import { HttpClient, parseRetryAfter } from "./http.js";

const IMAGE_URL = "https://img.example.com/p/1.jpg";

function respond(status: number, body = "", headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers });
}

function client(fetchImpl: typeof fetch, retries = 2): HttpClient {
  return new HttpClient({ maxConnections: 2, retries, backoffMs: 1, timeoutMs: 1000, fetch: fetchImpl });
}

describe("parseRetryAfter", () => {
  it("converts seconds to milliseconds", () => {
    expect(parseRetryAfter("2")).toBe(2000);
    expect(parseRetryAfter(" 0 ")).toBe(0);
  });

  it("ignores missing or non-numeric values", () => {
    expect(parseRetryAfter(null)).toBeNull();
    expect(parseRetryAfter("Wed, 21 Oct 2015 07:28:00 GMT")).toBeNull();
    expect(parseRetryAfter("-1")).toBeNull();
  });
});

describe("HttpClient", () => {
  it("returns the body of a successful response", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(respond(200, "image-bytes"));

    const buffer = await client(fetchImpl).getBuffer(IMAGE_URL);

    expect(buffer.toString()).toBe("image-bytes");
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe(IMAGE_URL);
  });

  it("sends the default headers", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(respond(200, "x"));

    await client(fetchImpl).getBuffer(IMAGE_URL);

    const headers = fetchImpl.mock.calls[0]?.[1]?.headers;
    expect(headers).toMatchObject({ Accept: "image/webp,image/apng,image/*,*/*;q=0.8" });
  });

  it("retries transient statuses", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(respond(503))
      .mockResolvedValueOnce(respond(429, "", { "Retry-After": "0" }))
      .mockResolvedValueOnce(respond(200, "ok"));

    const buffer = await client(fetchImpl).getBuffer(IMAGE_URL);

    expect(buffer.toString()).toBe("ok");
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it("does not retry other client errors", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(respond(404));

    const error = await client(fetchImpl)
      .getBuffer(IMAGE_URL)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ status: 404, url: IMAGE_URL });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("gives up on a transient status once retries are exhausted", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(async () => respond(502));

    await expect(client(fetchImpl, 2).getBuffer(IMAGE_URL)).rejects.toMatchObject({ status: 502 });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it("retries network errors and wraps the last one", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError("fetch failed"));

    const error = await client(fetchImpl, 1)
      .getBuffer(IMAGE_URL)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ message: `Request failed for ${IMAGE_URL}: fetch failed`, status: undefined });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("caps concurrent requests", async () => {
    let active = 0;
    let peak = 0;
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return respond(200, "x");
    });

    const http = client(fetchImpl);
    await Promise.all(Array.from({ length: 6 }, (_, i) => http.getBuffer(`${IMAGE_URL}?n=${i}`)));

    expect(fetchImpl).toHaveBeenCalledTimes(6);
    expect(peak).toBe(2);
  });
});
