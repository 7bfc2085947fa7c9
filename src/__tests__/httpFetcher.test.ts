import { describe, it, expect, vi, afterEach } from "vitest";
import { TileRequestError, createAbortError } from "../errors";
import { HttpTileFetcher } from "../net/httpFetcher";

const URL = "https://tiles.example.test/tiles/h0213.jpeg?g=517&mkt=en-us";

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("HttpTileFetcher", () => {
  it("returns the response body and sends the user agent", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      new Response(new Uint8Array([1, 2, 3]), { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);

    const bytes = await new HttpTileFetcher({ userAgent: "test-agent" }).fetchBytes(URL);

    expect(Array.from(bytes)).toEqual([1, 2, 3]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ "User-Agent": "test-agent" });
  });

  it("raises TileRequestError with the status for error responses", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("gone", { status: 404 })));

    const attempt = new HttpTileFetcher().fetchBytes(URL);

    await expect(attempt).rejects.toBeInstanceOf(TileRequestError);
    await expect(attempt).rejects.toMatchObject({ status: 404, url: URL });
  });

  it("raises TileRequestError with status 0 when the connection fails", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    await expect(new HttpTileFetcher().fetchBytes(URL)).rejects.toMatchObject({
      name: "TileRequestError",
      status: 0
    });
  });

  it("passes aborts through untouched", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw createAbortError();
      })
    );

    await expect(new HttpTileFetcher().fetchBytes(URL)).rejects.toMatchObject({
      name: "AbortError"
    });
  });
});
