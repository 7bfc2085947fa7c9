import { TileRequestError, isAbortError } from "../errors";

export interface TileFetcher {
  fetchBytes(url: string, signal?: AbortSignal): Promise<Uint8Array>;
}

export interface HttpTileFetcherOptions {
  userAgent?: string;
  headers?: Record<string, string>;
}

const DEFAULT_USER_AGENT = "aerial-image-retrieval/0.1";

export class HttpTileFetcher implements TileFetcher {
  private headers: Record<string, string>;

  constructor(options: HttpTileFetcherOptions = {}) {
    this.headers = {
      "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
      ...options.headers
    };
  }

  async fetchBytes(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    let response: Response;
    try {
      response = await fetch(url, { headers: this.headers, signal });
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      throw new TileRequestError(`Tile request failed: ${url}`, 0, url, error);
    }
    if (!response.ok) {
      throw new TileRequestError(
        `Tile service returned ${response.status} for ${url}`,
        response.status,
        url
      );
    }
    return new Uint8Array(await response.arrayBuffer());
  }
}
