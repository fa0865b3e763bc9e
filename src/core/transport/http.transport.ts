import { fetch } from "undici";
import { NotFoundError, RetrievalFailedError } from "../errors";
import type { FragmentTransport } from "./transport.types";

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

type FetchResponse = Awaited<ReturnType<typeof fetch>>;

const describeCause = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class HttpTransport implements FragmentTransport {
  readonly schemes = ["http", "https"] as const;

  constructor(private readonly timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS) {}

  async read(uri: string): Promise<string> {
    let response: FetchResponse;
    try {
      response = await fetch(uri, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new RetrievalFailedError(
        `Failed to fetch ${uri}: ${describeCause(error)}`,
        { uri },
        undefined,
        { cause: error }
      );
    }

    if (response.status === 404) {
      throw new NotFoundError(`Failed to find data at: ${uri}`, { uri });
    }
    if (!response.ok) {
      throw new RetrievalFailedError(
        `Fetching ${uri} failed with HTTP ${response.status} ${response.statusText}`.trim(),
        { uri },
        response.status
      );
    }

    try {
      return (await response.text()).trim();
    } catch (error) {
      throw new RetrievalFailedError(
        `Failed to read response body from ${uri}: ${describeCause(error)}`,
        { uri },
        response.status,
        { cause: error }
      );
    }
  }
}
