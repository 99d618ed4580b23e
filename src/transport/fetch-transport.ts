import type { Transport } from "./types.js";
import { TransportError } from "../infra/errors.js";
import { createLogger } from "../logging.js";
import { describeError } from "../utils.js";

const log = createLogger("transport");

/**
 * Default transport on the global `fetch`. Returns every HTTP status to the
 * caller; only requests that get no response at all are rejected.
 */
export function createFetchTransport(): Transport {
  return {
    async post(url, headers, body) {
      const response = await fetch(url, { method: "POST", headers, body }).catch((err: unknown) => {
        const detail = describeError(err);
        log.error(`POST ${url} failed: ${detail}`);
        throw new TransportError(`Request to ${url} failed: ${detail}`);
      });
      const text = await response.text();
      log.debug(`POST ${url} -> ${response.status} (${text.length} bytes)`);
      return { status: response.status, body: text };
    },
  };
}
