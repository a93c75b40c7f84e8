import { parseFetchRequestForLog, type ProviderFetch } from "./format.js";
import type { Logger } from "./logger.js";

/**
 * Wraps the fetch handed to the AI provider so every chat-completion request is logged
 * before it leaves the process.
 */
export function createLlmLoggingFetch(args: {
  logger: Pick<Logger, "log">;
  enabled: boolean;
  baseFetch?: ProviderFetch;
}): ProviderFetch {
  const baseFetch: ProviderFetch = args.baseFetch ?? globalThis.fetch.bind(globalThis);

  return async (input, init) => {
    if (args.enabled) {
      const parsed = parseFetchRequestForLog(input, init);
      if (parsed) {
        await args.logger.log("debug", parsed.requestText, parsed.meta);
      }
    }

    return baseFetch(input, init);
  };
}
