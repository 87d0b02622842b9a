import { EmbeddingApiError, RateLimitError } from "../errors.js";

/**
 * POST a JSON body and return the parsed response. 429 becomes a
 * RateLimitError so the batch processor can back off; every other non-2xx
 * status is an EmbeddingApiError.
 */
export async function postJson<T>(
  provider: string,
  url: string,
  headers: Record<string, string>,
  body: unknown,
): Promise<T> {
  const response = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
  });

  if (!response.ok) {
    const error = await response.text();
    if (response.status === 429) {
      throw new RateLimitError(provider, error);
    }
    throw new EmbeddingApiError(provider, response.status, error);
  }

  return (await response.json()) as T;
}
