import type { z } from "zod";
import { UpstreamServiceError, errorMessage } from "../errors";

export type FetchFn = typeof fetch;

/**
 * Fetches and validates a JSON body. Transport failures, non-2xx answers and
 * bodies that do not match the schema all surface as UpstreamServiceError.
 */
export async function fetchJson<T>(
  fetchFn: FetchFn,
  service: string,
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  init: RequestInit = {},
): Promise<T> {
  let response: Response;
  try {
    response = await fetchFn(url, init);
  } catch (error) {
    throw new UpstreamServiceError(service, `request failed: ${errorMessage(error)}`);
  }

  if (!response.ok) {
    const body = await response.text().catch(() => "");
    throw new UpstreamServiceError(service, `HTTP ${response.status}`, body.slice(0, 500));
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new UpstreamServiceError(service, `invalid JSON body: ${errorMessage(error)}`);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new UpstreamServiceError(service, "unexpected response shape", parsed.error.flatten());
  }
  return parsed.data;
}
