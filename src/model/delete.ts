import type { ApiEnvelope, SlackError } from "../slack/types.js";
import { ensureOk, mapSlackError } from "../utils/errors.js";
import { rateLimited } from "../utils/safe-api.js";
import type { JanitorContext } from "./context.js";

/**
 * Runs one delete call through the rate-limit wrapper and reports the outcome
 * to the janitor. Returns the mapped failure, or null on success.
 */
export async function deleteVia(
  janitor: JanitorContext,
  entity: object,
  method: string,
  call: () => Promise<ApiEnvelope>
): Promise<SlackError | null> {
  try {
    ensureOk(await rateLimited(janitor, method, call), method);
  } catch (error) {
    const failure = mapSlackError(error);
    await janitor.postDelete(entity, failure);
    return failure;
  }
  await janitor.postDelete(entity);
  return null;
}
