import { z } from "zod";
import type { WeatherError } from "../domain/errors";
import { err, ok, type Result } from "../domain/result";

export const envelopeSchema = z.object({
  status: z.string(),
  info: z.string().default(""),
  infocode: z.string().optional(),
});

export interface ProviderEnvelope {
  status: string;
  info: string;
}

/**
 * Parses a provider body and checks its status envelope. Shared by the
 * weather and geocoding clients.
 */
export function decodeProviderPayload<T extends ProviderEnvelope>(
  body: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  source: string,
): Result<T, WeatherError> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return err({
      type: "DataParsingError",
      message: `${source} returned malformed JSON.`,
    });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    console.warn(`${source} payload did not match schema:`, parsed.error.issues);
    return err({
      type: "DataParsingError",
      message: `${source} payload did not match the expected shape.`,
    });
  }
  if (parsed.data.status !== "1") {
    return err({
      type: "ApiError",
      message: parsed.data.info || `${source} rejected the request.`,
    });
  }
  return ok(parsed.data);
}
