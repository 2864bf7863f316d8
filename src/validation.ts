import { z } from "zod";
import { InvalidInputError } from "./errors.js";

export const instantSchema = z.union([z.date(), z.number().finite()]);

export const geoCoordinateSchema = z.object({
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
});

export type Instant = z.infer<typeof instantSchema>;
export type GeoCoordinate = z.infer<typeof geoCoordinateSchema>;

/**
 * Runs `schema` over `value` and rethrows the first issue as an
 * `InvalidInputError` named after the issue path, or `field` at the root.
 */
export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  field: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join(".") : field;
    throw new InvalidInputError(path, issue?.message ?? "Invalid input");
  }
  return result.data;
}
