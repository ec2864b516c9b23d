import { z } from "zod";
import { ValidationError } from "agentry-shared";

/** Body of the run endpoints: input variable values by name */
export const runInputSchema = z.record(z.string(), z.unknown());

/**
 * Validate a request body.
 *
 * @throws ValidationError naming the first invalid field
 */
export function parseBody<TSchema extends z.ZodType>(schema: TSchema, body: unknown): z.output<TSchema> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const [first] = result.error.issues;
    const field = first && first.path.length > 0 ? first.path.join(".") : "body";
    throw new ValidationError(field, `Invalid request body: ${first?.message ?? "unreadable"}`, "VALIDATION_FORMAT");
  }
  return result.data;
}
