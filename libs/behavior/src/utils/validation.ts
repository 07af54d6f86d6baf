import { ZodError, type ZodType } from "zod";
import { ValidationError } from "../types";

/**
 * Validates payloads using `zod` schemas
 *
 * @param payload the raw payload
 * @param schema the zod schema
 * @returns the validated payload
 */
export const validate = <T>(payload: unknown, schema: ZodType<T>): T => {
  try {
    return schema.parse(payload);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(
        ({ path, message }) => `${path.join(".")}: ${message}`
      );
      throw new ValidationError(issues);
    }
    throw new ValidationError(["zod validation error"]);
  }
};
