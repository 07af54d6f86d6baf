import * as dotenv from "dotenv";
import { z } from "zod";
import { Environments, LogLevels } from "./types/enums";
import { validate } from "./utils/validation";

dotenv.config();

const Schema = z.object({
  env: z.enum(Environments),
  logLevel: z.enum(LogLevels)
});
export type Config = z.infer<typeof Schema>;

/**
 * Reads and validates the environment
 * - `NODE_ENV` defaults to `development`
 * - `LOG_LEVEL` defaults to `error`
 * @throws `ValidationError` with invalid values
 */
export const config = (): Config => {
  const { NODE_ENV, LOG_LEVEL } = process.env;
  return validate(
    {
      env: NODE_ENV || "development",
      logLevel: LOG_LEVEL || "error"
    },
    Schema
  );
};
