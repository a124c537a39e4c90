import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../infra/errors";

dotenv.config({ path: process.env.PS_ENV_PATH || ".env" });

// `KEY=` in a .env file means unset.
const blankAsUnset = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema.optional());

const EnvSchema = z.object({
  PS_WEBSOCKET_URI: blankAsUnset(z.string().url()),
  PS_USERNAME: blankAsUnset(z.string()),
  PS_PASSWORD: blankAsUnset(z.string()),
  PS_STATE_PATH: z.string().min(1).default("ps_client_state.json"),
  PS_LOGIN_SERVER: z.string().url().default("https://play.pokemonshowdown.com"),
  PS_RENAME_SETTLE_MS: z.coerce.number().int().nonnegative().default(1000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
});

export type AppEnv = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new ConfigurationError(`invalid environment: ${fields}`, { cause: parsed.error });
  }
  return parsed.data;
}
