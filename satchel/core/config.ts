import { z } from "zod";
import { ERR, SatchelError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import { DEFAULT_NAMESPACE, NAMESPACE_PATTERN } from "../store/store.js";

const EnvSchema = z.object({
  SATCHEL_STORE: z.enum(["memory", "libsql"]).default("libsql"),
  SATCHEL_LIBSQL_URL: z.string().min(1).default("file:./satchel.db"),
  SATCHEL_LIBSQL_AUTH_TOKEN: z.string().min(1).optional(),
  SATCHEL_NAMESPACE: z
    .string()
    .min(1)
    .regex(NAMESPACE_PATTERN, "namespace must not contain ':'")
    .default(DEFAULT_NAMESPACE),
  // an empty value counts as unset rather than coercing to 0 (never expire)
  SATCHEL_TTL_SECONDS: z.preprocess(
    (v) => (v === "" ? undefined : v),
    z.coerce.number().int().nonnegative().default(86_400),
  ),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
  SATCHEL_LOG_PRETTY: z.enum(["true", "false"]).default("false"),
});

export type SatchelConfig = {
  store: "memory" | "libsql";
  libsql: { url: string; authToken?: string };
  namespace: string;
  /** `null` when entries never expire. */
  ttlMs: number | null;
  logLevel: LogLevel;
  logPretty: boolean;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): SatchelConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const summary = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new SatchelError(ERR.CONFIG_INVALID, `invalid satchel configuration: ${summary}`, parsed.error.issues);
  }

  const e = parsed.data;
  return {
    store: e.SATCHEL_STORE,
    libsql: { url: e.SATCHEL_LIBSQL_URL, authToken: e.SATCHEL_LIBSQL_AUTH_TOKEN },
    namespace: e.SATCHEL_NAMESPACE,
    ttlMs: e.SATCHEL_TTL_SECONDS === 0 ? null : e.SATCHEL_TTL_SECONDS * 1000,
    logLevel: e.LOG_LEVEL,
    logPretty: e.SATCHEL_LOG_PRETTY === "true",
  };
}
