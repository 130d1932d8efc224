/**
 * Runtime settings read from the environment.
 *
 *   VERSE_TIMEZONE – IANA zone used to decide what "today" is (default UTC)
 *   VERSE_SEED     – integer seed for reproducible picks (default: unseeded)
 *   LOG_LEVEL      – debug | info | warn | error (default info)
 *   DATABASE_URL   – Postgres connection string, required once the pool is created
 *   DATABASE_SSL   – auto | require | disable (default auto: TLS unless the host is local)
 */

import { z } from "zod";

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  VERSE_TIMEZONE: z
    .string()
    .trim()
    .min(1)
    .refine(isTimeZone, { message: "must be an IANA time zone such as Europe/London" })
    .default("UTC"),
  VERSE_SEED: z
    .string()
    .trim()
    .regex(/^-?\d+$/, { message: "must be an integer" })
    .transform((value) => Number.parseInt(value, 10))
    .optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DATABASE_URL: z.string().trim().optional(),
  DATABASE_SSL: z.enum(["auto", "require", "disable"]).default("auto"),
});

export type LogLevel = "debug" | "info" | "warn" | "error";

export type AppConfig = {
  timeZone: string;
  seed: number | null;
  logLevel: LogLevel;
  databaseUrl: string | null;
  databaseSsl: "auto" | "require" | "disable";
};

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const blankToUndefined = (value: string | undefined) =>
    value === undefined || value.trim() === "" ? undefined : value;

  const result = envSchema.safeParse({
    VERSE_TIMEZONE: blankToUndefined(env.VERSE_TIMEZONE),
    VERSE_SEED: blankToUndefined(env.VERSE_SEED),
    LOG_LEVEL: blankToUndefined(env.LOG_LEVEL),
    DATABASE_URL: blankToUndefined(env.DATABASE_URL),
    DATABASE_SSL: blankToUndefined(env.DATABASE_SSL),
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    timeZone: result.data.VERSE_TIMEZONE,
    seed: result.data.VERSE_SEED ?? null,
    logLevel: result.data.LOG_LEVEL,
    databaseUrl: result.data.DATABASE_URL ?? null,
    databaseSsl: result.data.DATABASE_SSL,
  };
}

let cached: AppConfig | undefined;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = parseConfig(process.env);
  }
  return cached;
}
