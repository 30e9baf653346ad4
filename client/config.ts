import { z } from "zod";
import { ConfigError } from "./errors.js";
import { isTimeZone } from "./mapping/temporal.js";

export const DEFAULT_HOST = "https://www.transparentclassroom.com";
export const DEFAULT_OUTDIR = "./data/classroom";

// an empty `KEY=` line in .env counts as unset
const env = <S extends z.ZodTypeAny>(schema: S) => z.preprocess((v) => (v === "" ? undefined : v), schema);

const objectId = z.string().regex(/^\d+$/, "expected a numeric id").transform(Number);

const envSchema = z.object({
  TC_HOST: env(z.string().url().default(DEFAULT_HOST)),
  TC_EMAIL: env(z.string().min(1)),
  TC_PASSWORD: env(z.string().min(1)),
  TC_SCHOOL_ID: env(objectId.optional()),
  TC_MASQUERADE_ID: env(objectId.optional()),
  TC_TIME_ZONE: env(z.string().refine(isTimeZone, "unknown IANA time zone").optional()),
  RATE_MS: env(z.coerce.number().int().nonnegative().default(900)),
  HTTP_RETRIES: env(z.coerce.number().int().nonnegative().default(3)),
  OUTDIR: env(z.string().default(DEFAULT_OUTDIR)),
});

export type ClientConfig = {
  host: string;
  email: string;
  password: string;
  /** Network admins act on behalf of this school. */
  schoolId?: number;
  /** Admins act as this user. */
  masqueradeId?: number;
  timeZone?: string;
  rateMs: number;
  retries: number;
  outdir: string;
};

export function loadConfig(source: NodeJS.ProcessEnv = process.env): ClientConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) throw new ConfigError(parsed.error.issues);
  const e = parsed.data;
  return {
    host: e.TC_HOST.replace(/\/+$/, ""),
    email: e.TC_EMAIL,
    password: e.TC_PASSWORD,
    schoolId: e.TC_SCHOOL_ID,
    masqueradeId: e.TC_MASQUERADE_ID,
    timeZone: e.TC_TIME_ZONE,
    rateMs: e.RATE_MS,
    retries: e.HTTP_RETRIES,
    outdir: e.OUTDIR,
  };
}
