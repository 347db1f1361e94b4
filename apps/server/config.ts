import { z } from "zod";
import { loadWordList, BUNDLED_WORD_LIST, GeometrySettings } from "@utils";

// `VAR=` in a shell or .env file counts as unset.
const unsetIfEmpty = (value: unknown) => (value === "" ? undefined : value);

const envSchema = z.object({
  PORT: z.preprocess(unsetIfEmpty, z.coerce.number().int().min(1).max(65535).default(3000)),
  HOST: z.string().min(1).default("0.0.0.0"),
  // Comma-separated list; unset allows any origin.
  CORS_ORIGINS: z.string().optional(),
  // Largest point set / polygon accepted by the geometry command; unset is unbounded.
  MAX_POINTS: z.preprocess(unsetIfEmpty, z.coerce.number().int().positive().optional()),
  // Replaces the bundled anagram dictionary.
  WORDLIST_PATH: z.preprocess(unsetIfEmpty, z.string().min(1).optional()),
});

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string[] | true;
  geometry: GeometrySettings;
  wordList: readonly string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid server configuration: ${details}`);
  }

  const { PORT, HOST, CORS_ORIGINS, MAX_POINTS, WORDLIST_PATH } = parsed.data;
  const origins = CORS_ORIGINS?.split(",").map(origin => origin.trim()).filter(origin => origin.length > 0);

  return {
    port: PORT,
    host: HOST,
    corsOrigins: origins && origins.length > 0 ? origins : true,
    geometry: { max_points: MAX_POINTS ?? Number.POSITIVE_INFINITY },
    wordList: WORDLIST_PATH ? loadWordList(WORDLIST_PATH) : BUNDLED_WORD_LIST,
  };
}
