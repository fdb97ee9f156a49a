import { z } from "zod";
import { ConfigError } from "./errors";

export const WordgenConfigSchema = z.object({
  wordlist: z.string().min(1).default("/usr/share/dict/words"),
  table: z.string().min(1).optional(),
  order: z.number().int().positive().default(3),
  sectionLength: z.number().int().positive().default(6),
  sections: z.number().int().positive().default(3),
  delimiter: z.string().default("-"),
  capitalsPerSection: z.number().int().nonnegative().default(1),
  digitsPerSection: z.number().int().nonnegative().default(1),
  maxAttempts: z.number().int().positive().default(10)
});

export type WordgenConfig = z.infer<typeof WordgenConfigSchema>;
export type WordgenConfigInput = z.input<typeof WordgenConfigSchema>;

export function parseConfig(input: unknown = {}): WordgenConfig {
  const parsed = WordgenConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`));
  }
  return parsed.data;
}

export const DEFAULT_CONFIG: WordgenConfig = parseConfig({});
