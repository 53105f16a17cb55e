import { z } from "zod";

// A bare `PORT=` in .env arrives as "", which counts as unset
const unsetIfEmpty = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema);

const ConfigSchema = z.object({
  PORT: unsetIfEmpty(z.coerce.number().int().min(0).max(65535).default(3000)),
  ELO_CSV_PATH: unsetIfEmpty(z.string().min(1).default("data/elos.csv")),
  MEDIA_DIR: unsetIfEmpty(z.string().min(1).default("media")),
});

export interface HubConfig {
  port: number;
  eloCsvPath: string;
  mediaDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HubConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    port: parsed.data.PORT,
    eloCsvPath: parsed.data.ELO_CSV_PATH,
    mediaDir: parsed.data.MEDIA_DIR,
  };
}
