import { z } from "zod";
import type { Game, MonitorTarget } from "@marne-presence/shared";
import { ConfigError } from "./errors.js";
import { DEFAULT_PROBE_PORT } from "./probe.js";

// Blank values (as left behind by container env templates) count as unset.
const optionalString = z
  .string()
  .trim()
  .transform((v) => (v.length > 0 ? v : undefined))
  .optional();

export const configSchema = z.object({
  DISCORD_TOKEN: z.string().trim().min(1, "DISCORD_TOKEN is required"),
  GAME: optionalString.pipe(z.enum(["bf1", "bfv"]).default("bf1")),
  SERVER_NAME: optionalString,
  SERVER_ID: optionalString.pipe(
    z.coerce.number().int("SERVER_ID must be an integer").optional(),
  ),
  PROBE_PORT: optionalString.pipe(
    z.coerce.number().int().min(1).max(65535).default(DEFAULT_PROBE_PORT),
  ),
  OUTPUT_DIR: optionalString.transform((v) => v ?? "."),
});

export interface Config {
  discordToken: string;
  game: Game;
  target: MonitorTarget;
  probePort: number;
  outputDir: string;
}

/** A configured name wins over a configured id. */
export function toMonitorTarget(name: string | undefined, id: number | undefined): MonitorTarget {
  if (name !== undefined) return { by: "name", name };
  if (id !== undefined) return { by: "id", id };
  return { by: "none" };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const { DISCORD_TOKEN, GAME, SERVER_NAME, SERVER_ID, PROBE_PORT, OUTPUT_DIR } = parsed.data;
  return {
    discordToken: DISCORD_TOKEN,
    game: GAME,
    target: toMonitorTarget(SERVER_NAME, SERVER_ID),
    probePort: PROBE_PORT,
    outputDir: OUTPUT_DIR,
  };
}
