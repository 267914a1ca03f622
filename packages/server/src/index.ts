import path from "node:path";
import { fileURLToPath } from "node:url";
import { Client, Events, GatewayIntentBits } from "discord.js";
import { loadConfig, type Config } from "./config.js";
import { CycleDriver } from "./cycle.js";
import { errorMessage } from "./errors.js";
import { LivenessTracker } from "./liveness.js";
import { loadLookupTables, type LookupTables } from "./lookup.js";
import { renderMapImage } from "./map-image.js";
import { endpointFor, fetchServerList } from "./poller.js";
import { buildProbeApp } from "./probe.js";
import { DiscordPublisher, type Publisher } from "./publisher.js";

export { CycleDriver, FALLBACK_STATUS, POLL_INTERVAL_MS } from "./cycle.js";
export { LivenessTracker, LIVENESS_THRESHOLD_MINUTES } from "./liveness.js";
export { buildProbeApp } from "./probe.js";
export { DiscordPublisher, type Publisher } from "./publisher.js";

/** Wire a cycle driver for the given config against the live Marne API. */
export function createCycleDriver(
  config: Config,
  publisher: Publisher,
  tracker: LivenessTracker,
  tables: LookupTables,
): CycleDriver {
  const url = endpointFor(config.game);

  return new CycleDriver({
    poll: () => fetchServerList(url),
    render: (mode, imageUrl) => renderMapImage(mode, imageUrl, { outputDir: config.outputDir }),
    publisher,
    tracker,
    tables,
    target: config.target,
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const tables = loadLookupTables();
  if (config.target.by === "none") {
    console.error("[CONFIG] No server name or id set! Set SERVER_NAME or SERVER_ID.");
  }

  const tracker = new LivenessTracker();
  const probe = buildProbeApp(tracker);
  await probe.listen({ port: config.probePort, host: "0.0.0.0" });
  console.log(`[PROBE] Liveness probe listening on port ${config.probePort}`);

  const client = new Client({ intents: [GatewayIntentBits.Guilds] });
  let driver: CycleDriver | null = null;

  client.once(Events.ClientReady, (readyClient) => {
    console.log(`[DISCORD] Logged in as ${readyClient.user.tag}`);
    driver = createCycleDriver(config, new DiscordPublisher(readyClient), tracker, tables);
    driver.start().catch((err) => {
      console.error("[CYCLE] Monitor loop stopped unexpectedly:", err);
      process.exit(1);
    });
  });

  const shutdown = async (signal: string) => {
    console.log(`[MAIN] ${signal} received, shutting down`);
    driver?.stop();
    await client.destroy();
    await probe.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        console.error(`[MAIN] Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
    });
  }

  await client.login(config.discordToken);
}

// Only auto-start when this file is the entry point (not when imported by tests).
const isMain =
  process.argv[1] && path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url));

if (isMain) {
  main().catch((err) => {
    console.error("[MAIN] Failed to start:", err);
    process.exit(1);
  });
}
