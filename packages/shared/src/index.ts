/** Game titles served by the Marne server list. */
export type Game = "bf1" | "bfv";

/** One server's state as returned by a single poll. */
export interface ServerSnapshot {
  readonly id: number;
  readonly name: string;
  /** Raw map identifier; either a bare key or a slash-delimited asset path. */
  readonly mapKey: string;
  readonly modeKey: string;
  readonly maxPlayers: number;
  readonly currentPlayers: number;
  readonly region: string;
  readonly country: string;
}

/** Servers in the order the API returned them. */
export type ServerList = readonly ServerSnapshot[];

/** Outcome of decoding a poll response body. */
export type PollResult =
  | { type: "ok"; servers: ServerList }
  | { type: "malformed"; raw: string; reason: string };

/** Which server the bot follows. `none` never matches anything. */
export type MonitorTarget =
  | { by: "name"; name: string }
  | { by: "id"; id: number }
  | { by: "none" };

/** A matched server with its map and mode looked up. */
export interface ResolvedServer {
  snapshot: ServerSnapshot;
  mapKey: string;
  mapName: string;
  imageUrl: string;
  modeAbbreviation: string;
}

export type CycleState = "idle" | "polling" | "matching" | "rendering" | "publishing";

/** Result of one poll → match → render → publish pass. */
export type CycleOutcome =
  | { type: "published"; status: string; imagePath: string }
  | { type: "failed"; stage: Exclude<CycleState, "idle">; error: Error; fallbackPublished: boolean };
