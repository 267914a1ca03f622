import { z } from "zod";
import type { Game, PollResult, ServerList } from "@marne-presence/shared";
import { NetworkError, ParseError, errorMessage } from "./errors.js";

const ENDPOINTS: Record<Game, string> = {
  bf1: "https://marne.io/api/srvlst/",
  bfv: "https://marne.io/api/v/srvlst/",
};

// Lead byte of a 3-byte UTF-8 sequence; the API sometimes prefixes bodies with a BOM.
const BOM_LEAD_BYTE = 0xef;
const BOM_LENGTH = 3;

// Only the fields a snapshot needs are validated; anything else is dropped.
const serverListSchema = z.object({
  servers: z.array(
    z.object({
      id: z.number().int(),
      name: z.string(),
      mapName: z.string(),
      gameMode: z.string(),
      maxPlayers: z.number().int(),
      currentPlayers: z.number().int(),
      region: z.string(),
      country: z.string(),
    }),
  ),
});

export function endpointFor(game: Game): string {
  return ENDPOINTS[game];
}

/** Drop a leading byte-order mark. Bodies without one are returned untouched. */
export function stripBom(buf: Buffer): Buffer {
  if (buf.length > 0 && buf[0] === BOM_LEAD_BYTE) {
    return buf.subarray(BOM_LENGTH);
  }
  return buf;
}

/** Decode a server list body into either the list or the reason it is malformed. */
export function parseServerList(text: string): PollResult {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    return { type: "malformed", raw: text, reason: `invalid JSON: ${errorMessage(err)}` };
  }

  const parsed = serverListSchema.safeParse(json);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return { type: "malformed", raw: text, reason };
  }

  return {
    type: "ok",
    servers: parsed.data.servers.map((s) => ({
      id: s.id,
      name: s.name,
      mapKey: s.mapName,
      modeKey: s.gameMode,
      maxPlayers: s.maxPlayers,
      currentPlayers: s.currentPlayers,
      region: s.region,
      country: s.country,
    })),
  };
}

/**
 * Fetch the public server list once.
 *
 * There is no retry here; the next scheduled cycle is the retry.
 */
export async function fetchServerList(url: string): Promise<ServerList> {
  let body: Buffer;
  try {
    const res = await fetch(url);
    if (!res.ok) {
      throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
    }
    body = Buffer.from(await res.arrayBuffer());
  } catch (err) {
    throw new NetworkError(`Server list request to ${url} failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const result = parseServerList(stripBom(body).toString("utf8"));
  if (result.type === "malformed") {
    throw new ParseError(`Server list response is malformed: ${result.reason}`, result.raw);
  }
  return result.servers;
}
