import type {
  MonitorTarget,
  ResolvedServer,
  ServerList,
  ServerSnapshot,
} from "@marne-presence/shared";
import { NotFoundError } from "./errors.js";
import type { LookupTables } from "./lookup.js";

/** Human readable description of a target, for logs and errors. */
export function describeTarget(target: MonitorTarget): string {
  switch (target.by) {
    case "name":
      return `name "${target.name}"`;
    case "id":
      return `id ${target.id}`;
    case "none":
      return "no target";
  }
}

function isTarget(server: ServerSnapshot, target: MonitorTarget): boolean {
  switch (target.by) {
    case "name":
      return server.name === target.name;
    case "id":
      return server.id === target.id;
    case "none":
      return false;
  }
}

/** Pick the first server in list order that matches the target. */
export function selectServer(list: ServerList, target: MonitorTarget): ServerSnapshot {
  const server = list.find((s) => isTarget(s, target));
  if (!server) {
    if (target.by === "none") {
      throw new NotFoundError("No server name or id configured");
    }
    throw new NotFoundError(
      `Server with ${describeTarget(target)} not found among ${list.length} listed servers`,
    );
  }
  return server;
}

/**
 * Reduce a raw map identifier to its lookup key.
 *
 * Newer API generations send a full asset path such as
 * `Xpack2/Levels/MP/MP_Bridge/MP_Bridge`; older ones send just `MP_Bridge`.
 * A path with a trailing slash has no final segment and is kept whole.
 */
export function extractMapKey(raw: string): string {
  const key = raw.slice(raw.lastIndexOf("/") + 1);
  return key.length > 0 ? key : raw;
}

export function resolveServer(snapshot: ServerSnapshot, tables: LookupTables): ResolvedServer {
  const mapKey = extractMapKey(snapshot.mapKey);
  return {
    snapshot,
    mapKey,
    mapName: tables.mapName(mapKey),
    imageUrl: tables.mapImage(mapKey),
    modeAbbreviation: tables.modeAbbreviation(snapshot.modeKey),
  };
}

export function matchServer(
  list: ServerList,
  target: MonitorTarget,
  tables: LookupTables,
): ResolvedServer {
  return resolveServer(selectServer(list, target), tables);
}

/** Presence text, e.g. `40/64 - Amiens`. */
export function formatStatus(server: ResolvedServer): string {
  return `${server.snapshot.currentPlayers}/${server.snapshot.maxPlayers} - ${server.mapName}`;
}
