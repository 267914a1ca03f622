import { describe, it, expect, vi, afterEach } from "vitest";
import { endpointFor, fetchServerList, parseServerList, stripBom } from "./poller.js";
import { NetworkError, ParseError } from "./errors.js";

const BOM = Buffer.from([0xef, 0xbb, 0xbf]);

/** Raw server entry the way the API sends it, including fields the monitor ignores. */
function rawServer(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 1,
    name: "Alpha",
    mapName: "MP_Amiens",
    gameMode: "Conquest0",
    maxPlayers: 64,
    tickRate: 60,
    password: 0,
    needSameMods: 0,
    allowMoreMods: 1,
    currentPlayers: 40,
    region: "EU",
    country: "NL",
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// stripBom
// ---------------------------------------------------------------------------

describe("stripBom", () => {
  it("removes a leading byte-order mark", () => {
    const body = Buffer.concat([BOM, Buffer.from('{"servers":[]}')]);
    expect(stripBom(body).toString("utf8")).toBe('{"servers":[]}');
  });

  it("returns a clean payload unchanged", () => {
    const body = Buffer.from('{"servers":[]}');
    expect(stripBom(body)).toBe(body);
  });

  it("is a no-op the second time", () => {
    const body = Buffer.concat([BOM, Buffer.from("[]")]);
    const once = stripBom(body);
    expect(stripBom(once)).toBe(once);
    expect(once.toString("utf8")).toBe("[]");
  });

  it("only triggers on a first byte of 239", () => {
    const body = Buffer.from([0x7b, 0xef, 0xbb, 0xbf, 0x7d]);
    expect(stripBom(body)).toBe(body);
  });

  it("handles an empty body", () => {
    expect(stripBom(Buffer.alloc(0)).length).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// parseServerList
// ---------------------------------------------------------------------------

describe("parseServerList", () => {
  it("maps API entries to snapshots and drops unknown fields", () => {
    const result = parseServerList(JSON.stringify({ servers: [rawServer()], total: 1 }));

    expect(result).toEqual({
      type: "ok",
      servers: [
        {
          id: 1,
          name: "Alpha",
          mapKey: "MP_Amiens",
          modeKey: "Conquest0",
          maxPlayers: 64,
          currentPlayers: 40,
          region: "EU",
          country: "NL",
        },
      ],
    });
  });

  it("keeps list order", () => {
    const result = parseServerList(
      JSON.stringify({ servers: [rawServer({ id: 3 }), rawServer({ id: 1 }), rawServer({ id: 2 })] }),
    );

    expect(result.type).toBe("ok");
    if (result.type === "ok") {
      expect(result.servers.map((s) => s.id)).toEqual([3, 1, 2]);
    }
  });

  it("accepts an empty list", () => {
    expect(parseServerList('{"servers":[]}')).toEqual({ type: "ok", servers: [] });
  });

  it("reports invalid JSON as malformed with the raw text", () => {
    const result = parseServerList("<html>502 Bad Gateway</html>");

    expect(result.type).toBe("malformed");
    if (result.type === "malformed") {
      expect(result.raw).toBe("<html>502 Bad Gateway</html>");
      expect(result.reason.startsWith("invalid JSON: ")).toBe(true);
    }
  });

  it("reports a missing servers array", () => {
    const result = parseServerList('{"error":"rate limited"}');

    expect(result).toEqual({
      type: "malformed",
      raw: '{"error":"rate limited"}',
      reason: "servers: Required",
    });
  });

  it("reports a field with the wrong type", () => {
    const result = parseServerList(JSON.stringify({ servers: [rawServer({ currentPlayers: "40" })] }));

    expect(result.type).toBe("malformed");
    if (result.type === "malformed") {
      expect(result.reason).toBe("servers.0.currentPlayers: Expected number, received string");
    }
  });

  it("does not strip a byte-order mark by itself", () => {
    const result = parseServerList("\uFEFF{\"servers\":[]}");
    expect(result.type).toBe("malformed");
  });
});

// ---------------------------------------------------------------------------
// endpointFor
// ---------------------------------------------------------------------------

describe("endpointFor", () => {
  it("maps each game to its server list URL", () => {
    expect(endpointFor("bf1")).toBe("https://marne.io/api/srvlst/");
    expect(endpointFor("bfv")).toBe("https://marne.io/api/v/srvlst/");
  });
});

// ---------------------------------------------------------------------------
// fetchServerList (mocked fetch)
// ---------------------------------------------------------------------------

describe("fetchServerList", () => {
  const SERVER_LIST_URL = "https://marne.io/api/srvlst/";

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function stubFetch(impl: () => Promise<Response>) {
    const fetchMock = vi.fn(impl);
    vi.stubGlobal("fetch", fetchMock);
    return fetchMock;
  }

  it("returns the parsed list for a body prefixed with a byte-order mark", async () => {
    const body = Buffer.concat([BOM, Buffer.from(JSON.stringify({ servers: [rawServer()] }))]);
    const fetchMock = stubFetch(async () => new Response(new Uint8Array(body)));

    const servers = await fetchServerList(SERVER_LIST_URL);

    expect(fetchMock).toHaveBeenCalledOnce();
    expect(fetchMock.mock.calls[0]).toEqual([SERVER_LIST_URL]);
    expect(servers).toHaveLength(1);
    expect(servers[0].name).toBe("Alpha");
    expect(servers[0].mapKey).toBe("MP_Amiens");
  });

  it("throws NetworkError when the request fails", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed");
    });

    const promise = fetchServerList(SERVER_LIST_URL);

    await expect(promise).rejects.toBeInstanceOf(NetworkError);
    await expect(promise).rejects.toThrow(`Server list request to ${SERVER_LIST_URL} failed: fetch failed`);
  });

  it("throws NetworkError on a non-2xx status", async () => {
    stubFetch(async () => new Response("oops", { status: 500, statusText: "Internal Server Error" }));

    await expect(fetchServerList(SERVER_LIST_URL)).rejects.toThrow(
      `Server list request to ${SERVER_LIST_URL} failed: HTTP 500 Internal Server Error`,
    );
  });

  it("throws ParseError carrying the raw body when the shape is wrong", async () => {
    stubFetch(async () => new Response('{"servers":"none"}'));

    const err = await fetchServerList(SERVER_LIST_URL).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ParseError);
    if (err instanceof ParseError) {
      expect(err.raw).toBe('{"servers":"none"}');
      expect(err.kind).toBe("parse");
      expect(err.message).toBe(
        "Server list response is malformed: servers: Expected array, received string",
      );
    }
  });
});
