import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { LivenessTracker, epochMinute, isHealthy } from "./liveness.js";

export const DEFAULT_PROBE_PORT = 3030;

/**
 * Build the liveness probe (without starting it).
 *
 * Any request on any path answers with the minutes elapsed since the last poll attempt: 200 while healthy, 503
 * once stale.
 */
export function buildProbeApp(
  tracker: LivenessTracker,
  clock: () => number = Date.now,
): FastifyInstance {
  const app = Fastify({ logger: false });

  const handler = async (_request: FastifyRequest, reply: FastifyReply) => {
    const elapsed = tracker.minutesSince(epochMinute(clock()));
    return reply
      .code(isHealthy(elapsed) ? 200 : 503)
      .type("text/plain; charset=utf-8")
      .send(String(elapsed));
  };

  for (const url of ["/", "/*"]) {
    app.all(url, handler);
  }

  return app;
}
