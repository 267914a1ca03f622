import { EventEmitter } from "node:events";
import type {
  CycleOutcome,
  CycleState,
  MonitorTarget,
  ResolvedServer,
  ServerList,
} from "@marne-presence/shared";
import { PublishError, errorMessage } from "./errors.js";
import { LivenessTracker, epochMinute } from "./liveness.js";
import type { LookupTables } from "./lookup.js";
import { describeTarget, formatStatus, matchServer } from "./matcher.js";
import type { Publisher } from "./publisher.js";

/** Pause between the end of one cycle and the start of the next. */
export const POLL_INTERVAL_MS = 60_000;

export const FALLBACK_STATUS = "¯\\_(ツ)_/¯ server not found";

export interface CycleDriverOptions {
  poll: () => Promise<ServerList>;
  render: (modeAbbreviation: string, imageUrl: string) => Promise<string>;
  publisher: Publisher;
  tracker: LivenessTracker;
  tables: LookupTables;
  target: MonitorTarget;
  clock?: () => number;
}

type FailedStage = Exclude<CycleState, "idle">;

/**
 * Runs poll → match → render → publish on a fixed interval.
 *
 * A cycle never throws: a failed poll or render publishes the fallback
 * status once, a missing server publishes nothing, and publisher rejections
 * are only logged. Whatever happens, the liveness tracker is stamped with
 * the current minute as the last step of the cycle.
 *
 * Events:
 * - `state` (CycleState) on every transition
 * - `cycle` (CycleOutcome) after every cycle
 */
export class CycleDriver extends EventEmitter {
  private readonly clock: () => number;
  private _state: CycleState = "idle";
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  constructor(private readonly options: CycleDriverOptions) {
    super();
    this.clock = options.clock ?? Date.now;
  }

  get state(): CycleState {
    return this._state;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Loop until `stop()` is called. Resolves once the loop has ended. */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    console.log(`[CYCLE] Monitoring server with ${describeTarget(this.options.target)}`);

    while (this.running) {
      await this.runCycle();
      if (!this.running) break;
      await this.sleep(POLL_INTERVAL_MS);
    }
  }

  /** End the loop after the cycle in progress, cutting any pending sleep short. */
  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.wake?.();
    this.wake = null;
  }

  async runCycle(): Promise<CycleOutcome> {
    const outcome = await this.attempt();
    this.setState("idle");
    this.options.tracker.recordAttempt(epochMinute(this.clock()));
    this.emit("cycle", outcome);
    return outcome;
  }

  private async attempt(): Promise<CycleOutcome> {
    const { poll, render, publisher, tables, target } = this.options;

    this.setState("polling");
    let servers: ServerList;
    try {
      servers = await poll();
    } catch (err) {
      return this.fail("polling", err, true);
    }

    this.setState("matching");
    let server: ResolvedServer;
    try {
      server = matchServer(servers, target, tables);
    } catch (err) {
      return this.fail("matching", err, false);
    }

    this.setState("rendering");
    let imagePath: string;
    try {
      imagePath = await render(server.modeAbbreviation, server.imageUrl);
    } catch (err) {
      return this.fail("rendering", err, true);
    }

    this.setState("publishing");
    const status = formatStatus(server);
    await this.publish("status", () => publisher.setStatusText(status));
    await this.publish("avatar", () => publisher.setAvatarImage(imagePath));
    console.log(`[CYCLE] ${server.snapshot.name}: ${status} (${server.modeAbbreviation || "no mode"})`);

    return { type: "published", status, imagePath };
  }

  private async fail(stage: FailedStage, err: unknown, withFallback: boolean): Promise<CycleOutcome> {
    const error = err instanceof Error ? err : new Error(String(err));
    console.error(`[CYCLE] Cycle failed while ${stage}: ${error.message}`);

    const fallbackPublished = withFallback
      ? await this.publish("fallback status", () =>
          this.options.publisher.setStatusText(FALLBACK_STATUS),
        )
      : false;

    return { type: "failed", stage, error, fallbackPublished };
  }

  /** Run one publisher call; failures are logged and reported as `false`. */
  private async publish(what: string, action: () => Promise<void>): Promise<boolean> {
    try {
      await action();
      return true;
    } catch (err) {
      const error =
        err instanceof PublishError
          ? err
          : new PublishError(`Could not publish ${what}: ${errorMessage(err)}`, { cause: err });
      console.warn(`[PUBLISH] ${error.message}`);
      return false;
    }
  }

  private setState(state: CycleState): void {
    if (this._state === state) return;
    this._state = state;
    this.emit("state", state);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }
}
