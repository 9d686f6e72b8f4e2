// backend/services/gateway/src/registry/RedisMembershipNotifier.ts
import { createClient } from "redis";
import { getLogger } from "@edge/shared/src/utils/logger";
import type { MembershipNotifier } from "./MembershipNotifier";

type RedisSubscriber = ReturnType<typeof createClient>;

/**
 * Redis pub/sub listener: any message on the channel is a change signal.
 * Connects in the background; until Redis answers (or if it never does)
 * the fallback timer alone converges the routes.
 */
export class RedisMembershipNotifier implements MembershipNotifier {
  private readonly log = getLogger().child({ component: "RedisMembershipNotifier" });
  private readonly listeners = new Set<() => void>();
  private client?: RedisSubscriber;

  constructor(
    private readonly url: string,
    private readonly channel: string
  ) {}

  /** Start connecting; never blocks the caller on Redis. */
  public start(): void {
    if (this.client) return;
    const client = createClient({ url: this.url });
    this.client = client;

    client.on("error", (err: unknown) => {
      this.log.warn({ err, channel: this.channel }, "redis subscriber error");
    });

    client
      .connect()
      .then(async () => {
        if (this.client !== client) return;
        await client.subscribe(this.channel, () => this.notify());
        this.log.info({ channel: this.channel }, "subscribed to registry changes");
      })
      .catch((err: unknown) => {
        this.log.warn(
          { err, channel: this.channel },
          "redis subscribe failed; relying on fallback polling"
        );
      });
  }

  public subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public async close(): Promise<void> {
    const client = this.client;
    this.client = undefined;
    this.listeners.clear();
    if (!client || !client.isOpen) return;
    // QUIT would sit in the offline queue of a client that never connected.
    if (client.isReady) await client.quit();
    else await client.disconnect();
  }

  private notify(): void {
    for (const listener of [...this.listeners]) {
      try {
        listener();
      } catch (err) {
        this.log.error({ err }, "membership listener threw");
      }
    }
  }
}
