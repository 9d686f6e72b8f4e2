// backend/services/gateway/src/routing/RouteRefreshBus.ts
import { EventEmitter } from "node:events";
import type { RefreshPublisher, Unsubscribe } from "./types";

const REFRESH = "refresh";

/** In-process "routes changed" signal between the reconciler and the locator. */
export class RouteRefreshBus implements RefreshPublisher {
  private readonly emitter = new EventEmitter();
  private published = 0;

  public publishRefresh(): void {
    this.published++;
    this.emitter.emit(REFRESH);
  }

  public onRefresh(listener: () => void): Unsubscribe {
    this.emitter.on(REFRESH, listener);
    return () => {
      this.emitter.off(REFRESH, listener);
    };
  }

  public publishedCount(): number {
    return this.published;
  }
}
