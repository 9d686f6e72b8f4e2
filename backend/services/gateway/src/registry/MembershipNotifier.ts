// backend/services/gateway/src/registry/MembershipNotifier.ts
import type { Unsubscribe } from "../routing/types";

/** Push channel for "registry membership changed". Payloads are ignored. */
export interface MembershipNotifier {
  subscribe(listener: () => void): Unsubscribe;
  close(): Promise<void>;
}
