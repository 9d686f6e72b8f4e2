// backend/services/gateway/src/middleware/stages.ts
import type { Express, RequestHandler } from "express";

/**
 * Edge pipeline as explicit, ordered stages. Lower `order` runs first; ties
 * keep declaration order.
 *
 *   telemetry (0)   request id, access log, problem+json, cookie parsing
 *   auth      (100) fail-closed gate; sets the trusted identity header
 *   control   (200) gateway-owned endpoints under /__gateway
 *   routing   (300) dynamic route proxy
 */
export const STAGE_ORDER = {
  telemetry: 0,
  auth: 100,
  control: 200,
  routing: 300,
} as const;

export type GatewayStage = {
  name: string;
  order: number;
  path?: string;
  handlers: RequestHandler[];
};

/** Mounts stages in priority order; returns the stage names as mounted. */
export function mountStages(app: Express, stages: GatewayStage[]): string[] {
  const ordered = stages
    .map((stage, idx) => ({ stage, idx }))
    .sort((a, b) => a.stage.order - b.stage.order || a.idx - b.idx)
    .map(({ stage }) => stage);

  for (const stage of ordered) {
    for (const handler of stage.handlers) {
      if (stage.path) app.use(stage.path, handler);
      else app.use(handler);
    }
  }
  return ordered.map((s) => s.name);
}
