// backend/services/shared/src/contracts/registry.contract.ts
import { z } from "zod";

/**
 * Registry snapshot as served by `GET {REGISTRY_BASE_URL}/services`.
 * Service ids are opaque; case is preserved as the registry reports it.
 */
export const ServiceInstanceSchema = z.object({
  baseUrl: z.string().url(),
  healthy: z.boolean().default(true),
});

export const RegistryServiceSchema = z.object({
  serviceId: z.string().trim().min(1),
  instances: z.array(ServiceInstanceSchema).default([]),
});

export const RegistrySnapshotSchema = z.object({
  services: z.array(RegistryServiceSchema),
  updatedAt: z.string().optional(),
});

export type ServiceInstance = z.infer<typeof ServiceInstanceSchema>;
export type RegistryService = z.infer<typeof RegistryServiceSchema>;
export type RegistrySnapshot = z.infer<typeof RegistrySnapshotSchema>;
