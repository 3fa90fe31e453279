/**
 * render-dash Runtime Host — Render API Response Schemas
 *
 * zod schemas for the three Render endpoints the client reads, and the
 * mapping from Render's status vocabulary to the core ServiceState and
 * DeployState enums.
 *
 * Render returns list items wrapped (`[{ service: {...}, cursor }]`) and
 * single resources unwrapped; both shapes are accepted everywhere.
 */

import { z } from 'zod';
import { DeployState, ServiceState } from '@render-dash/core';
import type { DeployDetail, ServiceDetail } from '@render-dash/core';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const ServiceBodySchema = z.object({
  id: z.string().min(1),
  name: z.string().nullish(),
  type: z.string().nullish(),
  status: z.string().nullish(),
  /** `suspended` or `not_suspended`. */
  suspended: z.string().nullish(),
  serviceDetails: z.object({ url: z.string().nullish() }).nullish(),
});

export const ServiceResponseSchema = z.union([z.object({ service: ServiceBodySchema }), ServiceBodySchema]);

const ServiceItemSchema = ServiceResponseSchema;

export const ServiceListResponseSchema = z.union([
  z.array(ServiceItemSchema),
  z.object({ services: z.array(ServiceItemSchema) }),
]);

export const DeployBodySchema = z.object({
  id: z.string().min(1),
  status: z.string().nullish(),
  commit: z
    .object({
      id: z.string().nullish(),
      message: z.string().nullish(),
    })
    .nullish(),
  createdAt: z.string().nullish(),
  finishedAt: z.string().nullish(),
});

const DeployItemSchema = z.union([z.object({ deploy: DeployBodySchema }), DeployBodySchema]);

export const DeployListResponseSchema = z.union([
  z.array(DeployItemSchema),
  z.object({ deploys: z.array(DeployItemSchema) }),
]);

export type ServiceBody = z.infer<typeof ServiceBodySchema>;
export type DeployBody = z.infer<typeof DeployBodySchema>;

// ---------------------------------------------------------------------------
// Unwrapping
// ---------------------------------------------------------------------------

export function unwrapService(data: z.infer<typeof ServiceResponseSchema>): ServiceBody {
  return 'service' in data ? data.service : data;
}

export function unwrapServiceList(data: z.infer<typeof ServiceListResponseSchema>): ServiceBody[] {
  const items = Array.isArray(data) ? data : data.services;
  return items.map(unwrapService);
}

export function unwrapDeployList(data: z.infer<typeof DeployListResponseSchema>): DeployBody[] {
  const items = Array.isArray(data) ? data : data.deploys;
  return items.map((item) => ('deploy' in item ? item.deploy : item));
}

// ---------------------------------------------------------------------------
// Status Mapping
// ---------------------------------------------------------------------------

const SERVICE_STATUS: Readonly<Record<string, ServiceState>> = {
  available: ServiceState.Running,
  deploying: ServiceState.Deploying,
  suspended: ServiceState.Suspended,
  failed: ServiceState.Failed,
  unavailable: ServiceState.Failed,
};

/**
 * The `suspended` flag wins over `status`. Without a `status` field an
 * explicitly not-suspended service is reported Running.
 */
export function mapServiceState(body: Pick<ServiceBody, 'status' | 'suspended'>): ServiceState {
  const suspended = body.suspended?.toLowerCase();
  if (suspended === 'suspended') return ServiceState.Suspended;

  const status = body.status?.toLowerCase();
  if (status === undefined || status === null || status === '') {
    return suspended === 'not_suspended' ? ServiceState.Running : ServiceState.Unknown;
  }
  return SERVICE_STATUS[status] ?? ServiceState.Unknown;
}

/** Unrecognized deploy statuses are treated as Created (not yet settled). */
export function mapDeployState(status: string | null | undefined): DeployState {
  const value = status?.toLowerCase() ?? '';
  if (value === 'live') return DeployState.Live;
  if (value.endsWith('_in_progress')) return DeployState.Building;
  if (value.endsWith('_failed')) return DeployState.Failed;
  if (value === 'canceled' || value === 'deactivated') return DeployState.Canceled;
  return DeployState.Created;
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

export function toServiceDetail(body: ServiceBody): ServiceDetail {
  const url = body.serviceDetails?.url;
  return {
    id: body.id,
    name: body.name ?? body.id,
    type: body.type ?? 'unknown',
    state: mapServiceState(body),
    ...(url !== undefined && url !== null && url !== '' ? { url } : {}),
  };
}

export function toDeployDetail(body: DeployBody, now: Date): DeployDetail {
  const commitRef = body.commit?.id ?? undefined;
  const commitMessage = body.commit?.message ?? undefined;
  const finishedAt = parseTimestamp(body.finishedAt);
  return {
    id: body.id,
    deployState: mapDeployState(body.status),
    startedAt: parseTimestamp(body.createdAt) ?? now,
    ...(commitRef !== undefined ? { commitRef } : {}),
    ...(commitMessage !== undefined ? { commitMessage } : {}),
    ...(finishedAt !== undefined ? { finishedAt } : {}),
  };
}

/** ISO-8601 → Date; absent or unparseable → undefined. */
export function parseTimestamp(value: string | null | undefined): Date | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
