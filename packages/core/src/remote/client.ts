/**
 * render-dash Core — Remote Client Contract
 *
 * The core never talks to the network. It declares what it needs from a
 * remote client; the concrete HTTP implementation lives in
 * @render-dash/runtime-host and is injected into the SyncEngine.
 *
 * Every method either resolves with a parsed value or rejects with a
 * RemoteError (after the implementation's own retry policy has run).
 */

import { RemoteError, RemoteErrorKind, toRemoteError } from '../types/errors.js';
import type { DeployDetail, RemoteStatus, ServiceDetail } from '../types/status.js';
import { ServiceState, isDeployInProgress } from '../types/status.js';

export interface RemoteStatusClient {
  fetchServiceDetail(id: string): Promise<ServiceDetail>;
  /** Resolves `null` when the service has never deployed. */
  fetchLatestDeploy(id: string): Promise<DeployDetail | null>;
  fetchCombined(id: string): Promise<RemoteStatus>;
  /** Every service visible to the credential. */
  listServices(): Promise<ServiceDetail[]>;
}

/** The two reads fetchCombined() is built from. */
export type StatusReads = Pick<RemoteStatusClient, 'fetchServiceDetail' | 'fetchLatestDeploy'>;

/**
 * Run both reads concurrently and merge them.
 *
 * Both must succeed; a partial result is never returned. When both fail,
 * the service-detail error is the one reported.
 *
 * A deploy that has not settled promotes the service to Deploying, since
 * the service record itself keeps reporting the previous live state until
 * the rollout finishes.
 */
export async function fetchCombined(reads: StatusReads, id: string): Promise<RemoteStatus> {
  const [detailResult, deployResult] = await Promise.allSettled([
    reads.fetchServiceDetail(id),
    reads.fetchLatestDeploy(id),
  ]);

  if (detailResult.status === 'rejected') throw toRemoteError(detailResult.reason);
  if (deployResult.status === 'rejected') throw toRemoteError(deployResult.reason);

  const detail = detailResult.value;
  const latestDeploy = deployResult.value;

  if (detail.id !== id) {
    throw new RemoteError(
      RemoteErrorKind.MalformedResponse,
      `Service detail for ${id} reported id ${detail.id}`,
    );
  }

  if (latestDeploy !== null && isDeployInProgress(latestDeploy.deployState)) {
    return { detail: { ...detail, state: ServiceState.Deploying }, latestDeploy };
  }

  return { detail, latestDeploy };
}
