import type { V1Deployment, V1Pod } from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import type { ClusterSnapshot } from '../cache/clusterCache';
import type { PodMetricsSnapshot } from '../types/metrics';
import type { ClusterClients } from './k8sClient';

const logger = getLogger();

export class ClusterLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClusterLoadError';
  }
}

function field(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

// Extract a human-readable message from a K8s API error.
// Tries multiple paths where the K8s client may place the error message.
export function extractK8sErrorMessage(e: unknown, fallbackContext: string): string {
  const body = field(e, 'body');
  if (typeof body === 'string') {
    try {
      const message = field(JSON.parse(body), 'message');
      if (typeof message === 'string') return message;
    } catch {
      // Not JSON, the body is the message
      return body;
    }
  }

  const responseMessage = field(field(field(e, 'response'), 'body'), 'message');
  if (typeof responseMessage === 'string') return responseMessage;

  if (e instanceof Error && e.message) return e.message;

  return `Unknown error for ${fallbackContext}`;
}

async function fetchDeployments(clients: ClusterClients, namespace?: string): Promise<V1Deployment[]> {
  try {
    const res = namespace
      ? await clients.appsApi.listNamespacedDeployment({ namespace })
      : await clients.appsApi.listDeploymentForAllNamespaces();
    return res.items;
  } catch (e: unknown) {
    throw new ClusterLoadError(`Failed to list deployments: ${extractK8sErrorMessage(e, 'deployments')}`);
  }
}

async function fetchPods(clients: ClusterClients, namespace?: string): Promise<V1Pod[]> {
  try {
    const res = namespace
      ? await clients.coreApi.listNamespacedPod({ namespace })
      : await clients.coreApi.listPodForAllNamespaces();
    return res.items;
  } catch (e: unknown) {
    throw new ClusterLoadError(`Failed to list pods: ${extractK8sErrorMessage(e, 'pods')}`);
  }
}

// Missing metrics-server is not fatal: utilization checks then see no usage
async function fetchPodMetrics(clients: ClusterClients, namespace?: string): Promise<PodMetricsSnapshot[]> {
  try {
    const res = await clients.metricsClient.getPodMetrics(namespace);
    return res.items;
  } catch (e: unknown) {
    logger.warn(`Pod metrics unavailable (is metrics-server installed?): ${extractK8sErrorMessage(e, 'metrics')}`);
    return [];
  }
}

// Fetches every object the sanitizers need, once
export async function loadClusterSnapshot(clients: ClusterClients, namespace?: string): Promise<ClusterSnapshot> {
  const [deployments, pods, podMetrics] = await Promise.all([
    fetchDeployments(clients, namespace),
    fetchPods(clients, namespace),
    fetchPodMetrics(clients, namespace)
  ]);
  logger.info(`Loaded ${deployments.length} deployment(s), ${pods.length} pod(s), ${podMetrics.length} pod metric(s)`);
  return { deployments, pods, podMetrics };
}
