import type { V1Deployment, V1LabelSelector, V1Pod } from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import type { Allocations, SanitizerConfig } from '../config/config';
import type { DeploymentLister, PodLister } from '../sanitize/types';
import type { PodMetricsSnapshot } from '../types/metrics';
import { fqn } from './fqn';
import { matchesSelector } from './selector';

const logger = getLogger();

// Point-in-time copy of the cluster objects the sanitizers read
export interface ClusterSnapshot {
  deployments: V1Deployment[];
  pods: V1Pod[];
  podMetrics: PodMetricsSnapshot[];
}

type NameMeta = { name?: string | undefined; namespace?: string | undefined } | undefined;

function indexByFqn<T>(items: T[], meta: (item: T) => NameMeta): Map<string, T> {
  const index = new Map<string, T>();
  for (const item of items) {
    const m = meta(item);
    if (!m?.name) {
      logger.warn('Skipping object without a name');
      continue;
    }
    index.set(fqn(m.namespace ?? '', m.name), item);
  }
  return index;
}

// ClusterCache serves a snapshot through the lister interfaces, with thresholds
// taken from the sanitizer configuration.
export class ClusterCache implements DeploymentLister, PodLister {
  private readonly deployments: Map<string, V1Deployment>;
  private readonly pods: Map<string, V1Pod>;
  private readonly podMetrics: Map<string, PodMetricsSnapshot>;

  constructor(
    snapshot: ClusterSnapshot,
    private readonly config: SanitizerConfig
  ) {
    this.deployments = indexByFqn(snapshot.deployments, d => d.metadata);
    this.pods = indexByFqn(snapshot.pods, p => p.metadata);
    this.podMetrics = indexByFqn(snapshot.podMetrics, m => m.metadata);
  }

  listDeployments(): Map<string, V1Deployment> {
    return new Map(this.deployments);
  }

  listPods(): Map<string, V1Pod> {
    return new Map(this.pods);
  }

  listPodsMetrics(): Map<string, PodMetricsSnapshot> {
    return new Map(this.podMetrics);
  }

  listPodsBySelector(namespace: string, selector: V1LabelSelector | undefined): Map<string, V1Pod> {
    const res = new Map<string, V1Pod>();
    for (const [podFqn, pod] of this.pods) {
      if (pod.metadata?.namespace === namespace && matchesSelector(pod.metadata.labels, selector)) {
        res.set(podFqn, pod);
      }
    }
    return res;
  }

  cpuResourceLimits(): Allocations {
    return this.config.cpu;
  }

  memResourceLimits(): Allocations {
    return this.config.memory;
  }

  restartsLimit(): number {
    return this.config.restartsLimit;
  }

  podCPULimit(): number {
    return this.config.podCPULimit;
  }

  podMEMLimit(): number {
    return this.config.podMEMLimit;
  }
}
