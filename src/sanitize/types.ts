import type { V1Deployment, V1LabelSelector, V1Pod } from '@kubernetes/client-node';
import type { Allocations } from '../config/config';
import type { PodMetricsSnapshot } from '../types/metrics';

export interface SanitizeOptions {
  // Compare current usage against requests. Needs pod metrics, off by default.
  overAllocs?: boolean | undefined;
}

export class SanitizeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SanitizeError';
  }
}

export interface ResourceLimiter {
  cpuResourceLimits(): Allocations;
  memResourceLimits(): Allocations;
}

export interface PodLimiter {
  restartsLimit(): number;
  // Percentages of a container's limit (request when unlimited)
  podCPULimit(): number;
  podMEMLimit(): number;
}

export interface PodSelectorLister {
  listPodsBySelector(namespace: string, selector: V1LabelSelector | undefined): Map<string, V1Pod>;
}

export interface PodMetricsLister {
  listPodsMetrics(): Map<string, PodMetricsSnapshot>;
}

export interface DeploymentLister extends PodLimiter, ResourceLimiter, PodSelectorLister, PodMetricsLister {
  listDeployments(): Map<string, V1Deployment>;
}

export interface PodLister extends PodLimiter, PodMetricsLister {
  listPods(): Map<string, V1Pod>;
}
