import type { V1Container, V1PodSpec } from '@kubernetes/client-node';
import { toBytes, toMillis } from './quantity';
import type { ContainerMetrics, PodMetricsSnapshot, PodsMetrics } from '../types/metrics';

export interface RequestedResources {
  cpu: number;
  mem: number;
}

export function hasRequests(co: V1Container): boolean {
  return Object.keys(co.resources?.requests ?? {}).length > 0;
}

export function hasLimits(co: V1Container): boolean {
  return Object.keys(co.resources?.limits ?? {}).length > 0;
}

// True when the container declares neither CPU nor memory, request or limit.
// Such a container runs as best effort.
export function isBestEffort(co: V1Container): boolean {
  const requests: Record<string, string> = co.resources?.requests ?? {};
  const limits: Record<string, string> = co.resources?.limits ?? {};
  return (
    requests['cpu'] === undefined &&
    requests['memory'] === undefined &&
    limits['cpu'] === undefined &&
    limits['memory'] === undefined
  );
}

// Requested CPU (millicores) and memory (bytes) of one container. Limits are not
// taken into account.
export function containerRequests(co: V1Container): RequestedResources {
  const requests: Record<string, string> = co.resources?.requests ?? {};
  const cpu = requests['cpu'];
  const mem = requests['memory'];
  return {
    cpu: cpu === undefined ? 0 : toMillis(cpu),
    mem: mem === undefined ? 0 : toBytes(mem)
  };
}

// Sum of requests over init and main containers of a pod spec
export function podRequests(spec: V1PodSpec): RequestedResources {
  const containers = [...(spec.initContainers ?? []), ...spec.containers];
  return containers.reduce<RequestedResources>(
    (acc, co) => {
      const req = containerRequests(co);
      return { cpu: acc.cpu + req.cpu, mem: acc.mem + req.mem };
    },
    { cpu: 0, mem: 0 }
  );
}

// Converts raw pod metrics into per container usage keyed by pod FQN
export function toPodsMetrics(raw: ReadonlyMap<string, PodMetricsSnapshot>): PodsMetrics {
  const pmx: PodsMetrics = new Map();
  for (const [podFqn, mx] of raw) {
    pmx.set(podFqn, toContainerMetrics(mx));
  }
  return pmx;
}

export function toContainerMetrics(mx: PodMetricsSnapshot): ContainerMetrics {
  const cmx: ContainerMetrics = new Map();
  for (const co of mx.containers) {
    cmx.set(co.name, {
      currentCPU: toMillis(co.usage.cpu),
      currentMEM: toBytes(co.usage.memory)
    });
  }
  return cmx;
}
