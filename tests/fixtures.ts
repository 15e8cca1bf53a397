import type {
  V1Container,
  V1ContainerStatus,
  V1Deployment,
  V1LabelSelector,
  V1Pod,
  V1ResourceRequirements
} from '@kubernetes/client-node';
import type { Allocations } from '../src/config/config';
import type { DeploymentLister, PodLister } from '../src/sanitize/types';
import type { PodMetricsSnapshot } from '../src/types/metrics';
import { fqn } from '../src/cache/fqn';

export interface ContainerOpts {
  image?: string;
  rcpu?: string;
  rmem?: string;
  lcpu?: string;
  lmem?: string;
  probes?: boolean;
}

export interface DeploymentOpts {
  reps?: number;
  availReps?: number;
  collisions?: number;
  co?: ContainerOpts;
}

export interface PodOpts {
  phase?: string;
  ready?: boolean;
  restarts?: number;
  labels?: Record<string, string>;
  withInit?: boolean;
  co?: ContainerOpts;
}

function resourceList(cpu: string | undefined, mem: string | undefined): Record<string, string> | undefined {
  const list: Record<string, string> = {};
  if (cpu) list['cpu'] = cpu;
  if (mem) list['memory'] = mem;
  return Object.keys(list).length > 0 ? list : undefined;
}

export function makeContainer(name: string, o: ContainerOpts = {}): V1Container {
  const resources: V1ResourceRequirements = {};
  const requests = resourceList(o.rcpu, o.rmem);
  const limits = resourceList(o.lcpu, o.lmem);
  if (requests) resources.requests = requests;
  if (limits) resources.limits = limits;

  const co: V1Container = { name, image: o.image ?? 'fred:0.0.1', resources };
  if (o.probes) {
    co.readinessProbe = { httpGet: { path: '/ready', port: 8080 } };
    co.livenessProbe = { httpGet: { path: '/live', port: 8080 } };
  }
  return co;
}

export function makeDeployment(name: string, o: DeploymentOpts = {}, namespace = 'default'): V1Deployment {
  return {
    metadata: { name, namespace },
    spec: {
      replicas: o.reps ?? 1,
      selector: { matchLabels: { app: name } },
      template: {
        metadata: { labels: { app: name } },
        spec: {
          initContainers: [makeContainer('i1', o.co)],
          containers: [makeContainer('c1', o.co)]
        }
      }
    },
    status: {
      availableReplicas: o.availReps ?? 1,
      collisionCount: o.collisions ?? 0
    }
  };
}

function makeContainerStatus(name: string, o: PodOpts): V1ContainerStatus {
  return {
    name,
    image: o.co?.image ?? 'fred:0.0.1',
    imageID: '',
    ready: o.ready ?? true,
    restartCount: o.restarts ?? 0
  };
}

export function makePod(name: string, o: PodOpts = {}, namespace = 'default'): V1Pod {
  return {
    metadata: { name, namespace, labels: o.labels ?? { app: 'd1' } },
    spec: {
      ...(o.withInit ? { initContainers: [makeContainer('i1', o.co)] } : {}),
      containers: [makeContainer('c1', o.co)]
    },
    status: {
      phase: o.phase ?? 'Running',
      containerStatuses: [makeContainerStatus('c1', o)]
    }
  };
}

// usage per container name: [cpu, memory]
export function makePodMetrics(
  name: string,
  usage: Record<string, [string, string]>,
  namespace = 'default'
): PodMetricsSnapshot {
  return {
    metadata: { name, namespace },
    containers: Object.entries(usage).map(([co, [cpu, memory]]) => ({ name: co, usage: { cpu, memory } }))
  };
}

function byFqn<T extends { metadata?: { name?: string | undefined; namespace?: string | undefined } | undefined }>(
  items: T[]
): Map<string, T> {
  return new Map(items.map(item => [fqn(item.metadata?.namespace ?? '', item.metadata?.name ?? ''), item] as const));
}

export const TEST_ALLOCATIONS: Allocations = { underPerc: 100, overPerc: 50 };

// In-memory lister serving fixed objects. Every pod is returned for any selector.
export class FakeLister implements DeploymentLister, PodLister {
  constructor(
    private readonly objects: {
      deployments?: V1Deployment[];
      pods?: V1Pod[];
      metrics?: PodMetricsSnapshot[];
    },
    private readonly allocations: Allocations = TEST_ALLOCATIONS
  ) {}

  listDeployments(): Map<string, V1Deployment> {
    return byFqn(this.objects.deployments ?? []);
  }

  listPods(): Map<string, V1Pod> {
    return byFqn(this.objects.pods ?? []);
  }

  listPodsBySelector(_namespace: string, _selector: V1LabelSelector | undefined): Map<string, V1Pod> {
    return this.listPods();
  }

  listPodsMetrics(): Map<string, PodMetricsSnapshot> {
    return byFqn(this.objects.metrics ?? []);
  }

  cpuResourceLimits(): Allocations {
    return this.allocations;
  }

  memResourceLimits(): Allocations {
    return this.allocations;
  }

  restartsLimit(): number {
    return 10;
  }

  podCPULimit(): number {
    return 80;
  }

  podMEMLimit(): number {
    return 80;
  }
}
