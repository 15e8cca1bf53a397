import type { V1Deployment } from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import type { Collector, Outcome } from '../issues/collector';
import { Level, ROOT, newIssue, type Issues } from '../issues/issue';
import { splitFqn } from '../cache/fqn';
import { podRequests, toPodsMetrics } from '../analysis/resources';
import { checkUtilization } from '../analysis/utilization';
import type { PodsMetrics } from '../types/metrics';
import { checkContainer } from './container';
import { SanitizeError, type DeploymentLister, type SanitizeOptions } from './types';

const logger = getLogger();

interface ConsumptionMetrics {
  requestCPU: number;
  requestMEM: number;
  currentCPU: number;
  currentMEM: number;
}

// DeploymentSanitizer checks deployments for scale, availability, collisions,
// container resources and, on demand, requested resources vs current usage.
export class DeploymentSanitizer {
  constructor(
    private readonly collector: Collector,
    private readonly lister: DeploymentLister
  ) {}

  sanitize(opts: SanitizeOptions = {}): void {
    const overAllocs = opts.overAllocs === true;
    const pmx: PodsMetrics = overAllocs ? toPodsMetrics(this.lister.listPodsMetrics()) : new Map();

    for (const [fqn, dp] of this.lister.listDeployments()) {
      logger.debug(`Sanitizing deployment ${fqn}`);
      // Issues are committed once every check went through
      const issues = this.checkDeployment(fqn, dp, overAllocs, pmx);
      this.collector.initOutcome(fqn);
      for (const issue of issues) {
        this.collector.addIssue(fqn, issue);
      }
    }
  }

  outcome(): Outcome {
    return this.collector.outcome();
  }

  private checkDeployment(fqn: string, dp: V1Deployment, overAllocs: boolean, pmx: PodsMetrics): Issues {
    const podSpec = dp.spec?.template.spec;
    if (!dp.spec || !podSpec) {
      throw new SanitizeError(`Deployment ${fqn} has no pod template spec`);
    }

    const issues: Issues = [];
    const replicas = dp.spec.replicas ?? 1;
    const available = dp.status?.availableReplicas ?? 0;
    const collisions = dp.status?.collisionCount ?? 0;

    if (replicas === 0) {
      issues.push(newIssue(ROOT, Level.Warn, 'Zero scale detected'));
    }
    if (replicas > 0 && available === 0) {
      issues.push(newIssue(ROOT, Level.Warn, 'Used? No available replicas found'));
    }
    if (collisions > 0) {
      issues.push(newIssue(ROOT, Level.Error, `ReplicaSet collisions detected (${collisions})`));
    }

    for (const co of [...(podSpec.initContainers ?? []), ...podSpec.containers]) {
      issues.push(...checkContainer(co, { checkProbes: false }));
    }

    if (overAllocs) {
      const mx = this.deploymentUsage(fqn, dp, pmx);
      const cpu = checkUtilization('CPU', mx.requestCPU, mx.currentCPU, this.lister.cpuResourceLimits());
      if (cpu) issues.push(cpu);
      const mem = checkUtilization('Memory', mx.requestMEM, mx.currentMEM, this.lister.memResourceLimits());
      if (mem) issues.push(mem);
    }

    return issues;
  }

  // Requests and usage are both summed over the pods the deployment selects;
  // pods without metrics count as idle.
  private deploymentUsage(fqn: string, dp: V1Deployment, pmx: PodsMetrics): ConsumptionMetrics {
    const mx: ConsumptionMetrics = { requestCPU: 0, requestMEM: 0, currentCPU: 0, currentMEM: 0 };

    const namespace = dp.metadata?.namespace ?? splitFqn(fqn).namespace;
    for (const [podFqn, pod] of this.lister.listPodsBySelector(namespace, dp.spec?.selector)) {
      if (pod.spec) {
        const requests = podRequests(pod.spec);
        mx.requestCPU += requests.cpu;
        mx.requestMEM += requests.mem;
      }

      const cmx = pmx.get(podFqn);
      if (!cmx) {
        logger.warn(`No metrics found for pod ${podFqn}`);
        continue;
      }
      for (const usage of cmx.values()) {
        mx.currentCPU += usage.currentCPU;
        mx.currentMEM += usage.currentMEM;
      }
    }
    return mx;
  }
}
