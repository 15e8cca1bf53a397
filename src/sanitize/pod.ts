import type { V1Container, V1ContainerStatus, V1Pod } from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import type { Collector, Outcome } from '../issues/collector';
import { Level, ROOT, newIssue, type Issues } from '../issues/issue';
import { toBytes, toMillis } from '../analysis/quantity';
import { toPodsMetrics } from '../analysis/resources';
import type { ContainerMetrics } from '../types/metrics';
import { checkContainer } from './container';
import { SanitizeError, type PodLister } from './types';

const logger = getLogger();

const HAPPY_PHASES = ['Running', 'Succeeded'];

// Limit of a container for one dimension, falling back to its request
function baseline(co: V1Container, key: 'cpu' | 'memory'): string | undefined {
  return co.resources?.limits?.[key] ?? co.resources?.requests?.[key];
}

// PodSanitizer checks pod phase, readiness, restarts, containers and how close
// each container runs to its limits.
export class PodSanitizer {
  constructor(
    private readonly collector: Collector,
    private readonly lister: PodLister
  ) {}

  sanitize(): void {
    const pmx = toPodsMetrics(this.lister.listPodsMetrics());

    for (const [fqn, po] of this.lister.listPods()) {
      logger.debug(`Sanitizing pod ${fqn}`);
      const issues = this.checkPod(fqn, po, pmx.get(fqn));
      this.collector.initOutcome(fqn);
      for (const issue of issues) {
        this.collector.addIssue(fqn, issue);
      }
    }
  }

  outcome(): Outcome {
    return this.collector.outcome();
  }

  private checkPod(fqn: string, po: V1Pod, cmx: ContainerMetrics | undefined): Issues {
    if (!po.spec) {
      throw new SanitizeError(`Pod ${fqn} has no spec`);
    }

    const issues: Issues = [];
    const phase = po.status?.phase ?? 'Unknown';
    if (!HAPPY_PHASES.includes(phase)) {
      issues.push(newIssue(ROOT, Level.Error, `Pod is in an unhappy phase (${phase})`));
    }

    const statuses = po.status?.containerStatuses ?? [];
    if (phase === 'Running') {
      const ready = statuses.filter(s => s.ready).length;
      if (ready < statuses.length) {
        issues.push(newIssue(ROOT, Level.Error, `Pod is not ready [${ready}/${statuses.length}]`));
      }
    }

    this.checkRestarts([...(po.status?.initContainerStatuses ?? []), ...statuses], issues);

    for (const co of po.spec.initContainers ?? []) {
      issues.push(...checkContainer(co, { checkProbes: false }));
    }
    for (const co of po.spec.containers) {
      issues.push(...checkContainer(co, { checkProbes: true }));
      if (cmx) {
        this.checkContainerUtilization(co, cmx, issues);
      }
    }

    return issues;
  }

  private checkRestarts(statuses: V1ContainerStatus[], issues: Issues): void {
    const limit = this.lister.restartsLimit();
    for (const status of statuses) {
      if (status.restartCount > limit) {
        issues.push(newIssue(status.name, Level.Warn, `Pod was restarted (${status.restartCount}) times`));
      }
    }
  }

  private checkContainerUtilization(co: V1Container, cmx: ContainerMetrics, issues: Issues): void {
    const mx = cmx.get(co.name);
    if (!mx) {
      return;
    }

    const cpu = baseline(co, 'cpu');
    const cpuBase = cpu === undefined ? 0 : toMillis(cpu);
    if (cpuBase > 0) {
      const perc = (mx.currentCPU / cpuBase) * 100;
      const limit = this.lister.podCPULimit();
      if (perc >= limit) {
        issues.push(newIssue(co.name, Level.Error, `CPU threshold (${limit}%) reached ${Math.round(perc)}%`));
      }
    }

    const mem = baseline(co, 'memory');
    const memBase = mem === undefined ? 0 : toBytes(mem);
    if (memBase > 0) {
      const perc = (mx.currentMEM / memBase) * 100;
      const limit = this.lister.podMEMLimit();
      if (perc >= limit) {
        issues.push(newIssue(co.name, Level.Error, `Memory threshold (${limit}%) reached ${Math.round(perc)}%`));
      }
    }
  }
}
