import type { V1Container } from '@kubernetes/client-node';
import { Level, newIssue, type Issues } from '../issues/issue';
import { hasLimits, hasRequests, isBestEffort } from '../analysis/resources';

export interface ContainerCheckOptions {
  checkProbes: boolean;
}

// Returns the image tag, or undefined when the image is neither tagged nor pinned by digest
export function imageTag(image: string): string | undefined {
  if (image.includes('@')) {
    return image.slice(image.indexOf('@') + 1);
  }
  const lastSegment = image.slice(image.lastIndexOf('/') + 1);
  const idx = lastSegment.indexOf(':');
  return idx === -1 ? undefined : lastSegment.slice(idx + 1);
}

function checkImage(co: V1Container, issues: Issues): void {
  if (!co.image) {
    return;
  }
  const tag = imageTag(co.image);
  if (tag === undefined) {
    issues.push(newIssue(co.name, Level.Error, 'Untagged docker image in use'));
    return;
  }
  if (tag === 'latest') {
    issues.push(newIssue(co.name, Level.Warn, 'Image tagged "latest" in use'));
  }
}

function checkResources(co: V1Container, issues: Issues): void {
  if (isBestEffort(co)) {
    issues.push(newIssue(co.name, Level.Warn, 'No resources defined'));
    return;
  }
  if (hasRequests(co) && !hasLimits(co)) {
    issues.push(newIssue(co.name, Level.Info, 'No resource limits defined'));
  }
}

function checkProbes(co: V1Container, issues: Issues): void {
  if (!co.readinessProbe) {
    issues.push(newIssue(co.name, Level.Warn, 'No readiness probe'));
  }
  if (!co.livenessProbe) {
    issues.push(newIssue(co.name, Level.Warn, 'No liveness probe'));
  }
}

// Runs the per container checks. Issues are grouped under the container name.
export function checkContainer(co: V1Container, opts: ContainerCheckOptions): Issues {
  const issues: Issues = [];
  checkImage(co, issues);
  checkResources(co, issues);
  if (opts.checkProbes) {
    checkProbes(co, issues);
  }
  return issues;
}
