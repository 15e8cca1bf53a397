import type { Allocations } from '../config/config';
import { Level, ROOT, newIssue, type Issue } from '../issues/issue';
import { formatCPU, formatMemory, formatPerc } from './quantity';

export type Dimension = 'CPU' | 'Memory';

export type AllocationStatus = 'under' | 'over' | 'ok';

export interface UtilizationResult {
  status: AllocationStatus;
  // Ratio behind the status, in percent. Undefined when nothing was compared.
  ratio?: number | undefined;
}

// Usage is compared against requests, never limits. Under allocation is checked
// first so at most one direction is reported per dimension.
export function classifyUtilization(requested: number, current: number, allocs: Allocations): UtilizationResult {
  if (requested === 0) {
    return { status: 'ok' };
  }

  const underRatio = (current / requested) * 100;
  if (underRatio >= 100 + allocs.underPerc) {
    return { status: 'under', ratio: underRatio };
  }

  // A zero usage yields an infinite ratio, i.e. the whole request is idle
  const overRatio = current === 0 ? Infinity : (requested / current) * 100;
  if (overRatio >= 100 + allocs.overPerc) {
    return { status: 'over', ratio: overRatio };
  }

  return { status: 'ok' };
}

function formatAmount(dimension: Dimension, amount: number): string {
  return dimension === 'CPU' ? formatCPU(amount) : formatMemory(amount);
}

// Checks usage of one dimension (millicores for CPU, bytes for Memory) against the
// requested baseline and returns the matching issue, if any.
export function checkUtilization(
  dimension: Dimension,
  requested: number,
  current: number,
  allocs: Allocations
): Issue | undefined {
  const { status, ratio } = classifyUtilization(requested, current, allocs);
  if (status === 'ok' || ratio === undefined) {
    return undefined;
  }

  const label = status === 'under' ? 'under allocated' : 'over allocated';
  return newIssue(
    ROOT,
    Level.Warn,
    `At current load, ${dimension} ${label}. Current:${formatAmount(dimension, current)} vs Requested:${formatAmount(
      dimension,
      requested
    )} (${formatPerc(ratio)}%)`
  );
}
