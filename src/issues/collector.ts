import { Level, maxSeverity, type Issue, type Issues } from './issue';

export type Outcome = ReadonlyMap<string, readonly Issue[]>;

// Collector aggregates issues per resource FQN. A single instance may be shared
// by sanitizers of different kinds so the outcome spans all of them.
export class Collector {
  private readonly issues = new Map<string, Issues>();

  // Makes sure the resource shows up in the outcome even when it has no issue
  initOutcome(fqn: string): void {
    if (!this.issues.has(fqn)) {
      this.issues.set(fqn, []);
    }
  }

  addIssue(fqn: string, issue: Issue): void {
    const current = this.issues.get(fqn);
    if (current) {
      current.push(issue);
      return;
    }
    this.issues.set(fqn, [issue]);
  }

  // Read only after every sanitizer writing to this collector has returned
  outcome(): Outcome {
    return this.issues;
  }
}

export function outcomeMaxSeverity(outcome: Outcome, fqn: string): Level {
  return maxSeverity(outcome.get(fqn) ?? []);
}
