import type { Issue, Level } from '../issues/issue';

export interface ResourceReport {
  fqn: string;
  level: Level;
  issues: Issue[];
}

export interface ReportSection {
  kind: string;
  resources: ResourceReport[];
}

export interface SanitizeReport {
  context: string;
  namespace: string;
  timestamp: string;
  sections: ReportSection[];
}
