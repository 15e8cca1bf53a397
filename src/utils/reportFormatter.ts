import type { Outcome } from '../issues/collector';
import { Level, ROOT, filterIssues, levelName, maxSeverity, type Issue } from '../issues/issue';
import type { ReportSection, ResourceReport, SanitizeReport } from '../types/report';

export interface KindOutcome {
  kind: string;
  outcome: Outcome;
}

export interface ReportInput {
  context: string;
  namespace: string;
  timestamp: string;
  outcomes: KindOutcome[];
}

function buildSection({ kind, outcome }: KindOutcome, minLevel: Level): ReportSection {
  const resources: ResourceReport[] = [];
  for (const fqn of [...outcome.keys()].sort()) {
    const issues = filterIssues(outcome.get(fqn) ?? [], minLevel);
    // Clean resources only show up when everything was asked for
    if (issues.length === 0 && minLevel > Level.Ok) continue;
    resources.push({ fqn, level: maxSeverity(issues), issues });
  }
  return { kind, resources };
}

// Keeps the issues at or above minLevel, resources sorted by FQN
export function buildReport(input: ReportInput, minLevel: Level = Level.Ok): SanitizeReport {
  return {
    context: input.context,
    namespace: input.namespace,
    timestamp: input.timestamp,
    sections: input.outcomes.map(o => buildSection(o, minLevel))
  };
}

function levelTag(level: Level): string {
  return `[${levelName(level).toUpperCase()}]`;
}

function formatIssue(issue: Issue): string {
  const scope = issue.group === ROOT ? '' : `${issue.group}: `;
  return `    ${levelTag(issue.level)} ${scope}${issue.message}`;
}

function countLevel(section: ReportSection, level: Level): number {
  return section.resources.reduce((sum, r) => sum + r.issues.filter(i => i.level === level).length, 0);
}

function formatSection(section: ReportSection): string {
  const lines: string[] = [];
  lines.push(`## ${section.kind} (${section.resources.length})`);
  lines.push('');

  if (section.resources.length === 0) {
    lines.push('Nothing to report.');
    return lines.join('\n');
  }

  section.resources.forEach(r => {
    lines.push(`${levelTag(r.level)} ${r.fqn}`);
    r.issues.forEach(issue => {
      lines.push(formatIssue(issue));
    });
  });

  lines.push('');
  lines.push(
    `Summary: ${countLevel(section, Level.Error)} error(s), ${countLevel(section, Level.Warn)} warning(s), ${countLevel(
      section,
      Level.Info
    )} info`
  );
  return lines.join('\n');
}

export function formatReport(report: SanitizeReport): string {
  const lines: string[] = [];

  // Header
  lines.push(`# Sanitizer Report: ${report.namespace}`);
  lines.push('');
  lines.push(`**Context:** ${report.context}`);
  lines.push(`**Generated:** ${report.timestamp}`);

  for (const section of report.sections) {
    lines.push('');
    lines.push(formatSection(section));
  }

  return lines.join('\n');
}

export function reportMaxSeverity(report: SanitizeReport): Level {
  return report.sections.reduce<Level>(
    (max, s) => s.resources.reduce((m, r) => (r.level > m ? r.level : m), max),
    Level.Ok
  );
}
