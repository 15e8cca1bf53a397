// Severity of a finding. Ordered, so levels can be compared with < and >.
export enum Level {
  Ok = 0,
  Info = 1,
  Warn = 2,
  Error = 3
}

// Group used for issues about the resource as a whole rather than one of its containers
export const ROOT = '__root__';

export interface Issue {
  group: string;
  level: Level;
  message: string;
}

export type Issues = Issue[];

export function newIssue(group: string, level: Level, message: string): Issue {
  return { group, level, message };
}

const LEVEL_NAMES: Record<Level, string> = {
  [Level.Ok]: 'Ok',
  [Level.Info]: 'Info',
  [Level.Warn]: 'Warn',
  [Level.Error]: 'Error'
};

export function levelName(level: Level): string {
  return LEVEL_NAMES[level];
}

// Parses a level name case-insensitively ("warn", "Error"...)
export function parseLevel(name: string): Level | undefined {
  const levels = [Level.Ok, Level.Info, Level.Warn, Level.Error];
  return levels.find(l => LEVEL_NAMES[l].toLowerCase() === name.toLowerCase());
}

export function maxSeverity(issues: readonly Issue[]): Level {
  return issues.reduce<Level>((max, issue) => (issue.level > max ? issue.level : max), Level.Ok);
}

export function filterIssues(issues: readonly Issue[], minLevel: Level): Issues {
  return issues.filter(i => i.level >= minLevel);
}
