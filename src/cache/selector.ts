import type { V1LabelSelector } from '@kubernetes/client-node';

// Reports whether a label set satisfies a label selector. An empty selector
// matches everything; a missing one matches nothing.
export function matchesSelector(labels: Record<string, string> | undefined, selector: V1LabelSelector | undefined): boolean {
  if (!selector) {
    return false;
  }
  const set = labels ?? {};

  for (const [key, value] of Object.entries(selector.matchLabels ?? {})) {
    if (set[key] !== value) {
      return false;
    }
  }

  return (selector.matchExpressions ?? []).every(expr => {
    const value = set[expr.key];
    const values = expr.values ?? [];
    switch (expr.operator) {
      case 'In':
        return value !== undefined && values.includes(value);
      case 'NotIn':
        return value === undefined || !values.includes(value);
      case 'Exists':
        return value !== undefined;
      case 'DoesNotExist':
        return value === undefined;
      default:
        return false;
    }
  });
}
