// Fully-qualified name of a namespaced resource: "namespace/name"
export function fqn(namespace: string, name: string): string {
  if (namespace === '') {
    return name;
  }
  return `${namespace}/${name}`;
}

export function splitFqn(value: string): { namespace: string; name: string } {
  const idx = value.indexOf('/');
  if (idx === -1) {
    return { namespace: '', name: value };
  }
  return { namespace: value.slice(0, idx), name: value.slice(idx + 1) };
}
