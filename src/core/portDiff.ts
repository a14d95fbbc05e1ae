export interface PortDiff {
  appeared: string[];
  disappeared: string[];
}

/**
 * appeared = snapshot - knownActive
 * disappeared = knownActive - snapshot
 * 结果排序，保证同一 tick 内按端口名稳定派发
 */
export function diffPorts(snapshot: Iterable<string>, knownActive: Iterable<string>): PortDiff {
  const current = new Set<string>();
  for (const p of snapshot) {
    if (p) current.add(p);
  }
  const known = new Set<string>(knownActive);

  const appeared: string[] = [];
  for (const p of current) {
    if (!known.has(p)) appeared.push(p);
  }
  const disappeared: string[] = [];
  for (const p of known) {
    if (!current.has(p)) disappeared.push(p);
  }

  appeared.sort();
  disappeared.sort();
  return { appeared, disappeared };
}
