import type { Environment, InventoryRecord } from '../../types/index.js';

export const ENV_COLORS: Record<Environment, string> = {
  prod: '#007bff',
  dev: '#28a745',
  test: '#fd7e14',
  qa: '#6f42c1',
  external: '#ff3366',
  unknown: '#6c757d',
};

// First match wins; pre-production names are checked before "prod".
const PATTERNS: ReadonlyArray<[Environment, readonly string[]]> = [
  ['qa', ['pre-prod', 'preprod', 'preproduction', 'pre production']],
  ['prod', ['prod', 'prd', 'produktion', 'production']],
  ['dev', ['dev', 'developer']],
  ['test', ['test', 'tst']],
  ['qa', ['qa', 'quality']],
];

/** Classify a role, tag or host name by naming convention. */
export function classifyName(name: string | null | undefined): Environment {
  if (!name) return 'unknown';
  const val = name.toLowerCase();
  for (const [env, keys] of PATTERNS) {
    if (keys.some((k) => val.includes(k))) return env;
  }
  return 'unknown';
}

/**
 * Environment of a graph node: public IP → external, then inventory role,
 * inventory tags, and finally the host name itself.
 */
export function classifyNode(
  name: string,
  isPublicIp: boolean,
  inventory: InventoryRecord | undefined,
): Environment {
  if (isPublicIp) return 'external';
  if (inventory) {
    const byRole = classifyName(inventory.role);
    if (byRole !== 'unknown') return byRole;
    for (const tag of inventory.tags) {
      const byTag = classifyName(tag);
      if (byTag !== 'unknown') return byTag;
    }
  }
  return classifyName(name);
}
