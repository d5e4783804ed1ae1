import { logger } from '@envswitch/adapters/logging';
import type { ServiceGroup } from '@envswitch/contracts';
import { DependencyResolutionError } from '../../errors';

export interface DependencyEdge {
  from: string;
  to: string;
}

const ARROW = ' -> ';

/**
 * Parse a `"from -> to"` constraint. Surrounding whitespace on either
 * endpoint is trimmed.
 */
export function parseDependency(constraint: string): DependencyEdge {
  const parts = constraint.split(ARROW);
  const from = parts[0]?.trim() ?? '';
  const to = parts[1]?.trim() ?? '';
  if (parts.length !== 2 || !from || !to) {
    throw new DependencyResolutionError(
      'ERR_DEPENDENCY_FORMAT',
      `invalid dependency format: "${constraint}" (expected "from -> to")`,
    );
  }
  return { from, to };
}

function buildEdges(services: Set<string>, constraints: readonly string[]): DependencyEdge[] {
  return constraints.map((constraint) => {
    const edge = parseDependency(constraint);
    if (!services.has(edge.from)) {
      throw new DependencyResolutionError(
        'ERR_UNKNOWN_SERVICE',
        `unknown source service "${edge.from}" in dependency "${constraint}"`,
      );
    }
    if (!services.has(edge.to)) {
      throw new DependencyResolutionError(
        'ERR_UNKNOWN_SERVICE',
        `unknown target service "${edge.to}" in dependency "${constraint}"`,
      );
    }
    return edge;
  });
}

interface Frame {
  node: string;
  /** index of the next successor to visit */
  next: number;
}

/**
 * Three-colour DFS over an explicit stack. Throws on the first edge that
 * reaches a node still on the stack; `x -> x` is reported the same way.
 */
function assertAcyclic(nodes: string[], adjacency: Map<string, string[]>): void {
  const done = new Set<string>();
  const onStack = new Set<string>();
  const stack: Frame[] = [];

  for (const root of nodes) {
    if (done.has(root)) {
      continue;
    }
    onStack.add(root);
    stack.push({ node: root, next: 0 });

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame === undefined) {
        break;
      }
      const next = (adjacency.get(frame.node) ?? [])[frame.next];
      if (next === undefined) {
        stack.pop();
        onStack.delete(frame.node);
        done.add(frame.node);
        continue;
      }
      frame.next++;

      if (onStack.has(next)) {
        throw new DependencyResolutionError(
          'ERR_CIRCULAR_DEPENDENCY',
          `circular dependency detected: ${frame.node} -> ${next}`,
        );
      }
      if (!done.has(next)) {
        onStack.add(next);
        stack.push({ node: next, next: 0 });
      }
    }
  }
}

/**
 * Group services into levels: every service of a level depends only on
 * services of earlier levels. Services inside a level are sorted by name.
 */
export function resolveDependencies(
  services: readonly string[],
  constraints: readonly string[],
): ServiceGroup[] {
  const nodes = Array.from(new Set(services)).sort();
  const edges = buildEdges(new Set(nodes), constraints);

  const adjacency = new Map<string, string[]>(nodes.map((n) => [n, []]));
  const inDegree = new Map<string, number>(nodes.map((n) => [n, 0]));
  for (const { from, to } of edges) {
    adjacency.get(from)?.push(to);
    inDegree.set(to, (inDegree.get(to) ?? 0) + 1);
  }

  assertAcyclic(nodes, adjacency);

  const groups: ServiceGroup[] = [];
  let frontier = nodes.filter((n) => inDegree.get(n) === 0);
  let placed = 0;
  while (frontier.length > 0) {
    groups.push({ level: groups.length, services: frontier });
    placed += frontier.length;

    const unlocked: string[] = [];
    for (const node of frontier) {
      for (const next of adjacency.get(node) ?? []) {
        const degree = (inDegree.get(next) ?? 0) - 1;
        inDegree.set(next, degree);
        if (degree === 0) {
          unlocked.push(next);
        }
      }
    }
    frontier = unlocked.sort();
  }
  if (placed < nodes.length) {
    const stuck = nodes.filter((n) => (inDegree.get(n) ?? 0) > 0);
    throw new DependencyResolutionError(
      'ERR_CIRCULAR_DEPENDENCY',
      `circular dependency detected among: ${stuck.join(', ')}`,
    );
  }

  logger.debug('dependencies resolved', {
    services: nodes.length,
    constraints: edges.length,
    levels: groups.length,
  });

  return groups;
}

/** Services flattened in execution order. */
export function getExecutionOrder(
  services: readonly string[],
  constraints: readonly string[],
): string[] {
  return resolveDependencies(services, constraints).flatMap((group) => group.services);
}

export function getParallelGroups(
  services: readonly string[],
  constraints: readonly string[],
): ServiceGroup[] {
  return resolveDependencies(services, constraints);
}

/** Throws DependencyResolutionError when the constraints cannot be resolved. */
export function validateDependencies(
  services: readonly string[],
  constraints: readonly string[],
): void {
  resolveDependencies(services, constraints);
}
