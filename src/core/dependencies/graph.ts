/**
 * Dependency Graph Data Structure
 *
 * Ordering constraints between applications. Nodes keep their insertion
 * order, and every traversal follows it, so equal inputs always produce equal
 * output.
 */

import { formatCircularDependencyError } from '../errors.js';

export interface DependencyNode<T> {
  id: string;
  value: T;
  /** Ids this node must be realized after */
  dependencies: Set<string>;
  /** Ids that must be realized after this node */
  dependents: Set<string>;
}

type VisitState = 'visiting' | 'done';

export class DependencyGraph<T> {
  private readonly nodes = new Map<string, DependencyNode<T>>();

  get size(): number {
    return this.nodes.size;
  }

  addNode(id: string, value: T): void {
    if (this.nodes.has(id)) {
      throw new Error(`Node with id '${id}' already exists in dependency graph`);
    }
    this.nodes.set(id, { id, value, dependencies: new Set(), dependents: new Set() });
  }

  /**
   * Record that `dependentId` must be realized after `dependencyId`
   */
  addEdge(dependentId: string, dependencyId: string): void {
    const dependent = this.requireNode(dependentId, 'Dependent');
    const dependency = this.requireNode(dependencyId, 'Dependency');
    dependent.dependencies.add(dependencyId);
    dependency.dependents.add(dependentId);
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  getNode(id: string): DependencyNode<T> | undefined {
    return this.nodes.get(id);
  }

  getNodeIds(): string[] {
    return [...this.nodes.keys()];
  }

  getDependencies(id: string): string[] {
    return [...(this.nodes.get(id)?.dependencies ?? [])];
  }

  getDependents(id: string): string[] {
    return [...(this.nodes.get(id)?.dependents ?? [])];
  }

  /**
   * Every edge as a [dependency, dependent] pair, grouped by dependent in
   * insertion order
   */
  getEdges(): Array<[string, string]> {
    return [...this.nodes.values()].flatMap((node) =>
      [...node.dependencies].map((dependencyId): [string, string] => [dependencyId, node.id])
    );
  }

  hasCycles(): boolean {
    return this.findCycles().length > 0;
  }

  /**
   * Cycles reachable by following dependencies. Each cycle is reported as a
   * path that starts and ends on the same id.
   */
  findCycles(): string[][] {
    const state = new Map<string, VisitState>();
    const cycles: string[][] = [];
    const path: string[] = [];

    const visit = (id: string): void => {
      const seen = state.get(id);
      if (seen === 'visiting') {
        cycles.push([...path.slice(path.indexOf(id)), id]);
        return;
      }
      if (seen === 'done') {
        return;
      }

      state.set(id, 'visiting');
      path.push(id);
      for (const dependencyId of this.nodes.get(id)?.dependencies ?? []) {
        visit(dependencyId);
      }
      path.pop();
      state.set(id, 'done');
    };

    for (const id of this.nodes.keys()) {
      visit(id);
    }
    return cycles;
  }

  /**
   * Ids ordered dependencies first (Kahn's algorithm). Nodes that become
   * ready at the same time keep their insertion order.
   * Throws CircularDependencyError if the graph has a cycle.
   */
  getTopologicalOrder(): string[] {
    const remaining = new Map<string, number>();
    const order: string[] = [];

    for (const node of this.nodes.values()) {
      remaining.set(node.id, node.dependencies.size);
      if (node.dependencies.size === 0) {
        order.push(node.id);
      }
    }

    // `order` doubles as the work queue
    for (let head = 0; head < order.length; head++) {
      const current = order[head];
      const node = current === undefined ? undefined : this.nodes.get(current);
      for (const dependentId of node?.dependents ?? []) {
        const left = (remaining.get(dependentId) ?? 0) - 1;
        remaining.set(dependentId, left);
        if (left === 0) {
          order.push(dependentId);
        }
      }
    }

    if (order.length !== this.nodes.size) {
      const [cycle = []] = this.findCycles();
      throw formatCircularDependencyError(cycle);
    }
    return order;
  }

  /**
   * Nodes with no dependencies
   */
  getRootNodes(): string[] {
    return this.filterIds((node) => node.dependencies.size === 0);
  }

  /**
   * Nodes nothing else depends on
   */
  getLeafNodes(): string[] {
    return this.filterIds((node) => node.dependents.size === 0);
  }

  private filterIds(predicate: (node: DependencyNode<T>) => boolean): string[] {
    return [...this.nodes.values()].filter(predicate).map((node) => node.id);
  }

  private requireNode(id: string, role: 'Dependent' | 'Dependency'): DependencyNode<T> {
    const node = this.nodes.get(id);
    if (!node) {
      throw new Error(`${role} node '${id}' not found in graph`);
    }
    return node;
  }
}
