import { AnyTaskSpec } from '../types/task';
import { GraphConfigurationError } from './errors';

/**
 * Task Graph
 *
 * Validated, immutable view of a task set. Construction fails with
 * GraphConfigurationError on duplicate names, unknown dependencies or
 * cycles, so a bad graph is caught when the engine starts rather than
 * in the middle of an invocation.
 */
export class TaskGraph {
    private readonly specs: ReadonlyMap<string, AnyTaskSpec>;
    private readonly dependents: ReadonlyMap<string, readonly string[]>;
    private readonly order: readonly string[];

    constructor(tasks: readonly AnyTaskSpec[]) {
        const specs = new Map<string, AnyTaskSpec>();
        for (const task of tasks) {
            if (specs.has(task.name)) {
                throw new GraphConfigurationError(`Duplicate task name: ${task.name}`);
            }
            specs.set(task.name, task);
        }

        const dependents = new Map<string, string[]>();
        for (const task of tasks) {
            dependents.set(task.name, []);
        }
        for (const task of tasks) {
            const seen = new Set<string>();
            for (const dependency of task.dependencies) {
                if (!specs.has(dependency)) {
                    throw new GraphConfigurationError(
                        `Task ${task.name} depends on unknown task ${dependency}`
                    );
                }
                if (dependency === task.name) {
                    throw new GraphConfigurationError(`Task ${task.name} depends on itself`);
                }
                if (seen.has(dependency)) {
                    throw new GraphConfigurationError(
                        `Task ${task.name} declares dependency ${dependency} twice`
                    );
                }
                seen.add(dependency);
                dependents.get(dependency)?.push(task.name);
            }
        }

        this.specs = specs;
        this.dependents = dependents;
        this.order = this.topologicalOrder(tasks);
    }

    get size(): number {
        return this.specs.size;
    }

    /** Task names in a dependency-respecting order, ties kept in declaration order. */
    get executionOrder(): readonly string[] {
        return this.order;
    }

    get tasks(): readonly AnyTaskSpec[] {
        return [...this.specs.values()];
    }

    get(name: string): AnyTaskSpec {
        const spec = this.specs.get(name);
        if (!spec) {
            throw new GraphConfigurationError(`Unknown task: ${name}`);
        }
        return spec;
    }

    dependentsOf(name: string): readonly string[] {
        return this.dependents.get(name) ?? [];
    }

    /**
     * Number of tasks on the longest dependency chain. Together with the
     * per-task timeout this bounds the wall-clock cost of a run.
     */
    depth(): number {
        const levels = new Map<string, number>();
        for (const name of this.order) {
            const spec = this.get(name);
            const level = spec.dependencies.reduce(
                (max, dependency) => Math.max(max, levels.get(dependency) ?? 0),
                0
            ) + 1;
            levels.set(name, level);
        }
        return Math.max(0, ...levels.values());
    }

    // Kahn's algorithm; whatever is left unvisited sits on a cycle.
    private topologicalOrder(tasks: readonly AnyTaskSpec[]): string[] {
        const remaining = new Map<string, number>();
        for (const task of tasks) {
            remaining.set(task.name, task.dependencies.length);
        }

        const order: string[] = [];
        let ready = tasks.filter(task => task.dependencies.length === 0).map(task => task.name);

        while (ready.length > 0) {
            order.push(...ready);
            const next = new Set<string>();
            for (const name of ready) {
                for (const dependent of this.dependentsOf(name)) {
                    const count = (remaining.get(dependent) ?? 0) - 1;
                    remaining.set(dependent, count);
                    if (count === 0) {
                        next.add(dependent);
                    }
                }
            }
            ready = tasks.filter(task => next.has(task.name)).map(task => task.name);
        }

        if (order.length !== tasks.length) {
            const cyclic = tasks
                .filter(task => !order.includes(task.name))
                .map(task => task.name);
            throw new GraphConfigurationError(
                `Task graph contains a cycle among: ${cyclic.join(', ')}`
            );
        }

        return order;
    }
}
