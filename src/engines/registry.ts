import { createConfigurationError } from '../types/index.js';
import { SolverAdapter } from './interface.js';
import { createStubAdapter } from './stub/index.js';
import { createEvaluatorAdapter } from './evaluator/index.js';
import { createZ3Adapter } from './z3/index.js';

export interface AdapterFactoryOptions {
    timeoutMs?: number;
    logic?: string;
}

export interface AdapterEntry {
    factory: (options: AdapterFactoryOptions) => Promise<SolverAdapter>;
    description: string;
}

/**
 * Named solver backends. Only Z3's WebAssembly module is initialised on demand.
 */
export class AdapterRegistry {
    private registry: Map<string, AdapterEntry> = new Map();

    constructor() {
        this.registerDefaults();
    }

    private registerDefaults() {
        this.registry.set('stub', {
            factory: async () => createStubAdapter(),
            description: 'always answers sat',
        });

        this.registry.set('eval', {
            factory: async () => createEvaluatorAdapter(),
            description: 'exact evaluation of ground terms',
        });

        // The WebAssembly module is only loaded when a Z3 adapter is created
        this.registry.set('z3', {
            factory: (options) => createZ3Adapter(options),
            description: 'Z3 SMT solver (WebAssembly)',
        });
    }

    register(name: string, entry: AdapterEntry): void {
        this.registry.set(name, entry);
    }

    has(name: string): boolean {
        return this.registry.has(name);
    }

    names(): string[] {
        return [...this.registry.keys()];
    }

    describe(name: string): string | undefined {
        return this.registry.get(name)?.description;
    }

    async create(name: string, options: AdapterFactoryOptions = {}): Promise<SolverAdapter> {
        const entry = this.registry.get(name);
        if (!entry) {
            throw createConfigurationError(`Unknown engine '${name}'`, [
                `valid engines are ${this.names().join(', ')}`,
            ]);
        }
        return entry.factory(options);
    }
}

export function createAdapterRegistry(): AdapterRegistry {
    return new AdapterRegistry();
}
