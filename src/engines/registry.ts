import { SatEngine } from './interface.js';
import { EngineName, ENGINE_NAMES, SolveOptions } from '../types/options.js';
import { createInvalidOptionError } from '../types/errors.js';
import { createDPLLEngine } from './dpll/index.js';
import { createMiniSatEngine } from './minisat/index.js';

export interface EngineEntry {
    factory: () => Promise<SatEngine>;
    instance?: SatEngine;
}

export function isEngineName(name: string): name is EngineName {
    return ENGINE_NAMES.some(n => n === name);
}

export class EngineRegistry {
    private registry: Map<EngineName, EngineEntry> = new Map();

    constructor(options: SolveOptions = {}) {
        this.registerEngines(options);
    }

    private registerEngines(options: SolveOptions) {
        this.registry.set('dpll', {
            factory: async () => createDPLLEngine(options),
        });

        this.registry.set('minisat', {
            factory: async () => createMiniSatEngine(),
        });
    }

    async getEngine(name: string): Promise<SatEngine> {
        const entry = isEngineName(name) ? this.registry.get(name) : undefined;
        if (!entry) {
            throw createInvalidOptionError(
                `Engine '${name}' not registered`,
                `Valid engines are: ${ENGINE_NAMES.join(', ')}`
            );
        }

        if (!entry.instance) {
            entry.instance = await entry.factory();
        }
        return entry.instance;
    }
}
