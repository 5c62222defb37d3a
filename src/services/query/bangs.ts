// Bang table - alias -> engine routing, immutable after load

import { z } from 'zod';
import { loadDataFile } from '../../config/dataFiles';
import { ConfigurationError } from '../../utils/errors';

export interface BangEntry {
    engine: string;
    displayName: string;
    /** Short aliases; the engine name itself is always a valid bang too. */
    aliases: string[];
}

export interface BangListing {
    bang: string;
    engine: string;
    displayName: string;
    shortCode: string;
    aliases: string[];
}

const bangFileSchema = z.array(z.object({
    engine: z.string().min(1),
    aliases: z.array(z.string().regex(/^[a-z0-9]+$/, 'aliases are lowercase alphanumerics')),
}).strict());

export interface EngineLookup {
    has(name: string): boolean;
    displayName(name: string): string | undefined;
}

export class BangTable {
    private readonly aliasToEngine = new Map<string, string>();
    private readonly byEngine = new Map<string, BangEntry>();

    constructor(private readonly entries: readonly BangEntry[]) {
        for (const entry of entries) {
            if (this.byEngine.has(entry.engine)) {
                throw new ConfigurationError(`Bang table lists ${entry.engine} twice`, 'MALFORMED_BANG_TABLE');
            }
            this.byEngine.set(entry.engine, entry);
        }

        for (const entry of entries) {
            for (const alias of [entry.engine, ...entry.aliases]) {
                const key = alias.toLowerCase();
                const existing = this.aliasToEngine.get(key);
                if (existing !== undefined && existing !== entry.engine) {
                    throw new ConfigurationError(
                        `Bang !${key} maps to both ${existing} and ${entry.engine}`,
                        'MALFORMED_BANG_TABLE',
                    );
                }
                this.aliasToEngine.set(key, entry.engine);
            }
        }
    }

    /** Loads src/data/bangs.json, rejecting entries for unregistered engines. */
    static load(engines: EngineLookup): BangTable {
        const rows = loadDataFile('bangs.json', bangFileSchema);
        return new BangTable(rows.map(row => {
            const displayName = engines.displayName(row.engine);
            if (!engines.has(row.engine) || displayName === undefined) {
                throw new ConfigurationError(`Bang table references unknown engine ${row.engine}`, 'MALFORMED_BANG_TABLE');
            }
            return { engine: row.engine, displayName, aliases: row.aliases };
        }));
    }

    resolve(alias: string): string | undefined {
        return this.aliasToEngine.get(alias.toLowerCase());
    }

    all(): readonly BangEntry[] {
        return this.entries;
    }

    get(engine: string): BangEntry | undefined {
        return this.byEngine.get(engine);
    }

    /** The shortest alias (first one on ties), falling back to the engine name. */
    shortCode(engine: string): string {
        const entry = this.byEngine.get(engine);
        if (!entry) return engine;
        return [...entry.aliases, entry.engine].reduce((best, alias) => (alias.length < best.length ? alias : best));
    }

    list(): BangListing[] {
        return this.entries.map(entry => ({
            bang: `!${entry.engine}`,
            engine: entry.engine,
            displayName: entry.displayName,
            shortCode: `!${this.shortCode(entry.engine)}`,
            aliases: entry.aliases.map(alias => `!${alias}`),
        }));
    }
}
