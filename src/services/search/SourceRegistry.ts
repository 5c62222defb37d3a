// Source Registry - immutable name -> adapter map built once at startup

import type { ISearchSource, SourceDescriptor } from './interfaces';
import { ConfigurationError } from '../../utils/errors';

export class SourceRegistry {
    private readonly sources = new Map<string, ISearchSource>();

    constructor(sources: Iterable<ISearchSource>) {
        for (const source of sources) {
            if (this.sources.has(source.name)) {
                throw new ConfigurationError(`Engine ${source.name} is registered twice`, 'DUPLICATE_ENGINE');
            }
            this.sources.set(source.name, source);
        }
    }

    get size(): number {
        return this.sources.size;
    }

    names(): string[] {
        return Array.from(this.sources.keys());
    }

    has(name: string): boolean {
        return this.sources.has(name);
    }

    get(name: string): ISearchSource | undefined {
        return this.sources.get(name);
    }

    /** Registration order is tier order: bespoke adapters first, then the table. */
    all(): ISearchSource[] {
        return Array.from(this.sources.values());
    }

    describe(name: string): SourceDescriptor | undefined {
        return this.sources.get(name)?.capabilities();
    }

    displayName(name: string): string | undefined {
        return this.sources.get(name)?.displayName;
    }
}
