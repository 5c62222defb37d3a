// Generic HTML engine definitions (src/data/engines.json)

import { z } from 'zod';
import { loadDataFile } from './dataFiles';

const capabilitiesSchema = z.object({
    preview: z.boolean().default(false),
    download: z.boolean().default(false),
    duration: z.boolean().default(false),
    views: z.boolean().default(false),
    rating: z.boolean().default(false),
    quality: z.boolean().default(false),
    uploadDate: z.boolean().default(false),
}).strict();

export const engineDefinitionSchema = z.object({
    name: z.string().regex(/^[a-z0-9]+$/, 'engine names are lowercase alphanumerics'),
    displayName: z.string().min(1),
    baseUrl: z.string().url(),
    tier: z.number().int().min(1).max(9),
    searchPath: z.string().includes('{query}'),
    itemSelectors: z.array(z.string().min(1)).min(1),
    querySeparator: z.enum(['+', '-', '%20']).default('+'),
    capabilities: capabilitiesSchema.default({}),
}).strict();

export type EngineDefinition = z.infer<typeof engineDefinitionSchema>;

export const engineTableSchema = z.array(engineDefinitionSchema).superRefine((engines, ctx) => {
    const seen = new Set<string>();
    engines.forEach((engine, index) => {
        if (seen.has(engine.name)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'name'], message: `duplicate engine ${engine.name}` });
        }
        seen.add(engine.name);
    });
});

export function loadEngineDefinitions(): EngineDefinition[] {
    return loadDataFile('engines.json', engineTableSchema);
}
