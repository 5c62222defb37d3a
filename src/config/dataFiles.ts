// Static JSON tables shipped under src/data, validated on load

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

const DATA_DIR = new URL('../data/', import.meta.url);

export function dataFilePath(name: string): string {
    return fileURLToPath(new URL(name, DATA_DIR));
}

/** Reads and validates one data file; any problem is a ConfigurationError. */
export function loadDataFile<T extends z.ZodTypeAny>(name: string, schema: T): z.infer<T> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(readFileSync(dataFilePath(name), 'utf8'));
    } catch (error) {
        throw new ConfigurationError(`Unable to read data file ${name}`, 'DATA_FILE_UNREADABLE', error);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new ConfigurationError(
            `Malformed data file ${name}: ${issue?.path.join('.') || '(root)'} ${issue?.message ?? ''}`.trim(),
            'DATA_FILE_INVALID',
        );
    }
    return result.data;
}
