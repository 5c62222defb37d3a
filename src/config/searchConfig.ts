// Search configuration - environment settings and the hot-reloadable store

import dotenv from 'dotenv';
import { z } from 'zod';
import Logger from '../utils/logger';
import { ConfigurationError, errorMessage } from '../utils/errors';

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

// Request-level constants
export const SEARCH_CONFIG = {
    defaultSuggestionLimit: 10,
    maxSuggestionLimit: 50,
    relatedSearchLimit: 8,
    retryBaseDelayMs: 100,
    retryMaxDelayMs: 2000,
} as const;

const csv = z
    .string()
    .optional()
    .transform(value => (value ?? '')
        .split(',')
        .map(item => item.trim())
        .filter(item => item.length > 0));

const flag = (fallback: boolean) => z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform(value => (value === undefined ? fallback : ['true', '1', 'yes'].includes(value)));

const settingsSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(5000),
    NODE_ENV: z.string().default('production'),
    ENABLED_ENGINES: csv.transform(names => names.map(name => name.toLowerCase())),
    SOURCE_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
    SOURCE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(1),
    MIN_DURATION_SECONDS: z.coerce.number().int().min(0).default(0),
    FILTER_PREMIUM: flag(true),
    ANONYMIZE_OUTBOUND: flag(false),
    ANONYMIZER_PROXY_URL: z.string().url().optional(),
    USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
    THUMBNAIL_PROXY_PREFIX: z.string().min(1).optional(),
    SUGGEST_CUSTOM_TERMS: csv,
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
}).superRefine((env, ctx) => {
    if (env.REQUEST_TIMEOUT_MS < env.SOURCE_TIMEOUT_MS) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['REQUEST_TIMEOUT_MS'],
            message: 'must be at least SOURCE_TIMEOUT_MS',
        });
    }
    if (env.ANONYMIZE_OUTBOUND && !env.ANONYMIZER_PROXY_URL) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['ANONYMIZER_PROXY_URL'],
            message: 'required when ANONYMIZE_OUTBOUND is enabled',
        });
    }
});

export interface SearchSettings {
    port: number;
    env: string;
    enabledEngines: string[];
    sourceTimeoutMs: number;
    requestTimeoutMs: number;
    maxAttempts: number;
    minDurationSeconds: number;
    filterPremium: boolean;
    anonymize: boolean;
    proxyUrl?: string;
    userAgent: string;
    thumbnailProxyPrefix?: string;
    customTerms: string[];
    rateLimit: { windowMs: number; limit: number };
}

export function loadSearchSettings(env: NodeJS.ProcessEnv = process.env): SearchSettings {
    const parsed = settingsSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new ConfigurationError(`Invalid configuration - ${details}`, 'INVALID_CONFIGURATION');
    }

    const config = parsed.data;
    return {
        port: config.PORT,
        env: config.NODE_ENV,
        enabledEngines: config.ENABLED_ENGINES,
        sourceTimeoutMs: config.SOURCE_TIMEOUT_MS,
        requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
        maxAttempts: config.SOURCE_MAX_ATTEMPTS,
        minDurationSeconds: config.MIN_DURATION_SECONDS,
        filterPremium: config.FILTER_PREMIUM,
        anonymize: config.ANONYMIZE_OUTBOUND,
        proxyUrl: config.ANONYMIZER_PROXY_URL,
        userAgent: config.USER_AGENT,
        thumbnailProxyPrefix: config.THUMBNAIL_PROXY_PREFIX,
        customTerms: config.SUGGEST_CUSTOM_TERMS,
        rateLimit: { windowMs: config.RATE_LIMIT_WINDOW_MS, limit: config.RATE_LIMIT_MAX },
    };
}

export interface ConfigSnapshot {
    settings: SearchSettings;
    enabledSources: ReadonlySet<string>;
}

/**
 * Resolves the enabled engine list against the registered names; an empty
 * list enables everything.
 */
export function resolveEnabledSources(settings: SearchSettings, registered: readonly string[]): ReadonlySet<string> {
    const known = new Set(registered);
    const unknown = settings.enabledEngines.filter(name => !known.has(name));
    if (unknown.length > 0) {
        throw new ConfigurationError(`Unknown engines in ENABLED_ENGINES: ${unknown.join(', ')}`, 'UNKNOWN_ENGINE');
    }

    const enabled = settings.enabledEngines.length > 0 ? settings.enabledEngines : registered;
    if (enabled.length === 0) {
        throw new ConfigurationError('No search engines are enabled', 'NO_ENGINES');
    }
    return new Set(enabled);
}

/**
 * Reload participant. Every `validate` runs before any `apply`, so a refusal
 * leaves all handlers on the previous snapshot.
 */
export interface ReloadHandler {
    validate?(snapshot: ConfigSnapshot): void;
    apply(snapshot: ConfigSnapshot): void;
}

/**
 * Holds the current configuration snapshot. Snapshots are immutable and
 * replaced wholesale, so in-flight requests keep the one they started with.
 */
export class ConfigStore {
    private snapshot: ConfigSnapshot;
    private readonly handlers: ReloadHandler[] = [];

    constructor(
        private readonly registered: readonly string[],
        private readonly readEnv: () => NodeJS.ProcessEnv = readEnvironment,
    ) {
        this.snapshot = this.build();
    }

    current(): ConfigSnapshot {
        return this.snapshot;
    }

    get settings(): SearchSettings {
        return this.snapshot.settings;
    }

    isEnabled(name: string): boolean {
        return this.snapshot.enabledSources.has(name);
    }

    onReload(handler: ReloadHandler | ((snapshot: ConfigSnapshot) => void)): void {
        this.handlers.push(typeof handler === 'function' ? { apply: handler } : handler);
    }

    /**
     * Re-reads the environment. An invalid configuration is rejected and the
     * previous snapshot stays active. A handler failing in `apply` rolls the
     * handlers already applied back to the previous snapshot.
     */
    reload(): ConfigSnapshot {
        const next = this.build();
        for (const handler of this.handlers) {
            handler.validate?.(next);
        }

        const applied: ReloadHandler[] = [];
        try {
            for (const handler of this.handlers) {
                handler.apply(next);
                applied.push(handler);
            }
        } catch (error) {
            this.rollback(applied);
            throw error;
        }

        this.snapshot = next;
        Logger.info(`🔄 Configuration reloaded (${next.enabledSources.size} engines enabled)`);
        return next;
    }

    tryReload(): boolean {
        try {
            this.reload();
            return true;
        } catch (error) {
            Logger.error(`❌ Configuration reload rejected: ${errorMessage(error)}`);
            return false;
        }
    }

    private rollback(applied: ReloadHandler[]): void {
        for (const handler of applied.reverse()) {
            try {
                handler.apply(this.snapshot);
            } catch (error) {
                Logger.error(`❌ Failed to restore previous configuration: ${errorMessage(error)}`);
            }
        }
    }

    private build(): ConfigSnapshot {
        const settings = loadSearchSettings(this.readEnv());
        return { settings, enabledSources: resolveEnabledSources(settings, this.registered) };
    }
}

function readEnvironment(): NodeJS.ProcessEnv {
    dotenv.config({ override: true });
    return process.env;
}
