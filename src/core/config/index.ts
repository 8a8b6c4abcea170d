import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { Viewport } from '../../types';

export const CONFIG_KEYS = ['chromePath', 'viewportWidth', 'viewportHeight', 'maxElements', 'headless'] as const;

export type ConfigKey = typeof CONFIG_KEYS[number];

// CLI values arrive as strings
const booleanish = z.union([
    z.boolean(),
    z.enum(['true', 'false']).transform(value => value === 'true'),
]);

const ConfigSchema = z.object({
    chromePath: z.string().min(1).optional(),
    viewportWidth: z.coerce.number().int().positive().optional(),
    viewportHeight: z.coerce.number().int().positive().optional(),
    maxElements: z.coerce.number().int().positive().optional(),
    headless: booleanish.optional(),
});

const ENV_KEYS: Array<[string, ConfigKey]> = [
    ['CHROME_PATH', 'chromePath'],
    ['UI_LENS_VIEWPORT_WIDTH', 'viewportWidth'],
    ['UI_LENS_VIEWPORT_HEIGHT', 'viewportHeight'],
];

export type UserConfig = z.output<typeof ConfigSchema>;

export interface ResolvedConfig {
    chromePath?: string;
    viewport: Viewport;
    maxElements: number;
    headless: boolean;
}

export const DEFAULT_CONFIG = {
    viewportWidth: 1920,
    viewportHeight: 1080,
    maxElements: 50,
    headless: true,
};

export function isConfigKey(key: string): key is ConfigKey {
    return CONFIG_KEYS.some(k => k === key);
}

function describeError(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export class ConfigManager {
    private configPath: string;
    private config: UserConfig = {};

    constructor(configPath: string = path.join(os.homedir(), '.ui-lensrc')) {
        this.configPath = configPath;
        this.load();
    }

    get path(): string {
        return this.configPath;
    }

    private load() {
        if (!fs.existsSync(this.configPath)) return;

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
        } catch (e) {
            console.warn(`Ignoring unreadable config ${this.configPath}:`, e instanceof Error ? e.message : e);
            return;
        }

        const parsed = ConfigSchema.safeParse(raw);
        if (parsed.success) {
            this.config = parsed.data;
        } else {
            console.warn(`Ignoring invalid config ${this.configPath}: ${describeError(parsed.error)}`);
        }
    }

    private save() {
        fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2));
    }

    get<K extends ConfigKey>(key: K): UserConfig[K] {
        return this.config[key];
    }

    /** Validates and coerces `value` for `key`, then persists it. */
    set(key: ConfigKey, value: string | number | boolean) {
        const parsed = ConfigSchema.safeParse({ ...this.config, [key]: value });
        if (!parsed.success) {
            throw new Error(`Invalid value for ${key}: ${describeError(parsed.error)}`);
        }
        this.config = parsed.data;
        this.save();
    }

    delete(key: ConfigKey) {
        delete this.config[key];
        this.save();
    }

    list(): UserConfig {
        return { ...this.config };
    }

    /**
     * Effective settings: explicit overrides (CLI flags), then environment,
     * then the rc file, then built-in defaults.
     */
    resolve(overrides: UserConfig = {}, env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
        const envConfig: UserConfig = {};
        for (const [name, key] of ENV_KEYS) {
            const raw = env[name];
            if (!raw) continue;
            // Parsed per variable
            const parsed = ConfigSchema.safeParse({ [key]: raw });
            if (parsed.success) {
                Object.assign(envConfig, parsed.data);
            } else {
                console.warn(`Ignoring invalid ${name}: ${describeError(parsed.error)}`);
            }
        }

        const pick = <K extends ConfigKey>(key: K): UserConfig[K] =>
            overrides[key] ?? envConfig[key] ?? this.config[key];

        return {
            chromePath: pick('chromePath'),
            viewport: {
                width: pick('viewportWidth') ?? DEFAULT_CONFIG.viewportWidth,
                height: pick('viewportHeight') ?? DEFAULT_CONFIG.viewportHeight,
            },
            maxElements: pick('maxElements') ?? DEFAULT_CONFIG.maxElements,
            headless: pick('headless') ?? DEFAULT_CONFIG.headless,
        };
    }
}
