import { basename } from 'node:path';

type EnvValue = string | number | boolean;

/**
 * Typed access to environment configuration.
 */
export class Env {
    static get appName(): string {
        return Env.get('APP_NAME', process.env.npm_package_name || basename(process.execPath));
    }
    static get appVersion(): string {
        return Env.get('APP_VERSION', process.env.npm_package_version || '0.0.0');
    }

    /**
     * Get environment variable with type casting and validation.
     *
     * @param key - The environment variable key.
     * @param def - The default value if the key is not found; its type selects the cast.
     * @param min - The minimum value for numeric keys.
     * @param max - The maximum value for numeric keys.
     */
    static get(key: string, def: string, min?: string, max?: string): string;
    static get(key: string, def: number, min?: number, max?: number): number;
    static get(key: string, def: boolean): boolean;
    static get(key: string, def: EnvValue, min?: EnvValue, max?: EnvValue): EnvValue {
        const raw = process.env[key];
        switch (typeof def) {
            case 'boolean': {
                if (raw === undefined || raw === '') return def;
                const val = raw.toLowerCase();
                return val === 'true' || val === '1';
            }
            case 'number': {
                let rc = raw === undefined || raw === '' ? def : Number(raw);
                if (Number.isNaN(rc)) rc = def;
                if (typeof min === 'number' && rc < min) rc = min;
                if (typeof max === 'number' && rc > max) rc = max;
                return rc;
            }
            default: {
                let rc = raw ?? def;
                if (typeof min === 'string' && min && rc < min) rc = min;
                if (typeof max === 'string' && max && rc > max) rc = max;
                return rc;
            }
        }
    }
}
