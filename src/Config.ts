/**
 * Loads tracker connection settings from config files and environment variables.
 * Emits `config.loaded` / `config.error` on the main event bus.
 */

import { readConfigFile } from './Common/ConfigReader.js';
import { EVENT_NAMES } from './Domain/Utility.js';
import { MAIN_EVENT_BUS } from './Events/MainEventBus.js';

/** Environment variables that take precedence over file values. */
const ENV_OVERRIDES: Readonly<Record<string, string>> = {
    TRACKER_URL: `url`,
    TRACKER_VERSION: `version`,
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === `object` && value !== null && !Array.isArray(value);
}

/**
 * Loads the config file and applies environment overrides. The result is not validated yet;
 * ConfigService does that.
 * @param configPath string - Path to configuration file (JSON or YAML format)
 * @returns Promise<Record<string, unknown>> - Parsed document with overrides applied
 * @example
 * const raw = await LoadConfig('./config/tracker.yaml');
 */
export async function LoadConfig(configPath: string): Promise<Record<string, unknown>> {
    try {
        const parsed = await readConfigFile(configPath);
        // an empty yaml document parses to undefined
        const config: Record<string, unknown> = isRecord(parsed) ? { ...parsed } : {};
        for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
            const value = process.env[variable];
            if (value) {
                config[key] = value;
            }
        }
        MAIN_EVENT_BUS.Emit(EVENT_NAMES.configLoaded, config);
        return config;
    } catch(configError) {
        MAIN_EVENT_BUS.Emit(EVENT_NAMES.configError, configError);
        throw configError;
    }
}
