import { EventEmitter } from 'events';
import Joi from 'joi';
import { Configurator } from '../Common/Configurator.js';
import { ValidationError } from '../Common/Errors.js';
import { SetLogLevel } from '../Common/Log.js';
import { LoadConfig } from '../Config.js';
import { EVENT_NAMES } from '../Domain/Utility.js';
import type { ValidatedConfig } from '../Types/Config.js';

/** Connection settings schema; unknown keys are allowed so one file can feed several tools. */
export const CONFIG_SCHEMA = Joi.object<ValidatedConfig>({
    url: Joi.string()
        .uri({ scheme: [`http`, `https`] })
        .replace(/\/+$/, ``)
        .required(),
    dateFormat: Joi.string().default(`%Y-%m-%d`),
    datetimeFormat: Joi.string().default(`%Y-%m-%dT%H:%M:%SZ`),
    version: Joi.string().pattern(/^\d+(\.\d+)*$/),
    raiseAttrException: Joi.alternatives()
        .try(Joi.boolean(), Joi.array().items(Joi.string()))
        .default(true),
    logLevel: Joi.string().valid(`debug`, `info`, `warn`, `error`),
}).unknown(true);

/**
 * Service responsible for loading and validating tracker connection settings.
 */
export class ConfigService {
    /** Event bus for emitting config-related events */
    private _eventBus: EventEmitter;

    /**
     * @param eventBus EventEmitter - Event bus used for emitting `config.loaded`.
     */
    constructor(eventBus: EventEmitter) {
        this._eventBus = eventBus;
    }

    /**
     * Loads, validates and applies the configuration (the log level takes effect immediately).
     * @param path string - Filesystem path to the config file. Example: './config/tracker.json'
     * @returns Promise<ValidatedConfig> - Settings with defaults filled in
     * @throws ValidationError if loading or validation fails
     * @example
     * const config = await new ConfigService(MAIN_EVENT_BUS).Load('./config/tracker.json');
     * const tracker = new InMemoryTracker(config);
     */
    public async Load(path: string): Promise<ValidatedConfig> {
        try {
            const rawConfig = await LoadConfig(path);
            const validated = new Configurator(CONFIG_SCHEMA, rawConfig).getConfig();
            if (validated.logLevel) {
                SetLogLevel(validated.logLevel);
            }
            this._eventBus.emit(EVENT_NAMES.configLoaded, validated);
            return validated;
        } catch(err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new ValidationError(`Failed to load config from '${path}': ${reason}`, { path }, err);
        }
    }
}
