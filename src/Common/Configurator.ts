import type { ObjectSchema } from 'joi';
import { ValidationError } from './Errors.js';

/**
 * Validates configuration against a Joi schema and keeps the validated value, defaults applied.
 * @template T - The expected shape of the configuration object
 */
export class Configurator<T> {
    private readonly _schema: ObjectSchema<T>;
    private _config: T;

    /**
     * @param schema ObjectSchema<T> - Joi schema for validating the configuration
     * @param rawConfig unknown - Raw configuration object to validate
     * @throws ValidationError listing every failed rule
     * @example
     * const schema = Joi.object<{ url: string }>({ url: Joi.string().uri().required() });
     * const configurator = new Configurator(schema, { url: 'https://tracker.example.com' });
     */
    constructor(schema: ObjectSchema<T>, rawConfig: unknown) {
        this._schema = schema;
        this._config = this._validate(rawConfig);
    }

    public getConfig(): T {
        return this._config;
    }

    /**
     * Replaces the stored configuration; the previous one stays when validation fails.
     * @throws ValidationError
     */
    public updateConfig(rawConfig: unknown): void {
        this._config = this._validate(rawConfig);
    }

    private _validate(rawConfig: unknown): T {
        const { error, value } = this._schema.validate(rawConfig, { abortEarly: false });
        if (error) {
            throw new ValidationError(`Config validation error: ${error.message}`, {
                fields: error.details.map(detail => {
                    return detail.path.join(`.`);
                }),
            }, error);
        }
        return value;
    }
}
