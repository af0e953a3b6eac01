/**
 * Reads connection settings files. A plain file reader: it does not validate and emits no events.
 */
import { readFile } from 'fs/promises';
import { ValidationError } from './Errors.js';

/**
 * Loads and parses a config file (JSON or YAML).
 * @param configPath string - Path to config file (e.g. './tracker.yaml')
 * @returns Promise<unknown> - Parsed document, not yet validated
 * @throws ValidationError for unsupported extensions; read and parse errors propagate as thrown
 * @example
 * const raw = await readConfigFile('./tracker.json');
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
    const raw = await readFile(configPath, `utf-8`);

    if (configPath.endsWith(`.json`)) {
        return JSON.parse(raw);
    }
    if (configPath.endsWith(`.yaml`) || configPath.endsWith(`.yml`)) {
        // yaml support is only loaded when a yaml file is read
        const yaml = await import('js-yaml');
        return yaml.load(raw);
    }
    throw new ValidationError(`Unsupported config file format. Use .json or .yaml`, { path: configPath });
}
