import { EventEmitter } from 'events';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import Joi from 'joi';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { Configurator } from '../src/Common/Configurator.js';
import { ValidationError } from '../src/Common/Errors.js';
import { GetLogLevel, LogLevel } from '../src/Common/Log.js';
import { EVENT_NAMES } from '../src/Domain/Utility.js';
import { MAIN_EVENT_BUS } from '../src/Events/MainEventBus.js';
import { ConfigService } from '../src/Services/ConfigService.js';

describe('ConfigService', () => {
    let directory: string;
    let eventBus: EventEmitter;
    let service: ConfigService;

    async function configFile(name: string, content: string): Promise<string> {
        const path = join(directory, name);
        await writeFile(path, content, 'utf-8');
        return path;
    }

    beforeEach(async () => {
        directory = await mkdtemp(join(tmpdir(), 'tracker-config-'));
        eventBus = new EventEmitter();
        service = new ConfigService(eventBus);
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        await rm(directory, { recursive: true, force: true });
    });

    it('should fill in defaults and strip the trailing slash', async () => {
        const path = await configFile('tracker.json', JSON.stringify({ url: 'https://tracker.example.com/', version: '4.2' }));
        const config = await service.Load(path);

        expect(config).toEqual({
            url: 'https://tracker.example.com',
            version: '4.2',
            dateFormat: '%Y-%m-%d',
            datetimeFormat: '%Y-%m-%dT%H:%M:%SZ',
            raiseAttrException: true,
        });
    });

    it('should read yaml and apply the log level', async () => {
        const path = await configFile(
            'tracker.yaml',
            ['url: https://tracker.example.com', 'raiseAttrException:', '  - Issue', 'logLevel: debug', ''].join('\n'),
        );
        const config = await service.Load(path);

        expect(config.raiseAttrException).toEqual(['Issue']);
        expect(GetLogLevel()).toBe(LogLevel.Debug);
    });

    it('should let environment variables override the file', async () => {
        vi.stubEnv('TRACKER_URL', 'https://override.example.com');
        vi.stubEnv('TRACKER_VERSION', '5.0');
        const path = await configFile('tracker.json', JSON.stringify({ url: 'https://tracker.example.com' }));
        const config = await service.Load(path);

        expect(config.url).toBe('https://override.example.com');
        expect(config.version).toBe('5.0');
    });

    it('should emit the loaded configuration on both buses', async () => {
        const loaded = vi.fn();
        const raw = vi.fn();
        eventBus.on(EVENT_NAMES.configLoaded, loaded);
        MAIN_EVENT_BUS.On(EVENT_NAMES.configLoaded, raw);

        const path = await configFile('tracker.json', JSON.stringify({ url: 'https://tracker.example.com' }));
        const config = await service.Load(path);

        expect(loaded).toHaveBeenCalledWith(config);
        expect(raw).toHaveBeenCalledWith({ url: 'https://tracker.example.com' });
    });

    it('should reject invalid settings', async () => {
        const path = await configFile('tracker.json', JSON.stringify({ url: 'not a url', raiseAttrException: 'sometimes' }));

        await expect(service.Load(path)).rejects.toBeInstanceOf(ValidationError);
        await expect(service.Load(path)).rejects.toThrow(`Failed to load config from '${path}': Config validation error:`);
    });

    it('should reject an empty yaml document', async () => {
        const path = await configFile('tracker.yml', '');
        await expect(service.Load(path)).rejects.toThrow('"url" is required');
    });

    it('should reject unsupported file types and report them on the main bus', async () => {
        const failed = vi.fn();
        MAIN_EVENT_BUS.On(EVENT_NAMES.configError, failed);
        const path = await configFile('tracker.ini', 'url=https://tracker.example.com');

        await expect(service.Load(path)).rejects.toThrow(
            `Failed to load config from '${path}': Unsupported config file format. Use .json or .yaml`,
        );
        expect(failed).toHaveBeenCalledTimes(1);
    });
});

describe('Configurator', () => {
    const schema = Joi.object<{ url: string }>({ url: Joi.string().uri().required() });

    it('should keep the previous configuration when an update is invalid', () => {
        const configurator = new Configurator(schema, { url: 'https://tracker.example.com' });

        expect(() => {
            configurator.updateConfig({ url: 42 });
        }).toThrow(ValidationError);
        expect(configurator.getConfig()).toEqual({ url: 'https://tracker.example.com' });
    });

    it('should list every failing field', () => {
        const strict = Joi.object<{ url: string; version: string }>({
            url: Joi.string().uri().required(),
            version: Joi.string().required(),
        });
        try {
            new Configurator(strict, {});
            expect.unreachable();
        } catch(error) {
            expect(error).toBeInstanceOf(ValidationError);
            expect(error instanceof ValidationError && error.details).toEqual({ fields: ['url', 'version'] });
        }
    });
});
