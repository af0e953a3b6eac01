import type { LogLevelName } from '../Common/Log.js';

/**
 * Whether unresolvable attributes raise: always, never, or only for the listed resource type names.
 */
export type AttributeErrorPolicy = boolean | readonly string[];

/**
 * Connection-level settings every resource reads through its manager.
 */
export interface ConnectionSettings {
    url: string; // base url without trailing slash, e.g. https://tracker.example.com
    dateFormat: string; // strftime-style, default '%Y-%m-%d'
    datetimeFormat: string; // strftime-style, default '%Y-%m-%dT%H:%M:%SZ'
    version?: string; // server version when known, e.g. '2.3.1'
    raiseAttrException: AttributeErrorPolicy;
}

/**
 * Validated configuration shape produced by ConfigService.
 */
export interface ValidatedConfig extends ConnectionSettings {
    logLevel?: LogLevelName;
}
