/**
 * Central enumeration of well-known event names for the typed event bus helpers.
 */
export const EVENT_NAMES = {
    configLoaded: 'config.loaded',
    configError: 'config.error',
    resourceCreated: 'resource.created',
    resourceUpdated: 'resource.updated',
    resourceDeleted: 'resource.deleted',
} as const;

/** Type union of event string literals. */
export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
