/**
 * Process-wide event bus for configuration and resource lifecycle notifications.
 */
import { EventEmitter } from 'events';
import type { EventName } from '../Domain/Utility.js';

/**
 * MainEventBus is a Node EventEmitter restricted to the names in EVENT_NAMES.
 */
export class MainEventBus extends EventEmitter {
    /** Typed emit helper enforcing known event names. */
    public Emit<T extends EventName>(eventName: T, ...args: unknown[]): boolean {
        return super.emit(eventName, ...args);
    }
    /** Typed on helper enforcing known event names. */
    public On<T extends EventName>(eventName: T, listener: (...args: any[]) => void): this {
        super.on(eventName, listener);
        return this;
    }
    /** Typed off helper enforcing known event names. */
    public Off<T extends EventName>(eventName: T, listener: (...args: any[]) => void): this {
        super.off(eventName, listener);
        return this;
    }
}

/**
 * Global event bus instance.
 * @example
 * import { MAIN_EVENT_BUS } from './Events/MainEventBus.js';
 * MAIN_EVENT_BUS.On(EVENT_NAMES.resourceCreated, (resource: Resource) => { ... });
 */
export const MAIN_EVENT_BUS = new MainEventBus();
