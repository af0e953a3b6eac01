import { ReadonlyAttributeError } from '../Common/Errors.js';
import type { ResourceType } from './ResourceType.js';

/**
 * Write protection keyed by lifecycle state. Both sets are expanded once with every relation
 * and include name of the type, so those never end up in a change set.
 */
export class ReadonlyGuard {
    private readonly _typeName: string;
    private readonly _onCreate: ReadonlySet<string>;
    private readonly _onUpdate: ReadonlySet<string>;

    constructor(type: ResourceType) {
        const linked = [...type.relations, ...type.includes];
        this._typeName = type.name;
        this._onCreate = new Set([...type.createReadonly, ...linked]);
        this._onUpdate = new Set([...type.updateReadonly, ...linked]);
    }

    public isReadonly(name: string, isNew: boolean): boolean {
        return (isNew ? this._onCreate : this._onUpdate).has(name);
    }

    /** @throws ReadonlyAttributeError */
    public assertWritable(name: string, isNew: boolean): void {
        if (this.isReadonly(name, isNew)) {
            throw new ReadonlyAttributeError(this._typeName, name, isNew);
        }
    }
}
