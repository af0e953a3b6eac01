import { ValidationError } from '../../Common/Errors.js';
import type { Connection, TransportResponse } from '../../Domain/Manager.js';
import type { Identity } from '../../Types/Attribute.js';
import type { Resource } from '../Resource.js';
import { DefineResourceType } from '../ResourceType.js';

export const Group = DefineResourceType({
    name: `Group`,
    minimumVersion: `2.1`,
    containerMany: `groups`,
    containerOne: `group`,
    queries: {
        all: `/groups.json`,
        one: `/groups/{0}.json`,
        create: `/groups.json`,
        update: `/groups/{0}.json`,
        delete: `/groups/{0}.json`,
    },
    includes: [`memberships`, `users`],
});

/**
 * Group membership changes, sent directly; the group's change set is left alone.
 */
export class GroupUsers {
    private readonly _connection: Connection;
    private readonly _groupId: Identity;

    constructor(group: Resource) {
        if (group.type !== Group) {
            throw new ValidationError(`Group users belong to groups, not ${group.type.name}`);
        }
        this._connection = group.manager.connection;
        this._groupId = group.internalId;
    }

    public add(userId: number): Promise<TransportResponse> {
        const url = `${this._connection.url}/groups/${this._groupId}/users.json`;
        return this._connection.request(`post`, url, { user_id: userId });
    }

    public remove(userId: number): Promise<TransportResponse> {
        const url = `${this._connection.url}/groups/${this._groupId}/users/${userId}.json`;
        return this._connection.request(`delete`, url);
    }
}
