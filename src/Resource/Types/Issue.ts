import { ValidationError } from '../../Common/Errors.js';
import { AssertServerVersion } from '../../Common/Version.js';
import type { Connection, TransportResponse } from '../../Domain/Manager.js';
import type { Identity } from '../../Types/Attribute.js';
import type { Resource } from '../Resource.js';
import { BASE_READONLY, BASE_UNCONVERTIBLE, DefineResourceType } from '../ResourceType.js';

export const Issue = DefineResourceType({
    name: `Issue`,
    minimumVersion: `1.0`,
    containerMany: `issues`,
    containerOne: `issue`,
    queries: {
        all: `/issues.json`,
        one: `/issues/{0}.json`,
        filter: `/issues.json`,
        create: `/projects/{project_id}/issues.json`,
        update: `/issues/{0}.json`,
        delete: `/issues/{0}.json`,
    },
    representation: [[`id`, `subject`], [`id`]],
    includes: [`children`, `attachments`, `relations`, `changesets`, `journals`, `watchers`],
    relations: [`relations`, `time_entries`],
    unconvertible: [...BASE_UNCONVERTIBLE, `subject`, `notes`],
    createReadonly: [...BASE_READONLY, `spent_hours`],
    overrides: {
        get(resource, name, next) {
            // `version` reads the fixed version
            return next(name === `version` ? `fixed_version` : name);
        },
        set(resource, name, value, next) {
            next(name === `version_id` ? `fixed_version_id` : name, value);
        },
        decode(name, value, context, next) {
            return next(name === `version_id` ? `fixed_version_id` : name, value);
        },
    },
});

/**
 * Adds and removes issue watchers with direct requests. Does not touch the issue's change set.
 * Watcher management needs server version 2.3 or newer.
 */
export class IssueWatcher {
    public static readonly MINIMUM_VERSION = `2.3`;
    private readonly _connection: Connection;
    private readonly _issueId: Identity;

    /**
     * @throws ValidationError when given something other than an issue
     * @throws ServerVersionMismatchError when the connected server is older than 2.3
     */
    constructor(issue: Resource) {
        if (issue.type !== Issue) {
            throw new ValidationError(`Watchers belong to issues, not ${issue.type.name}`);
        }
        AssertServerVersion(issue.manager.connection.version, IssueWatcher.MINIMUM_VERSION, `Issue watchers`);
        this._connection = issue.manager.connection;
        this._issueId = issue.internalId;
    }

    public add(userId: number): Promise<TransportResponse> {
        const url = `${this._connection.url}/issues/${this._issueId}/watchers.json`;
        return this._connection.request(`post`, url, { user_id: userId });
    }

    public remove(userId: number): Promise<TransportResponse> {
        const url = `${this._connection.url}/issues/${this._issueId}/watchers/${userId}.json`;
        return this._connection.request(`delete`, url);
    }
}
