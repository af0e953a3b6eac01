import { BASE_READONLY, DefineResourceType } from '../ResourceType.js';

export const User = DefineResourceType({
    name: `User`,
    minimumVersion: `1.1`,
    containerMany: `users`,
    containerOne: `user`,
    queries: {
        all: `/users.json`,
        one: `/users/{0}.json`,
        filter: `/users.json`,
        create: `/users.json`,
        update: `/users/{0}.json`,
        delete: `/users/{0}.json`,
    },
    representation: [
        [`id`, `firstname`, `lastname`],
        [`id`, `name`],
    ],
    includes: [`memberships`, `groups`],
    relations: [`issues`, `time_entries`],
    // issues are matched by assignee, time entries by the user who logged them
    relationsName: `assigned_to`,
    relationKeys: { time_entries: `user` },
    unconvertible: [`status`],
    createReadonly: [...BASE_READONLY, `api_key`, `last_login_on`],
});
