import { BASE_READONLY, DefineResourceType } from '../ResourceType.js';

export const ProjectMembership = DefineResourceType({
    name: `ProjectMembership`,
    minimumVersion: `1.4`,
    containerMany: `memberships`,
    containerOne: `membership`,
    queries: {
        filter: `/projects/{project_id}/memberships.json`,
        one: `/memberships/{0}.json`,
        create: `/projects/{project_id}/memberships.json`,
        update: `/memberships/{0}.json`,
        delete: `/memberships/{0}.json`,
    },
    representation: [[`id`]],
    createReadonly: [...BASE_READONLY, `roles`],
});
