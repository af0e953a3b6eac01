import { DefineResourceType } from '../ResourceType.js';

export const Version = DefineResourceType({
    name: `Version`,
    minimumVersion: `1.3`,
    containerMany: `versions`,
    containerOne: `version`,
    queries: {
        filter: `/projects/{project_id}/versions.json`,
        one: `/versions/{0}.json`,
        create: `/projects/{project_id}/versions.json`,
        update: `/versions/{0}.json`,
        delete: `/versions/{0}.json`,
    },
    unconvertible: [`status`],
});
