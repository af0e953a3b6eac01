import { DefineResourceType } from '../ResourceType.js';

export const IssueRelation = DefineResourceType({
    name: `IssueRelation`,
    minimumVersion: `1.3`,
    containerMany: `relations`,
    containerOne: `relation`,
    queries: {
        filter: `/issues/{issue_id}/relations.json`,
        one: `/relations/{0}.json`,
        create: `/issues/{issue_id}/relations.json`,
        delete: `/relations/{0}.json`,
    },
    representation: [[`id`]],
});
