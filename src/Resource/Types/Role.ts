import { DefineResourceType } from '../ResourceType.js';

export const Role = DefineResourceType({
    name: `Role`,
    minimumVersion: `1.4`,
    containerMany: `roles`,
    containerOne: `role`,
    queries: {
        all: `/roles.json`,
        one: `/roles/{0}.json`,
    },
});
