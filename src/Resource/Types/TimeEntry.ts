import { lookup } from '../Mappings.js';
import { DefineResourceType } from '../ResourceType.js';

const RENAMED: Readonly<Record<string, string>> = { from_date: `from`, to_date: `to` };

export const TimeEntry = DefineResourceType({
    name: `TimeEntry`,
    minimumVersion: `1.1`,
    containerMany: `time_entries`,
    containerOne: `time_entry`,
    queries: {
        all: `/time_entries.json`,
        one: `/time_entries/{0}.json`,
        filter: `/time_entries.json`,
        create: `/time_entries.json`,
        update: `/time_entries/{0}.json`,
        delete: `/time_entries/{0}.json`,
    },
    representation: [[`id`]],
    overrides: {
        // the API takes `from` / `to` filters, which are awkward names to write in code
        decode(name, value, context, next) {
            return next(lookup(RENAMED, name) ?? name, value);
        },
    },
});
