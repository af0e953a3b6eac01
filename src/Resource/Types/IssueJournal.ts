import { DefineResourceType } from '../ResourceType.js';

export const IssueJournal = DefineResourceType({
    name: `IssueJournal`,
    minimumVersion: `1.0`,
    representation: [[`id`]],
    unconvertible: [`notes`],
});
