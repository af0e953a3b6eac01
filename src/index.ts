/**
 * Public entry point of the resource mapping layer.
 */

export { CalendarDate } from './Common/CalendarDate.js';
export { readConfigFile } from './Common/ConfigReader.js';
export { Configurator } from './Common/Configurator.js';
export { CompileFormat, FormatCalendarDate, FormatDateTime, ParseCalendarDate, ParseDateTime } from './Common/DateFormat.js';
export {
    AppError,
    CustomFieldValueError,
    ERROR_CODES,
    NotFoundError,
    ReadonlyAttributeError,
    ResourceAttributeError,
    ServerVersionMismatchError,
    ValidationError,
    type ErrorCode,
} from './Common/Errors.js';
export { GetLogLevel, LogLevel, SetLogLevel, log, type LogLevelName } from './Common/Log.js';
export { FormatTemplate, type TemplateValue } from './Common/Template.js';
export { AssertServerVersion, CompareVersions } from './Common/Version.js';
export { LoadConfig } from './Config.js';
export type { Connection, HttpMethod, ResourceManager, TransportResponse } from './Domain/Manager.js';
export { EVENT_NAMES, type EventName } from './Domain/Utility.js';
export { MAIN_EVENT_BUS, MainEventBus } from './Events/MainEventBus.js';
export { InMemoryResourceManager } from './Repository/InMemoryResourceManager.js';
export { InMemoryTracker, type TrackerRequest } from './Repository/InMemoryTracker.js';
export { AttributeStore } from './Resource/AttributeStore.js';
export {
    MULTIPLE_ATTR_ID_MAP,
    RELATIONS_MAP,
    RESOURCE_MAP,
    RESOURCE_SET_MAP,
    SINGLE_ATTR_ID_MAP,
} from './Resource/Mappings.js';
export { ReadonlyGuard } from './Resource/ReadonlyGuard.js';
export { GetResourceType, RESOURCE_TYPES } from './Resource/Registry.js';
export { RelationResolver } from './Resource/RelationResolver.js';
export { DisplayString, InspectString } from './Resource/Representation.js';
export { Resource } from './Resource/Resource.js';
export { ResourceCollection, type CollectionSource } from './Resource/ResourceCollection.js';
export {
    BASE_READONLY,
    BASE_UNCONVERTIBLE,
    DefineResourceType,
    NUMERIC_DEFAULTS,
    type CodecContext,
    type HookName,
    type LifecycleHooks,
    type QueryName,
    type ResourceDefinition,
    type ResourceOverrides,
    type ResourceQueries,
    type ResourceType,
} from './Resource/ResourceType.js';
export { DecodeValue, EncodeValue, ToWire, TypeCodec } from './Resource/TypeCodec.js';
export { Attachment, DownloadAttachment } from './Resource/Types/Attachment.js';
export { CustomField } from './Resource/Types/CustomField.js';
export { Enumeration } from './Resource/Types/Enumeration.js';
export { Group, GroupUsers } from './Resource/Types/Group.js';
export { Issue, IssueWatcher } from './Resource/Types/Issue.js';
export { IssueCategory } from './Resource/Types/IssueCategory.js';
export { IssueJournal } from './Resource/Types/IssueJournal.js';
export { IssueRelation } from './Resource/Types/IssueRelation.js';
export { IssueStatus } from './Resource/Types/IssueStatus.js';
export { News } from './Resource/Types/News.js';
export { Project } from './Resource/Types/Project.js';
export { ProjectMembership } from './Resource/Types/ProjectMembership.js';
export { Query } from './Resource/Types/Query.js';
export { Role } from './Resource/Types/Role.js';
export { TimeEntry } from './Resource/Types/TimeEntry.js';
export { Tracker } from './Resource/Types/Tracker.js';
export { User } from './Resource/Types/User.js';
export { Version } from './Resource/Types/Version.js';
export { WikiPage } from './Resource/Types/WikiPage.js';
export { CONFIG_SCHEMA, ConfigService } from './Services/ConfigService.js';
export type {
    AttributeInput,
    AttributeValue,
    Decoded,
    Encoded,
    Identity,
    QueryParams,
    WireObject,
    WireScalar,
    WireValue,
} from './Types/Attribute.js';
export type { AttributeErrorPolicy, ConnectionSettings, ValidatedConfig } from './Types/Config.js';
