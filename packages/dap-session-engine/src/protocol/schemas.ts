import {
  Infer,
  bool,
  enumeration,
  integer,
  json,
  list,
  optional,
  string,
  struct,
  union,
} from '../marshal/schema';

export const REQUEST_COMMANDS = [
  'initialize',
  'launch',
  'configurationDone',
  'terminate',
  'disconnect',
  'threads',
  'modules',
] as const;

export type RequestCommand = (typeof REQUEST_COMMANDS)[number];

export const requestSchema = struct({
  seq: integer(),
  type: enumeration('request'),
  command: enumeration(...REQUEST_COMMANDS),
  arguments: json(),
});
export type Request = Infer<typeof requestSchema>;

export const initializeArgumentsSchema = struct({
  clientID: optional(string()),
  clientName: optional(string()),
  adapterID: string(),
  locale: optional(string()),
  linesStartAt1: optional(bool()),
  columnsStartAt1: optional(bool()),
  pathFormat: optional(enumeration('path', 'uri')),
  supportsVariableType: optional(bool()),
  supportsVariablePaging: optional(bool()),
  supportsRunInTerminalRequest: optional(bool()),
  supportsMemoryReferences: optional(bool()),
  supportsProgressReporting: optional(bool()),
  supportsInvalidatedEvent: optional(bool()),
  supportsMemoryEvent: optional(bool()),
  supportsArgsCanBeInterpretedByShell: optional(bool()),
  supportsStartDebuggingRequest: optional(bool()),
  supportsANSIStyling: optional(bool()),
});
export type InitializeArguments = Infer<typeof initializeArgumentsSchema>;

export const launchArgumentsSchema = struct({
  noDebug: optional(bool()),
  __restart: optional(json()),
});
export type LaunchArguments = Infer<typeof launchArgumentsSchema>;

export const configurationDoneArgumentsSchema = optional(struct({}));
export type ConfigurationDoneArguments = Infer<
  typeof configurationDoneArgumentsSchema
>;

export const terminateArgumentsSchema = optional(
  struct({
    restart: optional(bool()),
  }),
);
export type TerminateArguments = Infer<typeof terminateArgumentsSchema>;

export const disconnectArgumentsSchema = optional(
  struct({
    restart: optional(bool()),
    terminateDebuggee: optional(bool()),
    suspendDebuggee: optional(bool()),
  }),
);
export type DisconnectArguments = Infer<typeof disconnectArgumentsSchema>;

export const modulesArgumentsSchema = optional(
  struct({
    startModule: optional(integer()),
    moduleCount: optional(integer()),
  }),
);
export type ModulesArguments = Infer<typeof modulesArgumentsSchema>;

export const exceptionBreakpointsFilterSchema = struct({
  filter: string(),
  label: string(),
  description: optional(string()),
  default: optional(bool()),
  supportsCondition: optional(bool()),
  conditionDescription: optional(string()),
});
export type ExceptionBreakpointsFilter = Infer<
  typeof exceptionBreakpointsFilterSchema
>;

export const columnDescriptorSchema = struct({
  attributeName: string(),
  label: string(),
  format: optional(string()),
  type: optional(enumeration('string', 'number', 'boolean', 'unixTimestampUTC')),
  width: optional(integer()),
});
export type ColumnDescriptor = Infer<typeof columnDescriptorSchema>;

export const checksumAlgorithmSchema = enumeration(
  'MD5',
  'SHA1',
  'SHA256',
  'timestamp',
);
export type ChecksumAlgorithm = Infer<typeof checksumAlgorithmSchema>;

/** Known applicabilities, or any other string an adapter defines. */
export const breakpointModeApplicabilitySchema = union({
  source: null,
  exception: null,
  data: null,
  instruction: null,
  string: string(),
});
export type BreakpointModeApplicability = Infer<
  typeof breakpointModeApplicabilitySchema
>;

export const breakpointModeSchema = struct({
  mode: string(),
  label: string(),
  description: optional(string()),
  appliesTo: list(breakpointModeApplicabilitySchema),
});
export type BreakpointMode = Infer<typeof breakpointModeSchema>;

/** Auxiliary arrays an adapter may declare in its initialize response. */
export const capabilityArraysSchema = struct({
  completionTriggerCharacters: optional(list(string())),
  exceptionBreakpointFilters: optional(list(exceptionBreakpointsFilterSchema)),
  additionalModuleColumns: optional(list(columnDescriptorSchema)),
  supportedChecksumAlgorithms: optional(list(checksumAlgorithmSchema)),
  breakpointModes: optional(list(breakpointModeSchema)),
});

export const moduleIdSchema = union({
  integer: integer(),
  string: string(),
});
export type ModuleId = Infer<typeof moduleIdSchema>;

export const moduleSchema = struct({
  id: moduleIdSchema,
  name: string(),
  path: optional(string()),
  isOptimized: optional(bool()),
  isUserCode: optional(bool()),
  version: optional(string()),
  symbolStatus: optional(string()),
  symbolFilePath: optional(string()),
  dateTimeStamp: optional(string()),
  addressRange: optional(string()),
});
export type Module = Infer<typeof moduleSchema>;

export const threadSchema = struct({
  id: integer(),
  name: string(),
});
export type Thread = Infer<typeof threadSchema>;

export const stoppedBodySchema = struct({
  reason: string(),
  description: optional(string()),
  threadId: optional(integer()),
  preserveFocusHint: optional(bool()),
  text: optional(string()),
  allThreadsStopped: optional(bool()),
  hitBreakpointIds: optional(list(integer())),
});
export type StoppedBody = Infer<typeof stoppedBodySchema>;

export const continuedBodySchema = struct({
  threadId: integer(),
  allThreadsContinued: optional(bool()),
});
export type ContinuedBody = Infer<typeof continuedBodySchema>;

export const exitedBodySchema = struct({
  exitCode: integer(),
});

export const outputSchema = struct({
  category: optional(string()),
  output: string(),
  group: optional(enumeration('start', 'startCollapsed', 'end')),
  line: optional(integer()),
  column: optional(integer()),
  data: optional(json()),
});
export type Output = Infer<typeof outputSchema>;

export function moduleIdEquals(a: ModuleId, b: ModuleId): boolean {
  return a.tag === b.tag && a.value === b.value;
}

export function moduleIdToString(id: ModuleId): string {
  return id.tag === 'integer' ? String(id.value) : id.value;
}

/** For requests that take no arguments; encodes as an absent field. */
export const noArgumentsSchema = optional(struct({}));
