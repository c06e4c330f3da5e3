import type { DebugProtocol } from '@vscode/debugprotocol';
import type { JsonObject } from './json';
import type {
  BreakpointMode,
  ChecksumAlgorithm,
  ColumnDescriptor,
  ExceptionBreakpointsFilter,
} from './schemas';

export const CLIENT_CAPABILITY_KINDS = [
  'supportsVariableType',
  'supportsVariablePaging',
  'supportsRunInTerminalRequest',
  'supportsMemoryReferences',
  'supportsProgressReporting',
  'supportsInvalidatedEvent',
  'supportsMemoryEvent',
  'supportsArgsCanBeInterpretedByShell',
  'supportsStartDebuggingRequest',
  'supportsANSIStyling',
] as const satisfies ReadonlyArray<keyof DebugProtocol.InitializeRequestArguments>;

export type ClientCapabilityKind = (typeof CLIENT_CAPABILITY_KINDS)[number];

export const ADAPTER_CAPABILITY_KINDS = [
  'supportsConfigurationDoneRequest',
  'supportsFunctionBreakpoints',
  'supportsConditionalBreakpoints',
  'supportsHitConditionalBreakpoints',
  'supportsEvaluateForHovers',
  'supportsStepBack',
  'supportsSetVariable',
  'supportsRestartFrame',
  'supportsGotoTargetsRequest',
  'supportsStepInTargetsRequest',
  'supportsCompletionsRequest',
  'supportsModulesRequest',
  'supportsRestartRequest',
  'supportsExceptionOptions',
  'supportsValueFormattingOptions',
  'supportsExceptionInfoRequest',
  'supportTerminateDebuggee',
  'supportSuspendDebuggee',
  'supportsDelayedStackTraceLoading',
  'supportsLoadedSourcesRequest',
  'supportsLogPoints',
  'supportsTerminateThreadsRequest',
  'supportsSetExpression',
  'supportsTerminateRequest',
  'supportsDataBreakpoints',
  'supportsReadMemoryRequest',
  'supportsWriteMemoryRequest',
  'supportsDisassembleRequest',
  'supportsCancelRequest',
  'supportsBreakpointLocationsRequest',
  'supportsClipboardContext',
  'supportsSteppingGranularity',
  'supportsInstructionBreakpoints',
  'supportsExceptionFilterOptions',
  'supportsSingleThreadExecutionRequests',
  'supportsANSIStyling',
] as const satisfies ReadonlyArray<keyof DebugProtocol.Capabilities>;

export type AdapterCapabilityKind = (typeof ADAPTER_CAPABILITY_KINDS)[number];

/**
 * Set over a closed enumeration of flag names.
 */
export class CapabilitySet<K extends string> {
  private readonly present = new Set<K>();

  constructor(
    private readonly kinds: readonly K[],
    initial: Iterable<K> = [],
  ) {
    for (const kind of initial) this.present.add(kind);
  }

  public contains(kind: K): boolean {
    return this.present.has(kind);
  }

  public setPresent(kind: K, present: boolean): void {
    if (present) {
      this.present.add(kind);
    } else {
      this.present.delete(kind);
    }
  }

  public get size(): number {
    return this.present.size;
  }

  /** Present flags, in enumeration order. */
  public toArray(): K[] {
    return this.kinds.filter((kind) => this.present.has(kind));
  }
}

/**
 * Builds a set from the boolean-valued fields of `source` whose names are in
 * `kinds`. Only a literal `true` counts as present.
 */
export function capabilitySetFromObject<K extends string>(
  source: JsonObject | undefined,
  kinds: readonly K[],
): CapabilitySet<K> {
  const set = new CapabilitySet<K>(kinds);
  if (!source) return set;
  for (const kind of kinds) {
    const field = source[kind];
    if (typeof field === 'boolean') {
      set.setPresent(kind, field);
    }
  }
  return set;
}

export interface AdapterCapabilities {
  support: CapabilitySet<AdapterCapabilityKind>;
  completionTriggerCharacters?: string[];
  exceptionBreakpointFilters?: ExceptionBreakpointsFilter[];
  additionalModuleColumns?: ColumnDescriptor[];
  supportedChecksumAlgorithms?: ChecksumAlgorithm[];
  breakpointModes?: BreakpointMode[];
}

export function emptyAdapterCapabilities(): AdapterCapabilities {
  return { support: new CapabilitySet(ADAPTER_CAPABILITY_KINDS) };
}

export function emptyClientCapabilities(): CapabilitySet<ClientCapabilityKind> {
  return new CapabilitySet(CLIENT_CAPABILITY_KINDS);
}
