/**
 * Report item types shared by the validators and the constraint builder.
 *
 * A report item is an immutable diagnostic: a closed kind, a severity, an
 * optional force code and a payload whose shape is fixed by the kind.
 * Rendering the payload into text is left to the caller.
 *
 * @packageDocumentation
 */

/**
 * Severity of a report item. Only ERROR blocks the caller's operation.
 */
export type ReportSeverity = 'ERROR' | 'WARNING';

/**
 * Opaque tokens a caller passes back to downgrade a forceable error.
 */
export type ForceCode =
  | 'FORCE_OPTIONS'
  | 'FORCE_QDEVICE_MODEL'
  | 'FORCE_NODE_ADDRESSES_UNRESOLVABLE'
  | 'FORCE_CONSTRAINT_DUPLICATE';

/**
 * Plain export of a constraint element, listed in duplicate reports.
 */
export interface ExportedConstraint {
  readonly attributes: Readonly<Record<string, string>>;
  readonly resourceSets?: readonly ExportedResourceSet[];
}

/**
 * Plain export of a resource set element.
 */
export interface ExportedResourceSet {
  readonly ids: readonly string[];
  readonly options: Readonly<Record<string, string>>;
}

/**
 * Payload shape for every report kind.
 */
export interface ReportPayloads {
  MissingOption: {
    readonly optionNames: readonly string[];
    readonly optionType: string;
  };
  InvalidOptionValue: {
    readonly optionName: string;
    readonly optionValue: string;
    /** Either the list of allowed values or a description such as `0..255`. */
    readonly allowedValues: readonly string[] | string;
  };
  InvalidOptionName: {
    readonly optionNames: readonly string[];
    readonly allowed: readonly string[];
    readonly optionType: string;
    readonly allowedPatterns: readonly string[];
  };
  InvalidUserdefinedOptionName: {
    readonly optionNames: readonly string[];
    readonly allowedDescription: string;
    readonly optionType: string;
  };
  DependencyUnmet: {
    readonly optionName: string;
    readonly optionType: string;
    readonly prerequisiteName: string;
    readonly prerequisiteType: string;
  };
  NodeAddressesCountOutOfRange: {
    readonly actualCount: number;
    readonly minCount: number;
    readonly maxCount: number;
    readonly nodeName: string | null;
    readonly nodeIndex: number;
  };
  NodeAddressesUnresolvable: {
    readonly addresses: readonly string[];
  };
  DuplicateNodeNames: {
    readonly names: readonly string[];
  };
  DuplicateNodeAddresses: {
    readonly addresses: readonly string[];
  };
  NodeAddressCountMismatch: {
    readonly nodeAddrCount: Readonly<Record<string, number>>;
  };
  IpVersionMismatchInLinks: {
    readonly linkNumbers: readonly number[];
  };
  BroadcastDisallowsMcastaddr: Readonly<Record<string, never>>;
  TooManyLinks: {
    readonly actualCount: number;
    readonly maxCount: number;
    readonly transport: string;
  };
  DuplicateLinkNumbers: {
    readonly linkNumbers: readonly string[];
  };
  CryptoCipherRequiresHash: Readonly<Record<string, never>>;
  IncompatibleWithQdevice: {
    readonly optionNames: readonly string[];
  };
  ResourceNotFound: {
    readonly resourceId: string;
  };
  ResourceInClone: {
    readonly resourceId: string;
    readonly cloneId: string;
  };
  ResourceInMaster: {
    readonly resourceId: string;
    readonly masterId: string;
  };
  DuplicateConstraints: {
    readonly constraintType: string;
    readonly constraints: readonly ExportedConstraint[];
  };
  EmptyResourceSet: Readonly<Record<string, never>>;
  InvalidId: {
    readonly id: string;
    readonly idDescription: string;
    readonly invalidCharacter: string;
    readonly isFirstChar: boolean;
  };
  IdAlreadyExists: {
    readonly id: string;
  };
  CibSectionMissing: {
    readonly section: string;
  };
  InvalidScore: {
    readonly score: string;
  };
}

/**
 * Closed set of report kinds.
 */
export type ReportKind = keyof ReportPayloads;

/**
 * A single diagnostic produced by a validator or by the constraint builder.
 *
 * Narrow a `ReportItem` to a specific payload with {@link isReportOf}.
 */
export interface ReportItem<K extends ReportKind = ReportKind> {
  readonly kind: K;
  readonly severity: ReportSeverity;
  /** Set only on forceable errors; warnings never carry one. */
  readonly forceCode: ForceCode | null;
  readonly payload: ReportPayloads[K];
}

/**
 * Construction-time force settings for a forceable check.
 *
 * When `allowExtra` is true the violation is emitted already downgraded to a
 * WARNING without a force code.
 */
export interface ForceOptions {
  readonly forceCode?: ForceCode | undefined;
  readonly allowExtra?: boolean | undefined;
}
