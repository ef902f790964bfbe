/**
 * Error classes shared by the harvester, the registry client and the CLI
 */

// ============================================================================
// Record Mapping Errors
// ============================================================================

/**
 * One source record cannot be mapped to a complete canonical record.
 *
 * `identifier` is the best guess at which record failed (the PID when one was
 * found, otherwise the OAI header identifier) and is meant for operators.
 */
export class RecordParsingError extends Error {
  code = "RECORD_PARSING_ERROR" as const;

  constructor(
    message: string,
    readonly identifier: string | null
  ) {
    super(message);
    this.name = "RecordParsingError";
  }

  override toString(): string {
    return `Error parsing record ${this.identifier ?? "<unknown>"}: ${this.message}`;
  }
}

export type ActorResolutionReason =
  | "missing-name"
  | "missing-affiliation"
  | "no-actor-data";

/**
 * An actor element cannot be turned into an Actor. The mapper decides, per
 * dialect, whether this fails the whole record.
 */
export class ActorResolutionError extends Error {
  code = "ACTOR_RESOLUTION_ERROR" as const;

  constructor(
    message: string,
    readonly elementName: string,
    readonly reason: ActorResolutionReason
  ) {
    super(message);
    this.name = "ActorResolutionError";
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Retrying after one of these is pointless: the run aborts immediately.
 */
export class ConfigurationError extends Error {
  code = "CONFIGURATION_ERROR" as const;

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

// ============================================================================
// Transport Errors
// ============================================================================

export class HttpRequestError extends Error {
  code = "HTTP_REQUEST_ERROR" as const;

  constructor(
    message: string,
    readonly method: string,
    readonly url: string,
    readonly status: number | null,
    readonly responseText: string
  ) {
    super(message);
    this.name = "HttpRequestError";
  }
}

export class RegistryResponseError extends Error {
  code = "REGISTRY_RESPONSE_ERROR" as const;

  constructor(
    message: string,
    readonly url: string
  ) {
    super(message);
    this.name = "RegistryResponseError";
  }
}

export class DuplicateRecordError extends Error {
  code = "DUPLICATE_RECORD" as const;

  constructor(
    readonly pid: string,
    readonly count: number
  ) {
    super(
      `Expected at most one registry record for ${pid}, found ${String(count)}`
    );
    this.name = "DuplicateRecordError";
  }
}

export class OaiPmhError extends Error {
  code = "OAI_PMH_ERROR" as const;

  constructor(
    message: string,
    readonly oaiCode: string
  ) {
    super(message);
    this.name = "OaiPmhError";
  }
}

/**
 * Render any thrown value as a one-line message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
