export type ReleaseNotesErrorCode =
  | "MALFORMED_TAG"
  | "DUPLICATE_TAG"
  | "NO_TAGS_FOUND"
  | "NO_ANCESTOR_FOUND"
  | "VCS_QUERY_FAILED"
  | "TICKET_SERVICE_FAILED"
  | "VALIDATION_FAILED";

/**
 * Base class for every failure that aborts a release notes run.
 */
export class ReleaseNotesError extends Error {
  constructor(
    message: string,
    public readonly code: ReleaseNotesErrorCode,
  ) {
    super(message);
    this.name = "ReleaseNotesError";
  }
}

export class MalformedTagError extends ReleaseNotesError {
  constructor(public readonly tagName: string, reason: string) {
    super(`Malformed release tag '${tagName}': ${reason}`, "MALFORMED_TAG");
    this.name = "MalformedTagError";
  }
}

export class DuplicateTagError extends ReleaseNotesError {
  constructor(
    public readonly component: string,
    public readonly version: string,
  ) {
    super(`Release ${version} of component '${component}' already exists`, "DUPLICATE_TAG");
    this.name = "DuplicateTagError";
  }
}

export class NoTagsFoundError extends ReleaseNotesError {
  constructor(pattern: string) {
    super(`No tags matching pattern ${pattern} found.`, "NO_TAGS_FOUND");
    this.name = "NoTagsFoundError";
  }
}

export class NoAncestorFoundError extends ReleaseNotesError {
  constructor(
    public readonly component: string,
    public readonly tagName: string,
  ) {
    super(
      `No previous release found for '${tagName}' in component '${component}': its commit shares no history with an earlier release`,
      "NO_ANCESTOR_FOUND",
    );
    this.name = "NoAncestorFoundError";
  }
}

export class VcsQueryError extends ReleaseNotesError {
  constructor(
    public readonly operation: string,
    detail: string,
  ) {
    super(`VCS query '${operation}' failed: ${detail}`, "VCS_QUERY_FAILED");
    this.name = "VcsQueryError";
  }
}

export class TicketServiceError extends ReleaseNotesError {
  constructor(
    public readonly issueId: string,
    detail: string,
    // Whether another attempt may succeed (network error, 429, 5xx).
    public readonly transient: boolean = false,
  ) {
    super(`Ticket service lookup for ${issueId} failed: ${detail}`, "TICKET_SERVICE_FAILED");
    this.name = "TicketServiceError";
  }
}

export class ValidationError extends ReleaseNotesError {
  constructor(message: string) {
    super(message, "VALIDATION_FAILED");
    this.name = "ValidationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
