export type UpstreamFailureKind = "http" | "network" | "malformed" | "timeout";

export class PageviewsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PageviewsError";
  }
}

/**
 * Raised before any request is made when a caller passes an empty project,
 * an empty entity list, a non-positive limit or parallelism, or an option
 * outside its allowed values.
 */
export class InvalidArgumentError extends PageviewsError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid argument: ${issues.join("; ")}`);
    this.name = "InvalidArgumentError";
    this.issues = issues;
  }
}

export class UpstreamRequestError extends PageviewsError {
  readonly kind: UpstreamFailureKind;
  readonly status: number | null;
  readonly url: string;

  constructor(kind: UpstreamFailureKind, message: string, url: string, status: number | null = null) {
    super(message);
    this.name = "UpstreamRequestError";
    this.kind = kind;
    this.status = status;
    this.url = url;
  }
}
