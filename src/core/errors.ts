// Sandbay Errors - Failure taxonomy shared by the resolver, provisioner and callers

export type SandbayErrorCode =
  | 'config_validation'
  | 'provisioning'
  | 'upload'
  | 'execution'
  | 'template_not_found'
  | 'webhook';

export abstract class SandbayError extends Error {
  abstract readonly code: SandbayErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad names or name-addressed operations on list-form agents. Raised before provisioning. */
export class ConfigValidationError extends SandbayError {
  readonly code = 'config_validation';
}

export class ProvisioningError extends SandbayError {
  readonly code = 'provisioning';
}

/** Reports attempted paths only, never file contents. */
export class UploadError extends SandbayError {
  readonly code = 'upload';
  readonly paths: string[];

  constructor(paths: string[], options?: { cause?: unknown }) {
    super(
      `Failed to upload ${paths.length} file(s) (${paths.join(', ')}) to sandbox: ${describeError(options?.cause)}`,
      options,
    );
    this.paths = paths;
  }
}

/** Non-zero exit of the remote command. */
export class ExecutionError extends SandbayError {
  readonly code = 'execution';
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.exitCode = exitCode;
  }
}

/** Raised by provider adapters when the requested template does not exist. */
export class TemplateNotFoundError extends SandbayError {
  readonly code = 'template_not_found';
  readonly template: string;

  constructor(template: string, options?: { cause?: unknown }) {
    super(`Template "${template}" not found`, options);
    this.template = template;
  }
}

/** Failed call to the webhook management API. `status` is null when no HTTP response arrived. */
export class WebhookError extends SandbayError {
  readonly code = 'webhook';
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err === undefined) return 'unknown error';
  return String(err);
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
