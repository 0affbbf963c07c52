// Error taxonomy shared by controllers and the provisioning pipeline.
// errorCode matches the HTTP status the router answers with.
export class AppError extends Error {
  errorCode: number;
  constructor(errorCode: number, message: string) {
    super(message);
    this.name = 'AppError';
    this.errorCode = errorCode;
  }
}

// Bad or missing webhook signature; terminal for the delivery
export class AuthenticationFailure extends AppError {
  constructor(message = 'Invalid signature') {
    super(401, message);
    this.name = 'AuthenticationFailure';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

// No installation, stored or static credential for the account
export class NoCredentialError extends AppError {
  readonly accountLogin: string;
  constructor(accountLogin: string) {
    super(502, `No credential available for ${accountLogin}`);
    this.name = 'NoCredentialError';
    this.accountLogin = accountLogin;
  }
}

export type RemoteService = 'github' | 'ecs';

// Any failed or timed-out call to GitHub or the compute control plane
export class RemoteCallError extends AppError {
  readonly service: RemoteService;
  readonly operation: string;
  readonly status: number | null;
  readonly timedOut: boolean;
  constructor(
    service: RemoteService,
    operation: string,
    message: string,
    options: { status?: number | null; timedOut?: boolean; cause?: unknown } = {}
  ) {
    super(502, `${service} ${operation} failed: ${message}`);
    this.name = 'RemoteCallError';
    this.service = service;
    this.operation = operation;
    this.status = options.status ?? null;
    this.timedOut = options.timedOut ?? false;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

// Task launch failed after an accepted admission
export class ProvisioningError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(502, message);
    this.name = 'ProvisioningError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
