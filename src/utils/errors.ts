export class RemoteError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RemoteError';
  }
}

/** The control-plane rejected, failed or did not answer in time. */
export class RemoteBackendError extends RemoteError {
  constructor(message = 'Remote backend is not available', options?: ErrorOptions) {
    super(message, options);
    this.name = 'RemoteBackendError';
  }
}

export class RemoteNotConnected extends RemoteError {
  constructor(message = 'Remote tunnel is not connected', options?: ErrorOptions) {
    super(message, options);
    this.name = 'RemoteNotConnected';
  }
}

export class CertificateError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CertificateError';
  }
}

export class TunnelError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TunnelError';
  }
}

export class TimeoutError extends Error {
  constructor(readonly timeout: number) {
    super(`Operation timed out after ${timeout}ms`);
    this.name = 'TimeoutError';
  }
}
