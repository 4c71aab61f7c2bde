// Typed errors shared by storage, custody and publication code

export class IOError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IOError';
  }
}

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export type PublicationErrorKind = 'request-failed' | 'invalid-hash' | 'invalid-url' | 'unauthorized';

const PUBLICATION_ERROR_MESSAGES: Record<PublicationErrorKind, string> = {
  'request-failed': 'Failed to publish hash to the service',
  'invalid-hash': 'Invalid hash format',
  'invalid-url': 'Invalid URL provided',
  'unauthorized': 'Unauthorized - check your credentials',
};

export class PublicationError extends Error {
  readonly kind: PublicationErrorKind;
  readonly status?: number;

  constructor(kind: PublicationErrorKind, options?: { cause?: unknown; status?: number; detail?: string }) {
    const base = PUBLICATION_ERROR_MESSAGES[kind];
    super(options?.detail ? `${base}: ${options.detail}` : base, { cause: options?.cause });
    this.name = 'PublicationError';
    this.kind = kind;
    this.status = options?.status;
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
