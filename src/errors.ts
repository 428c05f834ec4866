import type { ZodError } from 'zod';

export type ErrorKind = 'NotFound' | 'ValidationError' | 'PayloadTooLarge' | 'MethodNotAllowed';

const STATUS: Record<ErrorKind, number> = {
  NotFound: 404,
  ValidationError: 422,
  PayloadTooLarge: 413,
  MethodNotAllowed: 405,
};

export interface ValidationIssue {
  /** Dotted path into the payload ("calendar_event.timezone"); empty for the root. */
  path: string;
  message: string;
  /** InvalidTimezone | InvalidTimeRange | InvalidRange, for the checks that span fields. */
  reason?: string;
}

export interface ErrorBody {
  error: {
    kind: ErrorKind | 'InternalError';
    message: string;
    issues?: ValidationIssue[];
  };
}

export class TaskApiError extends Error {
  readonly status: number;

  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly issues: ValidationIssue[] = [],
  ) {
    super(message);
    this.name = 'TaskApiError';
    this.status = STATUS[kind];
  }

  static notFound(entity: 'Task' | 'Subtask', id: string): TaskApiError {
    return new TaskApiError('NotFound', `${entity} not found: ${id}`);
  }

  static routeNotFound(method: string, path: string): TaskApiError {
    return new TaskApiError('NotFound', `No route for ${method} ${path}`);
  }

  static methodNotAllowed(method: string, path: string): TaskApiError {
    return new TaskApiError('MethodNotAllowed', `${method} is not allowed on ${path}`);
  }

  static payloadTooLarge(limitBytes: number): TaskApiError {
    return new TaskApiError('PayloadTooLarge', `Request body exceeds ${limitBytes} bytes`);
  }

  static validation(message: string, issues: ValidationIssue[] = []): TaskApiError {
    return new TaskApiError('ValidationError', message, issues);
  }

  static fromZod(error: ZodError): TaskApiError {
    const issues = error.issues.map((issue): ValidationIssue => {
      const out: ValidationIssue = { path: issue.path.join('.'), message: issue.message };
      if (issue.code === 'custom' && typeof issue.params?.reason === 'string') out.reason = issue.params.reason;
      return out;
    });
    const first = issues[0];
    const message = first ? (first.path ? `${first.path}: ${first.message}` : first.message) : 'Invalid request';
    return TaskApiError.validation(message, issues);
  }

  toBody(): ErrorBody {
    return {
      error: {
        kind: this.kind,
        message: this.message,
        ...(this.issues.length ? { issues: this.issues } : {}),
      },
    };
  }
}

export function isTaskApiError(err: unknown): err is TaskApiError {
  return err instanceof TaskApiError;
}
