export class HttpError extends Error {
  status?: number;
  data?: unknown;

  constructor(message: string, status?: number, data?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.data = data;
  }
}

export class TaskNotFoundError extends HttpError {
  constructor(taskId: string) {
    super(`Task '${taskId}' not found`, 404, { taskId });
    this.name = 'TaskNotFoundError';
  }
}

export class TaskNotCompletedError extends HttpError {
  constructor(taskId: string, status: string) {
    super(`Task '${taskId}' has not completed yet`, 400, { taskId, status });
    this.name = 'TaskNotCompletedError';
  }
}

export class UnsupportedFormatError extends HttpError {
  constructor(format: string) {
    super(`Unsupported export format '${format}'`, 400, { format });
    this.name = 'UnsupportedFormatError';
  }
}

export function getErrorStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object' || !('status' in error)) return undefined;
  return typeof error.status === 'number' ? error.status : undefined;
}
