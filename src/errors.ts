export class AppError extends Error {
  status: number;
  code: number;
  details?: Record<string, unknown>;

  constructor(status: number, code: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

/**
 * Raised by a store when a keyed critical section could not be entered in time
 * or when a concurrent writer already produced the row being inserted.
 * Never leaves the service layer unless the single retry also loses.
 */
export class CapacityRaceError extends Error {
  constructor(
    readonly key: string,
    cause?: unknown
  ) {
    super(`concurrent update on ${key}`, { cause });
    this.name = 'CapacityRaceError';
  }
}

export async function retryOnCapacityRace<T>(run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (!(err instanceof CapacityRaceError)) {
      throw err;
    }
  }
  try {
    return await run();
  } catch (err) {
    if (err instanceof CapacityRaceError) {
      throw new AppError(503, 50301, 'Service is busy, please try again');
    }
    throw err;
  }
}

export function notFound(message: string): AppError {
  return new AppError(404, 40401, message);
}

export function sessionInvalid(): AppError {
  return new AppError(401, 40104, 'Session expired. This device has been logged out or removed.');
}

export function unauthenticated(): AppError {
  return new AppError(401, 40103, 'Not signed in or credential is no longer valid');
}
