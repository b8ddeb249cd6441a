import { BadRequestException } from '@nestjs/common';

export type FaultReason = 'UNKNOWN_ROLE' | 'INVALID_EXPERIENCE_LEVEL' | 'EMPTY_RESUME' | 'INVALID_TOP_N';

/**
 * Caller error raised by the core operations. Reaches HTTP clients as a 400
 * whose body carries the machine-readable `reason`.
 */
export class ValidationFault extends BadRequestException {
  constructor(
    readonly reason: FaultReason,
    message: string,
  ) {
    super({ statusCode: 400, error: 'Bad Request', reason, message });
  }
}

/** Malformed reference data; raised while building a snapshot, never per request. */
export class ReferenceDataError extends Error {
  constructor(
    readonly source: string,
    readonly problems: string[],
  ) {
    super(`Invalid reference data in ${source}: ${problems.slice(0, 5).join('; ')}${problems.length > 5 ? ` (+${problems.length - 5} more)` : ''}`);
    this.name = 'ReferenceDataError';
  }
}
