import { InternalServerErrorException } from '@nestjs/common';

export const ANALYTICS_COMPUTATION_FAILED = 'ANALYTICS_COMPUTATION_FAILED';

/**
 * Raised when the snapshot cannot be read or a view cannot be composed.
 * The underlying error is kept as `cause` and never sent to the client.
 */
export class AnalyticsComputationException extends InternalServerErrorException {
  constructor(
    readonly view: string,
    cause: unknown,
  ) {
    super(
      {
        message: `Failed to compute ${view} analytics`,
        error: ANALYTICS_COMPUTATION_FAILED,
      },
      { cause },
    );
  }
}
