import { ValidationError } from '../../../common/errors.js';
import { type PredictionRequest, PredictionRequestSchema } from '../contracts/prediction.types.js';

/**
 * Validate an inbound prediction body. Throws ValidationError naming the first
 * offending field. Live enrichment fields are never taken from the caller.
 */
export function parsePredictionRequest(body: unknown): PredictionRequest {
  const parsed = PredictionRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : 'body';
    throw new ValidationError(`${field}: ${issue.message}`);
  }
  return parsed.data;
}
