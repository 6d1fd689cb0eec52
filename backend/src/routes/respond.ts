import { Response } from 'express';
import { StorageFailure, ValidationError } from '../utils/errors';
import { log } from '../utils/logger';

/**
 * Translate a thrown error into the API's error body.
 * ValidationError -> 400, StorageFailure -> 503, anything else -> 500.
 */
export function sendError(res: Response, error: unknown, context: string, action: string): Response {
  if (error instanceof ValidationError) {
    return res.status(400).json({
      error: 'validation_failed',
      reason: error.reason,
      issues: error.issues,
    });
  }

  if (error instanceof StorageFailure) {
    log.error(`${action} failed: storage unavailable`, context, error);
    return res.status(503).json({ error: 'storage_unavailable', reason: error.operation });
  }

  log.error(`${action} failed:`, context, error);
  return res.status(500).json({ error: `Failed to ${action}` });
}
