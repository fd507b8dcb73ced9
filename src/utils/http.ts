import { z } from 'zod';
import { Collaborator, CollaboratorError } from './errors';
import { logger } from './logger';

export const DEFAULT_TIMEOUT_MS = 30_000;

/** Throws a CollaboratorError carrying the upstream status and body for non-2xx responses. */
export async function ensureOk(collaborator: Collaborator, res: Response): Promise<void> {
  if (res.ok) return;
  const errBody = await res.text();
  logger.error('Upstream request failed', { collaborator, status: res.status, body: errBody });
  throw new CollaboratorError(collaborator, `API error ${res.status}: ${errBody}`, { status: res.status });
}

/** Reads a JSON body and validates it against the expected shape. */
export async function readJson<T>(
  collaborator: Collaborator,
  res: Response,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  const parsed = schema.safeParse(await res.json());
  if (!parsed.success) {
    throw new CollaboratorError(collaborator, `unexpected response shape: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
