export type HelplineErrorCode = 'INVALID_LANGUAGE' | 'COLLABORATOR_FAILURE' | 'SESSION_NOT_FOUND';

export class HelplineError extends Error {
  readonly code: HelplineErrorCode;

  constructor(code: HelplineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidLanguageError extends HelplineError {
  constructor(
    readonly role: 'source' | 'target',
    readonly language: string,
  ) {
    super('INVALID_LANGUAGE', `Unsupported ${role} language: ${language}`);
  }
}

export type Collaborator = 'recording' | 'stt' | 'translate' | 'llm' | 'tts';

export class CollaboratorError extends HelplineError {
  /** HTTP status of the upstream response, when there was one. */
  readonly status: number | undefined;

  constructor(
    readonly collaborator: Collaborator,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super('COLLABORATOR_FAILURE', `${collaborator}: ${message}`, { cause: options?.cause });
    this.status = options?.status;
  }
}

export class SessionNotFoundError extends HelplineError {
  constructor(readonly callSid: string) {
    super('SESSION_NOT_FOUND', `No live session for call ${callSid}`);
  }
}

/**
 * Runs a collaborator call, re-throwing anything that is not already a
 * CollaboratorError as one tagged with the given collaborator.
 */
export async function asCollaborator<T>(collaborator: Collaborator, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof CollaboratorError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new CollaboratorError(collaborator, message, { cause: err });
  }
}
