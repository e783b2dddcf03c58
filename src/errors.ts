export const REQUIRED_SCOPES = [
  'https://www.googleapis.com/auth/drive',
  'https://www.googleapis.com/auth/cloud-platform',
];

export type SetupErrorKind = 'missing-credentials' | 'insufficient-scope' | 'project-undetermined';

export interface SetupErrorOptions {
  kind: SetupErrorKind;
  message: string;
  cause?: unknown;
}

/**
 * Fatal error raised before any object is dispatched
 */
export class SetupError extends Error {
  public readonly kind: SetupErrorKind;
  public readonly cause?: unknown;

  constructor(options: SetupErrorOptions) {
    super(options.message);
    this.name = 'SetupError';
    this.kind = options.kind;
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SetupError);
    }
  }

  static isSetupError(error: unknown): error is SetupError {
    return error instanceof SetupError;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * HTTP status of a gaxios or Cloud Storage API error, if it carries one
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }
  if (typeof error.status === 'number') {
    return error.status;
  }
  if (typeof error.code === 'number') {
    return error.code;
  }
  if (isRecord(error.response) && typeof error.response.status === 'number') {
    return error.response.status;
  }
  return undefined;
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Map a raw error from credential lookup or a first remote call to a setup error kind
 */
export function classifySetupError(error: unknown): SetupErrorKind | undefined {
  if (SetupError.isSetupError(error)) {
    return error.kind;
  }

  const message = getErrorMessage(error).toLowerCase();

  if (
    message.includes('could not load the default credentials') ||
    (isRecord(error) && error.code === 'ENOENT' && message.includes('.json'))
  ) {
    return 'missing-credentials';
  }

  if (
    getErrorStatus(error) === 403 &&
    (message.includes('insufficient authentication scopes') || message.includes('insufficient permission'))
  ) {
    return 'insufficient-scope';
  }

  if (
    message.includes('project') &&
    (message.includes('could not be determined') ||
      message.includes('unable to detect') ||
      message.includes('quota project'))
  ) {
    return 'project-undetermined';
  }

  return undefined;
}

/**
 * Wrap an error as a SetupError when it is classifiable, otherwise return it untouched
 */
export function toSetupError(error: unknown): unknown {
  const kind = classifySetupError(error);
  if (!kind || SetupError.isSetupError(error)) {
    return error;
  }
  return new SetupError({ kind, message: getErrorMessage(error), cause: error });
}

/**
 * Guidance printed by the CLI for each setup failure
 */
export function describeSetupError(kind: SetupErrorKind): { title: string; lines: string[] } {
  const login = `gcloud auth application-default login --scopes=${REQUIRED_SCOPES.join(',')}`;

  switch (kind) {
    case 'missing-credentials':
      return {
        title: 'Google Cloud credentials not found.',
        lines: [
          'Please authenticate by running:',
          `  ${login}`,
          'Or provide service account key files using --gcs-sa and --drive-sa.',
        ],
      };
    case 'insufficient-scope':
      return {
        title: 'Insufficient authentication scopes.',
        lines: [
          'Your current credentials do not have access to Google Drive.',
          'Please re-authenticate with the required scopes:',
          `  ${login}`,
        ],
      };
    case 'project-undetermined':
      return {
        title: 'Google Cloud project could not be determined.',
        lines: [
          'Please try running with --project <YOUR_PROJECT_ID>',
          'Or set the quota project via: gcloud auth application-default set-quota-project <PROJECT_ID>',
        ],
      };
  }
}
