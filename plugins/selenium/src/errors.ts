import { error as wd } from 'selenium-webdriver';

export const ERROR_KINDS = [
  'UnknownTool',
  'InvalidArguments',
  'NoActiveSession',
  'SessionNotFound',
  'UnsupportedBrowserKind',
  'DriverStartFailure',
  'ElementNotFound',
  'Timeout',
  'ClickIntercepted',
  'NavigationFailure',
  'ScriptError',
  'UnknownFailure',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/** Failure kinds a tool may name as the fallback for generic driver errors. */
export type FailureKind = Extract<ErrorKind, 'NavigationFailure' | 'ScriptError' | 'UnknownFailure'>;

export interface CommandError {
  kind: ErrorKind;
  message: string;
  details?: string[];
}

export type CommandResult =
  | { success: true; payload: unknown }
  | { success: false; error: CommandError };

/**
 * An error that already knows how it should be reported to the caller.
 */
export class ToolError extends Error {
  readonly kind: ErrorKind;
  readonly details?: string[];

  constructor(kind: ErrorKind, message: string, details?: string[]) {
    super(message);
    this.name = 'ToolError';
    this.kind = kind;
    this.details = details;
  }
}

// Order matters: every class below extends WebDriverError.
const WEBDRIVER_KINDS: Array<[new (message?: string) => Error, ErrorKind]> = [
  [wd.NoSuchElementError, 'ElementNotFound'],
  [wd.StaleElementReferenceError, 'ElementNotFound'],
  [wd.ScriptTimeoutError, 'Timeout'],
  [wd.TimeoutError, 'Timeout'],
  [wd.ElementClickInterceptedError, 'ClickIntercepted'],
  [wd.JavascriptError, 'ScriptError'],
  [wd.InsecureCertificateError, 'NavigationFailure'],
  [wd.InvalidSelectorError, 'InvalidArguments'],
  [wd.InvalidArgumentError, 'InvalidArguments'],
];

/**
 * Map anything thrown while serving a tool call onto the uniform error
 * envelope. Generic WebDriver failures take the tool's own fallback kind;
 * non-driver exceptions are always UnknownFailure.
 */
export function classifyFailure(err: unknown, fallback: FailureKind = 'UnknownFailure'): CommandError {
  if (err instanceof ToolError) {
    return err.details ? { kind: err.kind, message: err.message, details: err.details } : { kind: err.kind, message: err.message };
  }
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof wd.WebDriverError) {
    for (const [type, kind] of WEBDRIVER_KINDS) {
      if (err instanceof type) return { kind, message };
    }
    return { kind: fallback, message };
  }
  return { kind: 'UnknownFailure', message };
}

export function failure(kind: ErrorKind, message: string, details?: string[]): CommandResult {
  return { success: false, error: details ? { kind, message, details } : { kind, message } };
}
