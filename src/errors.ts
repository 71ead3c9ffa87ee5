export type ErrorKind =
  | 'invalid_credentials'
  | 'invalid_otp'
  | 'otp_expired'
  | 'otp_attempts_exhausted'
  | 'not_authenticated'
  | 'no_pending_login'
  | 'otp_not_requested'
  | 'no_active_session'
  | 'installation_not_selected'
  | 'transition_in_flight'
  | 'otp_phone_unknown'
  | 'installation_not_found'
  | 'session_persist_failed';

const CATALOG: Record<ErrorKind, { status: number; code: number; message: string }> = {
  invalid_credentials: { status: 401, code: 40101, message: 'Invalid identity or secret' },
  invalid_otp: { status: 401, code: 40102, message: 'Verification code is incorrect' },
  otp_expired: { status: 401, code: 40103, message: 'Verification code has expired' },
  otp_attempts_exhausted: {
    status: 401,
    code: 40104,
    message: 'Too many incorrect verification codes, start the login again'
  },
  not_authenticated: { status: 401, code: 40105, message: 'Not logged in or session expired' },
  no_pending_login: { status: 409, code: 40901, message: 'No login is waiting for verification' },
  otp_not_requested: {
    status: 409,
    code: 40902,
    message: 'Choose a phone and send the verification code first'
  },
  no_active_session: { status: 409, code: 40903, message: 'No active session' },
  installation_not_selected: { status: 409, code: 40904, message: 'No installation selected' },
  transition_in_flight: {
    status: 409,
    code: 40905,
    message: 'Another alarm command is already in progress'
  },
  otp_phone_unknown: { status: 400, code: 40001, message: 'Phone is not offered for this login' },
  installation_not_found: { status: 404, code: 40401, message: 'Installation not found' },
  session_persist_failed: { status: 500, code: 50001, message: 'Could not persist the session' }
};

export class AppError extends Error {
  kind: ErrorKind;
  status: number;
  code: number;
  details?: Record<string, unknown>;

  constructor(kind: ErrorKind, details?: Record<string, unknown>) {
    const entry = CATALOG[kind];
    super(entry.message);
    this.kind = kind;
    this.status = entry.status;
    this.code = entry.code;
    this.details = details;
  }
}

export function isAppError(error: unknown, kind?: ErrorKind): error is AppError {
  return error instanceof AppError && (kind === undefined || error.kind === kind);
}
