export interface RuntimePreflightOptions {
  allowNonProd?: boolean;
  allowMemoryInProduction?: boolean;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isBlank(value: string | undefined): boolean {
  return !value || value.trim().length === 0;
}

export function shouldRunRuntimePreflight(env: NodeJS.ProcessEnv): boolean {
  return env.ENABLE_RUNTIME_PREFLIGHT === '1' || env.NODE_ENV === 'production';
}

export function validateRuntimeEnv(
  env: NodeJS.ProcessEnv,
  options: RuntimePreflightOptions = {}
): string[] {
  const errors: string[] = [];
  const allowNonProd = options.allowNonProd ?? false;
  const allowMemoryInProduction = options.allowMemoryInProduction ?? false;

  const nodeEnv = env.NODE_ENV?.trim();
  if (isBlank(nodeEnv)) {
    errors.push('NODE_ENV is not set');
  } else if (nodeEnv !== 'production' && !allowNonProd) {
    errors.push(`NODE_ENV=${nodeEnv} is not production (set ALLOW_NON_PROD=1 to skip)`);
  }

  const sessionStore = env.SESSION_STORE?.trim() || 'file';
  if (sessionStore !== 'file' && sessionStore !== 'memory') {
    errors.push(`SESSION_STORE=${sessionStore} is invalid, expected file or memory`);
  }

  if (sessionStore === 'memory' && nodeEnv === 'production' && !allowMemoryInProduction) {
    errors.push(
      'memory session store loses the login on restart (set ALLOW_MEMORY_IN_PRODUCTION=1 to skip)'
    );
  }

  const sessionFile = env.SESSION_FILE?.trim();
  if (sessionStore === 'file' && sessionFile !== undefined && !sessionFile.endsWith('.json')) {
    errors.push(`SESSION_FILE=${sessionFile} must point to a .json file`);
  }

  const otpAttempts = env.OTP_MAX_ATTEMPTS?.trim();
  if (otpAttempts !== undefined) {
    if (!/^\d+$/.test(otpAttempts) || Number(otpAttempts) < 1 || Number(otpAttempts) > 10) {
      errors.push(`OTP_MAX_ATTEMPTS=${otpAttempts} is invalid, expected an integer 1-10`);
    }
  }

  const logLevel = env.LOG_LEVEL?.trim();
  if (logLevel !== undefined && !LOG_LEVELS.includes(logLevel)) {
    errors.push(`LOG_LEVEL=${logLevel} is invalid, expected one of ${LOG_LEVELS.join(', ')}`);
  }

  if (isBlank(env.PROVIDER_FIXTURE)) {
    errors.push('PROVIDER_FIXTURE is not set');
  }

  const port = (env.PORT ?? '3000').trim();
  if (!/^\d+$/.test(port)) {
    errors.push(`PORT=${port} is invalid, must be a number`);
  } else {
    const value = Number(port);
    if (value < 1 || value > 65535) {
      errors.push(`PORT=${port} is out of range 1-65535`);
    }
  }

  return errors;
}

export function assertRuntimeEnv(
  env: NodeJS.ProcessEnv,
  options: RuntimePreflightOptions = {}
): void {
  const errors = validateRuntimeEnv(env, options);
  if (errors.length === 0) {
    return;
  }

  const message = ['Runtime environment check failed:', ...errors.map((item) => `- ${item}`)].join(
    '\n'
  );
  throw new Error(message);
}
