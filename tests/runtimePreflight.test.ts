import { describe, expect, it } from 'vitest';
import {
  assertRuntimeEnv,
  shouldRunRuntimePreflight,
  validateRuntimeEnv
} from '../src/runtimePreflight';

describe('runtime preflight', () => {
  it('runs by default in production or when explicit switch is enabled', () => {
    expect(shouldRunRuntimePreflight({ NODE_ENV: 'production' })).toBe(true);
    expect(shouldRunRuntimePreflight({ NODE_ENV: 'development' })).toBe(false);
    expect(shouldRunRuntimePreflight({ ENABLE_RUNTIME_PREFLIGHT: '1' })).toBe(true);
  });

  it('accepts valid production file store env', () => {
    const errors = validateRuntimeEnv({
      NODE_ENV: 'production',
      SESSION_STORE: 'file',
      SESSION_FILE: '/var/lib/alarm-panel/session.json',
      OTP_MAX_ATTEMPTS: '3',
      LOG_LEVEL: 'info',
      PROVIDER_FIXTURE: 'fixtures/provider.json',
      PORT: '3000'
    });
    expect(errors).toEqual([]);
  });

  it('fails for invalid store, attempt bound and port settings', () => {
    const errors = validateRuntimeEnv({
      NODE_ENV: 'production',
      SESSION_STORE: 'redis',
      OTP_MAX_ATTEMPTS: '0',
      LOG_LEVEL: 'verbose',
      PROVIDER_FIXTURE: 'fixtures/provider.json',
      PORT: '70000'
    });

    expect(errors).toEqual([
      'SESSION_STORE=redis is invalid, expected file or memory',
      'OTP_MAX_ATTEMPTS=0 is invalid, expected an integer 1-10',
      'LOG_LEVEL=verbose is invalid, expected one of fatal, error, warn, info, debug, trace, silent',
      'PORT=70000 is out of range 1-65535'
    ]);
  });

  it('requires a json session file', () => {
    const errors = validateRuntimeEnv({
      NODE_ENV: 'production',
      SESSION_FILE: '/var/lib/alarm-panel/session.txt',
      PROVIDER_FIXTURE: 'fixtures/provider.json'
    });
    expect(errors).toEqual(['SESSION_FILE=/var/lib/alarm-panel/session.txt must point to a .json file']);
  });

  it('fails for production memory by default but can be overridden', () => {
    const env = {
      NODE_ENV: 'production',
      SESSION_STORE: 'memory',
      PROVIDER_FIXTURE: 'fixtures/provider.json',
      PORT: '3000'
    };
    expect(validateRuntimeEnv(env).some((item) => item.includes('memory'))).toBe(true);
    expect(validateRuntimeEnv(env, { allowMemoryInProduction: true })).toEqual([]);
  });

  it('rejects non-production unless allowed', () => {
    const env = { NODE_ENV: 'development', PROVIDER_FIXTURE: 'fixtures/provider.json' };
    expect(validateRuntimeEnv(env)).toEqual([
      'NODE_ENV=development is not production (set ALLOW_NON_PROD=1 to skip)'
    ]);
    expect(validateRuntimeEnv(env, { allowNonProd: true })).toEqual([]);
  });

  it('throws on assert when env is invalid', () => {
    expect(() =>
      assertRuntimeEnv({
        NODE_ENV: 'production',
        PORT: '3000'
      })
    ).toThrow('Runtime environment check failed:\n- PROVIDER_FIXTURE is not set');
  });
});
