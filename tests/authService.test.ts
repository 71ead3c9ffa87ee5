import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ProviderError, SimulatedProvider } from '../src/provider';
import { AuthService, OTP_TTL_MS } from '../src/services/authService';
import type { OtpChallenge } from '../src/types';
import { OTP_CODE, OTP_USER, PLAIN_USER, providerFixture, silentLogger } from './support';

describe('authenticator', () => {
  const baseTime = new Date('2026-03-01T08:00:00.000Z').getTime();
  let provider = new SimulatedProvider(providerFixture());
  let auth = new AuthService(provider, silentLogger);

  async function startOtpLogin(): Promise<OtpChallenge> {
    const outcome = await auth.login(OTP_USER.identity, OTP_USER.secret);
    if (outcome.status !== 'otp_required') {
      throw new Error('expected a second factor');
    }
    return outcome.challenge;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(baseTime);
    provider = new SimulatedProvider(providerFixture());
    auth = new AuthService(provider, silentLogger);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('authenticates directly when no second factor is configured', async () => {
    const outcome = await auth.login(PLAIN_USER.identity, PLAIN_USER.secret);
    expect(outcome.status).toBe('authenticated');
    if (outcome.status !== 'authenticated') {
      return;
    }
    expect(outcome.session).toMatchObject({
      identity: 'user-plain',
      secret: 'test-secret',
      createdAt: baseTime
    });
    expect(outcome.session.token.startsWith('tok_')).toBe(true);
  });

  it('rejects wrong credentials', async () => {
    await expect(auth.login(PLAIN_USER.identity, 'wrong-secret')).rejects.toMatchObject({
      kind: 'invalid_credentials',
      code: 40101
    });
  });

  it('offers masked phones when a second factor is required', async () => {
    const challenge = await startOtpLogin();
    expect(challenge.phones).toEqual([
      { id: 1, phone: '*****1222' },
      { id: 2, phone: '*****3444' }
    ]);
    expect(challenge.state).toBe('otp_pending');
    expect(challenge.expiresAt).toBe(baseTime + OTP_TTL_MS);
  });

  it('completes the second factor with the right code', async () => {
    const challenge = await startOtpLogin();
    await expect(auth.verifyOtp(challenge, OTP_CODE)).rejects.toMatchObject({
      kind: 'otp_not_requested'
    });
    await expect(auth.requestOtp(challenge, 99)).rejects.toMatchObject({
      kind: 'otp_phone_unknown'
    });

    vi.setSystemTime(baseTime + 1_000);
    await auth.requestOtp(challenge, 2);
    expect(challenge.phoneId).toBe(2);
    expect(challenge.expiresAt).toBe(baseTime + 1_000 + OTP_TTL_MS);

    const result = await auth.verifyOtp(challenge, OTP_CODE);
    expect(result.session.identity).toBe('user-otp');
    expect(challenge.state).toBe('authenticated');
    await expect(auth.verifyOtp(challenge, OTP_CODE)).rejects.toMatchObject({
      kind: 'no_pending_login'
    });
  });

  it('allows a bounded number of wrong codes', async () => {
    const challenge = await startOtpLogin();
    await auth.requestOtp(challenge, 1);

    await expect(auth.verifyOtp(challenge, '000000')).rejects.toMatchObject({
      kind: 'invalid_otp',
      details: { remaining_attempts: 2 }
    });
    await expect(auth.verifyOtp(challenge, '000000')).rejects.toMatchObject({
      kind: 'invalid_otp',
      details: { remaining_attempts: 1 }
    });
    expect(challenge.state).toBe('otp_pending');

    await expect(auth.verifyOtp(challenge, '000000')).rejects.toMatchObject({
      kind: 'otp_attempts_exhausted'
    });
    expect(challenge.state).toBe('failed');
    await expect(auth.verifyOtp(challenge, OTP_CODE)).rejects.toMatchObject({
      kind: 'otp_attempts_exhausted'
    });
  });

  it('honours a configured attempt bound', async () => {
    auth = new AuthService(provider, silentLogger, { maxOtpAttempts: 1 });
    const challenge = await startOtpLogin();
    await auth.requestOtp(challenge, 1);
    await expect(auth.verifyOtp(challenge, '000000')).rejects.toMatchObject({
      kind: 'otp_attempts_exhausted'
    });
  });

  it('expires the challenge after the code window', async () => {
    const challenge = await startOtpLogin();
    await auth.requestOtp(challenge, 1);

    vi.setSystemTime(baseTime + OTP_TTL_MS + 1);
    await expect(auth.verifyOtp(challenge, OTP_CODE)).rejects.toMatchObject({
      kind: 'otp_expired'
    });
    expect(challenge.state).toBe('failed');
    await expect(auth.requestOtp(challenge, 1)).rejects.toMatchObject({ kind: 'otp_expired' });
  });

  it('probes stored sessions against the provider', async () => {
    const outcome = await auth.login(PLAIN_USER.identity, PLAIN_USER.secret);
    if (outcome.status !== 'authenticated') {
      throw new Error('expected direct authentication');
    }
    expect(await auth.probe(outcome.session)).toBe(true);

    provider.offline = true;
    await expect(auth.probe(outcome.session)).rejects.toBeInstanceOf(ProviderError);

    provider.offline = false;
    provider.revokeTokens();
    expect(await auth.probe(outcome.session)).toBe(false);
  });
});
