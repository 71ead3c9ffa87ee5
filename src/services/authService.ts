import { AppError } from '../errors';
import type { Logger } from '../logger';
import { isProviderError, type ProviderClient, type ProviderLoginResult } from '../provider';
import type { OtpChallenge, Session } from '../types';
import { now, randomToken } from '../utils';

export const OTP_TTL_MS = 5 * 60 * 1000;
export const DEFAULT_OTP_MAX_ATTEMPTS = 3;

export type LoginOutcome =
  | { status: 'authenticated'; session: Session }
  | { status: 'otp_required'; challenge: OtpChallenge };

export class AuthService {
  private readonly maxOtpAttempts: number;

  constructor(
    private readonly provider: ProviderClient,
    private readonly logger: Logger,
    options: { maxOtpAttempts?: number } = {}
  ) {
    this.maxOtpAttempts = options.maxOtpAttempts ?? DEFAULT_OTP_MAX_ATTEMPTS;
  }

  async login(identity: string, secret: string): Promise<LoginOutcome> {
    let result: ProviderLoginResult;
    try {
      result = await this.provider.login(identity, secret);
    } catch (error) {
      if (isProviderError(error, 'unauthorized')) {
        this.logger.info({ identity }, 'login rejected');
        throw new AppError('invalid_credentials');
      }
      throw error;
    }

    const current = now();
    if (result.status === 'authenticated') {
      this.logger.info({ identity }, 'login accepted without second factor');
      return {
        status: 'authenticated',
        session: { identity, secret, token: result.token, createdAt: current }
      };
    }

    this.logger.info({ identity, phones: result.phones.length }, 'second factor required');
    return {
      status: 'otp_required',
      challenge: {
        id: randomToken('chl'),
        identity,
        secret,
        otpHash: result.otpHash,
        phones: result.phones,
        issuedAt: current,
        expiresAt: current + OTP_TTL_MS,
        attempts: 0,
        state: 'otp_pending'
      }
    };
  }

  async requestOtp(challenge: OtpChallenge, phoneId: number): Promise<OtpChallenge> {
    this.assertPending(challenge);
    if (!challenge.phones.some((item) => item.id === phoneId)) {
      throw new AppError('otp_phone_unknown', { phone_id: phoneId });
    }

    try {
      await this.provider.sendOtp(challenge.otpHash, phoneId);
    } catch (error) {
      if (isProviderError(error, 'otp_expired')) {
        challenge.state = 'failed';
        throw new AppError('otp_expired');
      }
      throw error;
    }

    const current = now();
    challenge.phoneId = phoneId;
    challenge.issuedAt = current;
    challenge.expiresAt = current + OTP_TTL_MS;
    this.logger.info({ identity: challenge.identity, phoneId }, 'verification code sent');
    return challenge;
  }

  async verifyOtp(
    challenge: OtpChallenge,
    code: string
  ): Promise<{ status: 'authenticated'; session: Session }> {
    this.assertPending(challenge);
    if (challenge.phoneId === undefined) {
      throw new AppError('otp_not_requested');
    }

    let result: { token: string };
    try {
      result = await this.provider.verifyOtp(challenge.otpHash, code);
    } catch (error) {
      if (isProviderError(error, 'invalid_otp')) {
        challenge.attempts += 1;
        const remaining = this.maxOtpAttempts - challenge.attempts;
        if (remaining <= 0) {
          challenge.state = 'failed';
          this.logger.warn({ identity: challenge.identity }, 'verification attempts exhausted');
          throw new AppError('otp_attempts_exhausted');
        }
        throw new AppError('invalid_otp', { remaining_attempts: remaining });
      }
      if (isProviderError(error, 'otp_expired')) {
        challenge.state = 'failed';
        throw new AppError('otp_expired');
      }
      throw error;
    }

    challenge.state = 'authenticated';
    this.logger.info({ identity: challenge.identity }, 'second factor verified');
    return {
      status: 'authenticated',
      session: {
        identity: challenge.identity,
        secret: challenge.secret,
        token: result.token,
        createdAt: now()
      }
    };
  }

  async probe(session: Session): Promise<boolean> {
    try {
      await this.provider.listInstallations({ identity: session.identity, token: session.token });
      return true;
    } catch (error) {
      if (isProviderError(error, 'unauthorized')) {
        this.logger.info({ identity: session.identity }, 'stored token no longer accepted');
        return false;
      }
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    await this.provider.disconnect();
  }

  private assertPending(challenge: OtpChallenge): void {
    if (challenge.state === 'failed') {
      throw new AppError(
        challenge.attempts >= this.maxOtpAttempts ? 'otp_attempts_exhausted' : 'otp_expired'
      );
    }
    if (challenge.state !== 'otp_pending') {
      throw new AppError('no_pending_login');
    }
    if (challenge.expiresAt < now()) {
      challenge.state = 'failed';
      throw new AppError('otp_expired');
    }
  }
}
