import { AppError, isAppError } from '../errors';
import type { Logger } from '../logger';
import type { ProviderClient } from '../provider';
import type { Installation, OtpChallenge, OtpPhone, Session, SessionStatus } from '../types';
import type { AuthService } from './authService';
import type { SessionService } from './sessionService';

export type LoginResponse =
  | { status: 'authenticated'; identity: string }
  | { status: 'otp_required'; phones: OtpPhone[]; expiresAt: number };

/**
 * Login, verification and installation commands. Keeps at most one pending
 * OTP challenge; a new login abandons the previous one.
 */
export class AccountService {
  private pending?: OtpChallenge;

  constructor(
    private readonly authService: AuthService,
    private readonly sessionService: SessionService,
    private readonly provider: ProviderClient,
    private readonly logger: Logger
  ) {}

  async login(identity: string, secret: string): Promise<LoginResponse> {
    this.pending = undefined;
    const outcome = await this.authService.login(identity, secret);
    if (outcome.status === 'authenticated') {
      await this.sessionService.completeLogin(outcome.session);
      return { status: 'authenticated', identity };
    }
    this.pending = outcome.challenge;
    return {
      status: 'otp_required',
      phones: outcome.challenge.phones,
      expiresAt: outcome.challenge.expiresAt
    };
  }

  async sendOtp(phoneId: number): Promise<{ expiresAt: number }> {
    const challenge = this.requirePending();
    try {
      await this.authService.requestOtp(challenge, phoneId);
    } finally {
      this.dropIfFinished(challenge);
    }
    return { expiresAt: challenge.expiresAt };
  }

  async verifyOtp(code: string): Promise<{ status: 'authenticated'; identity: string }> {
    const challenge = this.requirePending();
    let result: { session: Session };
    try {
      result = await this.authService.verifyOtp(challenge, code);
    } finally {
      this.dropIfFinished(challenge);
    }
    await this.sessionService.completeLogin(result.session);
    return { status: 'authenticated', identity: result.session.identity };
  }

  async status(): Promise<SessionStatus> {
    try {
      const session = await this.sessionService.ensureSession();
      return {
        authenticated: true,
        identity: session.identity,
        ...(session.installationId ? { installationId: session.installationId } : {})
      };
    } catch (error) {
      if (isAppError(error, 'not_authenticated')) {
        return { authenticated: false };
      }
      throw error;
    }
  }

  async listInstallations(): Promise<Installation[]> {
    return this.sessionService.withSession((session) =>
      this.provider.listInstallations({ identity: session.identity, token: session.token })
    );
  }

  async selectInstallation(installationId: string): Promise<void> {
    const installations = await this.listInstallations();
    if (!installations.some((item) => item.id === installationId)) {
      throw new AppError('installation_not_found', { installation_id: installationId });
    }
    await this.sessionService.selectInstallation(installationId);
  }

  async logout(): Promise<void> {
    this.pending = undefined;
    await this.sessionService.logout();
  }

  private requirePending(): OtpChallenge {
    if (!this.pending) {
      throw new AppError('no_pending_login');
    }
    return this.pending;
  }

  private dropIfFinished(challenge: OtpChallenge): void {
    if (challenge.state !== 'otp_pending' && this.pending === challenge) {
      this.pending = undefined;
      this.logger.debug({ identity: challenge.identity, state: challenge.state }, 'login finished');
    }
  }
}
