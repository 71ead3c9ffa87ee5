import { AppError, isAppError } from '../errors';
import type { Logger } from '../logger';
import { isProviderError } from '../provider';
import type { CredentialStore } from '../store';
import type { Session } from '../types';
import { now, SerialQueue } from '../utils';
import type { AuthService, LoginOutcome } from './authService';

/**
 * Owns the single live session of the process.
 *
 * In-memory reads and writes of the session happen synchronously, so no two
 * callers ever see it half-updated. Network and file I/O run outside those
 * sections. `epoch` is bumped by every adopt or logout, and a load/probe
 * result computed under an older epoch is never committed. Store writes are
 * funnelled through one queue so the file always reflects the latest mutation.
 */
export class SessionService {
  private session?: Session;
  private epoch = 0;
  private pendingLoad?: Promise<Session>;
  private readonly writes = new SerialQueue();

  constructor(
    private readonly store: CredentialStore,
    private readonly authService: AuthService,
    private readonly logger: Logger
  ) {}

  current(): Session | undefined {
    return this.session ? { ...this.session } : undefined;
  }

  async ensureSession(): Promise<Session> {
    if (this.session) {
      return { ...this.session };
    }
    if (!this.pendingLoad) {
      const pending = this.restore(this.epoch);
      this.pendingLoad = pending;
      const release = () => {
        if (this.pendingLoad === pending) {
          this.pendingLoad = undefined;
        }
      };
      void pending.then(release, release);
    }
    const session = await this.pendingLoad;
    return { ...session };
  }

  /**
   * Runs `task` with the live session. A token the provider no longer accepts
   * invalidates the live session and the task is retried once on the
   * reauthenticated one.
   */
  async withSession<T>(task: (session: Session) => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt += 1) {
      const session = await this.ensureSession();
      try {
        return await task(session);
      } catch (error) {
        if (!isProviderError(error, 'unauthorized')) {
          throw error;
        }
        this.invalidate(session.token);
        if (attempt >= 1) {
          throw new AppError('not_authenticated', { reason: 'token_rejected' });
        }
      }
    }
  }

  async completeLogin(session: Session): Promise<void> {
    const adopted = this.adopt({ ...session, createdAt: now() });
    this.logger.info({ identity: adopted.identity }, 'session adopted after login');
    await this.persist(adopted);
  }

  async selectInstallation(installationId: string): Promise<void> {
    if (!this.session) {
      throw new AppError('no_active_session');
    }
    this.session = { ...this.session, installationId };
    this.logger.info({ installationId }, 'installation selected');
    await this.persist({ ...this.session });
  }

  /**
   * Drops the live session when the provider has rejected its token, leaving
   * the stored copy in place so the next {@link ensureSession} reauthenticates.
   */
  invalidate(token: string): void {
    if (this.session?.token !== token) {
      return;
    }
    this.logger.info({ identity: this.session.identity }, 'live session invalidated');
    this.session = undefined;
    this.epoch += 1;
  }

  async logout(): Promise<void> {
    const identity = this.session?.identity;
    this.session = undefined;
    this.epoch += 1;
    try {
      await this.clearStore();
    } finally {
      await this.authService.disconnect();
    }
    this.logger.info({ identity }, 'logged out');
  }

  private adopt(session: Session): Session {
    this.session = session;
    this.epoch += 1;
    return { ...session };
  }

  private persist(session: Session): Promise<void> {
    return this.writes.run(async () => {
      try {
        await this.store.save(session);
      } catch (error) {
        this.logger.error({ err: error }, 'could not persist the session');
        throw new AppError('session_persist_failed');
      }
    });
  }

  private clearStore(): Promise<void> {
    return this.writes.run(async () => {
      try {
        await this.store.clear();
      } catch (error) {
        this.logger.error({ err: error }, 'could not clear the stored session');
        throw new AppError('session_persist_failed');
      }
    });
  }

  private async restore(epoch: number): Promise<Session> {
    const stored = await this.store.load();
    if (!stored) {
      throw new AppError('not_authenticated');
    }

    if (await this.authService.probe(stored)) {
      return this.commit(epoch, stored, 'stored session restored');
    }
    if (epoch !== this.epoch) {
      return this.superseded();
    }

    let outcome: LoginOutcome;
    try {
      outcome = await this.authService.login(stored.identity, stored.secret);
    } catch (error) {
      if (isAppError(error, 'invalid_credentials')) {
        await this.discard(epoch, 'stored credentials rejected');
        throw new AppError('not_authenticated', { reason: 'credentials_rejected' });
      }
      throw error;
    }
    if (outcome.status === 'otp_required') {
      await this.discard(epoch, 'relogin needs a second factor');
      throw new AppError('not_authenticated', { reason: 'otp_required' });
    }

    const refreshed: Session = {
      ...outcome.session,
      ...(stored.installationId ? { installationId: stored.installationId } : {})
    };
    return this.commit(epoch, refreshed, 'session reauthenticated', true);
  }

  private async commit(
    epoch: number,
    session: Session,
    message: string,
    persist = false
  ): Promise<Session> {
    if (epoch !== this.epoch) {
      return this.superseded();
    }
    const adopted = this.adopt(session);
    this.logger.info({ identity: adopted.identity }, message);
    if (persist) {
      await this.persist(adopted);
    }
    return adopted;
  }

  private superseded(): Session {
    if (this.session) {
      return { ...this.session };
    }
    throw new AppError('not_authenticated');
  }

  private async discard(epoch: number, message: string): Promise<void> {
    this.logger.warn(message);
    if (epoch !== this.epoch) {
      return;
    }
    await this.clearStore();
  }
}
