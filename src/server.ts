import Fastify from 'fastify';
import { z } from 'zod';
import { AppError } from './errors';
import { createLogger, type Logger } from './logger';
import { ProviderError, SimulatedProvider, type ProviderClient } from './provider';
import { AccountService } from './services/accountService';
import { AlarmService } from './services/alarmService';
import { AlarmStateAggregator } from './services/alarmState';
import { AuthService, DEFAULT_OTP_MAX_ATTEMPTS } from './services/authService';
import { SessionService } from './services/sessionService';
import { createCredentialStore, type CredentialStore, type StoreKind } from './store';
import type { PanelState } from './types';

export interface BuildServerOptions {
  storage?: StoreKind;
  sessionFile?: string;
  store?: CredentialStore;
  provider?: ProviderClient;
  logger?: Logger;
  maxOtpAttempts?: number;
}

const PROVIDER_ERROR_RESPONSES: Record<ProviderError['reason'], { status: number; code: number }> = {
  rejected: { status: 422, code: 42201 },
  transport: { status: 502, code: 50201 },
  unauthorized: { status: 502, code: 50202 },
  invalid_otp: { status: 502, code: 50202 },
  otp_expired: { status: 502, code: 50202 }
};

const otpAttemptsSchema = z.coerce.number().int().min(1).max(10);

function otpAttemptsFromEnv(logger: Logger): number {
  const raw = process.env.OTP_MAX_ATTEMPTS;
  if (raw === undefined) {
    return DEFAULT_OTP_MAX_ATTEMPTS;
  }
  const parsed = otpAttemptsSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn({ value: raw, fallback: DEFAULT_OTP_MAX_ATTEMPTS }, 'invalid OTP_MAX_ATTEMPTS');
    return DEFAULT_OTP_MAX_ATTEMPTS;
  }
  return parsed.data;
}

function panelPayload(state: PanelState) {
  return {
    mode: state.mode,
    active_count: state.activeCount,
    active_alarms: state.activeLabels,
    multiple: state.multiple,
    summary: state.summary
  };
}

export function buildServer(options: BuildServerOptions = {}) {
  const storage = options.storage ?? (process.env.SESSION_STORE === 'memory' ? 'memory' : 'file');
  const logger = options.logger ?? createLogger();
  const maxOtpAttempts = options.maxOtpAttempts ?? otpAttemptsFromEnv(logger);

  const app = Fastify({ logger: false });
  const store =
    options.store ??
    createCredentialStore({
      kind: storage,
      filePath: options.sessionFile ?? process.env.SESSION_FILE,
      logger
    });
  const provider = options.provider ?? new SimulatedProvider({ accounts: [] });
  const authService = new AuthService(provider, logger, { maxOtpAttempts });
  const sessionService = new SessionService(store, authService, logger);
  const accountService = new AccountService(authService, sessionService, provider, logger);
  const alarmService = new AlarmService(
    sessionService,
    provider,
    new AlarmStateAggregator(),
    logger
  );

  app.addHook('onClose', async () => {
    await provider.disconnect();
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      reply.status(error.status).send({
        code: error.code,
        kind: error.kind,
        message: error.message,
        details: error.details ?? null
      });
      return;
    }

    if (error instanceof z.ZodError) {
      reply.status(400).send({
        code: 40000,
        kind: 'invalid_request',
        message: 'Invalid request parameters',
        details: { issues: error.issues }
      });
      return;
    }

    if (error instanceof ProviderError) {
      const mapped = PROVIDER_ERROR_RESPONSES[error.reason];
      logger.warn({ route: request.url, reason: error.reason }, error.message);
      reply.status(mapped.status).send({
        code: mapped.code,
        kind: `provider_${error.reason}`,
        message: error.message,
        details: null
      });
      return;
    }

    logger.error({ route: request.url, err: error }, 'unhandled error');
    reply.status(500).send({
      code: 50000,
      kind: 'internal',
      message: 'Internal server error'
    });
  });

  app.get('/healthz', async () => {
    return { code: 0, message: 'ok', data: { status: 'ok', uptime_sec: process.uptime() } };
  });

  app.post('/v1/auth/login', async (request) => {
    const body = z
      .object({
        identity: z.string().min(1),
        secret: z.string().min(1)
      })
      .parse(request.body);
    const result = await accountService.login(body.identity, body.secret);
    const data =
      result.status === 'authenticated'
        ? { status: result.status, identity: result.identity }
        : { status: result.status, phones: result.phones, expires_at: result.expiresAt };
    return { code: 0, message: 'ok', data };
  });

  app.post('/v1/auth/otp/send', async (request) => {
    const body = z.object({ phone_id: z.number().int() }).parse(request.body);
    const result = await accountService.sendOtp(body.phone_id);
    return { code: 0, message: 'ok', data: { expires_at: result.expiresAt } };
  });

  app.post('/v1/auth/otp/verify', async (request) => {
    const body = z.object({ code: z.string().min(1) }).parse(request.body);
    const result = await accountService.verifyOtp(body.code);
    return { code: 0, message: 'ok', data: result };
  });

  app.post('/v1/auth/logout', async () => {
    await accountService.logout();
    return { code: 0, message: 'ok' };
  });

  app.get('/v1/session/status', async () => {
    const status = await accountService.status();
    return {
      code: 0,
      message: 'ok',
      data: {
        authenticated: status.authenticated,
        identity: status.identity ?? null,
        installation_id: status.installationId ?? null
      }
    };
  });

  app.get('/v1/installations', async () => {
    const installations = await accountService.listInstallations();
    return { code: 0, message: 'ok', data: installations };
  });

  app.post('/v1/installations/select', async (request) => {
    const body = z.object({ installation_id: z.string().min(1) }).parse(request.body);
    await accountService.selectInstallation(body.installation_id);
    return { code: 0, message: 'ok', data: { installation_id: body.installation_id } };
  });

  app.post('/v1/alarm/arm', async (request) => {
    const body = z.object({ mode: z.enum(['away', 'home', 'night']) }).parse(request.body);
    const state = await alarmService.arm(body.mode);
    return { code: 0, message: 'ok', data: panelPayload(state) };
  });

  app.post('/v1/alarm/disarm', async (request) => {
    const body = z.object({ code: z.string().min(1).optional() }).parse(request.body ?? {});
    const state = await alarmService.disarm(body.code);
    return { code: 0, message: 'ok', data: panelPayload(state) };
  });

  app.get('/v1/alarm/active', async () => {
    const state = await alarmService.activeAlarms();
    return { code: 0, message: 'ok', data: panelPayload(state) };
  });

  return app;
}
