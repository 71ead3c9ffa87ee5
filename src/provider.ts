import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type {
  Installation,
  OtpPhone,
  ProviderAuth,
  ZoneAlarmState,
  ZoneKind
} from './types';
import { ZONE_KINDS } from './types';
import { maskPhone, randomToken } from './utils';

export type ProviderErrorReason =
  | 'unauthorized'
  | 'invalid_otp'
  | 'otp_expired'
  | 'rejected'
  | 'transport';

export class ProviderError extends Error {
  reason: ProviderErrorReason;

  constructor(reason: ProviderErrorReason, message: string) {
    super(message);
    this.name = 'ProviderError';
    this.reason = reason;
  }
}

export function isProviderError(
  error: unknown,
  reason?: ProviderErrorReason
): error is ProviderError {
  return error instanceof ProviderError && (reason === undefined || error.reason === reason);
}

export type ProviderLoginResult =
  | { status: 'authenticated'; token: string }
  | { status: 'otp_required'; otpHash: string; phones: OtpPhone[] };

/**
 * Remote security provider. Every call is a network round trip and may reject
 * with a {@link ProviderError}.
 */
export interface ProviderClient {
  login(identity: string, secret: string): Promise<ProviderLoginResult>;
  sendOtp(otpHash: string, phoneId: number): Promise<void>;
  verifyOtp(otpHash: string, code: string): Promise<{ token: string }>;
  listInstallations(auth: ProviderAuth): Promise<Installation[]>;
  /** Resolves with a complete snapshot or rejects; never a partial one. */
  fetchZoneStates(auth: ProviderAuth, installationId: string): Promise<ZoneAlarmState[]>;
  armZone(auth: ProviderAuth, installationId: string, kind: ZoneKind): Promise<void>;
  disarm(auth: ProviderAuth, installationId: string, code?: string): Promise<void>;
  disconnect(): Promise<void>;
}

const zoneFlagsSchema = z
  .object({
    internal_day: z.boolean().default(false),
    internal_night: z.boolean().default(false),
    internal_total: z.boolean().default(false),
    external: z.boolean().default(false)
  })
  .default({});

const simulatedInstallationSchema = z.object({
  id: z.string().min(1),
  alias: z.string().min(1),
  panel: z.string().optional(),
  disarm_code: z.string().min(1).optional(),
  zones: zoneFlagsSchema
});

const simulatedAccountSchema = z.object({
  identity: z.string().min(1),
  secret: z.string().min(1),
  otp: z
    .object({
      code: z.string().min(4),
      phones: z.array(z.object({ id: z.number().int(), phone: z.string().min(1) })).min(1)
    })
    .optional(),
  installations: z.array(simulatedInstallationSchema)
});

export const providerFixtureSchema = z.object({
  accounts: z.array(simulatedAccountSchema)
});

export type ProviderFixture = z.input<typeof providerFixtureSchema>;
type SimulatedAccount = z.infer<typeof simulatedAccountSchema>;
type SimulatedInstallation = z.infer<typeof simulatedInstallationSchema>;

export async function loadProviderFixture(filePath: string): Promise<ProviderFixture> {
  const raw = await readFile(filePath, 'utf8');
  return providerFixtureSchema.parse(JSON.parse(raw));
}

/**
 * In-process stand-in for the remote provider. Accounts, OTP phones and
 * installation zones come from a fixture. Issued tokens stay valid until
 * {@link SimulatedProvider.revokeTokens} is called.
 */
export class SimulatedProvider implements ProviderClient {
  private readonly accounts: SimulatedAccount[];
  private readonly tokens = new Map<string, string>();
  private readonly pendingOtp = new Map<string, { identity: string; sentTo?: number }>();

  offline = false;
  disconnects = 0;

  constructor(fixture: ProviderFixture) {
    this.accounts = providerFixtureSchema.parse(fixture).accounts;
  }

  async login(identity: string, secret: string): Promise<ProviderLoginResult> {
    this.assertOnline();
    const account = this.accounts.find(
      (item) => item.identity === identity && item.secret === secret
    );
    if (!account) {
      throw new ProviderError('unauthorized', 'credentials rejected');
    }
    if (account.otp) {
      const otpHash = randomToken('otp');
      this.pendingOtp.set(otpHash, { identity });
      return {
        status: 'otp_required',
        otpHash,
        phones: account.otp.phones.map((item) => ({ id: item.id, phone: maskPhone(item.phone) }))
      };
    }
    return { status: 'authenticated', token: this.issueToken(identity) };
  }

  async sendOtp(otpHash: string, phoneId: number): Promise<void> {
    this.assertOnline();
    const pending = this.pendingOtp.get(otpHash);
    if (!pending) {
      throw new ProviderError('otp_expired', 'unknown verification request');
    }
    const account = this.accountFor(pending.identity);
    if (!account.otp?.phones.some((item) => item.id === phoneId)) {
      throw new ProviderError('rejected', `phone ${phoneId} is not registered`);
    }
    pending.sentTo = phoneId;
  }

  async verifyOtp(otpHash: string, code: string): Promise<{ token: string }> {
    this.assertOnline();
    const pending = this.pendingOtp.get(otpHash);
    if (!pending || pending.sentTo === undefined) {
      throw new ProviderError('otp_expired', 'unknown verification request');
    }
    const account = this.accountFor(pending.identity);
    if (account.otp?.code !== code) {
      throw new ProviderError('invalid_otp', 'verification code rejected');
    }
    this.pendingOtp.delete(otpHash);
    return { token: this.issueToken(account.identity) };
  }

  async listInstallations(auth: ProviderAuth): Promise<Installation[]> {
    const account = this.authorize(auth);
    return account.installations.map((item) => ({
      id: item.id,
      alias: item.alias,
      ...(item.panel ? { panel: item.panel } : {})
    }));
  }

  async fetchZoneStates(auth: ProviderAuth, installationId: string): Promise<ZoneAlarmState[]> {
    const installation = this.installationFor(auth, installationId);
    return ZONE_KINDS.map((kind) => ({ kind, active: installation.zones[kind] }));
  }

  async armZone(auth: ProviderAuth, installationId: string, kind: ZoneKind): Promise<void> {
    const installation = this.installationFor(auth, installationId);
    installation.zones[kind] = true;
  }

  async disarm(auth: ProviderAuth, installationId: string, code?: string): Promise<void> {
    const installation = this.installationFor(auth, installationId);
    if (installation.disarm_code && installation.disarm_code !== code) {
      throw new ProviderError('rejected', 'disarm code rejected');
    }
    ZONE_KINDS.forEach((kind) => {
      installation.zones[kind] = false;
    });
  }

  async disconnect(): Promise<void> {
    this.disconnects += 1;
  }

  revokeTokens(): void {
    this.tokens.clear();
  }

  private issueToken(identity: string): string {
    const token = randomToken('tok');
    this.tokens.set(token, identity);
    return token;
  }

  private assertOnline(): void {
    if (this.offline) {
      throw new ProviderError('transport', 'provider unreachable');
    }
  }

  private accountFor(identity: string): SimulatedAccount {
    const account = this.accounts.find((item) => item.identity === identity);
    if (!account) {
      throw new ProviderError('unauthorized', 'unknown account');
    }
    return account;
  }

  private authorize(auth: ProviderAuth): SimulatedAccount {
    this.assertOnline();
    if (this.tokens.get(auth.token) !== auth.identity) {
      throw new ProviderError('unauthorized', 'token rejected');
    }
    return this.accountFor(auth.identity);
  }

  private installationFor(auth: ProviderAuth, installationId: string): SimulatedInstallation {
    const account = this.authorize(auth);
    const installation = account.installations.find((item) => item.id === installationId);
    if (!installation) {
      throw new ProviderError('rejected', `installation ${installationId} not found`);
    }
    return installation;
  }
}
