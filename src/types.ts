export type ZoneKind = 'internal_day' | 'internal_night' | 'internal_total' | 'external';

export const ZONE_KINDS: readonly ZoneKind[] = [
  'internal_total',
  'internal_day',
  'internal_night',
  'external'
];

export type SettledMode = 'disarmed' | 'armed_home' | 'armed_night' | 'armed_away';
export type TransitionKind = 'arming' | 'disarming';
export type PanelMode = SettledMode | TransitionKind;
export type ArmMode = 'away' | 'home' | 'night';

export interface Session {
  identity: string;
  secret: string;
  token: string;
  installationId?: string;
  createdAt: number;
}

export interface OtpPhone {
  id: number;
  phone: string;
}

export type OtpChallengeState = 'otp_pending' | 'authenticated' | 'failed';

export interface OtpChallenge {
  id: string;
  identity: string;
  secret: string;
  otpHash: string;
  phones: OtpPhone[];
  phoneId?: number;
  issuedAt: number;
  expiresAt: number;
  attempts: number;
  state: OtpChallengeState;
}

export interface ZoneAlarmState {
  kind: ZoneKind;
  active: boolean;
}

export interface PanelState {
  mode: PanelMode;
  activeCount: number;
  activeLabels: string[];
  multiple: boolean;
  summary: string;
}

export interface Installation {
  id: string;
  alias: string;
  panel?: string;
}

export interface ProviderAuth {
  identity: string;
  token: string;
}

export interface SessionStatus {
  authenticated: boolean;
  identity?: string;
  installationId?: string;
}
