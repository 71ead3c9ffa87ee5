import { AppError } from '../errors';
import type { Logger } from '../logger';
import type { ProviderClient } from '../provider';
import type { ArmMode, PanelState, ProviderAuth, TransitionKind, ZoneKind } from '../types';
import type { AlarmStateAggregator } from './alarmState';
import type { SessionService } from './sessionService';

const ARM_MODE_ZONES: Record<ArmMode, ZoneKind> = {
  away: 'internal_total',
  home: 'internal_day',
  night: 'internal_night'
};

export class AlarmService {
  constructor(
    private readonly sessionService: SessionService,
    private readonly provider: ProviderClient,
    private readonly aggregator: AlarmStateAggregator,
    private readonly logger: Logger
  ) {}

  async activeAlarms(): Promise<PanelState> {
    const zones = await this.withTarget((auth, installationId) =>
      this.provider.fetchZoneStates(auth, installationId)
    );
    return this.aggregator.resolve(zones);
  }

  armAway(): Promise<PanelState> {
    return this.arm('away');
  }

  armHome(): Promise<PanelState> {
    return this.arm('home');
  }

  armNight(): Promise<PanelState> {
    return this.arm('night');
  }

  async arm(mode: ArmMode): Promise<PanelState> {
    const zone = ARM_MODE_ZONES[mode];
    return this.runCommand('arming', `arm ${mode}`, (auth, installationId) =>
      this.provider.armZone(auth, installationId, zone)
    );
  }

  async disarm(code?: string): Promise<PanelState> {
    return this.runCommand('disarming', 'disarm', (auth, installationId) =>
      this.provider.disarm(auth, installationId, code)
    );
  }

  private async runCommand(
    kind: TransitionKind,
    label: string,
    command: (auth: ProviderAuth, installationId: string) => Promise<void>
  ): Promise<PanelState> {
    await this.withTarget(async (auth, installationId) => {
      this.aggregator.beginTransition(kind);
      this.logger.info({ installationId, command: label }, 'alarm command issued');
      try {
        await command(auth, installationId);
      } catch (error) {
        this.logger.error({ installationId, command: label, err: error }, 'alarm command failed');
        throw error;
      } finally {
        this.aggregator.endTransition();
      }
    });

    const zones = await this.withTarget((auth, installationId) =>
      this.provider.fetchZoneStates(auth, installationId)
    );
    const state = this.aggregator.resolve(zones);
    this.logger.info({ command: label, mode: state.mode }, 'alarm command settled');
    return state;
  }

  private withTarget<T>(
    task: (auth: ProviderAuth, installationId: string) => Promise<T>
  ): Promise<T> {
    return this.sessionService.withSession(async (session) => {
      if (!session.installationId) {
        throw new AppError('installation_not_selected');
      }
      return task({ identity: session.identity, token: session.token }, session.installationId);
    });
  }
}
