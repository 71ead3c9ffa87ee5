import { AppError } from '../errors';
import type {
  PanelState,
  SettledMode,
  TransitionKind,
  ZoneAlarmState,
  ZoneKind
} from '../types';
import { ZONE_KINDS } from '../types';

export const ZONE_LABELS: Record<ZoneKind, string> = {
  internal_total: 'Interna Total',
  internal_day: 'Interna Día',
  internal_night: 'Interna Noche',
  external: 'Externa'
};

function settledMode(active: ReadonlySet<ZoneKind>): SettledMode {
  if (active.has('internal_total')) {
    return 'armed_away';
  }
  if (active.has('internal_night')) {
    return 'armed_night';
  }
  if (active.has('internal_day') || active.has('external')) {
    return 'armed_home';
  }
  return 'disarmed';
}

function summarize(labels: string[]): string {
  if (labels.length === 0) {
    return 'No active alarms';
  }
  if (labels.length === 1) {
    return `${labels[0]} active`;
  }
  return `Multiple alarms active: ${labels.join(', ')}`;
}

/**
 * Collapses a zone snapshot into the panel mode and the per-zone detail.
 *
 * The mode follows zone priority (total, then night, then day or external);
 * the labels and summary always list every active zone. While a transition is
 * in flight its kind replaces the mode.
 */
export function resolvePanelState(
  zones: readonly ZoneAlarmState[],
  transition?: TransitionKind
): PanelState {
  const active = new Set<ZoneKind>();
  zones.forEach((zone) => {
    if (zone.active) {
      active.add(zone.kind);
    }
  });

  const activeLabels = ZONE_KINDS.filter((kind) => active.has(kind)).map(
    (kind) => ZONE_LABELS[kind]
  );

  return {
    mode: transition ?? settledMode(active),
    activeCount: activeLabels.length,
    activeLabels,
    multiple: activeLabels.length >= 2,
    summary: summarize(activeLabels)
  };
}

export class AlarmStateAggregator {
  private transition?: TransitionKind;

  inFlight(): TransitionKind | undefined {
    return this.transition;
  }

  beginTransition(kind: TransitionKind): void {
    if (this.transition) {
      throw new AppError('transition_in_flight', { in_flight: this.transition });
    }
    this.transition = kind;
  }

  endTransition(): void {
    this.transition = undefined;
  }

  resolve(zones: readonly ZoneAlarmState[]): PanelState {
    return resolvePanelState(zones, this.transition);
  }
}
