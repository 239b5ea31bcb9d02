import { ActionType, SanctionKind } from '../types';

export const ACTION_TYPES: readonly ActionType[] = ['warning', 'mute_1', 'mute_2', 'mute_3', 'ban_1', 'ban_2', 'ban_3'];

export const TIER_DURATIONS_SEC: Record<ActionType, number> = {
  warning: 0,
  mute_1: 5 * 60,
  mute_2: 15 * 60,
  mute_3: 60 * 60,
  ban_1: 24 * 60 * 60,
  ban_2: 7 * 24 * 60 * 60,
  ban_3: 30 * 24 * 60 * 60,
};

const ACTION_TYPE_SET: ReadonlySet<string> = new Set(ACTION_TYPES);

export function isActionType(value: string): value is ActionType {
  return ACTION_TYPE_SET.has(value);
}

export function sanctionKindOf(actionType: ActionType): SanctionKind | null {
  if (actionType.startsWith('mute_')) return 'mute';
  if (actionType.startsWith('ban_')) return 'ban';
  return null;
}

export function tierActionType(kind: SanctionKind, tier: number): ActionType | null {
  const candidate = `${kind}_${tier}`;
  return isActionType(candidate) ? candidate : null;
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${seconds} сек`;
  if (seconds < 60 * 60) return `${Math.floor(seconds / 60)} мин`;
  if (seconds < 24 * 60 * 60) return `${Math.floor(seconds / 3600)} ч`;
  return `${Math.floor(seconds / 86_400)} дн`;
}

export class UnknownActionTypeError extends Error {
  constructor(readonly actionType: string) {
    super(`Unknown action type: ${actionType}`);
    this.name = 'UnknownActionTypeError';
  }
}

export function parseActionType(value: string): ActionType {
  const normalized = value.trim().toLowerCase();
  if (!isActionType(normalized)) {
    throw new UnknownActionTypeError(value);
  }
  return normalized;
}
