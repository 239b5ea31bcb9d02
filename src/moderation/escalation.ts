import {
  ActionType,
  ChatModerationSettings,
  EscalationState,
  ModerationDecision,
  Sanction,
  Verdict,
  Violation,
  ViolationCategory,
} from '../types';
import { TIER_DURATIONS_SEC } from './tiers';

export const DEFAULT_PRECEDENCE: readonly ViolationCategory[] = [
  'flood',
  'spam',
  'bad_words',
  'caps',
  'emoji_spam',
  'number_spam',
  'repeated_chars',
  'max_length',
  'blocked_pattern',
  'links',
  'warning_limit',
];

export const DEFAULT_CATEGORY_ACTIONS: Record<ViolationCategory, ActionType> = {
  flood: 'mute_1',
  spam: 'mute_2',
  bad_words: 'warning',
  links: 'mute_1',
  caps: 'warning',
  emoji_spam: 'warning',
  number_spam: 'warning',
  repeated_chars: 'warning',
  max_length: 'warning',
  blocked_pattern: 'warning',
  warning_limit: 'ban_1',
};

export function resolveCategoryAction(violation: Violation, settings: ChatModerationSettings): ActionType {
  return violation.actionType
    ?? settings.ruleActions[violation.category]
    ?? DEFAULT_CATEGORY_ACTIONS[violation.category];
}

/**
 * Walks the chat's precedence list; each detected violation overwrites the
 * selected action, so the last one in the list wins. `warning_limit` fires
 * only after an earlier violation, once the projected warning count reaches
 * the chat's limit. A warning escalated that way is flagged with
 * `recordsWarning` so the counter still reaches the limit.
 */
export function selectAction(
  detected: Violation[],
  settings: ChatModerationSettings,
  storedWarningCount: number,
): Verdict {
  const byCategory = new Map<ViolationCategory, Violation>();
  for (const violation of detected) {
    if (!byCategory.has(violation.category)) {
      byCategory.set(violation.category, violation);
    }
  }

  const violations: Violation[] = [];
  let actionType: ActionType | null = null;
  let escalatedWarning = false;

  for (const category of settings.precedence) {
    if (category === 'warning_limit') {
      if (actionType === null) continue;

      const projected = storedWarningCount + (actionType === 'warning' ? 1 : 0);
      if (projected < settings.maxWarnings) continue;

      const violation: Violation = {
        category,
        reason: `Превышен лимит предупреждений: ${projected}/${settings.maxWarnings}`,
      };
      violations.push(violation);
      escalatedWarning = actionType === 'warning';
      actionType = resolveCategoryAction(violation, settings);
      continue;
    }

    const violation = byCategory.get(category);
    if (!violation) continue;

    violations.push(violation);
    escalatedWarning = false;
    actionType = resolveCategoryAction(violation, settings);
  }

  if (actionType === null) {
    return { violations, action: null };
  }

  const action: ModerationDecision = { type: actionType, durationSec: TIER_DURATIONS_SEC[actionType] };
  if (escalatedWarning && actionType !== 'warning') {
    action.recordsWarning = true;
  }
  return { violations, action };
}

export function resolveEscalationState(warningCount: number, activeSanctions: Sanction[]): EscalationState {
  if (activeSanctions.some((sanction) => sanction.kind === 'ban')) return 'banned';
  if (activeSanctions.some((sanction) => sanction.kind === 'mute')) return 'muted';
  if (warningCount > 0) return 'warned';
  return 'clean';
}
