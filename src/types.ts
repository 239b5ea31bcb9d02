export type ActionType = 'warning' | 'mute_1' | 'mute_2' | 'mute_3' | 'ban_1' | 'ban_2' | 'ban_3';

export type SanctionKind = 'mute' | 'ban';

export type AdminActionType = 'unmute' | 'unban' | 'warnings_reset' | 'config_update';

export type AuditActionType = ActionType | AdminActionType;

export type ContentCategory =
  | 'bad_words'
  | 'links'
  | 'caps'
  | 'emoji_spam'
  | 'number_spam'
  | 'repeated_chars'
  | 'max_length'
  | 'blocked_pattern';

export type ViolationCategory = 'flood' | 'spam' | ContentCategory | 'warning_limit';

export type FilterType = 'bad_word' | 'pattern';

export type ChatKind = 'dialog' | 'chat' | 'channel';

export interface AppConfig {
  botToken: string;
  databasePath: string;
  logChatId?: number;
  adminUserIds: number[];
  noticeInChat: boolean;
  notifyUserOnWarning: boolean;
  notifyOnExpiry: boolean;
  floodMinIntervalSec: number;
  spamThreshold: number;
  spamWindowSec: number;
  maxWarnings: number;
  maxMessageLength: number;
  sweepIntervalSec: number;
  retentionDays: number;
}

export interface ChatModerationSettings {
  enabled: boolean;
  floodProtection: boolean;
  floodMinIntervalSec: number;
  spamProtection: boolean;
  spamThreshold: number;
  spamWindowSec: number;
  badWords: boolean;
  links: boolean;
  caps: boolean;
  emojiSpam: boolean;
  numberSpam: boolean;
  repeatedChars: boolean;
  maxLength: boolean;
  blockedPatterns: boolean;
  maxMessageLength: number;
  maxWarnings: number;
  ruleActions: Partial<Record<ViolationCategory, ActionType>>;
  precedence: ViolationCategory[];
}

export interface BlockedPattern {
  filterId: number;
  pattern: string;
  actionType: ActionType;
}

export interface ModerationConfig {
  chatId: number;
  settings: ChatModerationSettings;
  badWords: string[];
  blockedPatterns: BlockedPattern[];
  allowedDomains: string[];
}

export interface ChatFilter {
  id: number;
  chatId: number;
  filterType: FilterType;
  pattern: string;
  actionType: ActionType;
  active: boolean;
  createdBy: number;
  createdAt: number;
}

export interface IncomingMessage {
  chatId: number;
  userId: number;
  userName?: string;
  text?: string | null;
  timestampMs: number;
  messageRef: string;
}

export interface Violation {
  category: ViolationCategory;
  reason: string;
  actionType?: ActionType;
}

export interface ModerationDecision {
  type: ActionType;
  durationSec: number;
  /** Set when a warning reached the limit and was escalated; the warning is stored with the sanction. */
  recordsWarning?: true;
}

export interface Verdict {
  violations: Violation[];
  action: ModerationDecision | null;
}

export interface NewSanction {
  chatId: number;
  userId: number;
  kind: SanctionKind;
  reason: string;
  issuedBy: number;
  issuedAtMs: number;
  durationSec: number;
}

export interface Sanction extends NewSanction {
  id: number;
  expiresAtMs: number;
  active: boolean;
}

export interface ModerationActionRecord {
  chatId: number;
  userId: number;
  actionType: AuditActionType;
  reason: string;
  moderatorId: number;
  durationSec: number;
  meta?: Record<string, unknown>;
}

export interface StoredModerationAction extends ModerationActionRecord {
  id: number;
  createdAt: number;
}

export interface ApplyActionRequest {
  chatId: number;
  userId: number;
  actionType: string;
  reason: string;
  moderatorId: number;
  durationSec: number;
  messageRef?: string;
  userName?: string;
  recordsWarning?: boolean;
}

export type EscalationState = 'clean' | 'warned' | 'muted' | 'banned';

export interface UserModerationStatus {
  chatId: number;
  userId: number;
  state: EscalationState;
  warningCount: number;
  activeSanctions: Sanction[];
}

export interface MaxSender {
  user_id: number;
  is_bot?: boolean;
  name?: string;
}

export interface MaxRecipient {
  chat_id: number | null;
  chat_type: ChatKind;
}

export interface MaxMessageBody {
  mid: string;
  text: string | null;
  attachments?: unknown[] | null;
}

export interface MaxIncomingMessage {
  sender?: MaxSender | null;
  recipient: MaxRecipient;
  body: MaxMessageBody;
  timestamp?: number;
}
