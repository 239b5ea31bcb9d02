interface Expiring<T> {
  value: T;
  expiresAt: number;
}

interface ChatMemberLike {
  user_id: number;
  is_admin?: boolean;
  is_owner?: boolean;
}

/** The part of the MAX `Api` used to resolve chat administrators. */
export interface AdminLookupApi {
  getChatAdmins(chatId: number): Promise<unknown>;
  getChatMembers(chatId: number, extra: { user_ids: number[] }): Promise<unknown>;
}

export type AdminResolverWarn = (message: string, meta?: Record<string, unknown>) => void;

const FAILED_LOOKUP_TTL_MS = 20_000;

function isChatMemberLike(value: unknown): value is ChatMemberLike {
  return typeof value === 'object'
    && value !== null
    && 'user_id' in value
    && typeof value.user_id === 'number';
}

function extractMembers(response: unknown): ChatMemberLike[] {
  if (typeof response !== 'object' || response === null || !('members' in response)) {
    return [];
  }

  const { members } = response;
  return Array.isArray(members) ? members.filter(isChatMemberLike) : [];
}

function isPrivileged(member: ChatMemberLike): boolean {
  return member.is_admin === true || member.is_owner === true;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Answers "may this user run admin commands here?".
 * Configured global admins always pass; otherwise the chat's admin list is fetched once per TTL,
 * with a direct member lookup for users missing from it.
 */
export class AdminResolver {
  private readonly chatAdmins = new Map<number, Expiring<ReadonlySet<number>>>();
  private readonly memberChecks = new Map<string, Expiring<boolean>>();
  private readonly globalAdmins: ReadonlySet<number>;

  constructor(
    private readonly api: AdminLookupApi,
    globalAdminIds: readonly number[] = [],
    private readonly ttlMs: number = 60_000,
    private readonly onWarn?: AdminResolverWarn,
  ) {
    this.globalAdmins = new Set(globalAdminIds);
  }

  async isAdmin(chatId: number, userId: number): Promise<boolean> {
    if (this.globalAdmins.has(userId)) {
      return true;
    }

    const admins = await this.loadChatAdmins(chatId);
    if (admins?.has(userId)) {
      return true;
    }

    return this.checkMember(chatId, userId);
  }

  private async loadChatAdmins(chatId: number): Promise<ReadonlySet<number> | undefined> {
    const now = Date.now();
    const cached = this.chatAdmins.get(chatId);
    if (cached && cached.expiresAt > now) {
      return cached.value;
    }

    try {
      const response = await this.api.getChatAdmins(chatId);
      const ids = new Set(extractMembers(response).filter(isPrivileged).map((member) => member.user_id));
      this.chatAdmins.set(chatId, { value: ids, expiresAt: now + this.ttlMs });
      return ids;
    } catch (error) {
      this.onWarn?.('getChatAdmins failed in AdminResolver', { chatId, error: describeError(error) });
      return undefined;
    }
  }

  private async checkMember(chatId: number, userId: number): Promise<boolean> {
    const key = `${chatId}:${userId}`;
    const now = Date.now();
    const cached = this.memberChecks.get(key);
    if (cached && cached.expiresAt > now) {
      return cached.value;
    }

    try {
      const response = await this.api.getChatMembers(chatId, { user_ids: [userId] });
      const member = extractMembers(response).find((item) => item.user_id === userId);
      const isAdmin = member !== undefined && isPrivileged(member);
      this.memberChecks.set(key, { value: isAdmin, expiresAt: now + this.ttlMs });
      return isAdmin;
    } catch (error) {
      this.onWarn?.('getChatMembers failed in AdminResolver', { chatId, userId, error: describeError(error) });
      this.memberChecks.set(key, { value: false, expiresAt: now + Math.min(this.ttlMs, FAILED_LOOKUP_TTL_MS) });
      return false;
    }
  }
}
