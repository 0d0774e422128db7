import { AppError } from '../errors';
import type { DataStore } from '../store';
import type { Session } from '../types';
import { now, randomToken, toIso } from '../utils';
import type { DiscordApi } from './discordClient';

export class AuthService {
  constructor(
    private readonly store: DataStore,
    private readonly discord: DiscordApi
  ) {}

  /** Completes the OAuth code flow and opens a session for the Discord user. */
  async loginWithCode(code: string): Promise<Session> {
    const { accessToken } = await this.discord.exchangeCode(code);
    const me = await this.discord.getCurrentUser(accessToken);
    const session: Session = {
      token: randomToken('sess'),
      userId: me.id,
      tz: null,
      inviteClicked: false,
      createdAt: toIso(now())
    };
    await this.store.createSession(session);
    return session;
  }

  async findSession(token?: string): Promise<Session | undefined> {
    if (!token) {
      return undefined;
    }
    return this.store.getSession(token);
  }

  async requireSession(token?: string): Promise<Session> {
    const session = await this.findSession(token);
    if (!session) {
      throw new AppError(401, 40101, '로그인이 필요합니다.');
    }
    return session;
  }

  async updateSession(session: Session): Promise<void> {
    await this.store.updateSession(session);
  }

  async logout(token?: string): Promise<void> {
    if (!token) {
      return;
    }
    await this.store.deleteSession(token);
  }
}
