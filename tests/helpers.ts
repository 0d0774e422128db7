import { pino, type Logger } from 'pino';
import request from 'supertest';
import { loadConfig, type AppConfig } from '../src/config';
import type { buildServer } from '../src/server';
import type { DiscordApi } from '../src/services/discordClient';

export function testConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({
    STORAGE_DRIVER: 'memory',
    SESSION_SECRET: 'test-secret',
    DISCORD_CLIENT_ID: 'test-client',
    DISCORD_CLIENT_SECRET: 'test-client-secret',
    DISCORD_BOT_TOKEN: 'test-bot-token',
    DISCORD_API_URL: 'https://discord.test/api',
    LOG_LEVEL: 'silent',
    ...overrides
  });
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** In-process stand-in for the Discord API. */
export class FakeDiscord implements DiscordApi {
  sent: Array<{ userId: string; text: string }> = [];
  failures = new Map<string, Error>();
  usersByCode = new Map<string, string>();

  loginUrl(): string {
    return 'https://discord.test/oauth2/authorize?client_id=test-client';
  }

  botInviteUrl(): string {
    return 'https://discord.test/oauth2/authorize?scope=bot';
  }

  async exchangeCode(code: string): Promise<{ accessToken: string }> {
    return { accessToken: `access-${code}` };
  }

  async getCurrentUser(accessToken: string): Promise<{ id: string }> {
    const code = accessToken.replace(/^access-/, '');
    return { id: this.usersByCode.get(code) ?? 'anonymous' };
  }

  async sendDirectMessage(userId: string, text: string): Promise<void> {
    const failure = this.failures.get(userId);
    if (failure) {
      throw failure;
    }
    this.sent.push({ userId, text });
  }
}

/** Runs the OAuth callback for `userId` and returns the session cookie pair. */
export async function login(
  app: ReturnType<typeof buildServer>,
  discord: FakeDiscord,
  userId: string
): Promise<string> {
  const code = `code-${userId}`;
  discord.usersByCode.set(code, userId);
  const response = await request(app.server).get('/auth/discord/callback').query({ code });
  const setCookie: string[] = [response.headers['set-cookie'] ?? []].flat();
  const sid = setCookie.find((item) => item.startsWith('sid='));
  if (!sid) {
    throw new Error('login did not set a session cookie');
  }
  return sid.split(';')[0];
}
