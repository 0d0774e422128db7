import { z } from 'zod';
import type { AppConfig } from '../config';
import { DeliveryError, TransportError } from '../errors';

const DISCORD_AUTHORIZE_URL = 'https://discord.com/oauth2/authorize';
export const REQUEST_TIMEOUT_MS = 15_000;

const channelSchema = z.object({ id: z.string().min(1) });
const tokenSchema = z.object({ access_token: z.string().min(1) });
const userSchema = z.object({ id: z.union([z.string(), z.number()]).transform(String) });

/** Sends a direct message to a Discord user. */
export interface NotificationClient {
  sendDirectMessage(userId: string, text: string): Promise<void>;
}

export interface DiscordApi extends NotificationClient {
  loginUrl(): string;
  botInviteUrl(): string;
  exchangeCode(code: string): Promise<{ accessToken: string }>;
  getCurrentUser(accessToken: string): Promise<{ id: string }>;
}

type DiscordConfig = Pick<AppConfig, 'baseUrl' | 'discord'>;

export class DiscordClient implements DiscordApi {
  private readonly apiUrl: string;

  constructor(private readonly config: DiscordConfig) {
    this.apiUrl = config.discord.apiUrl;
  }

  redirectUri(): string {
    return `${this.config.baseUrl}/auth/discord/callback`;
  }

  loginUrl(): string {
    const params = new URLSearchParams({
      client_id: this.config.discord.clientId,
      redirect_uri: this.redirectUri(),
      response_type: 'code',
      scope: 'identify'
    });
    return `${DISCORD_AUTHORIZE_URL}?${params.toString()}`;
  }

  botInviteUrl(): string {
    const params = new URLSearchParams({
      client_id: this.config.discord.clientId,
      scope: 'bot',
      permissions: '0'
    });
    return `${DISCORD_AUTHORIZE_URL}?${params.toString()}`;
  }

  async exchangeCode(code: string): Promise<{ accessToken: string }> {
    const body = new URLSearchParams({
      client_id: this.config.discord.clientId,
      client_secret: this.config.discord.clientSecret,
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.redirectUri()
    });
    const payload = await this.request(`${this.apiUrl}/oauth2/token`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: body.toString()
    });
    return { accessToken: this.parse(tokenSchema, payload, 'token').access_token };
  }

  async getCurrentUser(accessToken: string): Promise<{ id: string }> {
    const payload = await this.request(`${this.apiUrl}/users/@me`, {
      method: 'GET',
      headers: { Authorization: `Bearer ${accessToken}` }
    });
    return this.parse(userSchema, payload, 'user');
  }

  /**
   * Opens (or reuses) the DM channel with `userId` and posts `text` to it.
   * Throws `TransportError` when Discord rejects either call.
   */
  async sendDirectMessage(userId: string, text: string): Promise<void> {
    const headers = {
      Authorization: `Bot ${this.config.discord.botToken}`,
      'Content-Type': 'application/json'
    };
    const channelPayload = await this.request(`${this.apiUrl}/users/@me/channels`, {
      method: 'POST',
      headers,
      body: JSON.stringify({ recipient_id: userId })
    });
    const channel = this.parse(channelSchema, channelPayload, 'channel');

    await this.request(`${this.apiUrl}/channels/${channel.id}/messages`, {
      method: 'POST',
      headers,
      body: JSON.stringify({ content: text })
    });
  }

  private async request(url: string, init: RequestInit): Promise<unknown> {
    let res: Response;
    let text: string;
    try {
      res = await fetch(url, { ...init, signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
      text = await res.text();
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new DeliveryError(`request timed out after ${REQUEST_TIMEOUT_MS}ms`);
      }
      throw new DeliveryError(err instanceof Error ? err.message : String(err));
    }

    if (!res.ok) {
      throw new TransportError(res.status, text);
    }
    if (!text) {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch {
      throw new DeliveryError(`malformed JSON response from ${new URL(url).pathname}`);
    }
  }

  private parse<S extends z.ZodTypeAny>(schema: S, payload: unknown, what: string): z.infer<S> {
    const result = schema.safeParse(payload);
    if (!result.success) {
      throw new DeliveryError(`unexpected ${what} response from Discord`);
    }
    return result.data;
  }
}
