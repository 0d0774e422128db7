import cookie from '@fastify/cookie';
import Fastify, { type FastifyReply, type FastifyRequest } from 'fastify';
import type { Logger } from 'pino';
import { z } from 'zod';
import { loadConfig, type AppConfig } from './config';
import { AppError, DeliveryError, describeDeliveryError, TransportError } from './errors';
import { createLogger } from './logger';
import { AuthService } from './services/authService';
import { DeliveryPoller } from './services/deliveryPoller';
import { DiscordClient, type DiscordApi } from './services/discordClient';
import { ProfileService } from './services/profileService';
import { TimerService } from './services/timerService';
import { createStore, type DataStore, type StoreKind } from './store';
import { isTimerKind, TIMER_KIND_TABLE } from './timerKinds';
import type { Session, TimerKind, TimerRecord } from './types';
import { formatInTimezone, humanizeSeconds, now, toIso } from './utils';
import { renderHomePage } from './web';

export interface BuildServerOptions {
  storage?: StoreKind;
  databaseUrl?: string;
  config?: AppConfig;
  store?: DataStore;
  discord?: DiscordApi;
  logger?: Logger;
  startPoller?: boolean;
}

const SESSION_COOKIE = 'sid';
const TEST_DM_TEXT = '✅ 테스트 DM: 테스트 메시지가 정상적으로 도착했어요!';

function bearerToken(auth?: string): string | undefined {
  if (!auth) {
    return undefined;
  }
  const [type, token] = auth.split(' ');
  if (type !== 'Bearer') {
    return undefined;
  }
  return token;
}

function sessionToken(request: FastifyRequest): string | undefined {
  const raw = request.cookies[SESSION_COOKIE];
  if (raw) {
    const unsigned = request.unsignCookie(raw);
    if (unsigned.valid && unsigned.value) {
      return unsigned.value;
    }
  }
  return bearerToken(request.headers.authorization);
}

function parseTimerKind(raw: string): TimerKind {
  if (!isTimerKind(raw)) {
    throw new AppError(400, 40001, 'unknown timer_type');
  }
  return raw;
}

const timezoneBodySchema = z.object({
  tz: z
    .string()
    .trim()
    .min(1)
    .max(64)
    .refine((value) => value.includes('/'))
});

export function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? loadConfig(process.env);
  const storage = options.storage ?? config.storage.driver;
  const databaseUrl = options.databaseUrl ?? config.storage.databaseUrl;
  const logger = options.logger ?? createLogger(config);

  const app = Fastify({ logger });
  const store = options.store ?? createStore({ kind: storage, databaseUrl });
  const discord = options.discord ?? new DiscordClient(config);
  const authService = new AuthService(store, discord);
  const timerService = new TimerService(store);
  const profileService = new ProfileService(store, config.defaultTimezone);
  const poller = new DeliveryPoller(
    timerService,
    profileService,
    discord,
    logger.child({ component: 'poller' }),
    {
      intervalMs: config.poll.intervalSeconds * 1000,
      batchLimit: config.poll.batchLimit
    }
  );
  const startedAt = now();

  void app.register(cookie, { secret: config.sessionSecret });

  app.addHook('onReady', async () => {
    await store.init();
    if (options.startPoller) {
      poller.start();
    }
  });

  app.addHook('onClose', async () => {
    await poller.stop();
    await store.close();
  });

  const requireSession = async (request: FastifyRequest) =>
    authService.requireSession(sessionToken(request));

  const sessionTimezone = async (session: Session): Promise<string> => {
    if (session.tz) {
      return session.tz;
    }
    const tz = await profileService.getTimezone(session.userId);
    await authService.updateSession({ ...session, tz });
    return tz;
  };

  const localTime = (iso: string | null, tz: string): string | null =>
    iso ? formatInTimezone(new Date(iso), tz, config.defaultTimezone) : null;

  const timerView = (record: TimerRecord | undefined, tz: string) => {
    if (!record) {
      return null;
    }
    const remainingSec = Math.max(0, Math.floor((Date.parse(record.dueAt) - now()) / 1000));
    return {
      timer_type: record.kind,
      status: record.status,
      last_set_at: record.lastSetAt,
      due_at: record.dueAt,
      last_set_at_local: localTime(record.lastSetAt, tz),
      due_at_local: localTime(record.dueAt, tz),
      remaining_sec: remainingSec,
      remaining: humanizeSeconds(remainingSec),
      fail_reason: record.failReason
    };
  };

  const redirect = (reply: FastifyReply, url: string) => reply.redirect(url);

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      reply.status(error.status).send({
        code: error.code,
        message: error.message,
        details: error.details ?? null
      });
      return;
    }

    if (error instanceof z.ZodError) {
      reply.status(400).send({
        code: 40000,
        message: '요청 형식이 올바르지 않습니다.',
        details: { issues: error.issues }
      });
      return;
    }

    if (error instanceof DeliveryError) {
      request.log.warn({ err: error }, 'discord request failed');
      reply.status(502).send({
        code: 50201,
        message: '디스코드 요청에 실패했습니다.'
      });
      return;
    }

    if (typeof error.statusCode === 'number' && error.statusCode < 500) {
      reply.status(error.statusCode).send({ code: 40000, message: error.message });
      return;
    }

    request.log.error({ err: error }, 'unhandled request error');
    reply.status(500).send({
      code: 50000,
      message: '서버 내부 오류가 발생했습니다.'
    });
  });

  app.get('/healthz', async () => ({
    code: 0,
    message: 'ok',
    data: { status: 'ok', uptime_sec: Math.floor((now() - startedAt) / 1000) }
  }));

  app.get('/readyz', async () => ({
    code: 0,
    message: 'ok',
    data: { status: 'ready', poller: poller.isRunning ? 'running' : 'idle' }
  }));

  app.get('/', async (request, reply) => {
    const session = await authService.findSession(sessionToken(request));
    reply.type('text/html; charset=utf-8');
    return renderHomePage({ userId: session?.userId });
  });

  app.get('/logout', async (request, reply) => {
    await authService.logout(sessionToken(request));
    reply.clearCookie(SESSION_COOKIE, { path: '/' });
    return redirect(reply, '/');
  });

  app.get('/auth/discord/login', async (_request, reply) => redirect(reply, discord.loginUrl()));

  app.get('/auth/discord/callback', async (request, reply) => {
    const query = z
      .object({ code: z.string().optional(), error: z.string().optional() })
      .parse(request.query);
    if (query.error) {
      throw new AppError(400, 40031, `디스코드 로그인 실패: ${query.error}`);
    }
    if (!query.code) {
      throw new AppError(400, 40032, '인가 코드 없음');
    }

    const session = await authService.loginWithCode(query.code);
    request.log.info({ userId: session.userId }, 'user logged in');
    reply.setCookie(SESSION_COOKIE, session.token, {
      path: '/',
      httpOnly: true,
      sameSite: 'lax',
      secure: config.baseUrl.startsWith('https://'),
      signed: true
    });
    return redirect(reply, '/');
  });

  app.post('/api/timer/:kind', async (request) => {
    const session = await requireSession(request);
    const params = z.object({ kind: z.string() }).parse(request.params);
    const kind = parseTimerKind(params.kind);

    if (!(await profileService.isDeliveryReady(session.userId))) {
      throw new AppError(
        400,
        40011,
        'DM 알림을 받으려면 먼저 개인 서버에 봇을 초대하고, ‘테스트 DM’으로 활성화를 확인해 주세요.'
      );
    }

    const tz = await sessionTimezone(session);
    const record = await timerService.arm(session.userId, kind);
    const label = TIMER_KIND_TABLE[kind].label;
    return {
      code: 0,
      message: 'ok',
      data: {
        timer: timerView(record, tz),
        message: `✅ ${label} 타이머 갱신!\n- 다음 알림: ${localTime(record.dueAt, tz)} (${tz})`
      }
    };
  });

  app.post('/api/timer/:kind/cancel', async (request) => {
    const session = await requireSession(request);
    const params = z.object({ kind: z.string() }).parse(request.params);
    const kind = parseTimerKind(params.kind);

    await timerService.cancel(session.userId, kind);
    return {
      code: 0,
      message: 'ok',
      data: { message: `🛑 ${TIMER_KIND_TABLE[kind].label} 타이머를 중지했어요.` }
    };
  });

  app.post('/api/tz', async (request) => {
    const session = await requireSession(request);
    const body = timezoneBodySchema.safeParse(request.body ?? {});
    if (!body.success) {
      throw new AppError(400, 40002, 'bad tz');
    }
    const tz = body.data.tz;

    const previous = session.tz ?? (await profileService.getTimezone(session.userId));
    await authService.updateSession({ ...session, tz });
    if (tz !== previous) {
      await profileService.setTimezone(session.userId, tz);
    }
    return { code: 0, message: 'ok', data: { tz } };
  });

  app.post('/api/test-send', async (request) => {
    const session = await requireSession(request);
    try {
      await discord.sendDirectMessage(session.userId, TEST_DM_TEXT);
    } catch (err) {
      const reason = describeDeliveryError(err);
      await profileService.recordDeliveryResult(session.userId, false, reason);
      request.log.warn({ userId: session.userId, reason }, 'test dm failed');
      const message =
        err instanceof TransportError
          ? '→ 개인 서버에 봇을 초대했는지 확인하고, 디스코드에서 서버/DM 설정을 확인해 주세요.'
          : `❌ DM 전송 실패: ${reason}`;
      throw new AppError(400, 40021, message);
    }
    await profileService.recordDeliveryResult(session.userId, true);
    return {
      code: 0,
      message: 'ok',
      data: { message: '✅ 테스트 DM을 보냈어요! (Discord DM 확인)' }
    };
  });

  app.get('/api/dm/health', async (request) => {
    const session = await requireSession(request);
    const profile = await profileService.get(session.userId);
    return {
      code: 0,
      message: 'ok',
      data: {
        discord_user_id: session.userId,
        dm_status: profile?.dmStatus ?? 'unknown',
        dm_last_error: profile?.dmLastError ?? null,
        dm_ok_at: profile?.dmOkAt ?? null
      }
    };
  });

  app.get('/api/status.json', async (request) => {
    const session = await requireSession(request);
    const tz = await sessionTimezone(session);
    const timers = await timerService.getAll(session.userId);
    const serverNow = toIso(now());
    return {
      code: 0,
      message: 'ok',
      data: {
        server_now: serverNow,
        server_now_local: localTime(serverNow, tz),
        tz,
        timers: {
          rudolph: timerView(timers.rudolph, tz),
          bandage: timerView(timers.bandage, tz)
        }
      }
    };
  });

  app.post('/api/ack/:kind', async (request) => {
    const session = await requireSession(request);
    const params = z.object({ kind: z.string() }).parse(request.params);
    if (params.kind !== 'invite') {
      throw new AppError(400, 40003, 'bad kind');
    }
    await authService.updateSession({ ...session, inviteClicked: true });
    return { code: 0, message: 'ok', data: { ok: true } };
  });

  app.get('/api/banner', async (request) => {
    const session = await authService.findSession(sessionToken(request));
    if (!session) {
      return { code: 0, message: 'ok', data: { logged_in: false, show_banner: false } };
    }
    const ready = await profileService.isDeliveryReady(session.userId);
    return {
      code: 0,
      message: 'ok',
      data: {
        logged_in: true,
        dm_ready: ready,
        invite_clicked: session.inviteClicked,
        show_banner: !ready
      }
    };
  });

  app.get('/out/invite', async (_request, reply) => redirect(reply, discord.botInviteUrl()));

  app.get('/out/public', async (_request, reply) => {
    if (!config.publicServerInviteUrl) {
      throw new AppError(404, 40401, '공용 서버 초대 링크가 설정되지 않았습니다.');
    }
    return redirect(reply, config.publicServerInviteUrl);
  });

  return app;
}
