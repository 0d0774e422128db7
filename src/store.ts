import { Pool } from 'pg';
import type {
  DeliveryResultPatch,
  DmStatus,
  Session,
  TimerKind,
  TimerRecord,
  TimerStatus,
  TimerStatusPatch,
  UserProfile
} from './types';

export type StoreKind = 'memory' | 'postgres';

export interface DataStore {
  init(): Promise<void>;
  close(): Promise<void>;

  createSession(session: Session): Promise<void>;
  getSession(token: string): Promise<Session | undefined>;
  updateSession(session: Session): Promise<void>;
  deleteSession(token: string): Promise<void>;

  upsertTimer(record: TimerRecord): Promise<void>;
  updateTimerStatus(userId: string, kind: TimerKind, patch: TimerStatusPatch): Promise<void>;
  listTimersByUser(userId: string): Promise<TimerRecord[]>;
  listDueTimers(nowIso: string, limit: number): Promise<TimerRecord[]>;

  getProfile(userId: string): Promise<UserProfile | undefined>;
  upsertDeliveryResult(patch: DeliveryResultPatch): Promise<void>;
  upsertTimezone(userId: string, tz: string, updatedAt: string): Promise<void>;
}

function timerKey(userId: string, kind: TimerKind): string {
  return `${userId}:${kind}`;
}

export class InMemoryStore implements DataStore {
  sessions = new Map<string, Session>();
  timers = new Map<string, TimerRecord>();
  profiles = new Map<string, UserProfile>();

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async createSession(session: Session): Promise<void> {
    this.sessions.set(session.token, { ...session });
  }

  async getSession(token: string): Promise<Session | undefined> {
    const session = this.sessions.get(token);
    return session ? { ...session } : undefined;
  }

  async updateSession(session: Session): Promise<void> {
    if (!this.sessions.has(session.token)) {
      return;
    }
    this.sessions.set(session.token, { ...session });
  }

  async deleteSession(token: string): Promise<void> {
    this.sessions.delete(token);
  }

  async upsertTimer(record: TimerRecord): Promise<void> {
    this.timers.set(timerKey(record.userId, record.kind), { ...record });
  }

  async updateTimerStatus(
    userId: string,
    kind: TimerKind,
    patch: TimerStatusPatch
  ): Promise<void> {
    const key = timerKey(userId, kind);
    const current = this.timers.get(key);
    if (!current) {
      return;
    }
    this.timers.set(key, { ...current, ...patch });
  }

  async listTimersByUser(userId: string): Promise<TimerRecord[]> {
    return [...this.timers.values()]
      .filter((record) => record.userId === userId)
      .map((record) => ({ ...record }));
  }

  async listDueTimers(nowIso: string, limit: number): Promise<TimerRecord[]> {
    return [...this.timers.values()]
      .filter((record) => record.status === 'scheduled' && record.dueAt <= nowIso)
      .sort((a, b) => a.dueAt.localeCompare(b.dueAt))
      .slice(0, limit)
      .map((record) => ({ ...record }));
  }

  async getProfile(userId: string): Promise<UserProfile | undefined> {
    const profile = this.profiles.get(userId);
    return profile ? { ...profile } : undefined;
  }

  async upsertDeliveryResult(patch: DeliveryResultPatch): Promise<void> {
    const current = this.profiles.get(patch.userId);
    this.profiles.set(patch.userId, {
      userId: patch.userId,
      dmStatus: patch.dmStatus,
      dmLastError: patch.dmLastError,
      dmOkAt: patch.dmOkAt ?? current?.dmOkAt ?? null,
      tz: current?.tz ?? null,
      updatedAt: patch.updatedAt
    });
  }

  async upsertTimezone(userId: string, tz: string, updatedAt: string): Promise<void> {
    const current = this.profiles.get(userId);
    this.profiles.set(userId, {
      userId,
      dmStatus: current?.dmStatus ?? 'unknown',
      dmLastError: current?.dmLastError ?? null,
      dmOkAt: current?.dmOkAt ?? null,
      tz,
      updatedAt
    });
  }
}

type SessionRow = {
  token: string;
  discord_user_id: string;
  tz: string | null;
  invite_clicked: boolean;
  created_at: Date;
};

type TimerRow = {
  discord_user_id: string;
  timer_type: TimerKind;
  status: TimerStatus;
  due_at: Date;
  last_set_at: Date;
  updated_at: Date;
  fail_reason: string | null;
};

type ProfileRow = {
  discord_user_id: string;
  dm_status: DmStatus;
  dm_last_error: string | null;
  dm_ok_at: Date | null;
  tz: string | null;
  updated_at: Date;
};

function sessionFromRow(row: SessionRow): Session {
  return {
    token: row.token,
    userId: row.discord_user_id,
    tz: row.tz,
    inviteClicked: row.invite_clicked,
    createdAt: row.created_at.toISOString()
  };
}

function timerFromRow(row: TimerRow): TimerRecord {
  return {
    userId: row.discord_user_id,
    kind: row.timer_type,
    status: row.status,
    dueAt: row.due_at.toISOString(),
    lastSetAt: row.last_set_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
    failReason: row.fail_reason
  };
}

export class PostgresStore implements DataStore {
  private readonly pool: Pool;

  constructor(databaseUrl: string) {
    this.pool = new Pool({ connectionString: databaseUrl });
  }

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS sessions (
        token TEXT PRIMARY KEY,
        discord_user_id TEXT NOT NULL,
        tz TEXT,
        invite_clicked BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMPTZ NOT NULL
      );

      CREATE TABLE IF NOT EXISTS user_timers (
        discord_user_id TEXT NOT NULL,
        timer_type TEXT NOT NULL,
        status TEXT NOT NULL,
        due_at TIMESTAMPTZ NOT NULL,
        last_set_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL,
        fail_reason TEXT,
        PRIMARY KEY(discord_user_id, timer_type)
      );
      CREATE INDEX IF NOT EXISTS idx_user_timers_due ON user_timers(status, due_at);

      CREATE TABLE IF NOT EXISTS discord_users (
        discord_user_id TEXT PRIMARY KEY,
        dm_status TEXT NOT NULL DEFAULT 'unknown',
        dm_last_error TEXT,
        dm_ok_at TIMESTAMPTZ,
        tz TEXT,
        updated_at TIMESTAMPTZ NOT NULL
      );
    `);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async createSession(session: Session): Promise<void> {
    await this.pool.query(
      `INSERT INTO sessions(token, discord_user_id, tz, invite_clicked, created_at)
       VALUES ($1,$2,$3,$4,$5)`,
      [session.token, session.userId, session.tz, session.inviteClicked, session.createdAt]
    );
  }

  async getSession(token: string): Promise<Session | undefined> {
    const { rows } = await this.pool.query<SessionRow>(
      'SELECT * FROM sessions WHERE token = $1',
      [token]
    );
    const row = rows[0];
    return row ? sessionFromRow(row) : undefined;
  }

  async updateSession(session: Session): Promise<void> {
    await this.pool.query(
      'UPDATE sessions SET tz = $2, invite_clicked = $3 WHERE token = $1',
      [session.token, session.tz, session.inviteClicked]
    );
  }

  async deleteSession(token: string): Promise<void> {
    await this.pool.query('DELETE FROM sessions WHERE token = $1', [token]);
  }

  async upsertTimer(record: TimerRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO user_timers(discord_user_id, timer_type, status, due_at, last_set_at, updated_at, fail_reason)
       VALUES ($1,$2,$3,$4,$5,$6,$7)
       ON CONFLICT (discord_user_id, timer_type)
       DO UPDATE SET status = EXCLUDED.status,
                     due_at = EXCLUDED.due_at,
                     last_set_at = EXCLUDED.last_set_at,
                     updated_at = EXCLUDED.updated_at,
                     fail_reason = EXCLUDED.fail_reason`,
      [
        record.userId,
        record.kind,
        record.status,
        record.dueAt,
        record.lastSetAt,
        record.updatedAt,
        record.failReason
      ]
    );
  }

  async updateTimerStatus(
    userId: string,
    kind: TimerKind,
    patch: TimerStatusPatch
  ): Promise<void> {
    await this.pool.query(
      `UPDATE user_timers
       SET status = $3, fail_reason = $4, updated_at = $5
       WHERE discord_user_id = $1 AND timer_type = $2`,
      [userId, kind, patch.status, patch.failReason, patch.updatedAt]
    );
  }

  async listTimersByUser(userId: string): Promise<TimerRecord[]> {
    const { rows } = await this.pool.query<TimerRow>(
      'SELECT * FROM user_timers WHERE discord_user_id = $1',
      [userId]
    );
    return rows.map(timerFromRow);
  }

  async listDueTimers(nowIso: string, limit: number): Promise<TimerRecord[]> {
    const { rows } = await this.pool.query<TimerRow>(
      `SELECT * FROM user_timers
       WHERE status = 'scheduled' AND due_at <= $1
       ORDER BY due_at ASC
       LIMIT $2`,
      [nowIso, limit]
    );
    return rows.map(timerFromRow);
  }

  async getProfile(userId: string): Promise<UserProfile | undefined> {
    const { rows } = await this.pool.query<ProfileRow>(
      'SELECT * FROM discord_users WHERE discord_user_id = $1',
      [userId]
    );
    const row = rows[0];
    if (!row) {
      return undefined;
    }
    return {
      userId: row.discord_user_id,
      dmStatus: row.dm_status,
      dmLastError: row.dm_last_error,
      dmOkAt: row.dm_ok_at ? row.dm_ok_at.toISOString() : null,
      tz: row.tz,
      updatedAt: row.updated_at.toISOString()
    };
  }

  async upsertDeliveryResult(patch: DeliveryResultPatch): Promise<void> {
    await this.pool.query(
      `INSERT INTO discord_users(discord_user_id, dm_status, dm_last_error, dm_ok_at, updated_at)
       VALUES ($1,$2,$3,$4,$5)
       ON CONFLICT (discord_user_id)
       DO UPDATE SET dm_status = EXCLUDED.dm_status,
                     dm_last_error = EXCLUDED.dm_last_error,
                     dm_ok_at = COALESCE(EXCLUDED.dm_ok_at, discord_users.dm_ok_at),
                     updated_at = EXCLUDED.updated_at`,
      [patch.userId, patch.dmStatus, patch.dmLastError, patch.dmOkAt ?? null, patch.updatedAt]
    );
  }

  async upsertTimezone(userId: string, tz: string, updatedAt: string): Promise<void> {
    await this.pool.query(
      `INSERT INTO discord_users(discord_user_id, tz, updated_at)
       VALUES ($1,$2,$3)
       ON CONFLICT (discord_user_id)
       DO UPDATE SET tz = EXCLUDED.tz,
                     updated_at = EXCLUDED.updated_at`,
      [userId, tz, updatedAt]
    );
  }
}

export function createStore(params: { kind: StoreKind; databaseUrl?: string }): DataStore {
  if (params.kind === 'memory') {
    return new InMemoryStore();
  }
  if (!params.databaseUrl) {
    throw new Error('DATABASE_URL is required when using postgres store');
  }
  return new PostgresStore(params.databaseUrl);
}
