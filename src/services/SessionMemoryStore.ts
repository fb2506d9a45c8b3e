/**
 * Session Memory Store - append-only per-session log of queries, actions and
 * findings in SQLite, with cross-session finding recall.
 */

import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type {
    FindingFilter,
    NewSessionRecord,
    RecordBody,
    Session,
    SessionInfo,
    SessionRecord,
    StoredFinding,
} from '../types';
import { severityRank } from '../types';
import { ActionPayloadSchema, FindingSchema, QueryPayloadSchema } from '../types/schemas';
import { openDatabase } from '../db/init';
import { normalizeTarget } from './ScopeGuard';
import { sessionNotFound } from '../utils/errors';
import { deepFreeze } from '../utils/json';
import { componentLogger } from '../utils/logger';

const log = componentLogger('memory');

interface SessionRow {
    id: string;
    persona: string;
    created_at: string;
}

interface RecordRow {
    seq: number;
    session_id: string;
    type: string;
    timestamp: string;
    payload: string;
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/** session_YYYYMMDD_HHMMSS_xxxxxxxx, in UTC. */
export function generateSessionId(now: Date = new Date()): string {
    const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
    const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
    return `session_${date}_${time}_${uuidv4().substring(0, 8)}`;
}

function toInfo(row: SessionRow): SessionInfo {
    return { id: row.id, persona: row.persona, createdAt: row.created_at };
}

function parseBody(row: RecordRow): RecordBody {
    let raw: unknown;
    try {
        raw = JSON.parse(row.payload);
    } catch {
        throw new Error(`Corrupt session record ${row.seq}: payload is not JSON`);
    }

    switch (row.type) {
        case 'query': {
            const parsed = QueryPayloadSchema.safeParse(raw);
            if (parsed.success) return { type: 'query', payload: parsed.data };
            break;
        }
        case 'action': {
            const parsed = ActionPayloadSchema.safeParse(raw);
            if (parsed.success) return { type: 'action', payload: parsed.data };
            break;
        }
        case 'finding': {
            const parsed = FindingSchema.safeParse(raw);
            if (parsed.success) return { type: 'finding', payload: parsed.data };
            break;
        }
    }
    throw new Error(`Corrupt session record ${row.seq}: invalid ${row.type} payload`);
}

function toRecord(row: RecordRow): SessionRecord {
    return deepFreeze({ ...parseBody(row), seq: row.seq, sessionId: row.session_id, timestamp: row.timestamp });
}

export class SessionMemoryStore {
    private readonly db: Database.Database;
    /** Longest log observed per session; a shorter read means the log shrank. */
    private readonly observedLengths = new Map<string, number>();

    constructor(dbPath: string) {
        this.db = openDatabase(dbPath);
    }

    createSession(persona: string, id: string = generateSessionId()): SessionInfo {
        const createdAt = new Date().toISOString();
        this.db
            .prepare<[string, string, string]>('INSERT INTO sessions (id, persona, created_at) VALUES (?, ?, ?)')
            .run(id, persona, createdAt);
        log.info(`Created session ${id}`, { persona });
        return { id, persona, createdAt };
    }

    hasSession(sessionId: string): boolean {
        return this.getSession(sessionId) !== undefined;
    }

    getSession(sessionId: string): SessionInfo | undefined {
        const row = this.db
            .prepare<[string], SessionRow>('SELECT id, persona, created_at FROM sessions WHERE id = ?')
            .get(sessionId);
        return row ? toInfo(row) : undefined;
    }

    listSessions(): SessionInfo[] {
        return this.db
            .prepare<[], SessionRow>('SELECT id, persona, created_at FROM sessions ORDER BY created_at ASC, id ASC')
            .all()
            .map(toInfo);
    }

    /** One INSERT per record, so a reader never sees half of one. */
    append(sessionId: string, record: NewSessionRecord): SessionRecord {
        if (!this.hasSession(sessionId)) {
            throw sessionNotFound(sessionId);
        }
        const timestamp = record.timestamp ?? new Date().toISOString();
        const result = this.db
            .prepare<[string, string, string, string]>(
                'INSERT INTO session_records (session_id, type, timestamp, payload) VALUES (?, ?, ?, ?)'
            )
            .run(sessionId, record.type, timestamp, JSON.stringify(record.payload));

        const row: RecordRow = {
            seq: Number(result.lastInsertRowid),
            session_id: sessionId,
            type: record.type,
            timestamp,
            payload: JSON.stringify(record.payload),
        };
        return toRecord(row);
    }

    load(sessionId: string): Session {
        const info = this.getSession(sessionId);
        if (!info) {
            throw sessionNotFound(sessionId);
        }
        const records = this.db
            .prepare<[string], RecordRow>('SELECT * FROM session_records WHERE session_id = ? ORDER BY seq ASC')
            .all(sessionId)
            .map(toRecord);

        const previous = this.observedLengths.get(sessionId) ?? 0;
        if (records.length < previous) {
            throw new Error(`Session ${sessionId} log shrank from ${previous} to ${records.length} records`);
        }
        this.observedLengths.set(sessionId, records.length);

        return { ...info, records };
    }

    /** The last `limit` records of a session, oldest first. */
    recentRecords(sessionId: string, limit: number): SessionRecord[] {
        if (limit <= 0) return [];
        return this.db
            .prepare<[string, number], RecordRow>(
                'SELECT * FROM session_records WHERE session_id = ? ORDER BY seq DESC LIMIT ?'
            )
            .all(sessionId, limit)
            .map(toRecord)
            .reverse();
    }

    /** Findings across one, several or all sessions, in append order. */
    query(filter: FindingFilter = {}): StoredFinding[] {
        const params: string[] = [];
        let sql = "SELECT * FROM session_records WHERE type = 'finding'";
        if (filter.sessionIds) {
            if (filter.sessionIds.length === 0) return [];
            sql += ` AND session_id IN (${filter.sessionIds.map(() => '?').join(', ')})`;
            params.push(...filter.sessionIds);
        }
        sql += ' ORDER BY seq ASC';

        const target = filter.target ? normalizeTarget(filter.target) : undefined;
        const category = filter.category?.toLowerCase();
        const minRank = filter.minSeverity ? severityRank(filter.minSeverity) : undefined;

        const findings: StoredFinding[] = [];
        for (const row of this.db.prepare<string[], RecordRow>(sql).all(...params)) {
            const record = toRecord(row);
            if (record.type !== 'finding') continue;
            const finding = record.payload;
            if (target !== undefined && normalizeTarget(finding.target) !== target) continue;
            if (category !== undefined && finding.category.toLowerCase() !== category) continue;
            if (filter.severity !== undefined && finding.severity !== filter.severity) continue;
            if (minRank !== undefined && severityRank(finding.severity) > minRank) continue;
            findings.push(Object.freeze({ ...finding, sessionId: record.sessionId }));
        }
        return findings;
    }

    close(): void {
        this.db.close();
    }
}
