/**
 * Persisted portal sessions
 *
 * One JSON file per (company, portal) under the sessions directory, readable
 * by the owner only. The browser state inside is an opaque blob.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { Portal, PORTALS } from '../../types';
import { toErrorMessage } from '../../utils/errors';
import { AppLogger } from '../../utils/logger';
import { FileNamingService } from '../naming/FileNamingService';

const FILE_MODE = 0o600;

export interface StoredSession {
  company: string;
  portal: Portal;
  /** Opaque browser state */
  state: string;
  savedAt: Date;
  lastVerifiedAt?: Date;
}

const storedSessionSchema = z.object({
  company: z.string().min(1),
  portal: z.enum(['walmart', 'amazon']),
  state: z.string(),
  savedAt: z.coerce.date(),
  lastVerifiedAt: z.coerce.date().optional(),
});

export interface SessionFilter {
  company?: string;
  portal?: Portal;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Human-readable age of a session, e.g. "3 days ago"
 */
export function describeAge(from: Date, now: Date = new Date()): string {
  const minutes = Math.floor((now.getTime() - from.getTime()) / 60000);
  if (minutes < 1) {
    return 'just now';
  }
  if (minutes < 60) {
    return `${minutes} minute${minutes === 1 ? '' : 's'} ago`;
  }
  const hours = Math.floor(minutes / 60);
  if (hours < 24) {
    return `${hours} hour${hours === 1 ? '' : 's'} ago`;
  }
  const days = Math.floor(hours / 24);
  return `${days} day${days === 1 ? '' : 's'} ago`;
}

export class SessionStore {
  private readonly dir: string;
  private readonly naming: FileNamingService;

  constructor(dir: string, naming: FileNamingService = new FileNamingService()) {
    this.dir = dir;
    this.naming = naming;
  }

  filePath(company: string, portal: Portal): string {
    return path.join(this.dir, `${this.naming.sanitizeSegment(company)}_${portal}.json`);
  }

  /**
   * Stored session for (company, portal), or null
   * A file that cannot be decoded is deleted.
   */
  async load(company: string, portal: Portal): Promise<StoredSession | null> {
    const file = this.filePath(company, portal);

    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    const session = this.decode(raw);
    if (!session) {
      AppLogger.warn(`[SessionStore] Discarding unreadable session file: ${file}`);
      await this.invalidate(company, portal);
      return null;
    }
    return session;
  }

  async save(company: string, portal: Portal, state: string, now: Date = new Date()): Promise<StoredSession> {
    const session: StoredSession = { company, portal, state, savedAt: now, lastVerifiedAt: now };
    await this.write(session);
    AppLogger.info(`[SessionStore] Saved ${portal} session for ${company}`);
    return session;
  }

  async markVerified(session: StoredSession, now: Date = new Date()): Promise<StoredSession> {
    const updated = { ...session, lastVerifiedAt: now };
    await this.write(updated);
    return updated;
  }

  /**
   * Delete the stored session; returns whether one existed
   */
  async invalidate(company: string, portal: Portal): Promise<boolean> {
    try {
      await fs.unlink(this.filePath(company, portal));
      AppLogger.info(`[SessionStore] Invalidated ${portal} session for ${company}`);
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * All readable sessions, sorted by company then portal
   */
  async list(): Promise<StoredSession[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const sessions: StoredSession[] = [];
    for (const name of names.filter(n => n.endsWith('.json'))) {
      const session = this.decode(await fs.readFile(path.join(this.dir, name), 'utf8'));
      if (session) {
        sessions.push(session);
      } else {
        AppLogger.debug(`[SessionStore] Ignoring unreadable file: ${name}`);
      }
    }

    return sessions.sort(
      (a, b) => a.company.localeCompare(b.company) || PORTALS.indexOf(a.portal) - PORTALS.indexOf(b.portal)
    );
  }

  /**
   * Delete stored sessions matching the filter; returns how many were removed
   */
  async clear(filter: SessionFilter = {}): Promise<number> {
    const wantedCompany = filter.company?.toLowerCase();
    let removed = 0;

    for (const session of await this.list()) {
      if (wantedCompany && session.company.toLowerCase() !== wantedCompany) {
        continue;
      }
      if (filter.portal && session.portal !== filter.portal) {
        continue;
      }
      if (await this.invalidate(session.company, session.portal)) {
        removed++;
      }
    }

    return removed;
  }

  private decode(raw: string): StoredSession | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      AppLogger.debug(`[SessionStore] Invalid JSON: ${toErrorMessage(error)}`);
      return null;
    }

    const parsed = storedSessionSchema.safeParse(json);
    return parsed.success ? parsed.data : null;
  }

  private async write(session: StoredSession): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });

    const target = this.filePath(session.company, session.portal);
    const tmp = `${target}.${process.pid}.tmp`;
    const body = JSON.stringify(
      {
        company: session.company,
        portal: session.portal,
        state: session.state,
        savedAt: session.savedAt.toISOString(),
        lastVerifiedAt: session.lastVerifiedAt?.toISOString(),
      },
      null,
      2
    );

    try {
      await fs.writeFile(tmp, body, { mode: FILE_MODE });
      await fs.rename(tmp, target);
    } catch (error) {
      await fs.rm(tmp, { force: true });
      throw error;
    }
  }
}
