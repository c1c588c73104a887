import fs from 'node:fs';
import type { RuntimeProvider, RuntimeSession, SessionOptions } from '../types/runtime';
import { logger } from '../utils/logger';

export interface SessionLimits {
  maxSessions: number;
  maxMemoryMB: number;
}

export interface SessionStats {
  currentSessions: number;
  maxSessions: number;
  currentMemoryMB: number;
  maxMemoryMB: number;
}

interface CachedSession {
  session: RuntimeSession;
  sizeMB: number;
}

const BYTES_PER_MB = 1024 * 1024;

/**
 * Sessions keyed by model path. Insertion order doubles as age: when the
 * session count or the summed model size would go over the limit, the oldest
 * sessions are released first.
 */
export class OrtSessionManager {
  private readonly sessions = new Map<string, CachedSession>();
  private currentMemoryUsageMB = 0;

  constructor(
    private readonly provider: RuntimeProvider,
    private readonly limits: SessionLimits,
  ) {}

  has(modelPath: string): boolean {
    return this.sessions.has(modelPath);
  }

  async acquire(modelPath: string, options: SessionOptions): Promise<RuntimeSession> {
    const cached = this.sessions.get(modelPath);
    if (cached) {
      return cached.session;
    }

    // 모델 파일 크기 확인
    const stats = await fs.promises.stat(modelPath);
    const sizeMB = stats.size / BYTES_PER_MB;
    await this.ensureResourceAvailability(sizeMB);

    const session = await this.provider.createSession(modelPath, options);
    this.sessions.set(modelPath, { session, sizeMB });
    this.currentMemoryUsageMB += sizeMB;
    logger.debug(`Cached session ${modelPath} (${sizeMB.toFixed(1)} MB), ${this.sessions.size} open`);
    return session;
  }

  private async ensureResourceAvailability(sizeMB: number): Promise<void> {
    while (this.sessions.size > 0 && this.sessions.size >= this.limits.maxSessions) {
      await this.removeOldest();
    }
    while (this.sessions.size > 0 && this.currentMemoryUsageMB + sizeMB > this.limits.maxMemoryMB) {
      await this.removeOldest();
    }
  }

  private async removeOldest(): Promise<void> {
    const oldest = this.sessions.keys().next();
    if (!oldest.done) {
      await this.release(oldest.value);
    }
  }

  async release(modelPath: string): Promise<void> {
    const cached = this.sessions.get(modelPath);
    if (!cached) return;
    this.sessions.delete(modelPath);
    this.currentMemoryUsageMB = Math.max(0, this.currentMemoryUsageMB - cached.sizeMB);
    await cached.session.release();
  }

  async releaseAll(): Promise<void> {
    const all = [...this.sessions.values()];
    this.sessions.clear();
    this.currentMemoryUsageMB = 0;
    await Promise.all(all.map(({ session }) => session.release()));
  }

  stats(): SessionStats {
    return {
      currentSessions: this.sessions.size,
      maxSessions: this.limits.maxSessions,
      currentMemoryMB: Math.round(this.currentMemoryUsageMB),
      maxMemoryMB: this.limits.maxMemoryMB,
    };
  }
}
