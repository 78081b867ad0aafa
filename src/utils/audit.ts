import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { createHash, randomUUID } from 'crypto';
import type { AuditLog } from '../types';
import { createLogger } from './logger';

const logger = createLogger('Audit');

/**
 * Hash input for privacy/security
 */
function hashInput(input: unknown): string {
  return createHash('sha256').update(JSON.stringify(input ?? null)).digest('hex').slice(0, 16);
}

/**
 * Generate audit ID
 */
export function generateAuditId(): string {
  const timestamp = new Date().toISOString().replace(/[-:T]/g, '').slice(0, 14);
  return `audit_${timestamp}_${randomUUID().slice(0, 8)}`;
}

/**
 * Append-only JSONL trail of tool calls. An empty file path disables it.
 */
export class AuditTrail {
  private directoryReady = false;

  constructor(private readonly filePath: string) {}

  get enabled(): boolean {
    return this.filePath.length > 0;
  }

  write(entry: AuditLog): void {
    if (!this.enabled) {
      return;
    }
    try {
      if (!this.directoryReady) {
        mkdirSync(dirname(this.filePath), { recursive: true });
        this.directoryReady = true;
      }
      appendFileSync(this.filePath, JSON.stringify(entry) + '\n');
      logger.debug(`Audit log written for ${entry.tool} (${entry.audit_id})`);
    } catch (writeError) {
      logger.error('Failed to write audit log:', writeError);
    }
  }

  /**
   * Create audit context for tool execution
   */
  begin(
    tool: string,
    input: unknown,
    auditId: string
  ): {
    logSuccess: (sessionId?: string) => void;
    logError: (error: string, sessionId?: string) => void;
  } {
    const startedAt = Date.now();
    const entry = (success: boolean, sessionId?: string, error?: string): AuditLog => ({
      timestamp: new Date().toISOString(),
      tool,
      input_hash: hashInput(input),
      session_id: sessionId,
      audit_id: auditId,
      success,
      error,
      duration_ms: Date.now() - startedAt,
    });

    return {
      logSuccess: (sessionId?: string) => this.write(entry(true, sessionId)),
      logError: (error: string, sessionId?: string) => this.write(entry(false, sessionId, error)),
    };
  }
}
