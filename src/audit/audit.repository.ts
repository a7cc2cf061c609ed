import type { Knex } from 'knex';
import { AuditLog, NewAuditLog } from '../types/audit.types';

export interface AuditLogRepository {
  record(entry: NewAuditLog): Promise<AuditLog>;
  list(page: { limit: number; offset: number }): Promise<{ total: number; items: AuditLog[] }>;
}

export class KnexAuditLogRepository implements AuditLogRepository {
  constructor(private readonly db: Knex) {}

  async record(entry: NewAuditLog) {
    const [log] = await this.db<AuditLog>('audit_logs')
      .insert(entry)
      .returning('*');
    return log;
  }

  async list(page: { limit: number; offset: number }) {
    const [items, total] = await Promise.all([
      this.db<AuditLog>('audit_logs').orderBy('created_at', 'desc').limit(page.limit).offset(page.offset),
      this.db('audit_logs').count({ c: '*' }).first(),
    ]);
    return { total: Number(total?.c ?? 0), items };
  }
}
