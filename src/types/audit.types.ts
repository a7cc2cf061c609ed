export interface AuditLog {
  id: number;
  actor_id: number | null;
  action: string;
  target_id: number | null;
  details: Record<string, unknown> | null;
  created_at: Date;
}

export type NewAuditLog = Omit<AuditLog, 'id' | 'created_at'>;
