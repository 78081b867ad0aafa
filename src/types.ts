export type ColumnKind = 'numeric' | 'textual' | 'temporal' | 'mixed';

export type DatasetColumn =
  | { name: string; kind: 'numeric'; values: (number | null)[] }
  | { name: string; kind: 'textual'; values: (string | null)[] }
  | { name: string; kind: 'temporal'; values: (Date | null)[] }
  | { name: string; kind: 'mixed'; values: (number | string | null)[] };

export interface Dataset {
  rowCount: number;
  columns: DatasetColumn[];
}

export interface SessionRecord {
  sessionId: string;
  snapshotPath: string;
  description: string;
  rowCount: number;
  columnCount: number;
  source: string;
  createdAt: number;
}

export interface ExecutionOutcome {
  success: boolean;
  pValue: number;
}

export interface HypothesisSuggestion {
  hypothesis: string;
  benefit: string;
}

export interface HypothesisOutcome {
  success: boolean;
  p_value: number;
  analysis?: string;
  summary?: string;
}

export interface HypothesisRecord {
  title: string;
  benefit: string;
  outcome?: string | HypothesisOutcome | null;
}

export type ErrorCode =
  | 'NOT_FOUND'
  | 'BAD_INPUT'
  | 'PERMISSION_DENIED'
  | 'UPSTREAM_ERROR'
  | 'EXECUTION_ERROR'
  | 'CONFIG_ERROR'
  | 'INTERNAL_ERROR';

export interface NextAction {
  tool: string;
  args: Record<string, unknown>;
}

export interface ErrorResponse {
  error: ErrorCode;
  status: number;
  message: string;
  upstream?: { status: number; body: string };
  failed_stage?: string;
  next: NextAction[];
  audit_id?: string;
}

export interface AuditLog {
  timestamp: string;
  tool: string;
  input_hash: string;
  session_id?: string;
  audit_id: string;
  success: boolean;
  error?: string;
  duration_ms: number;
}

export const errorNext = (
  code: ErrorCode,
  status: number,
  message: string,
  next: NextAction[],
  auditId?: string
): ErrorResponse => ({
  error: code,
  status,
  message,
  next,
  audit_id: auditId,
});
