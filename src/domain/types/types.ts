// Domain Types
// Documents exchanged between supervisor and worker through pod directories

export const INSTRUCTIONS_FILE = 'instructions.json';
export const RESULT_FILE = 'result.json';
export const FEEDBACK_FILE = 'feedback.json';

export const HARNESS_DIR = '.agent-harness';
export const SESSIONS_DIR = 'sessions';
export const PODS_DIR = 'pods';
export const WORKERS_DIR = 'workers';

export type EvaluationStatus = 'PASS' | 'FAIL';

export interface InstructionsDocument {
  instructions: string;
  output_path: string;
  pod_id?: string;
  session_id?: string;
  project_root?: string;
  timestamp?: string;
  [key: string]: unknown;
}

export interface ResultDocument {
  result: unknown;
  worker_id?: string;
  pod_id?: string;
  session_id?: string;
  timestamp?: string;
  [key: string]: unknown;
}

export interface PassFeedback {
  status: 'PASS';
  result: unknown;
  attempts: number;
  timestamp: string;
  pod_id: string;
}

export interface FailFeedback {
  status: 'FAIL';
  gaps: string[];
  attempt: number;
  timestamp: string;
  pod_id: string;
}

export type FeedbackDocument = PassFeedback | FailFeedback;

export interface ValidationOutcome {
  valid: boolean;
  errors: string[];
}

export interface EvaluationVerdict {
  status: EvaluationStatus;
  gaps: string[];
}

export interface EvaluationHistoryEntry {
  status: EvaluationStatus;
  pod_id: string;
  timestamp: string;
  instructions: string;
  result: string | null;
  gaps: string[];
}

/**
 * Identity stamped into every result document
 */
export interface ResultIdentity {
  workerId: string;
  podId: string;
  sessionId: string;
}

export type LoopStatus = 'idle' | 'running' | 'COMPLETE' | 'FAILED';

export type LoopOutcome =
  | { status: 'PASS'; attempts: number; result: unknown }
  | { status: 'FAIL'; reason: string; attempts: number };

export const MAX_ATTEMPTS_EXCEEDED = 'MAX_ATTEMPTS_EXCEEDED';

export interface LoopHistoryEntry {
  attempt: number;
  status: EvaluationStatus;
  gaps: string[];
}

export type PodStatus = 'registered' | 'running' | 'COMPLETE' | 'FAILED' | 'ERROR' | 'CANCELLED';
