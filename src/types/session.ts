/**
 * Session Types
 */

/**
 * Monotonic lifecycle: Active → Suspended → Closing → Closed
 */
export type SessionStatus = 'Active' | 'Suspended' | 'Closing' | 'Closed';

export const SESSION_STATUS_ORDER: readonly SessionStatus[] = ['Active', 'Suspended', 'Closing', 'Closed'];

/**
 * TabHandle - one page inside a session's browser context
 */
export interface TabHandle {
  id: string;
  sessionId: string;
  /** Backend page id */
  pageId: string;
  createdAt: number;
  lastActivityAt: number;
  /** Bytes, as last reported by the caller (0 when unknown) */
  memoryEstimate: number;
}

/**
 * Session - one workflow's browser activity. Owns its tabs exclusively.
 * The browser process behind it is shared, never owned: closing a session
 * releases the logical handle and leaves process termination to cleanup.
 */
export interface Session {
  id: string;
  workflowId: string;
  status: SessionStatus;
  /** Backend browser-context id */
  contextId: string;
  tabs: Map<string, TabHandle>;
  createdAt: number;
  lastActivityAt: number;
  closedAt: number | null;
}

export interface SessionInfo {
  id: string;
  workflowId: string;
  status: SessionStatus;
  tabCount: number;
  memoryEstimate: number;
  createdAt: number;
  lastActivityAt: number;
  closedAt: number | null;
}

export interface OpenSessionOptions {
  /** Return the workflow's Active session instead of failing with WorkflowConflict */
  reuse?: boolean;
}

export interface SessionEvent {
  type: 'session:opened' | 'session:suspended' | 'session:closed' | 'tab:opened' | 'tab:closed';
  sessionId: string;
  workflowId: string;
  tabId?: string;
  timestamp: number;
}
