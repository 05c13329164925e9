/**
 * Session Tracker - logical sessions and tabs, independent of OS process identity
 *
 * Admission goes through the ConcurrencyGovernor before any state changes.
 * Mutations of one session run on that session's queue; opening a session
 * runs on its workflow's queue so the one-workflow-one-session check and
 * the registration cannot interleave.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  OpenSessionOptions,
  Session,
  SessionEvent,
  SessionInfo,
  SessionStatus,
  SESSION_STATUS_ORDER,
  TabHandle,
} from './types/session';
import { BrowserBackend } from './browser/backend';
import { AdmissionTicket, ConcurrencyGovernor } from './concurrency-governor';
import { SupervisorError, toError } from './errors';
import { RequestQueueManager } from './utils/request-queue';
import { createLogger } from './utils/logger';

const log = createLogger('SessionTracker');

/** Closed sessions kept in listSessions / getStats */
const MAX_CLOSED_SESSIONS = 100;

export interface SessionTrackerStats {
  active: number;
  suspended: number;
  closing: number;
  closed: number;
  totalTabs: number;
  totalSessionsOpened: number;
  totalSessionsClosed: number;
}

export class SessionTracker {
  private sessions: Map<string, Session> = new Map();
  private workflowIndex: Map<string, string> = new Map();
  private tabIndex: Map<string, string> = new Map();
  private sessionTickets: Map<string, AdmissionTicket> = new Map();
  private tabTickets: Map<string, AdmissionTicket> = new Map();
  private closedOrder: string[] = [];
  /** Closed sessions dropped from the listing; repeated closeSession calls still find them */
  private evicted: Map<string, Session> = new Map();
  private queueManager = new RequestQueueManager();
  private eventListeners: ((event: SessionEvent) => void)[] = [];
  private totalSessionsOpened = 0;
  private totalSessionsClosed = 0;
  private governor: ConcurrencyGovernor;
  private backend: BrowserBackend;

  constructor(governor: ConcurrencyGovernor, backend: BrowserBackend) {
    this.governor = governor;
    this.backend = backend;
  }

  // ==================== SESSIONS ====================

  /**
   * Open a session for a workflow.
   * Fails with WorkflowConflict while the workflow still has an Active session
   * (unless reuse is set), or CapacityExceeded at the session ceiling.
   */
  openSession(workflowId: string, options: OpenSessionOptions = {}): Promise<Session> {
    return this.queueManager.enqueue(`workflow:${workflowId}`, async () => {
      const existing = this.getSessionForWorkflow(workflowId);
      if (existing && existing.status === 'Active') {
        if (options.reuse) {
          return existing;
        }
        throw new SupervisorError(
          'WorkflowConflict',
          `Workflow ${workflowId} already has active session ${existing.id}; close it first`,
          { workflowId, sessionId: existing.id },
        );
      }

      const decision = await this.governor.admit({ kind: 'session', workflowId });
      if (!decision.granted) {
        throw new SupervisorError(
          'CapacityExceeded',
          `Session ceiling reached (${decision.current}/${decision.limit})`,
          { workflowId, reason: decision.reason, limit: decision.limit },
        );
      }

      const id = uuidv4();
      let contextId: string;
      try {
        contextId = await this.backend.createContext(id);
      } catch (error) {
        this.governor.release(decision.ticket);
        log.error(`Failed to create browser context for workflow ${workflowId}`, { error: toError(error) });
        throw error;
      }

      const now = Date.now();
      const session: Session = {
        id,
        workflowId,
        status: 'Active',
        contextId,
        tabs: new Map(),
        createdAt: now,
        lastActivityAt: now,
        closedAt: null,
      };

      this.sessions.set(id, session);
      this.workflowIndex.set(workflowId, id);
      this.sessionTickets.set(id, decision.ticket);
      this.totalSessionsOpened++;
      this.emitEvent({ type: 'session:opened', sessionId: id, workflowId, timestamp: now });

      log.info(`Opened session ${id} for workflow ${workflowId}`);
      return session;
    });
  }

  /**
   * Active → Suspended. A suspended session opens no tabs but keeps its slot.
   */
  suspendSession(sessionId: string): Promise<Session> {
    return this.queueManager.enqueue(sessionId, async () => {
      const session = this.requireSession(sessionId);
      if (session.status === 'Suspended') {
        return session;
      }
      this.transition(session, 'Suspended');
      this.emitEvent({ type: 'session:suspended', sessionId, workflowId: session.workflowId, timestamp: Date.now() });
      log.info(`Suspended session ${sessionId}`);
      return session;
    });
  }

  /**
   * Close every tab, then the context, then mark the session Closed.
   * Idempotent: closing a Closed session returns it unchanged.
   */
  closeSession(sessionId: string): Promise<Session> {
    const evicted = this.evicted.get(sessionId);
    if (evicted) {
      return Promise.resolve(evicted);
    }
    return this.queueManager.enqueue(sessionId, async () => {
      const session = this.requireSession(sessionId);
      if (session.status === 'Closed') {
        return session;
      }

      this.transition(session, 'Closing');

      for (const tab of [...session.tabs.values()]) {
        await this.closeTabInternal(session, tab);
      }

      try {
        await this.backend.closeContext(session.contextId);
      } catch (error) {
        // A context that died with its browser is still logically closed
        log.warn(`Closing context of session ${sessionId} failed`, { error: toError(error) });
      }

      this.transition(session, 'Closed');
      session.closedAt = Date.now();

      const ticket = this.sessionTickets.get(sessionId);
      if (ticket) {
        this.governor.release(ticket);
        this.sessionTickets.delete(sessionId);
      }
      this.governor.releaseSession(sessionId);

      if (this.workflowIndex.get(session.workflowId) === sessionId) {
        this.workflowIndex.delete(session.workflowId);
      }
      this.totalSessionsClosed++;
      this.retainClosed(sessionId);
      this.emitEvent({ type: 'session:closed', sessionId, workflowId: session.workflowId, timestamp: session.closedAt });

      log.info(`Closed session ${sessionId}`);
      return session;
    });
  }

  // ==================== TABS ====================

  /**
   * Open a tab in an Active session. Fails with TabLimitExceeded at the tab ceiling.
   */
  openTab(sessionId: string): Promise<TabHandle> {
    return this.queueManager.enqueue(sessionId, async () => {
      const session = this.requireSession(sessionId);
      if (session.status !== 'Active') {
        throw new SupervisorError('InvalidState', `Session ${sessionId} is ${session.status}`, {
          sessionId,
          status: session.status,
        });
      }

      const decision = await this.governor.admit({ kind: 'tab', sessionId });
      if (!decision.granted) {
        throw new SupervisorError(
          'TabLimitExceeded',
          `Tab ceiling reached for session ${sessionId} (${decision.current}/${decision.limit})`,
          { sessionId, reason: decision.reason, limit: decision.limit },
        );
      }

      let pageId: string;
      try {
        pageId = await this.backend.openPage(session.contextId);
      } catch (error) {
        this.governor.release(decision.ticket);
        throw error;
      }

      const now = Date.now();
      const tab: TabHandle = {
        id: uuidv4(),
        sessionId,
        pageId,
        createdAt: now,
        lastActivityAt: now,
        memoryEstimate: 0,
      };
      session.tabs.set(tab.id, tab);
      session.lastActivityAt = now;
      this.tabIndex.set(tab.id, sessionId);
      this.tabTickets.set(tab.id, decision.ticket);
      this.emitEvent({ type: 'tab:opened', sessionId, workflowId: session.workflowId, tabId: tab.id, timestamp: now });

      log.debug(`Opened tab ${tab.id} in session ${sessionId}`);
      return tab;
    });
  }

  /**
   * Close a tab. Unknown or already-closed tabs are a no-op.
   */
  async closeTab(tabId: string): Promise<void> {
    const sessionId = this.tabIndex.get(tabId);
    if (!sessionId) {
      return;
    }
    await this.queueManager.enqueue(sessionId, async () => {
      const session = this.sessions.get(sessionId);
      const tab = session?.tabs.get(tabId);
      if (session && tab) {
        await this.closeTabInternal(session, tab);
      }
    });
  }

  private async closeTabInternal(session: Session, tab: TabHandle): Promise<void> {
    try {
      await this.backend.closePage(tab.pageId);
    } catch (error) {
      log.warn(`Closing page of tab ${tab.id} failed`, { error: toError(error) });
    }

    session.tabs.delete(tab.id);
    this.tabIndex.delete(tab.id);
    const ticket = this.tabTickets.get(tab.id);
    if (ticket) {
      this.governor.release(ticket);
      this.tabTickets.delete(tab.id);
    }
    this.emitEvent({
      type: 'tab:closed',
      sessionId: session.id,
      workflowId: session.workflowId,
      tabId: tab.id,
      timestamp: Date.now(),
    });
  }

  /**
   * Record navigation/interaction on a tab
   */
  touchTab(tabId: string, memoryEstimate?: number): void {
    const sessionId = this.tabIndex.get(tabId);
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    const tab = session?.tabs.get(tabId);
    if (!session || !tab) {
      return;
    }
    const now = Date.now();
    tab.lastActivityAt = now;
    session.lastActivityAt = now;
    if (memoryEstimate !== undefined) {
      tab.memoryEstimate = memoryEstimate;
    }
  }

  getTab(tabId: string): TabHandle | undefined {
    const sessionId = this.tabIndex.get(tabId);
    return sessionId ? this.sessions.get(sessionId)?.tabs.get(tabId) : undefined;
  }

  // ==================== QUERIES ====================

  getSession(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * The workflow's current (non-Closed) session
   */
  getSessionForWorkflow(workflowId: string): Session | undefined {
    const sessionId = this.workflowIndex.get(workflowId);
    return sessionId ? this.sessions.get(sessionId) : undefined;
  }

  listSessions(options: { includeClosed?: boolean } = {}): SessionInfo[] {
    const infos: SessionInfo[] = [];
    for (const session of this.sessions.values()) {
      if (session.status === 'Closed' && !options.includeClosed) {
        continue;
      }
      let memoryEstimate = 0;
      for (const tab of session.tabs.values()) {
        memoryEstimate += tab.memoryEstimate;
      }
      infos.push({
        id: session.id,
        workflowId: session.workflowId,
        status: session.status,
        tabCount: session.tabs.size,
        memoryEstimate,
        createdAt: session.createdAt,
        lastActivityAt: session.lastActivityAt,
        closedAt: session.closedAt,
      });
    }
    return infos;
  }

  getStats(): SessionTrackerStats {
    const stats: SessionTrackerStats = {
      active: 0,
      suspended: 0,
      closing: 0,
      closed: 0,
      totalTabs: 0,
      totalSessionsOpened: this.totalSessionsOpened,
      totalSessionsClosed: this.totalSessionsClosed,
    };
    for (const session of this.sessions.values()) {
      if (session.status === 'Active') stats.active++;
      else if (session.status === 'Suspended') stats.suspended++;
      else if (session.status === 'Closing') stats.closing++;
      else stats.closed++;
      stats.totalTabs += session.tabs.size;
    }
    return stats;
  }

  // ==================== EVENTS ====================

  addEventListener(listener: (event: SessionEvent) => void): void {
    this.eventListeners.push(listener);
  }

  removeEventListener(listener: (event: SessionEvent) => void): void {
    const index = this.eventListeners.indexOf(listener);
    if (index !== -1) {
      this.eventListeners.splice(index, 1);
    }
  }

  private emitEvent(event: SessionEvent): void {
    for (const listener of this.eventListeners) {
      try {
        listener(event);
      } catch (e) {
        log.error('Event listener error', { error: toError(e) });
      }
    }
  }

  // ==================== INTERNALS ====================

  private requireSession(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SupervisorError('NotFound', `Session ${sessionId} not found`, { sessionId });
    }
    return session;
  }

  private transition(session: Session, next: SessionStatus): void {
    const from = SESSION_STATUS_ORDER.indexOf(session.status);
    const to = SESSION_STATUS_ORDER.indexOf(next);
    if (to < from) {
      throw new SupervisorError(
        'InvalidState',
        `Session ${session.id} cannot move from ${session.status} to ${next}`,
        { sessionId: session.id, from: session.status, to: next },
      );
    }
    session.status = next;
  }

  private retainClosed(sessionId: string): void {
    this.closedOrder.push(sessionId);
    while (this.closedOrder.length > MAX_CLOSED_SESSIONS) {
      const evictedId = this.closedOrder.shift();
      const session = evictedId !== undefined ? this.sessions.get(evictedId) : undefined;
      if (evictedId !== undefined && session) {
        this.sessions.delete(evictedId);
        this.queueManager.deleteQueue(evictedId);
        this.evicted.set(evictedId, session);
      }
    }
  }
}
