/**
 * Concurrency Governor - admission control for sessions and tabs
 *
 * Two independent ceilings: simultaneous sessions, and tabs per session.
 * A grant reserves its slot before admit() resolves, and every admission runs
 * through one serial queue, so N concurrent requests against a ceiling
 * of N - 1 yield exactly one denial. The governor never retries.
 */

import { v4 as uuidv4 } from 'uuid';
import { RequestQueue } from './utils/request-queue';
import { createLogger } from './utils/logger';
import { DEFAULT_MAX_SESSIONS, DEFAULT_MAX_TABS_PER_SESSION } from './config/defaults';

const log = createLogger('ConcurrencyGovernor');

export type AdmissionRequest =
  | { kind: 'session'; workflowId?: string }
  | { kind: 'tab'; sessionId: string };

export type DenialReason = 'SessionCeiling' | 'TabCeiling';

export interface AdmissionTicket {
  id: string;
  kind: AdmissionRequest['kind'];
  /** Set for tab tickets */
  sessionId?: string;
  grantedAt: number;
}

export type AdmissionDecision =
  | { granted: true; ticket: AdmissionTicket }
  | { granted: false; reason: DenialReason; limit: number; current: number };

export interface GovernorLimits {
  maxSessions: number;
  maxTabsPerSession: number;
}

export interface GovernorUsage extends GovernorLimits {
  sessions: number;
  tabs: Record<string, number>;
}

export class ConcurrencyGovernor {
  private limits: GovernorLimits;
  private queue = new RequestQueue('governor');
  private tickets: Map<string, AdmissionTicket> = new Map();
  private sessionSlots: Set<string> = new Set();
  private tabSlots: Map<string, Set<string>> = new Map();

  constructor(limits: Partial<GovernorLimits> = {}) {
    this.limits = {
      maxSessions: limits.maxSessions ?? DEFAULT_MAX_SESSIONS,
      maxTabsPerSession: limits.maxTabsPerSession ?? DEFAULT_MAX_TABS_PER_SESSION,
    };
  }

  getLimits(): GovernorLimits {
    return { ...this.limits };
  }

  /**
   * Check the ceiling and reserve a slot in one step
   */
  admit(request: AdmissionRequest): Promise<AdmissionDecision> {
    return this.queue.enqueue(async () => this.decide(request));
  }

  private decide(request: AdmissionRequest): AdmissionDecision {
    if (request.kind === 'session') {
      const current = this.sessionSlots.size;
      if (current >= this.limits.maxSessions) {
        log.warn(`Session denied: ceiling ${this.limits.maxSessions} reached`, { workflowId: request.workflowId });
        return { granted: false, reason: 'SessionCeiling', limit: this.limits.maxSessions, current };
      }
      const ticket = this.grant({ kind: 'session' });
      this.sessionSlots.add(ticket.id);
      this.warnIfNearCeiling('sessions', this.sessionSlots.size, this.limits.maxSessions);
      return { granted: true, ticket };
    }

    const slots = this.tabSlots.get(request.sessionId) ?? new Set<string>();
    const current = slots.size;
    if (current >= this.limits.maxTabsPerSession) {
      log.warn(`Tab denied for session ${request.sessionId}: ceiling ${this.limits.maxTabsPerSession} reached`);
      return { granted: false, reason: 'TabCeiling', limit: this.limits.maxTabsPerSession, current };
    }
    const ticket = this.grant({ kind: 'tab', sessionId: request.sessionId });
    slots.add(ticket.id);
    this.tabSlots.set(request.sessionId, slots);
    this.warnIfNearCeiling(`tabs in session ${request.sessionId}`, slots.size, this.limits.maxTabsPerSession);
    return { granted: true, ticket };
  }

  private grant(fields: Pick<AdmissionTicket, 'kind' | 'sessionId'>): AdmissionTicket {
    const ticket: AdmissionTicket = { id: uuidv4(), grantedAt: Date.now(), ...fields };
    this.tickets.set(ticket.id, ticket);
    return ticket;
  }

  private warnIfNearCeiling(what: string, used: number, limit: number): void {
    if (limit > 1 && used >= limit - 1) {
      log.warn(`Near ceiling: ${used}/${limit} ${what}`);
    }
  }

  /**
   * Return a slot. Releasing an unknown or already-released ticket is a no-op.
   */
  release(ticket: AdmissionTicket): void {
    if (!this.tickets.delete(ticket.id)) {
      return;
    }
    if (ticket.kind === 'session') {
      this.sessionSlots.delete(ticket.id);
      return;
    }
    if (ticket.sessionId === undefined) {
      return;
    }
    const slots = this.tabSlots.get(ticket.sessionId);
    if (slots) {
      slots.delete(ticket.id);
      if (slots.size === 0) {
        this.tabSlots.delete(ticket.sessionId);
      }
    }
  }

  /**
   * Drop every tab slot held for a session
   */
  releaseSession(sessionId: string): void {
    const slots = this.tabSlots.get(sessionId);
    if (!slots) {
      return;
    }
    for (const id of slots) {
      this.tickets.delete(id);
    }
    this.tabSlots.delete(sessionId);
  }

  getUsage(): GovernorUsage {
    const tabs: Record<string, number> = {};
    for (const [sessionId, slots] of this.tabSlots) {
      tabs[sessionId] = slots.size;
    }
    return { ...this.limits, sessions: this.sessionSlots.size, tabs };
  }
}
