/**
 * Event Channel - bounded, ordered stream of orchestrator events from the
 * core to the boundaries (SSE, CLI). When full, the oldest event is dropped
 * and counted.
 */

import { EventEmitter } from 'events';
import type { Action, ActionState, ConfirmationStatus, Finding, Summary } from '../types';
import type { ErrorInfo } from '../utils/errors';
import { deepFreeze } from '../utils/json';
import { logger } from '../utils/logger';

interface EventPayloads {
    persona_loaded: { persona: string; description: string };
    query_rejected: { planId: string; query: string; targets: readonly string[]; error: ErrorInfo };
    plan_created: { planId: string; backend: string | null; actions: readonly Action[]; notice?: string };
    planning_failed: { planId: string; error: ErrorInfo };
    action_started: { planId: string; action: Action };
    action_completed: {
        planId: string;
        action: Action;
        status: ActionState;
        error?: ErrorInfo;
        findingCount: number;
    };
    finding_added: { planId: string; finding: Finding };
    confirmation_required: { planId: string; action: Action; deadline: string };
    confirmation_resolved: { planId: string; actionId: string; status: Exclude<ConfirmationStatus, 'pending'> | 'cancelled' };
    plan_complete: { planId: string; summary: Summary };
    plan_stopped: { planId: string };
}

export type EventType = keyof EventPayloads;

export type OrchestratorEvent = {
    [K in EventType]: { readonly type: K; readonly sessionId: string } & Readonly<EventPayloads[K]>;
}[EventType];

export type EventEnvelope = OrchestratorEvent & { readonly seq: number; readonly timestamp: string };

export type EventListener = (event: EventEnvelope) => void;

export interface EventFilter {
    sessionId?: string;
    types?: readonly EventType[];
}

function accepts(event: EventEnvelope, filter: EventFilter | undefined): boolean {
    if (!filter) return true;
    if (filter.sessionId !== undefined && event.sessionId !== filter.sessionId) return false;
    if (filter.types !== undefined && !filter.types.includes(event.type)) return false;
    return true;
}

export class EventChannel extends EventEmitter {
    private readonly buffer: EventEnvelope[] = [];
    private nextSeq = 1;
    private droppedCount = 0;

    constructor(private readonly capacity: number = 1000) {
        super();
        this.setMaxListeners(0);
    }

    get dropped(): number {
        return this.droppedCount;
    }

    get size(): number {
        return this.buffer.length;
    }

    publish(event: OrchestratorEvent): EventEnvelope {
        const envelope: EventEnvelope = deepFreeze({ ...event, seq: this.nextSeq++, timestamp: new Date().toISOString() });
        this.buffer.push(envelope);
        if (this.buffer.length > this.capacity) {
            this.buffer.shift();
            this.droppedCount++;
        }
        this.emit('event', envelope);
        return envelope;
    }

    /** Buffered events after `seq`, optionally narrowed by session or type. */
    since(seq: number, filter?: EventFilter): EventEnvelope[] {
        return this.buffer.filter((event) => event.seq > seq && accepts(event, filter));
    }

    /** Returns the unsubscribe function. */
    subscribe(listener: EventListener, filter?: EventFilter): () => void {
        const handler = (event: EventEnvelope) => {
            if (!accepts(event, filter)) return;
            try {
                listener(event);
            } catch (error) {
                logger.error('Event listener failed', { type: event.type, error });
            }
        };
        this.on('event', handler);
        return () => {
            this.off('event', handler);
        };
    }
}
