import { EventEmitter } from 'events';
import type { AgentName } from '../contracts/agent-graph.js';
import { errorMessage } from '../errors/types.js';
import { logger } from '../observability/logger.js';

export type PipelineEventType =
  | 'pipeline.started'
  | 'pipeline.completed'
  | 'pipeline.failed'
  | 'stage.started'
  | 'stage.completed'
  | 'stage.failed';

export interface PipelineEvent {
  type: PipelineEventType;
  runId: string;
  storyId: string;
  stage?: AgentName;
  data: Record<string, unknown>;
  timestamp: string;
}

export type EventHandler = (event: PipelineEvent) => void;

const CHANNEL = 'pipeline_event';

/** `stage.*` matches `stage.started`; `*` alone matches everything. */
export function matchesPattern(pattern: string, type: string): boolean {
  if (pattern === '*') return true;
  const escaped = pattern
    .split('*')
    .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('[^.]*');
  return new RegExp(`^${escaped}$`).test(type);
}

export class EventBus {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(100);
  }

  publish(type: PipelineEventType, event: Omit<PipelineEvent, 'type' | 'timestamp'>): PipelineEvent {
    const published: PipelineEvent = { ...event, type, timestamp: new Date().toISOString() };
    this.emitter.emit(CHANNEL, published);
    return published;
  }

  /** Returns the unsubscribe function. A throwing handler is logged and skipped. */
  subscribe(pattern: string, handler: EventHandler): () => void {
    const listener = (event: PipelineEvent): void => {
      if (!matchesPattern(pattern, event.type)) return;

      try {
        handler(event);
      } catch (error) {
        logger.error('event_handler_error', 'Event handler threw', {
          pattern,
          eventType: event.type,
          error: errorMessage(error),
        });
      }
    };

    this.emitter.on(CHANNEL, listener);
    return () => {
      this.emitter.off(CHANNEL, listener);
    };
  }

  listenerCount(): number {
    return this.emitter.listenerCount(CHANNEL);
  }
}

export const eventBus = new EventBus();
