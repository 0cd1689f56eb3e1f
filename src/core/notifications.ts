import type { InteractionCategory } from './interaction.js';
import type { TaskStatus } from './taskStore.js';

export interface AgentEventPayloads {
  task_created: { task_id: string; description: string; actions_count: number };
  task_completed: { task_id: string; status: TaskStatus; result?: string };
  agent_error: { task_id?: string; error: string };
  command_output: { task_id?: string; output: string };
  interaction_detected: {
    task_id: string;
    category: InteractionCategory;
    depth: number;
    output: string;
  };
  download_progress: { task_id: string; percent: number };
  download_complete: { task_id: string; polls: number };
  download_timeout: { task_id: string; polls: number; percent?: number };
  agent_narration: { task_id: string; text: string };
  decision_required: {
    task_id: string;
    category: InteractionCategory;
    output: string;
  };
}

export type AgentEventName = keyof AgentEventPayloads;

export interface AgentEvent<K extends AgentEventName = AgentEventName> {
  name: K;
  session_id: string;
  timestamp: string;
  payload: AgentEventPayloads[K];
}

/**
 * Observer for engine events. Delivery is fire-and-forget: publish must not
 * throw back into the engine and nothing waits for an acknowledgement.
 */
export interface NotificationSink {
  publish<K extends AgentEventName>(event: AgentEvent<K>): void;
}

export class NoopNotificationSink implements NotificationSink {
  publish(): void {}
}

export interface RecordedEvent {
  seq: number;
  event: AgentEvent;
}

export class InMemoryNotificationSink implements NotificationSink {
  private events: RecordedEvent[] = [];
  private seq = 0;

  constructor(private limit = 1000) {}

  publish<K extends AgentEventName>(event: AgentEvent<K>): void {
    this.seq += 1;
    // Widened for storage; consumers narrow again through `ofType`.
    const stored: AgentEvent = event;
    this.events.push({ seq: this.seq, event: stored });
    if (this.events.length > this.limit) {
      this.events.splice(0, this.events.length - this.limit);
    }
  }

  since(seq = 0): RecordedEvent[] {
    return this.events.filter(e => e.seq > seq);
  }

  names(): AgentEventName[] {
    return this.events.map(e => e.event.name);
  }

  ofType<K extends AgentEventName>(name: K): AgentEventPayloads[K][] {
    const payloads: AgentEventPayloads[K][] = [];
    for (const { event } of this.events) {
      if (isEvent(event, name)) payloads.push(event.payload);
    }
    return payloads;
  }
}

function isEvent<K extends AgentEventName>(
  event: AgentEvent,
  name: K
): event is AgentEvent<K> {
  return event.name === name;
}

export type PublishFn = <K extends AgentEventName>(
  name: K,
  payload: AgentEventPayloads[K]
) => void;

export function publisherFor(sink: NotificationSink, session_id: string): PublishFn {
  return (name, payload) => {
    sink.publish({ name, session_id, timestamp: new Date().toISOString(), payload });
  };
}
