import { LocalShellTransport } from './adapters/localShellTransport.js';
import { OpenAIDecisionMaker } from './adapters/openaiDecisionMaker.js';
import type { ShellpilotConfig } from './config.js';
import type { AuditSink } from './core/audit.js';
import { ConsoleAuditSink } from './core/audit.js';
import type { DecisionMaker } from './core/decision.js';
import { AgentExecutor } from './core/executor.js';
import { InMemoryNotificationSink } from './core/notifications.js';
import { SQLiteAuditSink } from './core/sqliteAuditSink.js';
import { SQLiteTaskSnapshotStore } from './core/sqliteTaskSnapshot.js';
import { TaskStore } from './core/taskStore.js';
import type { Telemetry } from './core/telemetry.js';
import { AuditTelemetry } from './core/telemetry.js';
import type { ShellTransport } from './core/transport.js';

export * from './core/action.js';
export * from './core/audit.js';
export * from './core/decision.js';
export * from './core/errors.js';
export * from './core/executor.js';
export * from './core/history.js';
export * from './core/interaction.js';
export * from './core/keys.js';
export * from './core/notifications.js';
export * from './core/parser.js';
export * from './core/progress.js';
export * from './core/sqliteAuditSink.js';
export * from './core/sqliteTaskSnapshot.js';
export * from './core/taskStore.js';
export * from './core/telemetry.js';
export * from './core/transport.js';
export * from './adapters/localShellTransport.js';
export * from './adapters/openaiDecisionMaker.js';
export { loadConfig, ConfigError } from './config.js';
export type { ShellpilotConfig } from './config.js';

export interface Agent {
  executor: AgentExecutor;
  store: TaskStore;
  notifications: InMemoryNotificationSink;
  telemetry: Telemetry;
  audit: AuditSink;
  close(): void;
}

export interface CreateAgentOverrides {
  transport?: ShellTransport;
  decisionMaker?: DecisionMaker;
  telemetry?: Telemetry;
  audit?: AuditSink;
}

/**
 * Wires the executor and its collaborators from configuration. Overrides
 * replace the configured transport, decision-maker, telemetry or audit sink.
 */
export function createAgent(
  config: ShellpilotConfig,
  overrides: CreateAgentOverrides = {}
): Agent {
  const closers: Array<() => void> = [];

  let audit = overrides.audit;
  if (!audit) {
    if (config.audit === 'sqlite') {
      const sink = new SQLiteAuditSink(config.dbPath);
      closers.push(() => sink.close());
      audit = sink;
    } else {
      audit = new ConsoleAuditSink();
    }
  }

  let persistence: SQLiteTaskSnapshotStore | undefined;
  if (config.store === 'sqlite') {
    persistence = new SQLiteTaskSnapshotStore(config.dbPath);
    const snapshots = persistence;
    closers.push(() => snapshots.close());
  }
  const store = new TaskStore({ persistence, audit, session_id: config.sessionId });

  let transport = overrides.transport;
  if (!transport) {
    const shell = new LocalShellTransport({ shell: config.shell });
    shell.open();
    closers.unshift(() => shell.close());
    transport = shell;
  }

  const decisionMaker =
    overrides.decisionMaker ??
    (config.llm.apiKey
      ? OpenAIDecisionMaker.fromApiKey(config.llm.apiKey, config.llm.baseURL, {
          model: config.llm.model
        })
      : undefined);

  const telemetry = overrides.telemetry ?? new AuditTelemetry(audit);
  const notifications = new InMemoryNotificationSink();

  const executor = new AgentExecutor(
    { transport, store, decisionMaker, notifications, audit, telemetry },
    {
      session_id: config.sessionId,
      actionDelayMs: config.actionDelayMs,
      settleDelayMs: config.settleDelayMs,
      quiescenceMs: config.quiescenceMs,
      maxCaptureMs: config.maxCaptureMs,
      maxEscalationDepth: config.maxEscalationDepth,
      autoRespond: config.autoRespond,
      progressPollMs: config.progressPollMs,
      progressCeilingMs: config.progressCeilingMs
    }
  );

  return {
    executor,
    store,
    notifications,
    telemetry,
    audit,
    close() {
      for (const close of closers) close();
    }
  };
}
