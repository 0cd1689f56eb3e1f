import { performance } from 'perf_hooks';
import { setTimeout as sleep } from 'timers/promises';
import type { Action } from './action.js';
import { actionPayload, describeAction } from './action.js';
import type { AuditLevel, AuditSink, AuditStage } from './audit.js';
import { NoopAuditSink, safeWrite } from './audit.js';
import type { DecisionMaker } from './decision.js';
import { buildInteractionPrompt } from './decision.js';
import { EscalationExhaustedError, TransportError, errorMessage } from './errors.js';
import { ConversationHistory } from './history.js';
import type { InteractionCategory } from './interaction.js';
import { InteractionClassifier, extractProgressPercent } from './interaction.js';
import { keysToSequence } from './keys.js';
import type { NotificationSink, PublishFn } from './notifications.js';
import { NoopNotificationSink, publisherFor } from './notifications.js';
import { parseActions, stripActions } from './parser.js';
import { ProgressMonitor } from './progress.js';
import type { TaskPriority, TaskRecord, TaskStore } from './taskStore.js';
import type { Telemetry } from './telemetry.js';
import { NoopTelemetry } from './telemetry.js';
import type { ShellTransport } from './transport.js';
import { captureOutput } from './transport.js';

export type ExecutorState = 'idle' | 'running_task' | 'interacting';

export interface AgentExecutorOptions {
  session_id?: string;
  /** Pause after every action so transient output settles. */
  actionDelayMs?: number;
  /** Pause between answering a prompt and re-reading the shell. */
  settleDelayMs?: number;
  keyEchoDelayMs?: number;
  quiescenceMs?: number;
  maxCaptureMs?: number;
  maxEscalationDepth?: number;
  /** Answer resolvable prompts with their default response without asking the decision-maker. */
  autoRespond?: boolean;
  progressPollMs?: number;
  progressCeilingMs?: number;
  facts?: Record<string, string>;
}

export interface AgentExecutorDeps {
  transport: ShellTransport;
  store: TaskStore;
  decisionMaker?: DecisionMaker;
  notifications?: NotificationSink;
  audit?: AuditSink;
  telemetry?: Telemetry;
  classifier?: InteractionClassifier;
  history?: ConversationHistory;
}

export interface SubmitOptions {
  priority?: TaskPriority;
}

export type SubmitRejection = 'busy' | 'no_actions' | 'duplicate';

export type SubmitResult =
  | {
      accepted: true;
      task_id: string;
      /** Resolves with the task as it stands when the run ends; never rejects. */
      completion: Promise<TaskRecord | undefined>;
    }
  | { accepted: false; reason: SubmitRejection };

export type EscalationResult =
  | { kind: 'resolved' }
  | { kind: 'escalate'; category: InteractionCategory; output: string }
  | { kind: 'exhausted'; category: InteractionCategory; depth: number }
  | { kind: 'stopped' };

export interface ExecutorStatus {
  session_id: string;
  state: ExecutorState;
  busy: boolean;
  current_task?: TaskRecord;
  pending_tasks: number;
  total_tasks: number;
}

type RunOutcome = 'completed' | 'escalated' | 'failed' | 'stopped' | 'not_started';

const RESOLVED: EscalationResult = { kind: 'resolved' };

export class AgentExecutor {
  readonly session_id: string;
  private transport: ShellTransport;
  private store: TaskStore;
  private decisionMaker?: DecisionMaker;
  private audit: AuditSink;
  private telemetry: Telemetry;
  private classifier: InteractionClassifier;
  private history: ConversationHistory;
  private publish: PublishFn;

  private busy = false;
  private state: ExecutorState = 'idle';
  private activeTaskId?: string;
  private activeMonitor?: ProgressMonitor;
  private stopRequested = false;

  constructor(
    deps: AgentExecutorDeps,
    private opts: AgentExecutorOptions = {}
  ) {
    this.session_id = opts.session_id ?? 'default';
    this.transport = deps.transport;
    this.store = deps.store;
    this.decisionMaker = deps.decisionMaker;
    this.audit = deps.audit ?? new NoopAuditSink();
    this.telemetry = deps.telemetry ?? NoopTelemetry;
    this.classifier = deps.classifier ?? new InteractionClassifier();
    this.history = deps.history ?? new ConversationHistory();
    this.publish = publisherFor(
      deps.notifications ?? new NoopNotificationSink(),
      this.session_id
    );
  }

  /**
   * Accepts model text and starts running its actions. The decision is made
   * synchronously: a second call while a task runs is rejected, never queued.
   */
  submit(message: string, opts: SubmitOptions = {}): SubmitResult {
    if (this.busy) {
      const error = 'Another task is already running; wait for it to finish';
      this.reject('busy', error);
      this.publish('agent_error', { task_id: this.activeTaskId, error });
      return { accepted: false, reason: 'busy' };
    }

    const actions = parseActions(message);
    if (actions.length === 0) {
      this.reject('no_actions', 'Message contains no actions');
      return { accepted: false, reason: 'no_actions' };
    }

    const payloads = actions.map(actionPayload);
    if (this.store.hasPendingDuplicate(message, payloads)) {
      this.reject('duplicate', 'Identical task is already pending');
      return { accepted: false, reason: 'duplicate' };
    }

    this.busy = true;
    const task_id = this.store.create(message, opts.priority ?? 'medium', payloads);
    this.history.add('assistant', message);
    this.log('info', 'submit', `Created task with ${actions.length} action(s)`, task_id, {
      actions: payloads
    });
    this.publish('task_created', {
      task_id,
      description: message,
      actions_count: actions.length
    });

    const completion = this.run(task_id, actions).catch((err: unknown) => {
      this.log('error', 'task', `Task run aborted: ${errorMessage(err)}`, task_id);
      return this.store.get(task_id);
    });
    return { accepted: true, task_id, completion };
  }

  /**
   * Interrupts the running task: sends ETX and stops the progress watch.
   * The worker exits at its next check point and leaves the task as it was.
   */
  async stop(): Promise<boolean> {
    if (!this.busy) return false;
    this.stopRequested = true;
    this.activeMonitor?.stop();
    this.log('warn', 'task', 'Stop requested', this.activeTaskId);
    try {
      await this.send('\x03');
      return true;
    } catch (err) {
      this.log('error', 'task', `Failed to interrupt shell: ${errorMessage(err)}`, this.activeTaskId);
      return false;
    }
  }

  /** Raw user input, accepted only while no task owns the shell. */
  async sendInput(text: string): Promise<boolean> {
    if (this.busy) return false;
    await this.send(text);
    await sleep(this.opts.keyEchoDelayMs ?? 300);
    const output = await this.transport.readAvailable();
    if (output) this.publish('command_output', { output });
    return true;
  }

  status(): ExecutorStatus {
    return {
      session_id: this.session_id,
      state: this.state,
      busy: this.busy,
      current_task: this.activeTaskId ? this.store.get(this.activeTaskId) : undefined,
      pending_tasks: this.store.pending().length,
      total_tasks: this.store.list().length
    };
  }

  private async run(task_id: string, actions: Action[]): Promise<TaskRecord | undefined> {
    const span = this.telemetry.tracer.startSpan(
      'agent.task',
      { session_id: this.session_id, task_id },
      { actions: actions.length }
    );
    const start = performance.now();
    let outcome: RunOutcome = 'failed';
    this.stopRequested = false;

    try {
      if (!this.store.start(task_id)) {
        outcome = 'not_started';
        const error = `Unable to start task ${task_id}`;
        this.log('error', 'task', error, task_id);
        this.publish('agent_error', { task_id, error });
        return this.store.get(task_id);
      }
      this.activeTaskId = task_id;
      this.state = 'running_task';

      for (const [index, action] of actions.entries()) {
        if (this.stopRequested) {
          outcome = 'stopped';
          this.log('warn', 'task', 'Stopped before remaining actions', task_id, {
            remaining: actions.length - index
          });
          return this.store.get(task_id);
        }

        const step = await this.dispatch(task_id, action, index, actions.length);
        if (step.kind === 'stopped') {
          outcome = 'stopped';
          return this.store.get(task_id);
        }
        if (step.kind === 'escalate') {
          outcome = 'escalated';
          const result = `Awaiting user input: ${step.category} prompt after "${describeAction(action)}"`;
          this.store.complete(task_id, result);
          this.log('info', 'task', result, task_id, {
            skipped: actions.length - index - 1
          });
          this.publish('task_completed', { task_id, status: 'completed', result });
          return this.store.get(task_id);
        }

        await sleep(this.opts.actionDelayMs ?? 500);
      }

      const result = summarize(actions);
      this.store.complete(task_id, result);
      outcome = 'completed';
      this.log('info', 'task', 'Task completed', task_id);
      this.publish('task_completed', { task_id, status: 'completed', result });
    } catch (err) {
      const error = errorMessage(err);
      outcome = 'failed';
      this.store.fail(task_id, error);
      this.log('error', 'task', `Task failed: ${error}`, task_id);
      this.publish('agent_error', { task_id, error });
      span.recordException(err);
    } finally {
      this.busy = false;
      this.state = 'idle';
      this.activeTaskId = undefined;
      this.activeMonitor = undefined;
      this.telemetry.metrics.incCounter('agent_tasks_total', 1, { outcome });
      this.telemetry.metrics.observeHistogram(
        'agent_task_duration_ms',
        performance.now() - start,
        { outcome }
      );
      span.end(outcome === 'completed' || outcome === 'escalated' ? 'ok' : 'error');
    }

    return this.store.get(task_id);
  }

  private async dispatch(
    task_id: string,
    action: Action,
    index: number,
    total: number
  ): Promise<EscalationResult> {
    const span = this.telemetry.tracer.startSpan(
      'agent.action',
      { session_id: this.session_id, task_id },
      { kind: action.kind, index }
    );
    const start = performance.now();
    this.telemetry.metrics.incCounter('agent_actions_total', 1, { kind: action.kind });
    this.log('info', 'dispatch', `Action ${index + 1}/${total}: ${describeAction(action)}`, task_id);

    try {
      let result: EscalationResult = RESOLVED;
      switch (action.kind) {
        case 'run_command':
          result = await this.runCommand(task_id, action.command);
          break;
        case 'send_keys':
          await this.sendKeys(task_id, action.keys);
          break;
        case 'wait':
          await sleep(action.seconds * 1000);
          break;
      }
      if (result.kind === 'exhausted') {
        throw new EscalationExhaustedError(result.depth, result.category);
      }
      span.end('ok');
      return result;
    } catch (err) {
      span.recordException(err);
      span.end('error');
      throw err;
    } finally {
      this.telemetry.metrics.observeHistogram(
        'agent_action_duration_ms',
        performance.now() - start,
        { kind: action.kind }
      );
    }
  }

  private async runCommand(task_id: string, command: string): Promise<EscalationResult> {
    await this.send(`${command}\n`);
    const output = await captureOutput(this.transport, {
      quiescenceMs: this.opts.quiescenceMs ?? 2000,
      maxWaitMs: this.opts.maxCaptureMs ?? 30_000
    });
    if (output) this.publish('command_output', { task_id, output });
    this.history.addShellOutput(command, output);

    const category = this.classifier.classify(output);
    if (!category || category === 'completion') return RESOLVED;
    if (category === 'progress') return this.watchProgress(task_id, output, 0);
    return this.resolveInteraction(task_id, category, output, 0);
  }

  private async sendKeys(task_id: string, keys: readonly string[]): Promise<void> {
    this.publish('command_output', { task_id, output: `\n[agent keys] ${keys.join(' + ')}\n` });
    await this.send(keysToSequence(keys));
    await sleep(this.opts.keyEchoDelayMs ?? 300);
    const output = await this.transport.readAvailable();
    if (output) this.publish('command_output', { task_id, output });
  }

  /** Publishes the percent already on screen, then polls until the command finishes. */
  private async watchProgress(
    task_id: string,
    output: string,
    depth: number
  ): Promise<EscalationResult> {
    const percent = extractProgressPercent(output);
    if (percent !== undefined) this.publish('download_progress', { task_id, percent });
    if (this.stopRequested) return { kind: 'stopped' };
    const monitor = new ProgressMonitor(this.transport, this.classifier, {
      pollIntervalMs: this.opts.progressPollMs,
      ceilingMs: this.opts.progressCeilingMs,
      onOutput: output => this.publish('command_output', { task_id, output }),
      onProgress: percent => this.publish('download_progress', { task_id, percent })
    });
    this.activeMonitor = monitor;
    this.log('info', 'progress', 'Watching long-running command', task_id);

    const report = await monitor.watch().finally(() => {
      this.activeMonitor = undefined;
    });

    switch (report.kind) {
      case 'completed':
        this.log('info', 'progress', `Completed after ${report.polls} poll(s)`, task_id);
        this.publish('download_complete', { task_id, polls: report.polls });
        return RESOLVED;
      case 'timeout':
        this.log('warn', 'progress', 'Progress watch timed out; command may still be running', task_id, {
          polls: report.polls,
          percent: report.percent
        });
        this.publish('download_timeout', {
          task_id,
          polls: report.polls,
          percent: report.percent
        });
        return RESOLVED;
      case 'stopped':
        return { kind: 'stopped' };
      case 'interaction':
        return this.resolveInteraction(task_id, report.category, report.output, depth);
    }
  }

  /**
   * Answers a detected prompt and follows up until the shell stops asking.
   * Each follow-up prompt counts towards `maxEscalationDepth`; passing it
   * yields `exhausted` rather than looping forever.
   */
  private async resolveInteraction(
    task_id: string,
    category: InteractionCategory,
    output: string,
    depth: number
  ): Promise<EscalationResult> {
    const maxDepth = this.opts.maxEscalationDepth ?? 10;
    if (this.stopRequested) return { kind: 'stopped' };
    if (depth >= maxDepth) return { kind: 'exhausted', category, depth };

    this.telemetry.metrics.incCounter('agent_interactions_total', 1, { category });
    this.log('info', 'interaction', `Detected ${category} prompt`, task_id, { depth });
    this.publish('interaction_detected', { task_id, category, depth, output });

    if (category === 'credential') {
      this.publish('decision_required', { task_id, category, output });
      return { kind: 'escalate', category, output };
    }

    this.state = 'interacting';
    try {
      await this.respond(task_id, category, output);
    } finally {
      this.state = 'running_task';
    }

    await sleep(this.opts.settleDelayMs ?? 1000);
    const followUp = await this.transport.readAvailable();
    if (!followUp.trim()) return RESOLVED;
    this.publish('command_output', { task_id, output: followUp });

    const next = this.classifier.classify(followUp);
    if (!next || next === 'completion') return RESOLVED;
    if (next === 'progress') return this.watchProgress(task_id, followUp, depth + 1);
    return this.resolveInteraction(task_id, next, followUp, depth + 1);
  }

  private async respond(
    task_id: string,
    category: InteractionCategory,
    output: string
  ): Promise<void> {
    if (this.decisionMaker && !this.opts.autoRespond) {
      let reply: string | undefined;
      try {
        reply = await this.decisionMaker.decide({
          session_id: this.session_id,
          task_id,
          category,
          output,
          instruction: buildInteractionPrompt(category, output, this.opts.facts),
          history: this.history.recent(),
          facts: this.opts.facts
        });
      } catch (err) {
        this.log(
          'warn',
          'interaction',
          `Decision-maker ${this.decisionMaker.name} failed, using default response: ${errorMessage(err)}`,
          task_id
        );
      }
      if (reply !== undefined && (await this.applyDecision(task_id, reply))) return;
    }

    const response = this.classifier.defaultResponse(category);
    if (!response) return;
    this.log('info', 'interaction', `Auto-responding to ${category} prompt`, task_id, {
      response: JSON.stringify(response)
    });
    await this.send(response);
  }

  /** Applies the keys and waits of a decision reply. Returns false when nothing was applied. */
  private async applyDecision(task_id: string, reply: string): Promise<boolean> {
    this.history.add('assistant', reply);
    const narration = stripActions(reply);
    if (narration) this.publish('agent_narration', { task_id, text: narration });

    let applied = 0;
    for (const action of parseActions(reply)) {
      switch (action.kind) {
        case 'run_command':
          this.log('warn', 'interaction', 'Ignoring RUN_COMMAND in interaction reply', task_id, {
            command: action.command
          });
          break;
        case 'send_keys':
          this.publish('command_output', {
            task_id,
            output: `\n[agent keys] ${action.keys.join(' + ')}\n`
          });
          await this.send(keysToSequence(action.keys));
          applied++;
          break;
        case 'wait':
          await sleep(action.seconds * 1000);
          applied++;
          break;
      }
    }
    return applied > 0;
  }

  private async send(data: string): Promise<void> {
    if (!this.transport.isConnected()) {
      throw new TransportError('Shell connection is not established');
    }
    await this.transport.send(data);
  }

  private reject(reason: SubmitRejection, message: string): void {
    this.telemetry.metrics.incCounter('agent_submissions_rejected_total', 1, { reason });
    this.log(reason === 'busy' ? 'warn' : 'info', 'submit', `Rejected: ${message}`, this.activeTaskId);
  }

  private log(
    level: AuditLevel,
    stage: AuditStage,
    message: string,
    task_id?: string,
    data?: unknown
  ): void {
    safeWrite(this.audit, {
      session_id: this.session_id,
      task_id,
      timestamp: new Date().toISOString(),
      level,
      stage,
      message,
      data
    });
  }
}

function summarize(actions: readonly Action[]): string {
  const shown = actions.slice(0, 5).map(a => `- ${describeAction(a)}`);
  const more = actions.length > 5 ? [`... and ${actions.length - 5} more`] : [];
  return [`Executed ${actions.length} action(s):`, ...shown, ...more].join('\n');
}
