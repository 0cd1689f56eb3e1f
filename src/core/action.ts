export type ActionKind = 'run_command' | 'send_keys' | 'wait';

export interface RunCommandAction {
  readonly kind: 'run_command';
  readonly command: string;
  readonly created_at: string;
}

export interface SendKeysAction {
  readonly kind: 'send_keys';
  readonly keys: readonly string[];
  readonly created_at: string;
}

export interface WaitAction {
  readonly kind: 'wait';
  readonly seconds: number;
  readonly created_at: string;
}

export type Action = RunCommandAction | SendKeysAction | WaitAction;

/**
 * String form of an action used when comparing tasks for duplicates.
 */
export function actionPayload(action: Action): string {
  switch (action.kind) {
    case 'run_command':
      return action.command;
    case 'send_keys':
      return `keys:${action.keys.join(',')}`;
    case 'wait':
      return `wait:${action.seconds}`;
  }
}

export function describeAction(action: Action): string {
  switch (action.kind) {
    case 'run_command':
      return action.command;
    case 'send_keys':
      return `keys ${action.keys.join(' + ')}`;
    case 'wait':
      return `wait ${action.seconds}s`;
  }
}

/**
 * Rebuilds marker text for a list of actions. Parsing the result yields
 * the same actions (timestamps aside).
 */
export function serializeActions(actions: readonly Action[]): string {
  return actions
    .map(action => {
      switch (action.kind) {
        case 'run_command':
          return `RUN_COMMAND{${action.command}}`;
        case 'send_keys':
          return `SEND_KEYS{${action.keys.map(k => `"${k}"`).join(',')}}`;
        case 'wait':
          return `WAIT{${action.seconds}}`;
      }
    })
    .join('\n');
}
