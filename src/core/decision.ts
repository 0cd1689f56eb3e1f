import type { HistoryMessage } from './history.js';
import type { InteractionCategory } from './interaction.js';

export interface DecisionRequest {
  session_id: string;
  task_id: string;
  category: InteractionCategory;
  /** Raw terminal output that triggered the escalation. */
  output: string;
  /** Instruction text built by `buildInteractionPrompt`. */
  instruction: string;
  history: HistoryMessage[];
  facts?: Record<string, string>;
}

/**
 * The upstream model. Replies are free text; action markers inside a reply
 * are applied by the executor and the rest is forwarded as narration.
 */
export interface DecisionMaker {
  name: string;
  decide(request: DecisionRequest): Promise<string>;
}

export const INTERACTION_SYSTEM_PROMPT =
  'You resolve interactive prompts in a remote shell session. Answer only with key presses or waits.';

const CATEGORY_HINTS: Record<InteractionCategory, string> = {
  confirmation:
    'A yes/no confirmation. Decide from the command intent and answer with SEND_KEYS{"y","enter"} or SEND_KEYS{"n","enter"}.',
  install_prompt:
    'An installer asks whether to proceed. Answer with SEND_KEYS{"y","enter"} or SEND_KEYS{"n","enter"}.',
  continuation: 'The program waits for a key press. Continue with SEND_KEYS{"enter"}.',
  credential: 'A password prompt. Say that the user has to provide the password.',
  progress: 'A long-running operation is reporting progress. Use WAIT{n} if it needs more time.',
  completion: 'The operation reports completion. No input is needed.'
};

export function buildInteractionPrompt(
  category: InteractionCategory,
  output: string,
  facts?: Record<string, string>
): string {
  const lines = [
    'The shell is waiting for input after the last action.',
    '',
    `Output:\n${output.trim()}`,
    `Interaction: ${category}`,
    '',
    CATEGORY_HINTS[category],
    'Use SEND_KEYS{...} and WAIT{n} only. RUN_COMMAND is not accepted here.'
  ];
  if (facts && Object.keys(facts).length > 0) {
    lines.push(
      '',
      'System facts:',
      ...Object.entries(facts).map(([k, v]) => `- ${k}: ${v}`)
    );
  }
  return lines.join('\n');
}
