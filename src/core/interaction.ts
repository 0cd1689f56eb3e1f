export type InteractionCategory =
  | 'confirmation'
  | 'continuation'
  | 'credential'
  | 'progress'
  | 'completion'
  | 'install_prompt';

export interface InteractionRule {
  name: string;
  category: InteractionCategory;
  pattern: RegExp;
}

export interface InteractionMatch {
  rule: string;
  category: InteractionCategory;
}

// Order matters: the first matching rule wins, so prompts that need an
// answer are listed ahead of completion, and completion ahead of progress.
export const DEFAULT_INTERACTION_RULES: readonly InteractionRule[] = [
  {
    name: 'yes_no',
    category: 'confirmation',
    pattern: /\b(?:y\/n|yes\/no)\b|\b(?:continue|proceed)\s*\?/i
  },
  {
    name: 'are_you_sure',
    category: 'confirmation',
    pattern: /\b(?:confirm|are\s+you\s+sure|really\s+want|overwrite)\b/i
  },
  {
    name: 'password',
    category: 'credential',
    pattern: /\b(?:password|passphrase|passwd)(?:\s+for\s+\S+)?\s*[:：]?\s*$/im
  },
  {
    name: 'press_key',
    category: 'continuation',
    pattern: /\bpress\s+(?:any\s+key|enter|return)\b|--More--|\(END\)/i
  },
  {
    name: 'install_question',
    category: 'install_prompt',
    pattern: /\b(?:would\s+you\s+like\s+to\s+install|install|setup)\b[^\n]*\?/i
  },
  {
    name: 'finished',
    category: 'completion',
    pattern:
      /\b(?:download|installation|setup)\s+complete(?:d)?\b|\bsuccessfully\s+installed\b|(?<!\d)100\s?%/i
  },
  {
    name: 'progress',
    category: 'progress',
    pattern: /\b(?:downloading|progress)\b|\d{1,3}(?:\.\d+)?\s?%|\[#+[\s.-]*\]/i
  }
];

const DEFAULT_RESPONSES: Record<InteractionCategory, string> = {
  confirmation: 'y\n',
  install_prompt: 'y\n',
  continuation: '\n',
  credential: '',
  progress: '',
  completion: ''
};

export class InteractionClassifier {
  constructor(
    private rules: readonly InteractionRule[] = DEFAULT_INTERACTION_RULES
  ) {}

  match(output: string): InteractionMatch | undefined {
    for (const rule of this.rules) {
      if (rule.pattern.test(output)) {
        return { rule: rule.name, category: rule.category };
      }
    }
    return undefined;
  }

  classify(output: string): InteractionCategory | undefined {
    return this.match(output)?.category;
  }

  /**
   * Fixed reply for categories that can be answered without a decision.
   * An empty string means the caller has to escalate instead.
   */
  defaultResponse(category: InteractionCategory): string {
    return DEFAULT_RESPONSES[category];
  }
}

/** True for categories that only report state and never take a reply. */
export function isInformational(category: InteractionCategory): boolean {
  return category === 'progress' || category === 'completion';
}

export function extractProgressPercent(output: string): number | undefined {
  let percent: number | undefined;
  for (const m of output.matchAll(/(\d{1,3}(?:\.\d+)?)\s?%|\b(\d+)\/(\d+)\b/g)) {
    if (m[1] !== undefined) {
      percent = Number(m[1]);
    } else if (m[2] !== undefined && m[3] !== undefined) {
      const total = Number(m[3]);
      if (total > 0) percent = (Number(m[2]) / total) * 100;
    }
  }
  if (percent === undefined) return undefined;
  return Math.min(100, Math.max(0, Math.round(percent)));
}
