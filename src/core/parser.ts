import type { Action } from './action.js';

const RUN_COMMAND_PATTERN = /RUN_COMMAND\{([^}]+)\}/g;
const SEND_KEYS_PATTERN = /SEND_KEYS\{([^}]+)\}/g;
const WAIT_PATTERN = /WAIT\{([^}]+)\}/g;

export const DEFAULT_WAIT_SECONDS = 1.0;

type MarkerForm = 'run_command' | 'send_keys' | 'wait';

interface MarkerMatch {
  form: MarkerForm;
  body: string;
  start: number;
  end: number;
}

const MARKER_PATTERNS: ReadonlyArray<[MarkerForm, RegExp]> = [
  ['run_command', RUN_COMMAND_PATTERN],
  ['send_keys', SEND_KEYS_PATTERN],
  ['wait', WAIT_PATTERN]
];

// A marker that starts inside an earlier marker is part of that marker's
// body, not an action of its own.
function scanMarkers(text: string): MarkerMatch[] {
  const found: MarkerMatch[] = [];
  for (const [form, pattern] of MARKER_PATTERNS) {
    for (const m of text.matchAll(pattern)) {
      const start = m.index ?? 0;
      found.push({ form, body: m[1] ?? '', start, end: start + m[0].length });
    }
  }
  found.sort((a, b) => a.start - b.start);

  const accepted: MarkerMatch[] = [];
  let claimedUntil = 0;
  for (const match of found) {
    if (match.start < claimedUntil) continue;
    accepted.push(match);
    claimedUntil = match.end;
  }
  return accepted;
}

function bodies(markers: readonly MarkerMatch[], form: MarkerForm): string[] {
  return markers.filter(m => m.form === form).map(m => m.body);
}

function unquote(token: string): string {
  return token.trim().replace(/^["']+|["']+$/g, '');
}

function parseSeconds(raw: string): number {
  const trimmed = raw.trim();
  if (trimmed === '') return DEFAULT_WAIT_SECONDS;
  const value = Number(trimmed);
  if (!Number.isFinite(value) || value < 0) return DEFAULT_WAIT_SECONDS;
  return value;
}

/**
 * Extracts actions from model text. Each marker form is scanned on its own,
 * so the result lists every RUN_COMMAND first, then SEND_KEYS, then WAIT;
 * only the order within one form follows the source text. Markers nested in
 * the body of an earlier marker are not actions.
 */
export function parseActions(text: string): Action[] {
  const created_at = new Date().toISOString();
  const actions: Action[] = [];
  const markers = scanMarkers(text);

  for (const raw of bodies(markers, 'run_command')) {
    const command = raw.trim();
    if (!command) continue;
    actions.push({ kind: 'run_command', command, created_at });
  }

  for (const raw of bodies(markers, 'send_keys')) {
    actions.push({
      kind: 'send_keys',
      keys: raw.split(',').map(unquote),
      created_at
    });
  }

  for (const raw of bodies(markers, 'wait')) {
    actions.push({ kind: 'wait', seconds: parseSeconds(raw), created_at });
  }

  return actions;
}

export function hasActions(text: string): boolean {
  return parseActions(text).length > 0;
}

/** Model text with every action marker removed. */
export function stripActions(text: string): string {
  let stripped = '';
  let cursor = 0;
  for (const marker of scanMarkers(text)) {
    stripped += text.slice(cursor, marker.start);
    cursor = marker.end;
  }
  stripped += text.slice(cursor);
  return stripped.replace(/\n{3,}/g, '\n\n').trim();
}
