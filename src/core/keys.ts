const KEY_SEQUENCES: Record<string, string> = {
  enter: '\r',
  return: '\r',
  tab: '\t',
  space: ' ',
  escape: '\x1b',
  esc: '\x1b',
  backspace: '\x08',
  delete: '\x7f',
  up: '\x1b[A',
  down: '\x1b[B',
  right: '\x1b[C',
  left: '\x1b[D',
  'ctrl+c': '\x03',
  'ctrl+d': '\x04',
  'ctrl+l': '\x0c',
  'ctrl+z': '\x1a'
};

const MODIFIERS = new Set(['ctrl', 'control', 'alt']);

function controlChar(key: string): string | undefined {
  if (!/^[a-z]$/.test(key)) return undefined;
  return String.fromCharCode(key.charCodeAt(0) & 0x1f);
}

function combine(modifier: string, key: string): string | undefined {
  const lower = key.toLowerCase().trim();
  if (modifier === 'alt') return `\x1b${key}`;
  return KEY_SEQUENCES[`ctrl+${lower}`] ?? controlChar(lower);
}

function mapToken(token: string): string {
  const lower = token.toLowerCase().trim();
  const known = KEY_SEQUENCES[lower];
  if (known !== undefined) return known;
  const chord = /^(ctrl|control|alt)\+(.+)$/.exec(lower);
  if (chord) {
    const combined = combine(chord[1] === 'alt' ? 'alt' : 'ctrl', chord[2] ?? '');
    if (combined !== undefined) return combined;
  }
  return token;
}

/**
 * Converts key tokens into the bytes sent to the shell. Named keys map to
 * their control sequence, a bare modifier token combines with the token
 * after it (`"ctrl","c"` is ETX) and anything else is sent literally.
 */
export function keysToSequence(keys: readonly string[]): string {
  let sequence = '';
  for (let i = 0; i < keys.length; i++) {
    const token = keys[i] ?? '';
    const lower = token.toLowerCase().trim();
    const next = keys[i + 1];
    if (MODIFIERS.has(lower) && next !== undefined) {
      const combined = combine(lower === 'alt' ? 'alt' : 'ctrl', next);
      if (combined !== undefined) {
        sequence += combined;
        i++;
        continue;
      }
    }
    sequence += mapToken(token);
  }
  return sequence;
}
