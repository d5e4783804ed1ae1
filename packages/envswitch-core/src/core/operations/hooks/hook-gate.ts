export type HookCheck = { ok: true } | { ok: false; reason: string };

export const MAX_HOOK_COMMAND_LENGTH = 1000;

// matched case-insensitively as substrings
const DENIED_PATTERNS = [
  'rm -rf',
  'wget',
  '`',
  '$(',
  '&&',
  '||',
  '|&',
  '& ',
  '|sh',
  '|bash',
  '| sh',
  '| bash',
];

// a command word followed by any whitespace, reported as "<word> "
const DENIED_WORDS = /\b(sudo|su|curl|eval|exec)\s/i;

const ALLOWED_CHARACTERS = /^[a-zA-Z0-9\s\-_./=:@[\]{}()"']+$/;

/**
 * Static check run before a hook reaches the shell.
 *
 * This is a heuristic filter for obvious chaining, substitution, privilege
 * escalation and remote fetches. It is not a security boundary: hook text
 * must still come from a trusted environment file.
 */
export function validateHookCommand(command: string): HookCheck {
  if (command.length === 0) {
    return { ok: false, reason: 'hook command cannot be empty' };
  }
  if (command.length > MAX_HOOK_COMMAND_LENGTH) {
    return { ok: false, reason: `hook command too long (max ${MAX_HOOK_COMMAND_LENGTH} characters)` };
  }

  const lower = command.toLowerCase();
  const word = DENIED_WORDS.exec(command)?.[1];
  const denied = DENIED_PATTERNS.find((pattern) => lower.includes(pattern))
    ?? (word === undefined ? undefined : `${word.toLowerCase()} `);
  if (denied !== undefined) {
    return { ok: false, reason: `hook command contains potentially dangerous pattern: ${denied}` };
  }

  if (!ALLOWED_CHARACTERS.test(command)) {
    return { ok: false, reason: 'hook command contains unsafe characters' };
  }

  return { ok: true };
}
