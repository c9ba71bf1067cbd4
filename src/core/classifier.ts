/**
 * Field classification for decrypted pass entries
 *
 * pass stores the secret on the first line; the rest is free-form.
 * Lines are assigned to fields by ordered rules, first match wins:
 *
 *   1. first line          -> password
 *   2. username:/user:/login: label -> username (first one only)
 *   3. contains "@"        -> email (first one only)
 *   4. everything else     -> note
 *
 * Rule 2 runs before rule 3 so "username: alice@corp.com" is a username.
 */

import type { DecryptedPayload } from '../store/types';

export type Field = 'password' | 'username' | 'email' | 'note';

export interface ClassifiedRecord {
  readonly name: string;
  readonly password: string;
  readonly username: string;
  readonly email: string;
  readonly note: string;
}

export interface LineAssignment {
  field: Field;
  /** Line as it appears in the payload (trimmed) */
  line: string;
  /** Value contributed to the field */
  value: string;
}

export interface ClassifyOptions {
  /** Joins note lines (default: "\n") */
  noteSeparator?: string;
}

export const USERNAME_LABELS = ['username', 'user', 'login'] as const;

const USERNAME_PATTERN = new RegExp(`^(?:${USERNAME_LABELS.join('|')})\\s*:\\s*(.*)$`, 'i');

/**
 * Value of a username-labelled line, or null when the line has no label.
 */
export function matchUsername(line: string): string | null {
  const match = line.match(USERNAME_PATTERN);
  return match ? match[1].trim() : null;
}

/**
 * Value of an email-like line, or null when it has no "@".
 * A "label:" before the address is dropped ("email: a@b.com" -> "a@b.com").
 */
export function matchEmail(line: string): string | null {
  const at = line.indexOf('@');
  if (at === -1) return null;

  const colon = line.indexOf(':');
  if (colon !== -1 && colon < at) {
    return line.slice(colon + 1).trim();
  }
  return line;
}

/**
 * Assign every payload line to exactly one field.
 */
export function classifyLines(lines: DecryptedPayload): LineAssignment[] {
  const assignments: LineAssignment[] = [];
  let hasUsername = false;
  let hasEmail = false;

  lines.forEach((raw, index) => {
    const line = raw.trim();

    if (index === 0) {
      assignments.push({ field: 'password', line, value: line });
      return;
    }

    if (!hasUsername) {
      const username = matchUsername(line);
      if (username !== null) {
        hasUsername = true;
        assignments.push({ field: 'username', line, value: username });
        return;
      }
    }

    if (!hasEmail) {
      const email = matchEmail(line);
      if (email !== null) {
        hasEmail = true;
        assignments.push({ field: 'email', line, value: email });
        return;
      }
    }

    assignments.push({ field: 'note', line, value: line });
  });

  return assignments;
}

/**
 * Build the structured record for one entry.
 */
export function classifyPayload(
  name: string,
  lines: DecryptedPayload,
  options: ClassifyOptions = {}
): ClassifiedRecord {
  const separator = options.noteSeparator ?? '\n';
  const fields = { password: '', username: '', email: '' };
  const notes: string[] = [];

  for (const assignment of classifyLines(lines)) {
    if (assignment.field === 'note') {
      notes.push(assignment.value);
    } else {
      fields[assignment.field] = assignment.value;
    }
  }

  return Object.freeze({
    name,
    ...fields,
    note: notes.join(separator),
  });
}
