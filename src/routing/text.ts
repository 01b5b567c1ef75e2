/** Lower-case and strip combining accents: "Olá" -> "ola" */
export function foldText(text: string): string {
  return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '').toLowerCase();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a folded pattern into a regex anchored on word boundaries.
 * Inner whitespace matches any run of whitespace.
 */
export function compilePattern(pattern: string): RegExp {
  const body = foldText(pattern).trim().split(/\s+/).map(escapeRegExp).join('\\s+');
  return new RegExp(`(?:^|[^a-z0-9])(${body})(?=$|[^a-z0-9])`);
}

const EMAIL_RE = /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/i;
const PHONE_RE = /\+?\d[\d\s().-]{8,}\d/;

export interface ContactHints {
  email?: string;
  /** Digits only */
  phone?: string;
}

/** Pull the first email address and phone number out of free text */
export function extractContactHints(text: string): ContactHints {
  const hints: ContactHints = {};
  const email = EMAIL_RE.exec(text);
  if (email) hints.email = email[0].toLowerCase();

  // Strip the email first so its digits are not read as a phone number
  const rest = email ? text.replace(email[0], ' ') : text;
  const phone = PHONE_RE.exec(rest);
  if (phone) {
    const digits = phone[0].replace(/\D/g, '');
    if (digits.length >= 10 && digits.length <= 15) hints.phone = digits;
  }
  return hints;
}
