export type OperationType = "READ" | "WRITE" | "GENERAL";

// Checked before WRITE: "do you remember what I said" is a lookup.
const READ_PATTERNS: readonly RegExp[] = [
  /\b(what|whats|what's)\b.*\b(my|your|their|our)\b/,
  /\bdo you (know|remember)\b/,
  /\bcan you (recall|tell me|remind me)\b/,
  /\bwhat did i (say|tell|mention)\b/,
  /\b(retrieve|recall|find|search|look up|get)\b/,
  /\b(show me|tell me about)\b/,
];

const WRITE_PATTERNS: readonly RegExp[] = [
  /\b(remember|memorize|store|save|keep track|note that)\b/,
  /\bmy\b.*\bis\b/,
  /\bi (am|like|prefer|want|need)\b/,
  /\badd (this|that|to)\b/,
  /\b(put in|write down)\b/,
];

/** Labels the latest user message; anything unmatched is GENERAL. */
export function classify(message: string): OperationType {
  const text = message.toLowerCase();

  if (READ_PATTERNS.some((pattern) => pattern.test(text))) return "READ";
  if (WRITE_PATTERNS.some((pattern) => pattern.test(text))) return "WRITE";
  return "GENERAL";
}
