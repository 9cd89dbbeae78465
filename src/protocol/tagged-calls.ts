export interface TaggedCall {
  readonly name: string;
  readonly arguments: Readonly<Record<string, string>>;
  /** Offsets of the call block in the scanned text. */
  readonly start: number;
  readonly end: number;
}

export interface TaggedScan {
  readonly calls: readonly TaggedCall[];
  /** Input text with every extracted call block removed. */
  readonly text: string;
}

const FUNCTION_OPEN = "<function=";
const FUNCTION_CLOSE = "</function>";
const PARAM_CLOSE = "</parameter>";
const NAME = /^[A-Za-z_][\w.-]*$/;
const FUNCTION_TAG = /<function=([^>\n]*)>/y;
const PARAM_TAG = /\s*<parameter=([^>\n]*)>/y;

function readBlock(
  text: string,
  start: number,
  knownTools: ReadonlySet<string>,
): TaggedCall | undefined {
  FUNCTION_TAG.lastIndex = start;
  const open = FUNCTION_TAG.exec(text);
  if (!open) return undefined;

  const name = (open[1] ?? "").trim();
  if (!NAME.test(name) || !knownTools.has(name)) return undefined;

  const args: Record<string, string> = {};
  let count = 0;
  let pos = FUNCTION_TAG.lastIndex;

  for (;;) {
    PARAM_TAG.lastIndex = pos;
    const param = PARAM_TAG.exec(text);
    if (!param) break;

    const key = (param[1] ?? "").trim();
    if (!NAME.test(key)) return undefined;

    const valueStart = PARAM_TAG.lastIndex;
    const valueEnd = text.indexOf(PARAM_CLOSE, valueStart);
    if (valueEnd === -1) return undefined;

    const value = text.slice(valueStart, valueEnd);
    // An unterminated parameter runs into the next tag.
    if (value.includes("<parameter=") || value.includes(FUNCTION_OPEN)) return undefined;

    args[key] = value.trim();
    count++;
    pos = valueEnd + PARAM_CLOSE.length;
  }

  if (count === 0) return undefined;

  const close = text.indexOf(FUNCTION_CLOSE, pos);
  const nextOpen = text.indexOf(FUNCTION_OPEN, pos);
  let end = pos;
  if (close !== -1 && (nextOpen === -1 || close < nextOpen)) {
    if (text.slice(pos, close).trim() !== "") return undefined;
    end = close + FUNCTION_CLOSE.length;
  }

  return { name, arguments: args, start, end };
}

/**
 * Extracts `<function=NAME><parameter=KEY>VALUE</parameter>...` blocks.
 * Only blocks naming a known tool with at least one complete parameter are
 * calls; anything else stays in the text untouched.
 */
export function scanTaggedCalls(text: string, knownTools: ReadonlySet<string>): TaggedScan {
  const calls: TaggedCall[] = [];
  let from = 0;

  for (;;) {
    const start = text.indexOf(FUNCTION_OPEN, from);
    if (start === -1) break;

    const call = readBlock(text, start, knownTools);
    if (call) {
      calls.push(call);
      from = call.end;
    } else {
      from = start + FUNCTION_OPEN.length;
    }
  }

  if (calls.length === 0) return { calls, text };

  let remaining = "";
  let cursor = 0;
  for (const call of calls) {
    remaining += text.slice(cursor, call.start);
    cursor = call.end;
  }
  remaining += text.slice(cursor);

  return { calls, text: remaining.replace(/\n{3,}/g, "\n\n").trim() };
}
