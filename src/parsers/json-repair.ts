/**
 * Tolerant JSON Parser - Best-effort JSON extraction from model answers
 * Models wrap JSON in code fences or prose; this recovers the first usable value
 */

/**
 * Outcome of a tolerant parse
 * - empty: nothing but whitespace (or bare fences)
 * - direct: the whole fence-stripped text is JSON
 * - extracted: the first balanced {…} or […] region that is JSON
 * - invalid: no JSON found
 */
export type JsonParseResult =
  | { kind: 'empty' }
  | { kind: 'direct'; value: unknown }
  | { kind: 'extracted'; value: unknown; fragment: string }
  | { kind: 'invalid'; text: string; reason: string };

/**
 * Remove markdown code-fence markers (``` and ```json) anywhere in the text
 *
 * @example
 * stripCodeFences('```json\n{"a":1}\n```') → '{"a":1}'
 */
export function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?/gi, '').trim();
}

/**
 * Find the balanced region starting at `start`, honouring JSON strings
 * Returns null when brackets close out of order or never close
 */
function balancedRegionAt(text: string, start: number): string | null {
  const closers: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      closers.push('}');
    } else if (char === '[') {
      closers.push(']');
    } else if (char === '}' || char === ']') {
      if (closers.pop() !== char) {
        return null;
      }
      if (closers.length === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return null;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; reason: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Parse model output as JSON, tolerating fences and surrounding prose
 *
 * @example
 * parseTolerantJson('Plan: {"tool_name": "x"} done')
 * → { kind: 'extracted', value: { tool_name: 'x' }, fragment: '{"tool_name": "x"}' }
 */
export function parseTolerantJson(raw: string): JsonParseResult {
  const text = stripCodeFences(raw);
  if (text.length === 0) {
    return { kind: 'empty' };
  }

  const direct = tryParse(text);
  if (direct.ok) {
    return { kind: 'direct', value: direct.value };
  }

  for (let i = 0; i < text.length; i++) {
    if (text[i] !== '{' && text[i] !== '[') continue;

    const fragment = balancedRegionAt(text, i);
    if (fragment === null) continue;

    const extracted = tryParse(fragment);
    if (extracted.ok) {
      return { kind: 'extracted', value: extracted.value, fragment };
    }
  }

  return { kind: 'invalid', text, reason: direct.reason };
}
