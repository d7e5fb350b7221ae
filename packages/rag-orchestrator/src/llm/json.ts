/**
 * Extract a JSON value from model output that may wrap it in prose or a code fence
 */
export function parseJSONResponse(raw: string): unknown {
  const text = raw.trim();

  const direct = tryParse(text);
  if (direct.ok) {
    return direct.value;
  }

  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced?.[1]) {
    const parsed = tryParse(fenced[1].trim());
    if (parsed.ok) {
      return parsed.value;
    }
  }

  const object = text.match(/\{[\s\S]*\}/);
  if (object) {
    const parsed = tryParse(object[0]);
    if (parsed.ok) {
      return parsed.value;
    }
  }

  throw new Error(`Failed to parse JSON from LLM response: ${text.slice(0, 200)}...`);
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}
