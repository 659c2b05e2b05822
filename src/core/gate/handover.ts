export const HANDOVER_FIELDS = ['Outcome', 'Accomplishments', 'Next step'] as const;
export type HandoverField = (typeof HANDOVER_FIELDS)[number];

export type HandoverCheck =
  | { ok: true; fields: Record<HandoverField, string> }
  | { ok: false; sectionFound: boolean; missing: HandoverField[] };

const SECTION_HEADING = /^(#{1,6})\s*Handover\b.*$/im;
const FIELD_LINE = /^\s*(?:[-*]\s*)?\*\*([^*]+)\*\*\s*:?\s*(.*)$/;

/**
 * Structural check of a session handover:
 *
 * ```
 * ## Handover
 * **Outcome**: success
 * **Accomplishments**:
 * - wired the parser
 * **Next step**: review
 * ```
 *
 * A field whose value is on the following bullet lines counts as filled.
 */
export function parseHandover(text: string): HandoverCheck {
  const section = extractSection(text);
  if (section === null) return { ok: false, sectionFound: false, missing: [...HANDOVER_FIELDS] };

  const values = new Map<string, string[]>();
  let current: string | null = null;
  for (const line of section.split('\n')) {
    const m = FIELD_LINE.exec(line);
    if (m) {
      current = m[1].trim().toLowerCase();
      values.set(current, m[2].trim() ? [m[2].trim()] : []);
      continue;
    }
    if (current && line.trim()) values.get(current)?.push(line.trim());
  }

  const fields: Partial<Record<HandoverField, string>> = {};
  const missing: HandoverField[] = [];
  for (const f of HANDOVER_FIELDS) {
    const v = (values.get(f.toLowerCase()) ?? []).join('\n');
    if (v) fields[f] = v;
    else missing.push(f);
  }

  if (missing.length) return { ok: false, sectionFound: true, missing };
  return {
    ok: true,
    fields: { Outcome: fields.Outcome ?? '', Accomplishments: fields.Accomplishments ?? '', 'Next step': fields['Next step'] ?? '' }
  };
}

function extractSection(text: string): string | null {
  const heading = SECTION_HEADING.exec(text);
  if (!heading) return null;
  const level = heading[1].length;
  const rest = text.slice(heading.index + heading[0].length);
  const end = new RegExp(`^#{1,${level}}\\s`, 'm').exec(rest);
  return end ? rest.slice(0, end.index) : rest;
}
