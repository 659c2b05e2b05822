/**
 * Detect text in a task body that says the work is not finished yet:
 * unchecked checklist items, a "Remaining:" heading, an "N% complete" below
 * 100, or a WIP / in-progress note.
 */
export function findIncompleteMarkers(body: string): string[] {
  const found: string[] = [];

  for (const m of body.matchAll(/^\s*[-*]\s*\[ \]\s*(.+)$/gm)) {
    found.push(`unchecked item: ${m[1].trim()}`);
  }

  if (/^#+\s*Remaining:/im.test(body)) {
    found.push('"Remaining:" section');
  }

  for (const m of body.matchAll(/(\d+)%\s*complete/gi)) {
    const pct = Number(m[1]);
    if (pct < 100) found.push(`${pct}% complete`);
  }

  const wip = /\b(WIP|in-progress)\b/i.exec(body);
  if (wip) found.push(`marked ${wip[1]}`);

  return found;
}
